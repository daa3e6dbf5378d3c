import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, CreateDateColumn, UpdateDateColumn } from 'typeorm';
import { School } from '../../school/entities/school.entity';
import { decimalTransformer } from '../../common/utils/money.util';

@Entity('billing_items')
export class BillingItem {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  schoolId!: string;

  @ManyToOne(() => School, (school) => school.billingItems, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'schoolId' })
  school?: School;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'text', nullable: true })
  description?: string | null;

  @Column({ type: 'decimal', precision: 12, scale: 2, transformer: decimalTransformer })
  amount!: number;

  @Column({ default: false })
  isRecurring!: boolean;

  @Column({ type: 'varchar', length: 20, nullable: true })
  academicYear?: string | null; // e.g. 2025-2026

  @Column({ default: true })
  isActive!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
