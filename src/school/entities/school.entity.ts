import { Entity, PrimaryGeneratedColumn, Column, OneToMany, CreateDateColumn, UpdateDateColumn } from 'typeorm';
import { Grade } from '../../grades/entity/grade.entity';
import { Student } from '../../student/entities/student.entity';
import { BillingItem } from '../../billing/entities/billing-item.entity';

@Entity('schools')
export class School {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'varchar', length: 500, nullable: true })
  address?: string | null;

  @Column({ type: 'varchar', length: 50, nullable: true })
  phone?: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  email?: string | null;

  // Soft delete; rows are never removed while invoices reference them
  @Column({ default: true })
  isActive!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  @OneToMany(() => Student, (student) => student.school)
  students?: Student[];

  @OneToMany(() => Grade, (grade) => grade.school)
  grades?: Grade[];

  @OneToMany(() => BillingItem, (item) => item.school)
  billingItems?: BillingItem[];
}
