import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, OneToMany, JoinColumn, CreateDateColumn, UpdateDateColumn, Index } from 'typeorm';
import { Student } from '../../student/entities/student.entity';
import { BillingItem } from './billing-item.entity';
import { Payment } from './payment.entity';
import { InvoiceStatus } from '../enums/invoice-status.enum';
import { decimalTransformer } from '../../common/utils/money.util';

@Entity('invoices')
export class Invoice {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ type: 'uuid' })
  studentId!: string;

  @ManyToOne(() => Student, (student) => student.invoices, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'studentId' })
  student?: Student;

  @Column({ type: 'uuid', nullable: true })
  billingItemId?: string | null;

  @ManyToOne(() => BillingItem, { nullable: true, onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'billingItemId' })
  billingItem?: BillingItem | null;

  @Column({ type: 'decimal', precision: 12, scale: 2, transformer: decimalTransformer })
  amount!: number;

  @Index()
  @Column({ type: 'date' })
  dueDate!: string;

  @Index()
  @Column({ type: 'enum', enum: InvoiceStatus, default: InvoiceStatus.PENDING })
  status!: InvoiceStatus;

  @Column({ type: 'text', nullable: true })
  description?: string | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  @OneToMany(() => Payment, (payment) => payment.invoice)
  payments?: Payment[];
}
