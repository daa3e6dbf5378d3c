import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, CreateDateColumn, Index } from 'typeorm';
import { Invoice } from './invoice.entity';
import { PaymentMethod } from '../enums/payment-method.enum';
import { decimalTransformer } from '../../common/utils/money.util';

// Payments are immutable once recorded: no update or delete path exists.
@Entity('payments')
export class Payment {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ type: 'uuid' })
  invoiceId!: string;

  @ManyToOne(() => Invoice, (invoice) => invoice.payments, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'invoiceId' })
  invoice?: Invoice;

  @Column({ type: 'decimal', precision: 12, scale: 2, transformer: decimalTransformer })
  amount!: number;

  @Index()
  @Column({ type: 'date' })
  paymentDate!: string;

  @Column({ type: 'enum', enum: PaymentMethod, default: PaymentMethod.CASH })
  method!: PaymentMethod;

  @Column({ type: 'varchar', length: 255, nullable: true })
  reference?: string | null;

  @CreateDateColumn()
  createdAt!: Date;
}
