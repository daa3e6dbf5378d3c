import { Invoice } from '../entities/invoice.entity';
import { Payment } from '../entities/payment.entity';
import { InvoiceStatus } from '../enums/invoice-status.enum';
import { paidAmount, pendingAmount } from '../utils/invoice-ledger.utils';

export interface InvoiceView {
  id: string;
  studentId: string;
  billingItemId: string | null;
  amount: number;
  dueDate: string;
  status: InvoiceStatus;
  description: string | null;
  paidAmount: number;
  pendingAmount: number;
  payments: Payment[];
  createdAt: Date;
  updatedAt: Date;
}

export interface InvoiceBalance {
  id: string;
  amount: number;
  status: InvoiceStatus;
  paidAmount: number;
  pendingAmount: number;
}

export interface RecordedPayment {
  payment: Payment;
  invoice: InvoiceBalance;
}

export const newestFirst = (left: { createdAt: Date }, right: { createdAt: Date }): number =>
  new Date(right.createdAt).getTime() - new Date(left.createdAt).getTime();

export const toInvoiceView = (invoice: Invoice, payments: Payment[] = invoice.payments ?? []): InvoiceView => ({
  id: invoice.id,
  studentId: invoice.studentId,
  billingItemId: invoice.billingItemId ?? null,
  amount: invoice.amount,
  dueDate: invoice.dueDate,
  status: invoice.status,
  description: invoice.description ?? null,
  paidAmount: paidAmount(payments),
  pendingAmount: pendingAmount(invoice.amount, payments),
  payments: [...payments].sort(newestFirst),
  createdAt: invoice.createdAt,
  updatedAt: invoice.updatedAt,
});
