import { InvoiceStatus } from '../enums/invoice-status.enum';
import { fromCents, sumCents, toCents } from '../../common/utils/money.util';
import { calendarDaysBetween } from '../../common/utils/date.util';

export interface PaymentAmount {
  amount: number | string;
}

export const paidAmount = (payments: PaymentAmount[] = []): number =>
  fromCents(sumCents(payments.map((payment) => payment.amount)));

export const pendingAmount = (amount: number | string, payments: PaymentAmount[] = []): number =>
  fromCents(toCents(amount) - sumCents(payments.map((payment) => payment.amount)));

/**
 * Status an invoice takes after its paid total changes.
 * CANCELLED is terminal and never recomputed.
 */
export const recomputeStatus = (
  invoice: { amount: number | string; status: InvoiceStatus },
  paid: number,
): InvoiceStatus => {
  if (invoice.status === InvoiceStatus.CANCELLED) {
    return InvoiceStatus.CANCELLED;
  }
  const paidCents = toCents(paid);
  if (paidCents >= toCents(invoice.amount)) {
    return InvoiceStatus.PAID;
  }
  if (paidCents > 0) {
    return InvoiceStatus.PARTIAL;
  }
  return InvoiceStatus.PENDING;
};

export const isOpenStatus = (status: InvoiceStatus): boolean =>
  status === InvoiceStatus.PENDING || status === InvoiceStatus.PARTIAL;

/** OVERDUE, or still open with its due date behind `today`. */
export const isOverdue = (status: InvoiceStatus, dueDate: string, today: string): boolean =>
  status === InvoiceStatus.OVERDUE || (isOpenStatus(status) && dueDate < today);

export const daysOverdue = (status: InvoiceStatus, dueDate: string, today: string): number => {
  if (status === InvoiceStatus.PAID) return 0;
  return Math.max(0, calendarDaysBetween(dueDate, today));
};
