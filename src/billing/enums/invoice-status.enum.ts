export enum InvoiceStatus {
  PENDING = 'PENDING',
  PARTIAL = 'PARTIAL',
  PAID = 'PAID',
  OVERDUE = 'OVERDUE',
  CANCELLED = 'CANCELLED',
}

/** Statuses that still accept payments and can roll over to OVERDUE. */
export const OPEN_INVOICE_STATUSES = [InvoiceStatus.PENDING, InvoiceStatus.PARTIAL];
