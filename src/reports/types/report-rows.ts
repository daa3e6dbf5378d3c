import { InvoiceStatus } from '../../billing/enums/invoice-status.enum';
import { PaymentMethod } from '../../billing/enums/payment-method.enum';

// Shapes the aggregations read. Entities loaded with their relations satisfy them.

export interface SchoolSource {
  id: string;
  name: string;
  email?: string | null;
  phone?: string | null;
  isActive: boolean;
}

export interface PaymentSource {
  id: string;
  invoiceId: string;
  amount: number;
  paymentDate: string;
  method: PaymentMethod;
  reference?: string | null;
  createdAt: Date;
}

export interface StudentSource {
  id: string;
  schoolId: string;
  firstName: string;
  lastName: string;
  email?: string | null;
  gradeLevel?: string | null;
  isActive: boolean;
  grade?: { name: string; monthlyFee: number } | null;
  school?: SchoolSource;
}

export interface InvoiceSource {
  id: string;
  studentId: string;
  amount: number;
  dueDate: string;
  status: InvoiceStatus;
  description?: string | null;
  createdAt: Date;
  payments?: PaymentSource[];
  student?: StudentSource;
}

export interface StudentWithInvoices extends StudentSource {
  invoices?: InvoiceSource[];
}

export interface SchoolWithStudents extends SchoolSource {
  students?: StudentWithInvoices[];
}

export interface PaymentWithInvoice extends PaymentSource {
  invoice?: InvoiceSource;
}
