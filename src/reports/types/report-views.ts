import { InvoiceStatus } from '../../billing/enums/invoice-status.enum';
import { PaymentMethod } from '../../billing/enums/payment-method.enum';

export interface StudentBalanceRow {
  studentId: string;
  firstName: string;
  lastName: string;
  fullName: string;
  email: string | null;
  grade: string | null;
  monthlyFee: number | null;
  isActive: boolean;
  schoolId: string;
  schoolName: string;
  totalInvoices: number;
  totalInvoiced: number;
  totalPaid: number;
  balanceDue: number;
  overdueInvoices: number;
  pendingInvoices: number;
  partialInvoices: number;
  paidInvoices: number;
}

export interface SchoolSummaryRow {
  schoolId: string;
  schoolName: string;
  schoolEmail: string | null;
  schoolPhone: string | null;
  isActive: boolean;
  totalStudents: number;
  activeStudents: number;
  totalInvoices: number;
  totalInvoiced: number;
  totalCollected: number;
  totalPending: number;
  totalOverdue: number;
  overdueInvoiceCount: number;
  pendingInvoiceCount: number;
  paidInvoiceCount: number;
}

export interface InvoiceDetailRow {
  invoiceId: string;
  description: string | null;
  invoiceAmount: number;
  dueDate: string;
  status: InvoiceStatus;
  invoiceCreatedAt: Date;
  studentId: string;
  studentName: string;
  studentEmail: string | null;
  grade: string | null;
  schoolId: string;
  schoolName: string;
  paidAmount: number;
  pendingAmount: number;
  paymentCount: number;
  lastPaymentDate: string | null;
  daysOverdue: number;
}

export interface PaymentHistoryRow {
  paymentId: string;
  paymentAmount: number;
  paymentDate: string;
  paymentMethod: PaymentMethod;
  reference: string | null;
  paymentCreatedAt: Date;
  invoiceId: string;
  invoiceDescription: string | null;
  invoiceAmount: number;
  invoiceStatus: InvoiceStatus;
  dueDate: string;
  studentId: string;
  studentName: string;
  studentEmail: string | null;
  schoolId: string;
  schoolName: string;
}

export interface OverdueInvoiceRow {
  invoiceId: string;
  description: string | null;
  invoiceAmount: number;
  dueDate: string;
  daysOverdue: number;
  paidAmount: number;
  pendingAmount: number;
  studentId: string;
  studentName: string;
  studentEmail: string | null;
  grade: string | null;
  schoolId: string;
  schoolName: string;
  schoolPhone: string | null;
}

export interface DailyCollectionRow {
  paymentDate: string;
  schoolId: string;
  schoolName: string;
  paymentCount: number;
  totalCollected: number;
  cashAmount: number;
  transferAmount: number;
  creditCardAmount: number;
  debitCardAmount: number;
  otherAmount: number;
}

export interface MonthlyRevenueRow {
  month: string;
  schoolId: string;
  schoolName: string;
  studentsWithPayments: number;
  paymentCount: number;
  totalRevenue: number;
  avgPaymentAmount: number;
  minPayment: number;
  maxPayment: number;
}

export interface FinancialSummary {
  totalInvoiced: number;
  totalPaid: number;
  totalPending: number;
  totalOverdue: number;
}

export interface StatementPayment {
  amount: number;
  date: string;
  method: PaymentMethod;
}

export interface StatementInvoice {
  id: string;
  description: string | null;
  amount: number;
  paidAmount: number;
  pendingAmount: number;
  status: InvoiceStatus;
  dueDate: string;
  studentName?: string;
  payments?: StatementPayment[];
}

export interface StudentStatement {
  studentId: string;
  studentName: string;
  schoolName: string;
  summary: FinancialSummary;
  invoices: StatementInvoice[];
  generatedAt: Date;
}

export interface SchoolStatement {
  schoolId: string;
  schoolName: string;
  period: { fromDate: string | null; toDate: string | null };
  summary: FinancialSummary;
  totalStudents: number;
  activeStudents: number;
  invoices: StatementInvoice[];
  generatedAt: Date;
}
