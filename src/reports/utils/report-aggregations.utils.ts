import { InvoiceStatus } from '../../billing/enums/invoice-status.enum';
import { PaymentMethod } from '../../billing/enums/payment-method.enum';
import { daysOverdue, isOverdue } from '../../billing/utils/invoice-ledger.utils';
import { fromCents, sumCents, toCents } from '../../common/utils/money.util';
import { calendarDaysBetween, monthStart, toIsoDate } from '../../common/utils/date.util';
import {
  InvoiceSource,
  PaymentWithInvoice,
  SchoolWithStudents,
  StudentSource,
  StudentWithInvoices,
} from '../types/report-rows';
import {
  DailyCollectionRow,
  FinancialSummary,
  InvoiceDetailRow,
  MonthlyRevenueRow,
  OverdueInvoiceRow,
  PaymentHistoryRow,
  SchoolStatement,
  SchoolSummaryRow,
  StatementInvoice,
  StudentBalanceRow,
  StudentStatement,
} from '../types/report-views';

const fullName = (student: StudentSource): string => `${student.firstName} ${student.lastName}`;

// Linked grade wins over the legacy free-text grade
const gradeName = (student: StudentSource): string | null => student.grade?.name ?? student.gradeLevel ?? null;

const isLive = (invoice: InvoiceSource): boolean => invoice.status !== InvoiceStatus.CANCELLED;

const paidCents = (invoice: InvoiceSource): number =>
  sumCents((invoice.payments ?? []).map((payment) => payment.amount));

const pendingCents = (invoice: InvoiceSource): number => toCents(invoice.amount) - paidCents(invoice);

const countStatus = (invoices: InvoiceSource[], status: InvoiceStatus): number =>
  invoices.filter((invoice) => invoice.status === status).length;

const byName = (left: string, right: string): number => left.localeCompare(right);

const byIsoDate = (left: string, right: string): number => (left < right ? -1 : left > right ? 1 : 0);

export const financialSummary = (invoices: InvoiceSource[], today: string): FinancialSummary => {
  const live = invoices.filter(isLive);
  const invoiced = sumCents(live.map((invoice) => invoice.amount));
  const paid = live.reduce((total, invoice) => total + paidCents(invoice), 0);
  const overdue = live
    .filter((invoice) => isOverdue(invoice.status, invoice.dueDate, today))
    .reduce((total, invoice) => total + pendingCents(invoice), 0);

  return {
    totalInvoiced: fromCents(invoiced),
    totalPaid: fromCents(paid),
    totalPending: fromCents(invoiced - paid),
    totalOverdue: fromCents(overdue),
  };
};

/** One row per student; cancelled invoices do not count towards any total. */
export const buildStudentBalances = (
  students: StudentWithInvoices[],
  options: { onlyWithDebt?: boolean } = {},
): StudentBalanceRow[] => {
  const rows = students.map((student): StudentBalanceRow => {
    const invoices = (student.invoices ?? []).filter(isLive);
    const invoiced = sumCents(invoices.map((invoice) => invoice.amount));
    const paid = invoices.reduce((total, invoice) => total + paidCents(invoice), 0);

    return {
      studentId: student.id,
      firstName: student.firstName,
      lastName: student.lastName,
      fullName: fullName(student),
      email: student.email ?? null,
      grade: gradeName(student),
      monthlyFee: student.grade ? student.grade.monthlyFee : null,
      isActive: student.isActive,
      schoolId: student.schoolId,
      schoolName: student.school?.name ?? '',
      totalInvoices: invoices.length,
      totalInvoiced: fromCents(invoiced),
      totalPaid: fromCents(paid),
      balanceDue: fromCents(invoiced - paid),
      overdueInvoices: countStatus(invoices, InvoiceStatus.OVERDUE),
      pendingInvoices: countStatus(invoices, InvoiceStatus.PENDING),
      partialInvoices: countStatus(invoices, InvoiceStatus.PARTIAL),
      paidInvoices: countStatus(invoices, InvoiceStatus.PAID),
    };
  });

  return rows
    .filter((row) => !options.onlyWithDebt || row.balanceDue > 0)
    .sort((left, right) => right.balanceDue - left.balanceDue || byName(left.fullName, right.fullName));
};

export const buildSchoolSummaries = (schools: SchoolWithStudents[], today: string): SchoolSummaryRow[] =>
  schools
    .map((school): SchoolSummaryRow => {
      const students = school.students ?? [];
      const live = students.flatMap((student) => student.invoices ?? []).filter(isLive);
      const summary = financialSummary(live, today);

      return {
        schoolId: school.id,
        schoolName: school.name,
        schoolEmail: school.email ?? null,
        schoolPhone: school.phone ?? null,
        isActive: school.isActive,
        totalStudents: students.length,
        activeStudents: students.filter((student) => student.isActive).length,
        totalInvoices: live.length,
        totalInvoiced: summary.totalInvoiced,
        totalCollected: summary.totalPaid,
        totalPending: summary.totalPending,
        totalOverdue: summary.totalOverdue,
        overdueInvoiceCount: live.filter((invoice) => isOverdue(invoice.status, invoice.dueDate, today)).length,
        pendingInvoiceCount: countStatus(live, InvoiceStatus.PENDING),
        paidInvoiceCount: countStatus(live, InvoiceStatus.PAID),
      };
    })
    .sort((left, right) => byName(left.schoolName, right.schoolName));

/** Keeps the order the invoices were loaded in. */
export const buildInvoiceDetails = (invoices: InvoiceSource[], today: string): InvoiceDetailRow[] =>
  invoices.flatMap((invoice): InvoiceDetailRow[] => {
    const student = invoice.student;
    if (!student) return [];
    const payments = invoice.payments ?? [];
    const lastPaymentDate = payments.reduce<string | null>(
      (latest, payment) => (latest === null || payment.paymentDate > latest ? payment.paymentDate : latest),
      null,
    );

    return [
      {
        invoiceId: invoice.id,
        description: invoice.description ?? null,
        invoiceAmount: invoice.amount,
        dueDate: invoice.dueDate,
        status: invoice.status,
        invoiceCreatedAt: invoice.createdAt,
        studentId: student.id,
        studentName: fullName(student),
        studentEmail: student.email ?? null,
        grade: gradeName(student),
        schoolId: student.schoolId,
        schoolName: student.school?.name ?? '',
        paidAmount: fromCents(paidCents(invoice)),
        pendingAmount: fromCents(pendingCents(invoice)),
        paymentCount: payments.length,
        lastPaymentDate,
        daysOverdue: daysOverdue(invoice.status, invoice.dueDate, today),
      },
    ];
  });

export const buildPaymentHistory = (payments: PaymentWithInvoice[]): PaymentHistoryRow[] =>
  payments.flatMap((payment): PaymentHistoryRow[] => {
    const invoice = payment.invoice;
    const student = invoice?.student;
    if (!invoice || !student) return [];

    return [
      {
        paymentId: payment.id,
        paymentAmount: payment.amount,
        paymentDate: payment.paymentDate,
        paymentMethod: payment.method,
        reference: payment.reference ?? null,
        paymentCreatedAt: payment.createdAt,
        invoiceId: invoice.id,
        invoiceDescription: invoice.description ?? null,
        invoiceAmount: invoice.amount,
        invoiceStatus: invoice.status,
        dueDate: invoice.dueDate,
        studentId: student.id,
        studentName: fullName(student),
        studentEmail: student.email ?? null,
        schoolId: student.schoolId,
        schoolName: student.school?.name ?? '',
      },
    ];
  });

const COLLECTIBLE_STATUSES = [InvoiceStatus.OVERDUE, InvoiceStatus.PENDING, InvoiceStatus.PARTIAL];

export const buildOverdueInvoices = (
  invoices: InvoiceSource[],
  today: string,
  minDaysOverdue = 0,
): OverdueInvoiceRow[] =>
  invoices
    .flatMap((invoice): OverdueInvoiceRow[] => {
      const student = invoice.student;
      if (!student) return [];
      if (!COLLECTIBLE_STATUSES.includes(invoice.status) || invoice.dueDate >= today) return [];
      const pending = pendingCents(invoice);
      if (pending <= 0) return [];

      return [
        {
          invoiceId: invoice.id,
          description: invoice.description ?? null,
          invoiceAmount: invoice.amount,
          dueDate: invoice.dueDate,
          daysOverdue: calendarDaysBetween(invoice.dueDate, today),
          paidAmount: fromCents(paidCents(invoice)),
          pendingAmount: fromCents(pending),
          studentId: student.id,
          studentName: fullName(student),
          studentEmail: student.email ?? null,
          grade: gradeName(student),
          schoolId: student.schoolId,
          schoolName: student.school?.name ?? '',
          schoolPhone: student.school?.phone ?? null,
        },
      ];
    })
    .filter((row) => row.daysOverdue >= minDaysOverdue)
    .sort((left, right) => right.daysOverdue - left.daysOverdue);

interface PaymentGroup {
  key: string;
  schoolId: string;
  schoolName: string;
  payments: PaymentWithInvoice[];
}

const groupPayments = (
  payments: PaymentWithInvoice[],
  bucket: (payment: PaymentWithInvoice) => string,
): Map<string, PaymentGroup> => {
  const groups = new Map<string, PaymentGroup>();
  for (const payment of payments) {
    const student = payment.invoice?.student;
    if (!student) continue;
    const key = `${bucket(payment)}|${student.schoolId}`;
    const group = groups.get(key) ?? {
      key: bucket(payment),
      schoolId: student.schoolId,
      schoolName: student.school?.name ?? '',
      payments: [],
    };
    group.payments.push(payment);
    groups.set(key, group);
  }
  return groups;
};

const methodTotal = (payments: PaymentWithInvoice[], method: PaymentMethod): number =>
  fromCents(sumCents(payments.filter((payment) => payment.method === method).map((payment) => payment.amount)));

export const buildDailyCollections = (payments: PaymentWithInvoice[]): DailyCollectionRow[] =>
  [...groupPayments(payments, (payment) => payment.paymentDate).values()]
    .map(
      (group): DailyCollectionRow => ({
        paymentDate: group.key,
        schoolId: group.schoolId,
        schoolName: group.schoolName,
        paymentCount: group.payments.length,
        totalCollected: fromCents(sumCents(group.payments.map((payment) => payment.amount))),
        cashAmount: methodTotal(group.payments, PaymentMethod.CASH),
        transferAmount: methodTotal(group.payments, PaymentMethod.BANK_TRANSFER),
        creditCardAmount: methodTotal(group.payments, PaymentMethod.CREDIT_CARD),
        debitCardAmount: methodTotal(group.payments, PaymentMethod.DEBIT_CARD),
        otherAmount: methodTotal(group.payments, PaymentMethod.OTHER),
      }),
    )
    .sort((left, right) => byIsoDate(right.paymentDate, left.paymentDate) || byName(left.schoolName, right.schoolName));

export const buildMonthlyRevenue = (payments: PaymentWithInvoice[]): MonthlyRevenueRow[] =>
  [...groupPayments(payments, (payment) => monthStart(payment.paymentDate)).values()]
    .map((group): MonthlyRevenueRow => {
      const amounts = group.payments.map((payment) => toCents(payment.amount));
      const total = amounts.reduce((sum, cents) => sum + cents, 0);
      const students = new Set(group.payments.map((payment) => payment.invoice?.studentId));

      return {
        month: group.key,
        schoolId: group.schoolId,
        schoolName: group.schoolName,
        studentsWithPayments: students.size,
        paymentCount: amounts.length,
        totalRevenue: fromCents(total),
        avgPaymentAmount: fromCents(Math.round(total / amounts.length)),
        minPayment: fromCents(amounts.reduce((min, cents) => Math.min(min, cents))),
        maxPayment: fromCents(amounts.reduce((max, cents) => Math.max(max, cents))),
      };
    })
    .sort((left, right) => byIsoDate(right.month, left.month) || byName(left.schoolName, right.schoolName));

const toStatementInvoice = (invoice: InvoiceSource): StatementInvoice => ({
  id: invoice.id,
  description: invoice.description ?? null,
  amount: invoice.amount,
  paidAmount: fromCents(paidCents(invoice)),
  pendingAmount: fromCents(pendingCents(invoice)),
  status: invoice.status,
  dueDate: invoice.dueDate,
});

const byDueDate = (left: InvoiceSource, right: InvoiceSource): number => byIsoDate(left.dueDate, right.dueDate);

export const buildStudentStatement = (
  student: StudentWithInvoices,
  today: string,
  generatedAt: Date = new Date(),
): StudentStatement => {
  const invoices = (student.invoices ?? []).filter(isLive).sort(byDueDate);

  return {
    studentId: student.id,
    studentName: fullName(student),
    schoolName: student.school?.name ?? 'Unknown',
    summary: financialSummary(invoices, today),
    invoices: invoices.map((invoice) => ({
      ...toStatementInvoice(invoice),
      payments: [...(invoice.payments ?? [])]
        .sort((left, right) => byIsoDate(left.paymentDate, right.paymentDate))
        .map((payment) => ({ amount: payment.amount, date: payment.paymentDate, method: payment.method })),
    })),
    generatedAt,
  };
};

/**
 * The summary covers every live invoice of the school; the invoice list is
 * limited to invoices created inside the period.
 */
export const buildSchoolStatement = (
  school: SchoolWithStudents,
  period: { fromDate?: string; toDate?: string },
  today: string,
  generatedAt: Date = new Date(),
): SchoolStatement => {
  const students = school.students ?? [];
  const live = students.flatMap((student) =>
    (student.invoices ?? []).filter(isLive).map((invoice) => ({ invoice, studentName: fullName(student) })),
  );
  const inPeriod = live.filter(({ invoice }) => {
    const created = toIsoDate(invoice.createdAt);
    if (period.fromDate && created < period.fromDate) return false;
    if (period.toDate && created > period.toDate) return false;
    return true;
  });

  return {
    schoolId: school.id,
    schoolName: school.name,
    period: { fromDate: period.fromDate ?? null, toDate: period.toDate ?? null },
    summary: financialSummary(
      live.map(({ invoice }) => invoice),
      today,
    ),
    totalStudents: students.length,
    activeStudents: students.filter((student) => student.isActive).length,
    invoices: inPeriod
      .sort((left, right) => byDueDate(left.invoice, right.invoice))
      .map(({ invoice, studentName }) => ({ ...toStatementInvoice(invoice), studentName })),
    generatedAt,
  };
};
