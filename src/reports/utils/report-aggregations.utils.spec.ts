import { InvoiceStatus } from '../../billing/enums/invoice-status.enum';
import { PaymentMethod } from '../../billing/enums/payment-method.enum';
import {
  InvoiceSource,
  PaymentSource,
  PaymentWithInvoice,
  SchoolSource,
  SchoolWithStudents,
  StudentSource,
} from '../types/report-rows';
import {
  buildDailyCollections,
  buildInvoiceDetails,
  buildMonthlyRevenue,
  buildOverdueInvoices,
  buildPaymentHistory,
  buildSchoolStatement,
  buildSchoolSummaries,
  buildStudentBalances,
  buildStudentStatement,
  financialSummary,
} from './report-aggregations.utils';

const TODAY = '2025-03-01';

const alpha: SchoolSource = { id: 'school-alpha', name: 'Alpha Academy', email: 'office@alpha.test', phone: '555-0100', isActive: true };
const beta: SchoolSource = { id: 'school-beta', name: 'Beta School', email: null, phone: null, isActive: true };

const student = (id: string, school: SchoolSource, fields: Partial<StudentSource>): StudentSource => ({
  id,
  schoolId: school.id,
  firstName: 'First',
  lastName: 'Last',
  email: null,
  gradeLevel: null,
  grade: null,
  isActive: true,
  school,
  ...fields,
});

const ana = student('student-ana', alpha, {
  firstName: 'Ana',
  lastName: 'Diaz',
  email: 'ana@alpha.test',
  grade: { name: 'Grade 1', monthlyFee: 150 },
});
const ben = student('student-ben', alpha, { firstName: 'Ben', lastName: 'Cole', gradeLevel: '3B', isActive: false });
const cara = student('student-cara', alpha, { firstName: 'Cara', lastName: 'Moss' });
const dan = student('student-dan', beta, { firstName: 'Dan', lastName: 'Roy' });

const payment = (id: string, invoiceId: string, amount: number, paymentDate: string, method: PaymentMethod): PaymentSource => ({
  id,
  invoiceId,
  amount,
  paymentDate,
  method,
  reference: null,
  createdAt: new Date(`${paymentDate}T12:00:00`),
});

const invoice = (
  id: string,
  owner: StudentSource,
  amount: number,
  dueDate: string,
  status: InvoiceStatus,
  payments: PaymentSource[],
  createdOn: string,
): InvoiceSource => ({
  id,
  studentId: owner.id,
  amount,
  dueDate,
  status,
  description: `Invoice ${id}`,
  createdAt: new Date(`${createdOn}T10:00:00`),
  payments,
  student: owner,
});

const p1 = payment('pay-1', 'inv-1', 100, '2025-02-10', PaymentMethod.CASH);
const p2 = payment('pay-2', 'inv-2', 200, '2025-02-10', PaymentMethod.BANK_TRANSFER);
const p3 = payment('pay-3', 'inv-3', 50, '2025-01-05', PaymentMethod.CASH);
const p4 = payment('pay-4', 'inv-6', 75.5, '2025-02-10', PaymentMethod.CREDIT_CARD);

const i1 = invoice('inv-1', ana, 500, '2025-01-31', InvoiceStatus.OVERDUE, [p1], '2025-01-15');
const i2 = invoice('inv-2', ana, 200, '2025-02-15', InvoiceStatus.PAID, [p2], '2025-02-01');
const i3 = invoice('inv-3', ana, 300, '2025-01-10', InvoiceStatus.CANCELLED, [p3], '2025-01-02');
const i4 = invoice('inv-4', ben, 400, '2025-02-20', InvoiceStatus.PENDING, [], '2025-02-05');
const i5 = invoice('inv-5', ben, 250, '2025-03-10', InvoiceStatus.PENDING, [], '2025-02-20');
const i6 = invoice('inv-6', dan, 75.5, '2025-02-28', InvoiceStatus.PAID, [p4], '2025-02-01');

const alphaWithStudents: SchoolWithStudents = {
  ...alpha,
  students: [
    { ...ana, invoices: [i1, i2, i3] },
    { ...ben, invoices: [i4, i5] },
    { ...cara, invoices: [] },
  ],
};

const paymentsWithInvoices: PaymentWithInvoice[] = [
  { ...p1, invoice: i1 },
  { ...p2, invoice: i2 },
  { ...p3, invoice: i3 },
  { ...p4, invoice: i6 },
];

describe('report aggregations', () => {
  describe('buildStudentBalances', () => {
    const students = alphaWithStudents.students ?? [];

    it('computes balances over non-cancelled invoices, largest debt first', () => {
      const rows = buildStudentBalances(students);

      expect(rows.map((row) => [row.fullName, row.balanceDue])).toEqual([
        ['Ben Cole', 650],
        ['Ana Diaz', 400],
        ['Cara Moss', 0],
      ]);
      expect(rows[1]).toMatchObject({
        studentId: 'student-ana',
        grade: 'Grade 1',
        monthlyFee: 150,
        schoolName: 'Alpha Academy',
        totalInvoices: 2,
        totalInvoiced: 700,
        totalPaid: 300,
        overdueInvoices: 1,
        pendingInvoices: 0,
        partialInvoices: 0,
        paidInvoices: 1,
      });
    });

    it('falls back to the legacy grade when no grade row is linked', () => {
      const [ben] = buildStudentBalances(students);
      expect(ben.grade).toBe('3B');
      expect(ben.monthlyFee).toBeNull();
      expect(ben.pendingInvoices).toBe(2);
    });

    it('gives zero totals to a student without invoices', () => {
      const cara = buildStudentBalances(students).find((row) => row.studentId === 'student-cara');
      expect(cara).toMatchObject({ totalInvoices: 0, totalInvoiced: 0, totalPaid: 0, balanceDue: 0 });
    });

    it('drops students without debt when asked to', () => {
      const rows = buildStudentBalances(students, { onlyWithDebt: true });
      expect(rows.map((row) => row.studentId)).toEqual(['student-ben', 'student-ana']);
    });
  });

  describe('buildSchoolSummaries', () => {
    it('summarises every school, sorted by name', () => {
      const rows = buildSchoolSummaries([{ ...beta, students: [] }, alphaWithStudents], TODAY);

      expect(rows.map((row) => row.schoolName)).toEqual(['Alpha Academy', 'Beta School']);
      expect(rows[0]).toEqual({
        schoolId: 'school-alpha',
        schoolName: 'Alpha Academy',
        schoolEmail: 'office@alpha.test',
        schoolPhone: '555-0100',
        isActive: true,
        totalStudents: 3,
        activeStudents: 2,
        totalInvoices: 4,
        totalInvoiced: 1350,
        totalCollected: 300,
        totalPending: 1050,
        totalOverdue: 800,
        overdueInvoiceCount: 2,
        pendingInvoiceCount: 2,
        paidInvoiceCount: 1,
      });
      expect(rows[1]).toMatchObject({ totalStudents: 0, totalInvoiced: 0, totalOverdue: 0, overdueInvoiceCount: 0 });
    });

    it('counts only what is still owed on an overdue invoice', () => {
      const school: SchoolWithStudents = { ...alpha, students: [{ ...ana, invoices: [i1] }] };
      const [row] = buildSchoolSummaries([school], TODAY);
      expect(row.totalOverdue).toBe(400);
    });

    it('reports no overdue money when nothing is past due', () => {
      const school: SchoolWithStudents = { ...alpha, students: [{ ...ben, invoices: [i5] }] };
      const [row] = buildSchoolSummaries([school], TODAY);
      expect(row.totalOverdue).toBe(0);
      expect(row.overdueInvoiceCount).toBe(0);
    });
  });

  describe('buildInvoiceDetails', () => {
    it('adds payment totals and days overdue to each invoice', () => {
      const [overdue, paid, notDue] = buildInvoiceDetails([i1, i2, i5], TODAY);

      expect(overdue).toMatchObject({
        invoiceId: 'inv-1',
        studentName: 'Ana Diaz',
        grade: 'Grade 1',
        schoolName: 'Alpha Academy',
        paidAmount: 100,
        pendingAmount: 400,
        paymentCount: 1,
        lastPaymentDate: '2025-02-10',
        daysOverdue: 29,
      });
      expect(paid.daysOverdue).toBe(0);
      expect(notDue).toMatchObject({ daysOverdue: 0, paymentCount: 0, lastPaymentDate: null });
    });
  });

  describe('buildPaymentHistory', () => {
    it('denormalises invoice, student and school onto each payment', () => {
      const [row] = buildPaymentHistory([{ ...p2, invoice: i2 }]);

      expect(row).toEqual({
        paymentId: 'pay-2',
        paymentAmount: 200,
        paymentDate: '2025-02-10',
        paymentMethod: PaymentMethod.BANK_TRANSFER,
        reference: null,
        paymentCreatedAt: p2.createdAt,
        invoiceId: 'inv-2',
        invoiceDescription: 'Invoice inv-2',
        invoiceAmount: 200,
        invoiceStatus: InvoiceStatus.PAID,
        dueDate: '2025-02-15',
        studentId: 'student-ana',
        studentName: 'Ana Diaz',
        studentEmail: 'ana@alpha.test',
        schoolId: 'school-alpha',
        schoolName: 'Alpha Academy',
      });
    });
  });

  describe('buildOverdueInvoices', () => {
    it('keeps unpaid invoices past due, most overdue first', () => {
      const rows = buildOverdueInvoices([i1, i2, i3, i4, i5], TODAY);

      expect(rows.map((row) => [row.invoiceId, row.daysOverdue, row.pendingAmount])).toEqual([
        ['inv-1', 29, 400],
        ['inv-4', 9, 400],
      ]);
      expect(rows[1]).toMatchObject({ grade: '3B', schoolPhone: '555-0100', paidAmount: 0 });
    });

    it('applies the minimum days overdue', () => {
      const rows = buildOverdueInvoices([i1, i4], TODAY, 10);
      expect(rows.map((row) => row.invoiceId)).toEqual(['inv-1']);
    });
  });

  describe('buildDailyCollections', () => {
    it('groups by day and school with per-method subtotals', () => {
      const rows = buildDailyCollections(paymentsWithInvoices);

      expect(rows.map((row) => [row.paymentDate, row.schoolName])).toEqual([
        ['2025-02-10', 'Alpha Academy'],
        ['2025-02-10', 'Beta School'],
        ['2025-01-05', 'Alpha Academy'],
      ]);
      expect(rows[0]).toEqual({
        paymentDate: '2025-02-10',
        schoolId: 'school-alpha',
        schoolName: 'Alpha Academy',
        paymentCount: 2,
        totalCollected: 300,
        cashAmount: 100,
        transferAmount: 200,
        creditCardAmount: 0,
        debitCardAmount: 0,
        otherAmount: 0,
      });
      expect(rows[1]).toMatchObject({ paymentCount: 1, totalCollected: 75.5, creditCardAmount: 75.5 });
    });
  });

  describe('buildMonthlyRevenue', () => {
    it('groups by month and school', () => {
      const rows = buildMonthlyRevenue(paymentsWithInvoices);

      expect(rows.map((row) => [row.month, row.schoolName, row.totalRevenue])).toEqual([
        ['2025-02-01', 'Alpha Academy', 300],
        ['2025-02-01', 'Beta School', 75.5],
        ['2025-01-01', 'Alpha Academy', 50],
      ]);
      expect(rows[0]).toMatchObject({
        studentsWithPayments: 1,
        paymentCount: 2,
        avgPaymentAmount: 150,
        minPayment: 100,
        maxPayment: 200,
      });
    });

    it('rounds the average to the cent', () => {
      const payments: PaymentWithInvoice[] = [
        { ...payment('a', 'inv-4', 10, '2025-02-01', PaymentMethod.CASH), invoice: i4 },
        { ...payment('b', 'inv-4', 10.01, '2025-02-02', PaymentMethod.CASH), invoice: i4 },
        { ...payment('c', 'inv-5', 10.01, '2025-02-03', PaymentMethod.CASH), invoice: i5 },
      ];
      const [row] = buildMonthlyRevenue(payments);
      expect(row.avgPaymentAmount).toBe(10.01);
      expect(row.studentsWithPayments).toBe(1);
    });

    it('finds the smallest and largest payment of a very large month', () => {
      const payments: PaymentWithInvoice[] = Array.from({ length: 300_000 }, (_, index) => ({
        ...payment(`p-${index}`, 'inv-4', 1 + (index % 500) / 100, '2025-02-10', PaymentMethod.CASH),
        invoice: i4,
      }));

      const [row] = buildMonthlyRevenue(payments);

      expect(row.paymentCount).toBe(300_000);
      expect(row.minPayment).toBe(1);
      expect(row.maxPayment).toBe(5.99);
    });
  });

  describe('statements', () => {
    const generatedAt = new Date('2025-03-01T08:00:00Z');

    it('builds a student statement without cancelled invoices', () => {
      const statement = buildStudentStatement({ ...ana, invoices: [i2, i3, i1] }, TODAY, generatedAt);

      expect(statement.studentName).toBe('Ana Diaz');
      expect(statement.schoolName).toBe('Alpha Academy');
      expect(statement.summary).toEqual({ totalInvoiced: 700, totalPaid: 300, totalPending: 400, totalOverdue: 400 });
      expect(statement.invoices.map((row) => row.id)).toEqual(['inv-1', 'inv-2']);
      expect(statement.invoices[0].payments).toEqual([
        { amount: 100, date: '2025-02-10', method: PaymentMethod.CASH },
      ]);
      expect(statement.generatedAt).toBe(generatedAt);
    });

    it('names the school Unknown when it is not loaded', () => {
      const statement = buildStudentStatement({ ...cara, school: undefined, invoices: [] }, TODAY, generatedAt);
      expect(statement.schoolName).toBe('Unknown');
      expect(statement.summary).toEqual({ totalInvoiced: 0, totalPaid: 0, totalPending: 0, totalOverdue: 0 });
    });

    it('limits a school statement to invoices created inside the period', () => {
      const statement = buildSchoolStatement(
        alphaWithStudents,
        { fromDate: '2025-02-01', toDate: '2025-02-10' },
        TODAY,
        generatedAt,
      );

      expect(statement.period).toEqual({ fromDate: '2025-02-01', toDate: '2025-02-10' });
      expect(statement.invoices.map((row) => [row.id, row.studentName])).toEqual([
        ['inv-2', 'Ana Diaz'],
        ['inv-4', 'Ben Cole'],
      ]);
      expect(statement.summary).toEqual({ totalInvoiced: 1350, totalPaid: 300, totalPending: 1050, totalOverdue: 800 });
      expect(statement.totalStudents).toBe(3);
      expect(statement.activeStudents).toBe(2);
    });
  });

  it('financialSummary ignores cancelled invoices entirely', () => {
    expect(financialSummary([i3], TODAY)).toEqual({ totalInvoiced: 0, totalPaid: 0, totalPending: 0, totalOverdue: 0 });
  });
});
