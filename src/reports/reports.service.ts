import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import {
  Between,
  FindOperator,
  FindOptionsWhere,
  In,
  LessThan,
  LessThanOrEqual,
  MoreThanOrEqual,
  Repository,
} from 'typeorm';
import { School } from '../school/entities/school.entity';
import { Student } from '../student/entities/student.entity';
import { Invoice } from '../billing/entities/invoice.entity';
import { Payment } from '../billing/entities/payment.entity';
import { InvoiceStatus } from '../billing/enums/invoice-status.enum';
import { EntityNotFoundException } from '../common/exceptions/domain.exceptions';
import { toIsoDate, todayIso } from '../common/utils/date.util';
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
} from './utils/report-aggregations.utils';
import {
  CollectionsQueryDto,
  InvoiceDetailsQueryDto,
  MonthlyRevenueQueryDto,
  OverdueInvoicesQueryDto,
  PaymentHistoryQueryDto,
  SchoolStatementQueryDto,
  SchoolSummaryQueryDto,
  StudentBalanceQueryDto,
} from './dto/report-query.dto';
import {
  DailyCollectionRow,
  InvoiceDetailRow,
  MonthlyRevenueRow,
  OverdueInvoiceRow,
  PaymentHistoryRow,
  SchoolStatement,
  SchoolSummaryRow,
  StudentBalanceRow,
  StudentStatement,
} from './types/report-views';

const dateRange = (from?: string, to?: string): FindOperator<string> | undefined => {
  if (from && to) return Between(toIsoDate(from), toIsoDate(to));
  if (from) return MoreThanOrEqual(toIsoDate(from));
  if (to) return LessThanOrEqual(toIsoDate(to));
  return undefined;
};

const paymentScope = (schoolId?: string, studentId?: string): FindOptionsWhere<Invoice> | undefined => {
  const scope: FindOptionsWhere<Invoice> = {};
  if (studentId) scope.studentId = studentId;
  if (schoolId) scope.student = { schoolId };
  return Object.keys(scope).length > 0 ? scope : undefined;
};

/**
 * Read-only projections over the ledger. Every call reloads the rows it
 * needs and folds them in memory; nothing is cached between calls.
 */
@Injectable()
export class ReportsService {
  constructor(
    @InjectRepository(School) private readonly schoolRepo: Repository<School>,
    @InjectRepository(Student) private readonly studentRepo: Repository<Student>,
    @InjectRepository(Invoice) private readonly invoiceRepo: Repository<Invoice>,
    @InjectRepository(Payment) private readonly paymentRepo: Repository<Payment>,
  ) {}

  async studentBalances(query: StudentBalanceQueryDto): Promise<StudentBalanceRow[]> {
    const where: FindOptionsWhere<Student> = {};
    if (query.schoolId) where.schoolId = query.schoolId;
    if (query.onlyActive) where.isActive = true;

    const students = await this.studentRepo.find({
      where,
      relations: { school: true, grade: true, invoices: { payments: true } },
    });
    return buildStudentBalances(students, { onlyWithDebt: query.onlyWithDebt });
  }

  async schoolSummaries(query: SchoolSummaryQueryDto): Promise<SchoolSummaryRow[]> {
    const schools = await this.schoolRepo.find({
      where: query.onlyActive ? { isActive: true } : {},
      relations: { students: { invoices: { payments: true } } },
    });
    return buildSchoolSummaries(schools, todayIso());
  }

  async invoiceDetails(query: InvoiceDetailsQueryDto): Promise<InvoiceDetailRow[]> {
    const where: FindOptionsWhere<Invoice> = {};
    if (query.studentId) where.studentId = query.studentId;
    if (query.status) where.status = query.status;
    if (query.schoolId) where.student = { schoolId: query.schoolId };

    const invoices = await this.invoiceRepo.find({
      where,
      relations: { student: { school: true, grade: true }, payments: true },
      order: { dueDate: 'DESC', createdAt: 'DESC' },
      skip: query.offset,
      take: query.limit,
    });
    return buildInvoiceDetails(invoices, todayIso());
  }

  async paymentHistory(query: PaymentHistoryQueryDto): Promise<PaymentHistoryRow[]> {
    const where: FindOptionsWhere<Payment> = {};
    const range = dateRange(query.dateFrom, query.dateTo);
    if (range) where.paymentDate = range;
    const scope = paymentScope(query.schoolId, query.studentId);
    if (scope) where.invoice = scope;

    const payments = await this.paymentRepo.find({
      where,
      relations: { invoice: { student: { school: true } } },
      order: { createdAt: 'DESC' },
      skip: query.offset,
      take: query.limit,
    });
    return buildPaymentHistory(payments);
  }

  async overdueInvoices(query: OverdueInvoicesQueryDto): Promise<OverdueInvoiceRow[]> {
    const today = todayIso();
    const where: FindOptionsWhere<Invoice> = {
      status: In([InvoiceStatus.OVERDUE, InvoiceStatus.PENDING, InvoiceStatus.PARTIAL]),
      dueDate: LessThan(today),
    };
    if (query.schoolId) where.student = { schoolId: query.schoolId };

    const invoices = await this.invoiceRepo.find({
      where,
      relations: { student: { school: true, grade: true }, payments: true },
    });
    return buildOverdueInvoices(invoices, today, query.minDaysOverdue);
  }

  async dailyCollections(query: CollectionsQueryDto): Promise<DailyCollectionRow[]> {
    const where: FindOptionsWhere<Payment> = {};
    const range = dateRange(query.dateFrom, query.dateTo);
    if (range) where.paymentDate = range;
    const scope = paymentScope(query.schoolId);
    if (scope) where.invoice = scope;

    const payments = await this.paymentRepo.find({
      where,
      relations: { invoice: { student: { school: true } } },
    });
    return buildDailyCollections(payments);
  }

  async monthlyRevenue(query: MonthlyRevenueQueryDto): Promise<MonthlyRevenueRow[]> {
    const where: FindOptionsWhere<Payment> = {};
    if (query.year) where.paymentDate = Between(`${query.year}-01-01`, `${query.year}-12-31`);
    const scope = paymentScope(query.schoolId);
    if (scope) where.invoice = scope;

    const payments = await this.paymentRepo.find({
      where,
      relations: { invoice: { student: { school: true } } },
    });
    return buildMonthlyRevenue(payments);
  }

  async studentStatement(studentId: string): Promise<StudentStatement> {
    const student = await this.studentRepo.findOne({
      where: { id: studentId },
      relations: { school: true, invoices: { payments: true } },
    });
    if (!student) {
      throw new EntityNotFoundException('Student', studentId);
    }
    return buildStudentStatement(student, todayIso());
  }

  async schoolStatement(schoolId: string, query: SchoolStatementQueryDto): Promise<SchoolStatement> {
    const school = await this.schoolRepo.findOne({
      where: { id: schoolId },
      relations: { students: { invoices: { payments: true } } },
    });
    if (!school) {
      throw new EntityNotFoundException('School', schoolId);
    }
    return buildSchoolStatement(
      school,
      {
        fromDate: query.fromDate ? toIsoDate(query.fromDate) : undefined,
        toDate: query.toDate ? toIsoDate(query.toDate) : undefined,
      },
      todayIso(),
    );
  }
}
