import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, In, LessThan, Repository } from 'typeorm';
import { Invoice } from '../entities/invoice.entity';
import { Payment } from '../entities/payment.entity';
import { BillingItem } from '../entities/billing-item.entity';
import { Student } from '../../student/entities/student.entity';
import { InvoiceStatus, OPEN_INVOICE_STATUSES } from '../enums/invoice-status.enum';
import { CreateInvoiceDto } from '../dtos/create-invoice.dto';
import { UpdateInvoiceDto } from '../dtos/update-invoice.dto';
import { InvoiceQueryDto } from '../dtos/billing-query.dto';
import { InvoiceView, toInvoiceView } from '../types/invoice-view';
import { paidAmount, recomputeStatus } from '../utils/invoice-ledger.utils';
import { BusinessRuleException, EntityNotFoundException } from '../../common/exceptions/domain.exceptions';
import { Logger } from '../../common/interceptors/logging.interceptor';
import { formatMoney, roundMoney, toCents } from '../../common/utils/money.util';
import { toIsoDate, todayIso } from '../../common/utils/date.util';
import { Paginated, paginate } from '../../common/types/pagination';

@Injectable()
export class InvoicesService {
  constructor(
    private readonly dataSource: DataSource,
    @InjectRepository(Invoice) private readonly invoiceRepo: Repository<Invoice>,
    @InjectRepository(Student) private readonly studentRepo: Repository<Student>,
    @InjectRepository(BillingItem) private readonly billingItemRepo: Repository<BillingItem>,
  ) {}

  async create(dto: CreateInvoiceDto): Promise<InvoiceView> {
    const student = await this.studentRepo.findOne({ where: { id: dto.studentId } });
    if (!student) {
      throw new EntityNotFoundException('Student', dto.studentId);
    }

    if (dto.billingItemId) {
      const item = await this.billingItemRepo.findOne({ where: { id: dto.billingItemId } });
      if (!item) {
        throw new EntityNotFoundException('BillingItem', dto.billingItemId);
      }
      if (item.schoolId !== student.schoolId) {
        throw new BusinessRuleException(
          `Billing item '${item.id}' does not belong to the student's school`,
          'billing_item_school_mismatch',
        );
      }
    }

    const invoice = this.invoiceRepo.create({
      studentId: student.id,
      billingItemId: dto.billingItemId ?? null,
      amount: roundMoney(dto.amount),
      dueDate: toIsoDate(dto.dueDate),
      description: dto.description ?? null,
      status: InvoiceStatus.PENDING,
    });
    const saved = await this.invoiceRepo.save(invoice);

    Logger.log(
      `Invoice ${saved.id} created for student ${student.id}: ${formatMoney(saved.amount)} due ${saved.dueDate}`,
      'InvoicesService',
    );
    return toInvoiceView(saved, []);
  }

  async findOne(id: string): Promise<InvoiceView> {
    return toInvoiceView(await this.loadWithPayments(id));
  }

  async findAll(query: InvoiceQueryDto): Promise<Paginated<InvoiceView>> {
    const { page, pageSize, studentId, schoolId, status } = query;
    const qb = this.invoiceRepo
      .createQueryBuilder('invoice')
      .innerJoin('invoice.student', 'student')
      .leftJoinAndSelect('invoice.payments', 'payment')
      .orderBy('invoice.dueDate', 'DESC')
      .addOrderBy('invoice.createdAt', 'DESC')
      .skip((page - 1) * pageSize)
      .take(pageSize);

    if (studentId) qb.andWhere('invoice.studentId = :studentId', { studentId });
    if (schoolId) qb.andWhere('student.schoolId = :schoolId', { schoolId });
    if (status) qb.andWhere('invoice.status = :status', { status });

    const [invoices, total] = await qb.getManyAndCount();
    return paginate(
      invoices.map((invoice) => toInvoiceView(invoice)),
      total,
      page,
      pageSize,
    );
  }

  /**
   * Edits amount, due date or description. A new amount re-derives the
   * status from the payments already recorded; an OVERDUE invoice stays
   * OVERDUE until it is settled.
   *
   * Holds the invoice row lock that payment recording takes.
   */
  async update(id: string, dto: UpdateInvoiceDto): Promise<InvoiceView> {
    return this.dataSource.transaction(async (manager) => {
      const invoice = await manager.findOne(Invoice, {
        where: { id },
        lock: { mode: 'pessimistic_write' },
      });
      if (!invoice) {
        throw new EntityNotFoundException('Invoice', id);
      }
      if (invoice.status === InvoiceStatus.CANCELLED) {
        throw new BusinessRuleException(`Invoice '${id}' is cancelled and cannot be modified`, 'invoice_cancelled');
      }

      const payments = await manager.find(Payment, { where: { invoiceId: id } });
      const paid = paidAmount(payments);
      const changes: Partial<Pick<Invoice, 'amount' | 'dueDate' | 'description' | 'status'>> = {};

      if (dto.amount !== undefined) {
        if (toCents(dto.amount) < toCents(paid)) {
          throw new BusinessRuleException(
            `Invoice amount (${formatMoney(dto.amount)}) is below the amount already paid (${formatMoney(paid)})`,
            'invoice_amount_below_paid',
          );
        }
        changes.amount = roundMoney(dto.amount);
        const status = recomputeStatus({ amount: changes.amount, status: invoice.status }, paid);
        if (invoice.status !== InvoiceStatus.OVERDUE || status === InvoiceStatus.PAID) {
          changes.status = status;
        }
      }
      if (dto.dueDate !== undefined) changes.dueDate = toIsoDate(dto.dueDate);
      if (dto.description !== undefined) changes.description = dto.description;

      if (Object.keys(changes).length > 0) {
        await manager.update(Invoice, id, changes);
        Logger.log(`Invoice ${id} updated: ${Object.keys(changes).join(', ')}`, 'InvoicesService');
      }
      return toInvoiceView({ ...invoice, ...changes }, payments);
    });
  }

  async cancel(id: string): Promise<InvoiceView> {
    const invoice = await this.loadWithPayments(id);
    if (invoice.status !== InvoiceStatus.CANCELLED) {
      await this.invoiceRepo.update(id, { status: InvoiceStatus.CANCELLED });
      Logger.log(`Invoice ${id} cancelled (was ${invoice.status})`, 'InvoicesService');
    }
    return toInvoiceView({ ...invoice, status: InvoiceStatus.CANCELLED });
  }

  /** Marks open invoices due before `today` as OVERDUE and returns how many changed. */
  async sweepOverdue(today: string = todayIso()): Promise<number> {
    const result = await this.invoiceRepo.update(
      { dueDate: LessThan(today), status: In(OPEN_INVOICE_STATUSES) },
      { status: InvoiceStatus.OVERDUE },
    );
    const updated = result.affected ?? 0;
    Logger.log(`Overdue sweep for ${today}: ${updated} invoice(s) marked OVERDUE`, 'InvoicesService');
    return updated;
  }

  private async loadWithPayments(id: string): Promise<Invoice> {
    const invoice = await this.invoiceRepo.findOne({ where: { id }, relations: { payments: true } });
    if (!invoice) {
      throw new EntityNotFoundException('Invoice', id);
    }
    return invoice;
  }
}
