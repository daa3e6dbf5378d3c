import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, FindOptionsWhere, Repository } from 'typeorm';
import { Invoice } from '../entities/invoice.entity';
import { Payment } from '../entities/payment.entity';
import { InvoiceStatus } from '../enums/invoice-status.enum';
import { PaymentMethod } from '../enums/payment-method.enum';
import { RecordPaymentDto } from '../dtos/record-payment.dto';
import { PaymentQueryDto } from '../dtos/billing-query.dto';
import { RecordedPayment } from '../types/invoice-view';
import { paidAmount, recomputeStatus } from '../utils/invoice-ledger.utils';
import {
  EntityNotFoundException,
  InvoiceCancelledException,
  PaymentExceedsDebtException,
} from '../../common/exceptions/domain.exceptions';
import { Logger } from '../../common/interceptors/logging.interceptor';
import { formatMoney, fromCents, roundMoney, toCents } from '../../common/utils/money.util';
import { toIsoDate, todayIso } from '../../common/utils/date.util';
import { Paginated, paginate } from '../../common/types/pagination';

@Injectable()
export class PaymentsService {
  constructor(
    private readonly dataSource: DataSource,
    @InjectRepository(Payment) private readonly paymentRepo: Repository<Payment>,
    @InjectRepository(Invoice) private readonly invoiceRepo: Repository<Invoice>,
  ) {}

  /**
   * Records a payment and moves the invoice to PARTIAL or PAID.
   *
   * The invoice row is locked FOR UPDATE so concurrent payments against the
   * same invoice serialise and the paid total can never pass the amount.
   */
  async record(dto: RecordPaymentDto): Promise<RecordedPayment> {
    return this.dataSource.transaction(async (manager) => {
      const invoice = await manager.findOne(Invoice, {
        where: { id: dto.invoiceId },
        lock: { mode: 'pessimistic_write' },
      });
      if (!invoice) {
        throw new EntityNotFoundException('Invoice', dto.invoiceId);
      }
      if (invoice.status === InvoiceStatus.CANCELLED) {
        throw new InvoiceCancelledException(invoice.id);
      }

      const existing = await manager.find(Payment, { where: { invoiceId: invoice.id } });
      const pendingCents = toCents(invoice.amount) - toCents(paidAmount(existing));
      const amountCents = toCents(dto.amount);
      if (amountCents > pendingCents) {
        throw new PaymentExceedsDebtException(dto.amount, fromCents(pendingCents));
      }

      const payment = manager.create(Payment, {
        invoiceId: invoice.id,
        amount: roundMoney(dto.amount),
        method: dto.method ?? PaymentMethod.CASH,
        reference: dto.reference ?? null,
        paymentDate: dto.paymentDate ? toIsoDate(dto.paymentDate) : todayIso(),
      });
      const saved = await manager.save(Payment, payment);

      const newPaid = fromCents(toCents(paidAmount(existing)) + amountCents);
      const status = recomputeStatus(invoice, newPaid);
      if (status !== invoice.status) {
        await manager.update(Invoice, invoice.id, { status });
      }

      Logger.log(
        `Payment ${saved.id} of ${formatMoney(saved.amount)} recorded on invoice ${invoice.id}: ${invoice.status} -> ${status}`,
        'PaymentsService',
      );

      return {
        payment: saved,
        invoice: {
          id: invoice.id,
          amount: invoice.amount,
          status,
          paidAmount: newPaid,
          pendingAmount: fromCents(pendingCents - amountCents),
        },
      };
    });
  }

  async findOne(id: string): Promise<Payment> {
    const payment = await this.paymentRepo.findOne({ where: { id } });
    if (!payment) {
      throw new EntityNotFoundException('Payment', id);
    }
    return payment;
  }

  async findAll(query: PaymentQueryDto): Promise<Paginated<Payment>> {
    const { page, pageSize, invoiceId, method } = query;
    const where: FindOptionsWhere<Payment> = {};
    if (invoiceId) where.invoiceId = invoiceId;
    if (method) where.method = method;

    const [payments, total] = await this.paymentRepo.findAndCount({
      where,
      order: { createdAt: 'DESC' },
      skip: (page - 1) * pageSize,
      take: pageSize,
    });
    return paginate(payments, total, page, pageSize);
  }

  async findByInvoice(invoiceId: string): Promise<Payment[]> {
    const exists = await this.invoiceRepo.count({ where: { id: invoiceId } });
    if (!exists) {
      throw new EntityNotFoundException('Invoice', invoiceId);
    }
    return this.paymentRepo.find({ where: { invoiceId }, order: { createdAt: 'DESC' } });
  }
}
