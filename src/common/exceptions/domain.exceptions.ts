import { BadRequestException, NotFoundException } from '@nestjs/common';
import { formatMoney } from '../utils/money.util';

export class EntityNotFoundException extends NotFoundException {
  constructor(
    public readonly entity: string,
    public readonly id: string,
  ) {
    super({
      message: `${entity} with id '${id}' not found`,
      error: 'EntityNotFound',
      entity,
      id,
    });
  }
}

/**
 * Raised when a request is well formed but violates a ledger rule.
 * `rule` is a stable identifier clients can branch on.
 */
export class BusinessRuleException extends BadRequestException {
  constructor(
    message: string,
    public readonly rule?: string,
  ) {
    super({ message, error: 'BusinessRuleError', rule });
  }
}

export class PaymentExceedsDebtException extends BusinessRuleException {
  constructor(
    public readonly attempted: number,
    public readonly pending: number,
  ) {
    super(
      `Payment amount (${formatMoney(attempted)}) exceeds pending amount (${formatMoney(pending)})`,
      'payment_cannot_exceed_debt',
    );
  }
}

export class InvoiceCancelledException extends BusinessRuleException {
  constructor(public readonly invoiceId: string) {
    super(
      `Invoice '${invoiceId}' is cancelled and cannot receive payments`,
      'no_payment_for_cancelled_invoice',
    );
  }
}
