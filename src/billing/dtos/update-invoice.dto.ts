import { OmitType, PartialType } from '@nestjs/swagger';
import { CreateInvoiceDto } from './create-invoice.dto';

// Status is driven only by payments, cancellation and the overdue sweep.
export class UpdateInvoiceDto extends PartialType(
  OmitType(CreateInvoiceDto, ['studentId', 'billingItemId'] as const),
) {}
