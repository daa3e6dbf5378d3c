import { Controller, Post, Body, Get, Param, Query, ParseUUIDPipe } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { PaymentsService } from '../services/payments.service';
import { RecordPaymentDto } from '../dtos/record-payment.dto';
import { PaymentQueryDto } from '../dtos/billing-query.dto';

@ApiTags('Payments')
@Controller('payments')
export class PaymentsController {
  constructor(private readonly paymentsService: PaymentsService) {}

  @Post()
  @ApiOperation({ summary: 'Record a payment against an invoice' })
  async record(@Body() dto: RecordPaymentDto) {
    return this.paymentsService.record(dto);
  }

  @Get()
  @ApiOperation({ summary: 'List payments, newest first' })
  async findAll(@Query() query: PaymentQueryDto) {
    return this.paymentsService.findAll(query);
  }

  @Get(':id')
  async findOne(@Param('id', ParseUUIDPipe) id: string) {
    return this.paymentsService.findOne(id);
  }
}
