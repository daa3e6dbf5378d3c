import { Controller, Post, Body, Get, Param, Query, Patch, HttpCode, HttpStatus, ParseUUIDPipe } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { InvoicesService } from '../services/invoices.service';
import { PaymentsService } from '../services/payments.service';
import { CreateInvoiceDto } from '../dtos/create-invoice.dto';
import { UpdateInvoiceDto } from '../dtos/update-invoice.dto';
import { InvoiceQueryDto } from '../dtos/billing-query.dto';

@ApiTags('Invoices')
@Controller('invoices')
export class InvoicesController {
  constructor(
    private readonly invoicesService: InvoicesService,
    private readonly paymentsService: PaymentsService,
  ) {}

  @Post()
  @ApiOperation({ summary: 'Raise an invoice against a student' })
  async create(@Body() dto: CreateInvoiceDto) {
    return this.invoicesService.create(dto);
  }

  @Get()
  @ApiOperation({ summary: 'List invoices, filtered by student, school or status' })
  async findAll(@Query() query: InvoiceQueryDto) {
    return this.invoicesService.findAll(query);
  }

  // Triggered by an external scheduler; always sweeps against the server's date
  @Post('overdue/sweep')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Mark open invoices past their due date as OVERDUE' })
  async sweepOverdue() {
    const updated = await this.invoicesService.sweepOverdue();
    return { updated };
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get an invoice with its payments and balance' })
  async findOne(@Param('id', ParseUUIDPipe) id: string) {
    return this.invoicesService.findOne(id);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Edit amount, due date or description' })
  async update(@Param('id', ParseUUIDPipe) id: string, @Body() dto: UpdateInvoiceDto) {
    return this.invoicesService.update(id, dto);
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Cancel an invoice' })
  async cancel(@Param('id', ParseUUIDPipe) id: string) {
    return this.invoicesService.cancel(id);
  }

  @Get(':id/payments')
  @ApiOperation({ summary: 'Payments recorded against an invoice, newest first' })
  async payments(@Param('id', ParseUUIDPipe) id: string) {
    return this.paymentsService.findByInvoice(id);
  }
}
