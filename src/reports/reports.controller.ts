import { Controller, Get, Param, ParseUUIDPipe, Query } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { ReportsService } from './reports.service';
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

@ApiTags('Reports')
@Controller('reports')
export class ReportsController {
  constructor(private readonly reportsService: ReportsService) {}

  @Get('students/balance')
  @ApiOperation({ summary: 'Balance per student, largest debt first' })
  async studentBalances(@Query() query: StudentBalanceQueryDto) {
    return this.reportsService.studentBalances(query);
  }

  @Get('schools/summary')
  @ApiOperation({ summary: 'Financial summary per school' })
  async schoolSummaries(@Query() query: SchoolSummaryQueryDto) {
    return this.reportsService.schoolSummaries(query);
  }

  @Get('invoices/details')
  async invoiceDetails(@Query() query: InvoiceDetailsQueryDto) {
    return this.reportsService.invoiceDetails(query);
  }

  @Get('payments/history')
  async paymentHistory(@Query() query: PaymentHistoryQueryDto) {
    return this.reportsService.paymentHistory(query);
  }

  @Get('invoices/overdue')
  @ApiOperation({ summary: 'Unpaid invoices past their due date, most overdue first' })
  async overdueInvoices(@Query() query: OverdueInvoicesQueryDto) {
    return this.reportsService.overdueInvoices(query);
  }

  @Get('collections/daily')
  @ApiOperation({ summary: 'Collections per day and school, split by payment method' })
  async dailyCollections(@Query() query: CollectionsQueryDto) {
    return this.reportsService.dailyCollections(query);
  }

  @Get('revenue/monthly')
  async monthlyRevenue(@Query() query: MonthlyRevenueQueryDto) {
    return this.reportsService.monthlyRevenue(query);
  }

  @Get('students/:studentId/statement')
  @ApiOperation({ summary: 'Account statement of a student' })
  async studentStatement(@Param('studentId', ParseUUIDPipe) studentId: string) {
    return this.reportsService.studentStatement(studentId);
  }

  @Get('schools/:schoolId/statement')
  @ApiOperation({ summary: 'Account statement of a school for a period' })
  async schoolStatement(
    @Param('schoolId', ParseUUIDPipe) schoolId: string,
    @Query() query: SchoolStatementQueryDto,
  ) {
    return this.reportsService.schoolStatement(schoolId, query);
  }
}
