import { Transform, TransformFnParams } from 'class-transformer';
import { IsBoolean, IsDateString, IsEnum, IsInt, IsOptional, IsUUID, Max, Min } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { InvoiceStatus } from '../../billing/enums/invoice-status.enum';
import { REPORT_LIMITS } from '../../common/constants/constants';

const toBoolean = ({ value }: TransformFnParams) => value === true || value === 'true' || value === '1';

const toInt =
  (fallback: number) =>
  ({ value }: TransformFnParams) =>
    value === undefined || value === null || value === '' ? fallback : parseInt(value, 10);

export class StudentBalanceQueryDto {
  @ApiPropertyOptional()
  @IsOptional()
  @IsUUID()
  schoolId?: string;

  @ApiPropertyOptional({ description: 'Only students with a positive balance', default: false })
  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  onlyWithDebt: boolean = false;

  @ApiPropertyOptional({ default: true })
  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  onlyActive: boolean = true;
}

export class SchoolSummaryQueryDto {
  @ApiPropertyOptional({ default: true })
  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  onlyActive: boolean = true;
}

export class ReportPageQueryDto {
  @ApiPropertyOptional({ default: REPORT_LIMITS.DEFAULT_LIMIT, maximum: REPORT_LIMITS.MAX_LIMIT })
  @IsOptional()
  @Transform(toInt(REPORT_LIMITS.DEFAULT_LIMIT))
  @IsInt()
  @Min(1)
  @Max(REPORT_LIMITS.MAX_LIMIT)
  limit: number = REPORT_LIMITS.DEFAULT_LIMIT;

  @ApiPropertyOptional({ default: 0 })
  @IsOptional()
  @Transform(toInt(0))
  @IsInt()
  @Min(0)
  offset: number = 0;
}

export class InvoiceDetailsQueryDto extends ReportPageQueryDto {
  @ApiPropertyOptional()
  @IsOptional()
  @IsUUID()
  schoolId?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsUUID()
  studentId?: string;

  @ApiPropertyOptional({ enum: InvoiceStatus })
  @IsOptional()
  @IsEnum(InvoiceStatus)
  status?: InvoiceStatus;
}

export class PaymentHistoryQueryDto extends ReportPageQueryDto {
  @ApiPropertyOptional()
  @IsOptional()
  @IsUUID()
  schoolId?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsUUID()
  studentId?: string;

  @ApiPropertyOptional({ description: 'Inclusive, yyyy-MM-dd' })
  @IsOptional()
  @IsDateString()
  dateFrom?: string;

  @ApiPropertyOptional({ description: 'Inclusive, yyyy-MM-dd' })
  @IsOptional()
  @IsDateString()
  dateTo?: string;
}

export class OverdueInvoicesQueryDto {
  @ApiPropertyOptional()
  @IsOptional()
  @IsUUID()
  schoolId?: string;

  @ApiPropertyOptional({ default: 0 })
  @IsOptional()
  @Transform(toInt(0))
  @IsInt()
  @Min(0)
  minDaysOverdue: number = 0;
}

export class CollectionsQueryDto {
  @ApiPropertyOptional()
  @IsOptional()
  @IsUUID()
  schoolId?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsDateString()
  dateFrom?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsDateString()
  dateTo?: string;
}

export class MonthlyRevenueQueryDto {
  @ApiPropertyOptional()
  @IsOptional()
  @IsUUID()
  schoolId?: string;

  @ApiPropertyOptional({ example: 2025 })
  @IsOptional()
  @Transform(({ value }) => (value ? parseInt(value, 10) : undefined))
  @IsInt()
  @Min(2000)
  @Max(2100)
  year?: number;
}

export class SchoolStatementQueryDto {
  @ApiPropertyOptional({ description: 'Invoices created on or after this date' })
  @IsOptional()
  @IsDateString()
  fromDate?: string;

  @ApiPropertyOptional({ description: 'Invoices created on or before this date' })
  @IsOptional()
  @IsDateString()
  toDate?: string;
}
