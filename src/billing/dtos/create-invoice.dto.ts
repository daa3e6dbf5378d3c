import { IsUUID, IsNumber, IsOptional, IsString, IsDateString, Min, Max, MaxLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { MAX_MONEY_AMOUNT } from '../../common/constants/constants';

export class CreateInvoiceDto {
  @ApiProperty({ description: 'Student the invoice is raised against' })
  @IsUUID()
  studentId!: string;

  @ApiProperty({ description: 'Invoice amount', example: 1000 })
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0.01)
  @Max(MAX_MONEY_AMOUNT)
  amount!: number;

  @ApiProperty({ description: 'Due date (yyyy-MM-dd)', example: '2025-09-30' })
  @IsDateString()
  dueDate!: string;

  @ApiPropertyOptional({ description: 'Free-text description' })
  @IsOptional()
  @IsString()
  @MaxLength(1000)
  description?: string;

  @ApiPropertyOptional({ description: 'Catalog item this invoice bills for' })
  @IsOptional()
  @IsUUID()
  billingItemId?: string;
}
