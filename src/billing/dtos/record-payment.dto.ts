import { IsUUID, IsNumber, IsEnum, IsOptional, IsString, IsDateString, Min, Max, MaxLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { PaymentMethod } from '../enums/payment-method.enum';
import { MAX_MONEY_AMOUNT } from '../../common/constants/constants';

export class RecordPaymentDto {
  @ApiProperty({ description: 'Invoice ID' })
  @IsUUID()
  invoiceId!: string;

  @ApiProperty({ description: 'Payment amount', example: 300 })
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0.01)
  @Max(MAX_MONEY_AMOUNT)
  amount!: number;

  @ApiPropertyOptional({ description: 'Payment method', enum: PaymentMethod, default: PaymentMethod.CASH })
  @IsOptional()
  @IsEnum(PaymentMethod)
  method?: PaymentMethod = PaymentMethod.CASH;

  @ApiPropertyOptional({ description: 'Bank or receipt reference' })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  reference?: string;

  @ApiPropertyOptional({ description: 'Date the money was received (defaults to today)' })
  @IsOptional()
  @IsDateString()
  paymentDate?: string;
}
