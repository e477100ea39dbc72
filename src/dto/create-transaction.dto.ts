import { IsEnum, IsNumber, IsOptional, IsPositive, IsString, MaxLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { TransactionType } from '../common/enums/transaction-type.enum';

export class CreateTransactionDto {
  @ApiProperty({
    description: 'Direction of the transaction',
    enum: TransactionType,
    example: TransactionType.DEPOSIT,
  })
  @IsEnum(TransactionType, { message: 'type must be one of: deposit, withdrawal' })
  type!: TransactionType;

  @ApiProperty({
    description: 'Transaction amount (must be positive)',
    example: 100,
    exclusiveMinimum: true,
    minimum: 0,
  })
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive()
  amount!: number;

  @ApiPropertyOptional({
    description: 'Free-text description of the transaction',
    example: 'Salary',
    maxLength: 500,
  })
  @IsString()
  @IsOptional()
  @MaxLength(500, { message: 'description must not be greater than 500 characters' })
  description?: string;
}
