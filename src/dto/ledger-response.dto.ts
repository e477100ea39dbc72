import { ApiProperty } from '@nestjs/swagger';
import { TransactionType } from '../common/enums/transaction-type.enum';
import { Transaction } from '../models';

export const TRANSACTION_RECORDED_MESSAGE = 'Transaction successfully recorded.';

export class TransactionRecordedResponseDto {
  @ApiProperty({ example: TRANSACTION_RECORDED_MESSAGE })
  message!: string;
}

export class BalanceResponseDto {
  @ApiProperty({ example: 70 })
  balance!: number;
}

/**
 * Wire shape of a recorded transaction
 * Timestamps are ISO-8601 UTC with millisecond precision
 */
export class TransactionResponseDto {
  @ApiProperty({ example: '3b241101-e2bb-4255-8caf-4136c566a962' })
  id!: string;

  @ApiProperty({ example: 'acc1' })
  account_id!: string;

  @ApiProperty({ enum: TransactionType, example: TransactionType.DEPOSIT })
  type!: TransactionType;

  @ApiProperty({ example: 100 })
  amount!: number;

  @ApiProperty({ type: String, nullable: true, example: 'Salary' })
  description!: string | null;

  @ApiProperty({ example: '2024-01-15T10:30:00.000Z' })
  timestamp!: string;

  static fromTransaction(tx: Transaction): TransactionResponseDto {
    return {
      id: tx.id,
      account_id: tx.accountId,
      type: tx.type,
      amount: tx.amount,
      description: tx.description,
      timestamp: tx.timestamp.toISOString(),
    };
  }
}
