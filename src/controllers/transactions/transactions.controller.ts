import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post } from '@nestjs/common';
import { SkipThrottle } from '@nestjs/throttler';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { LedgerStore } from '../../services/ledger/ledger-store.service';
import { CreateTransactionDto } from '../../dto/create-transaction.dto';
import {
  TRANSACTION_RECORDED_MESSAGE,
  TransactionRecordedResponseDto,
  TransactionResponseDto,
} from '../../dto/ledger-response.dto';

/**
 * TransactionsController
 *
 * Records deposits and withdrawals and lists account history
 */
@ApiTags('Transactions')
@Controller('transactions')
export class TransactionsController {
  constructor(private readonly ledgerStore: LedgerStore) {}

  /**
   * POST /transactions/:accountId
   * Record a deposit or withdrawal
   *
   * A deposit to an unknown account opens it, a withdrawal never does
   */
  @Post(':accountId')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Record a transaction',
    description: 'Records a deposit or withdrawal. Deposits open unknown accounts implicitly.',
  })
  @ApiParam({ name: 'accountId', description: 'Account ID', example: 'acc1' })
  @ApiResponse({ status: 201, type: TransactionRecordedResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid input or insufficient funds' })
  @ApiResponse({ status: 404, description: 'Withdrawal from an account that does not exist' })
  createTransaction(
    @Param('accountId') accountId: string,
    @Body() dto: CreateTransactionDto,
  ): TransactionRecordedResponseDto {
    this.ledgerStore.recordTransaction(accountId, dto.type, dto.amount, dto.description);

    return { message: TRANSACTION_RECORDED_MESSAGE };
  }

  /**
   * GET /transactions/:accountId
   * Full transaction history, oldest first
   */
  @Get(':accountId')
  @SkipThrottle()
  @ApiOperation({ summary: 'List transactions', description: 'Returns the full history of the account in recorded order' })
  @ApiParam({ name: 'accountId', description: 'Account ID', example: 'acc1' })
  @ApiResponse({ status: 200, type: [TransactionResponseDto] })
  @ApiResponse({ status: 404, description: 'Account not found' })
  listTransactions(@Param('accountId') accountId: string): TransactionResponseDto[] {
    return this.ledgerStore
      .getTransactions(accountId)
      .map((tx) => TransactionResponseDto.fromTransaction(tx));
  }
}
