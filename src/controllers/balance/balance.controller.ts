import { Controller, Get, Param } from '@nestjs/common';
import { SkipThrottle } from '@nestjs/throttler';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { LedgerStore } from '../../services/ledger/ledger-store.service';
import { BalanceResponseDto } from '../../dto/ledger-response.dto';

@ApiTags('Balance')
@Controller('balance')
export class BalanceController {
  constructor(private readonly ledgerStore: LedgerStore) {}

  /**
   * GET /balance/:accountId
   * Current balance of the account
   */
  @Get(':accountId')
  @SkipThrottle()
  @ApiOperation({ summary: 'Get account balance' })
  @ApiParam({ name: 'accountId', description: 'Account ID', example: 'acc1' })
  @ApiResponse({ status: 200, type: BalanceResponseDto })
  @ApiResponse({ status: 404, description: 'Account not found' })
  getBalance(@Param('accountId') accountId: string): BalanceResponseDto {
    return { balance: this.ledgerStore.getBalance(accountId) };
  }
}
