import { Controller, Get } from '@nestjs/common';

import { CurrentUserId } from '../auth/current-user.decorator';
import type { BalanceRecord, LedgerEntryRecord, NotificationRecord } from '../../domain/models/account.model';
import { ProfilesService } from './profiles.service';

/** The caller's own balance, ledger and notifications. */
@Controller('me')
export class MeController {
  constructor(private readonly profilesService: ProfilesService) {}

  @Get('balance')
  async getBalance(@CurrentUserId() userId: string): Promise<BalanceRecord> {
    return this.profilesService.getBalance(userId);
  }

  @Get('transactions')
  async listTransactions(@CurrentUserId() userId: string): Promise<LedgerEntryRecord[]> {
    return this.profilesService.listTransactions(userId);
  }

  @Get('notifications')
  async listNotifications(@CurrentUserId() userId: string): Promise<NotificationRecord[]> {
    return this.profilesService.listNotifications(userId);
  }
}
