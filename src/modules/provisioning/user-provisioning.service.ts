/**
 * UserProvisioningService — creates the rows every new account starts with.
 *
 * Runs inside the caller's account transaction: profile, balance, welcome
 * ledger entry and welcome notification are written together in one
 * savepoint per attempt. A unique violation at insert time (a concurrent
 * signup grabbed the username after our check) rolls the savepoint back
 * and retries with exponential backoff; any other failure is final.
 */
import { Inject, Injectable } from '@nestjs/common';

import type { IAccountTransaction } from '../../domain/repositories/account-store.interface';
import type { IdentityUser, ProvisionedAccount } from '../../domain/models/account.model';
import {
  CleanupError,
  ConflictError,
  ProvisioningError,
  UniquenessRaceError,
} from '../../domain/errors/domain.errors';
import { AppLogger } from '../logging/app-logger.service';
import { LogCategory } from '../logging/log-levels';
import * as delayUtil from './delay.util';
import { PROVISIONING_OPTIONS, ProvisioningOptions } from './provisioning.config';
import { resolveAvatarUrl, validateUsername } from './username.util';

export const WELCOME_DESCRIPTION = 'Welcome bonus for new user';
export const WELCOME_TITLE = 'Welcome to Roomcast!';

export function welcomeMessage(amount: number): string {
  return `Thanks for joining! You've received ${amount} credits as a welcome bonus.`;
}

@Injectable()
export class UserProvisioningService {
  constructor(
    @Inject(PROVISIONING_OPTIONS) private readonly options: ProvisioningOptions,
    private readonly logger: AppLogger,
  ) {}

  async provision(
    tx: IAccountTransaction,
    user: Pick<IdentityUser, 'id' | 'metadata'>,
  ): Promise<ProvisionedAccount> {
    const username = validateUsername(user.metadata.username);
    const avatarUrl = resolveAvatarUrl(username, user.metadata.avatar_url);

    if (await tx.findProfileById(user.id)) {
      throw new ConflictError('user already provisioned');
    }

    const { maxAttempts, backoffUnitMs } = this.options;
    let lastError: UniquenessRaceError | undefined;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      try {
        const account = await tx.savepoint(() => this.writeRows(tx, user.id, username, avatarUrl));
        this.logger.info(LogCategory.PROVISIONING, 'User provisioned', {
          userId: user.id,
          username,
          attempts: attempt + 1,
        });
        return account;
      } catch (error) {
        if (!(error instanceof UniquenessRaceError)) {
          await this.cleanup(tx, user.id);
          throw error;
        }

        lastError = error;
        const retrying = attempt + 1 < maxAttempts;
        this.logger.warn(LogCategory.PROVISIONING, 'Username race on insert', {
          userId: user.id,
          username,
          constraint: error.constraint,
          attempt: attempt + 1,
          maxAttempts,
          retrying,
        });
        if (retrying) {
          await delayUtil.delay(backoffUnitMs * 2 ** (attempt + 1));
        }
      }
    }

    await this.cleanup(tx, user.id);
    this.logger.error(LogCategory.PROVISIONING, 'Provisioning exhausted retries', lastError, {
      userId: user.id,
      attempts: maxAttempts,
    });
    throw new ProvisioningError('exhausted retries', maxAttempts, { cause: lastError });
  }

  private async writeRows(
    tx: IAccountTransaction,
    userId: string,
    username: string,
    avatarUrl: string,
  ): Promise<ProvisionedAccount> {
    const holder = await tx.findUsernameHolder(username);
    if (holder) {
      throw new ConflictError('username already exists');
    }

    const amount = this.options.welcomeBonusAmount;
    const profile = await tx.insertProfile({ id: userId, username, avatarUrl });
    const balance = await tx.insertBalance(userId, amount);
    const welcomeTransaction = await tx.insertLedgerEntry({
      userId,
      amount,
      type: 'welcome_bonus',
      description: WELCOME_DESCRIPTION,
    });
    const welcomeNotification = await tx.insertNotification({
      userId,
      title: WELCOME_TITLE,
      message: welcomeMessage(amount),
      type: 'welcome_bonus',
    });

    return { profile, balance, welcomeTransaction, welcomeNotification };
  }

  /** Best effort: a failure here is logged and never replaces the original error. */
  private async cleanup(tx: IAccountTransaction, userId: string): Promise<void> {
    try {
      await tx.deleteProvisionedRows(userId);
    } catch (error) {
      const wrapped = new CleanupError(`cleanup failed for user ${userId}`, { cause: error });
      this.logger.warn(LogCategory.PROVISIONING, 'Error during user cleanup', { userId }, wrapped);
    }
  }
}
