import { Inject, Injectable } from '@nestjs/common';

import { ACCOUNT_STORE } from '../../domain/repositories/repository.tokens';
import type { IAccountStore } from '../../domain/repositories/account-store.interface';
import type {
  BalanceRecord,
  LedgerEntryRecord,
  NotificationRecord,
  ProfileRecord,
  ProfileUpdateInput,
} from '../../domain/models/account.model';
import {
  ConflictError,
  ForbiddenError,
  NotFoundError,
  UniquenessRaceError,
} from '../../domain/errors/domain.errors';
import { resolveAvatarUrl, validateUsername } from '../provisioning/username.util';
import { AppLogger } from '../logging/app-logger.service';
import { LogCategory } from '../logging/log-levels';
import type { UpdateProfileDto } from './dto/update-profile.dto';

@Injectable()
export class ProfilesService {
  constructor(
    @Inject(ACCOUNT_STORE) private readonly store: IAccountStore,
    private readonly logger: AppLogger,
  ) {}

  async getProfile(userId: string): Promise<ProfileRecord> {
    const profile = await this.store.findProfileById(userId);
    if (!profile) {
      throw new NotFoundError(`Profile ${userId} not found`);
    }
    return profile;
  }

  /** Owner-only. Usernames follow the signup rules; a blank avatar restores the placeholder. */
  async updateProfile(actorId: string, userId: string, dto: UpdateProfileDto): Promise<ProfileRecord> {
    if (actorId !== userId) {
      this.logger.warn(LogCategory.PROFILE, 'Profile update denied', { actorId, userId });
      throw new ForbiddenError('Only the owner may update this profile');
    }

    const existing = await this.getProfile(userId);
    const changes: ProfileUpdateInput = {};

    if (dto.username !== undefined) {
      changes.username = validateUsername(dto.username);
      if (await this.store.findProfileByUsername(changes.username, userId)) {
        throw new ConflictError('username already exists');
      }
    }
    if (dto.avatar_url !== undefined) {
      changes.avatarUrl = resolveAvatarUrl(changes.username ?? existing.username, dto.avatar_url);
    }

    let updated: ProfileRecord | null;
    try {
      updated = await this.store.updateProfile(userId, changes);
    } catch (error) {
      if (error instanceof UniquenessRaceError) {
        throw new ConflictError('username already exists', { cause: error });
      }
      throw error;
    }
    if (!updated) {
      throw new NotFoundError(`Profile ${userId} not found`);
    }

    this.logger.info(LogCategory.PROFILE, 'Profile updated', { userId, fields: Object.keys(changes) });
    return updated;
  }

  async getBalance(userId: string): Promise<BalanceRecord> {
    const balance = await this.store.findBalance(userId);
    if (!balance) {
      throw new NotFoundError(`Balance for ${userId} not found`);
    }
    return balance;
  }

  async listTransactions(userId: string): Promise<LedgerEntryRecord[]> {
    return this.store.listLedgerEntries(userId);
  }

  async listNotifications(userId: string): Promise<NotificationRecord[]> {
    return this.store.listNotifications(userId);
  }
}
