import { Inject, Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';

import { ACCOUNT_STORE } from '../../domain/repositories/repository.tokens';
import type { IAccountStore } from '../../domain/repositories/account-store.interface';
import { USERS_EMAIL_KEY } from '../../domain/repositories/constraint-names';
import type { BalanceRecord, IdentityUser, ProfileRecord } from '../../domain/models/account.model';
import { ConflictError, UniquenessRaceError } from '../../domain/errors/domain.errors';
import { UserProvisioningService } from '../provisioning/user-provisioning.service';
import { TokenService } from '../auth/token.service';
import { AppLogger } from '../logging/app-logger.service';
import { LogCategory } from '../logging/log-levels';
import type { SignupDto } from './dto/signup.dto';

export interface SignupResult {
  user: IdentityUser;
  profile: ProfileRecord;
  balance: BalanceRecord;
  accessToken: string;
  expiresIn: number;
}

/**
 * Identity stand-in: creates the user row and provisions it in the same
 * transaction, so a failed provisioning leaves no user behind.
 */
@Injectable()
export class AccountsService {
  constructor(
    @Inject(ACCOUNT_STORE) private readonly store: IAccountStore,
    private readonly provisioning: UserProvisioningService,
    private readonly tokens: TokenService,
    private readonly logger: AppLogger,
  ) {}

  async signup(dto: SignupDto): Promise<SignupResult> {
    const email = dto.email?.trim() || null;
    const metadata = { ...dto.metadata };

    this.logger.debug(LogCategory.ACCOUNT, 'Signup requested', { username: metadata.username, hasEmail: email !== null });

    let created: { user: IdentityUser; profile: ProfileRecord; balance: BalanceRecord };
    try {
      created = await this.store.transaction(async (tx) => {
        const user = await tx.insertUser({ id: randomUUID(), email, metadata });
        const { profile, balance } = await this.provisioning.provision(tx, user);
        return { user, profile, balance };
      });
    } catch (error) {
      if (error instanceof UniquenessRaceError && error.constraint === USERS_EMAIL_KEY) {
        this.logger.info(LogCategory.ACCOUNT, 'Signup rejected: email already registered');
        throw new ConflictError('email already registered', { cause: error });
      }
      throw error;
    }

    const token = this.tokens.issue(created.user.id);
    this.logger.info(LogCategory.ACCOUNT, 'Account created', {
      userId: created.user.id,
      username: created.profile.username,
    });

    return { ...created, accessToken: token.accessToken, expiresIn: token.expiresIn };
  }
}
