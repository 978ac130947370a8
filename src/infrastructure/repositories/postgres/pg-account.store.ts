/**
 * PgAccountStore — IAccountStore backed by PostgreSQL through a `pg` Pool.
 *
 * `transaction()` checks out one client and wraps the callback in
 * BEGIN/COMMIT/ROLLBACK; `savepoint()` nests a SAVEPOINT inside it so a
 * failed provisioning attempt can be undone without losing the identity row
 * inserted earlier in the same transaction. The unique index on
 * lower(username) is the final authority on username uniqueness.
 */
import { Injectable, Logger } from '@nestjs/common';
import type { PoolClient, QueryResult, QueryResultRow } from 'pg';
import { DatabaseService } from '../../../modules/database/database.service';
import type {
  IAccountStore,
  IAccountTransaction,
} from '../../../domain/repositories/account-store.interface';
import type {
  BalanceRecord,
  IdentityUser,
  IdentityUserCreateInput,
  LedgerEntryCreateInput,
  LedgerEntryRecord,
  LedgerEntryType,
  NotificationCreateInput,
  NotificationRecord,
  NotificationType,
  ProfileCreateInput,
  ProfileRecord,
  ProfileUpdateInput,
} from '../../../domain/models/account.model';
import { translatePgError } from './pg-errors';
import { isValidUuid } from './uuid-guard';

type UserRow = {
  id: string;
  email: string | null;
  metadata: Record<string, unknown> | null;
  created_at: Date;
};

type ProfileRow = {
  id: string;
  username: string;
  avatar_url: string;
  created_at: Date;
  updated_at: Date;
};

type BalanceRow = {
  user_id: string;
  balance: string;
  created_at: Date;
  updated_at: Date;
};

type LedgerRow = {
  id: string;
  user_id: string;
  amount: string;
  type: string;
  description: string;
  created_at: Date;
};

type NotificationRow = {
  id: string;
  user_id: string;
  title: string;
  message: string;
  type: string;
  read: boolean;
  created_at: Date;
};

const PROFILE_COLUMNS = 'id, username, avatar_url, created_at, updated_at';

export const SQL = {
  insertUser: `INSERT INTO users (id, email, metadata) VALUES ($1, $2, $3::jsonb)
    RETURNING id, email, metadata, created_at`,
  findUserById: 'SELECT id, email, metadata, created_at FROM users WHERE id = $1',
  findProfileById: `SELECT ${PROFILE_COLUMNS} FROM profiles WHERE id = $1`,
  findUsernameHolder: `SELECT ${PROFILE_COLUMNS} FROM profiles
    WHERE lower(username) = lower($1) LIMIT 1 FOR UPDATE SKIP LOCKED`,
  findProfileByUsername: `SELECT ${PROFILE_COLUMNS} FROM profiles
    WHERE lower(username) = lower($1) AND ($2::uuid IS NULL OR id <> $2::uuid) LIMIT 1`,
  insertProfile: `INSERT INTO profiles (id, username, avatar_url, created_at, updated_at)
    VALUES ($1, $2, $3, now(), now()) RETURNING ${PROFILE_COLUMNS}`,
  updateProfile: `UPDATE profiles SET username = COALESCE($2, username),
    avatar_url = COALESCE($3, avatar_url), updated_at = now()
    WHERE id = $1 RETURNING ${PROFILE_COLUMNS}`,
  insertBalance: `INSERT INTO user_balances (user_id, balance, created_at, updated_at)
    VALUES ($1, $2, now(), now()) RETURNING user_id, balance, created_at, updated_at`,
  findBalance: 'SELECT user_id, balance, created_at, updated_at FROM user_balances WHERE user_id = $1',
  insertLedgerEntry: `INSERT INTO transactions (user_id, amount, type, description, created_at)
    VALUES ($1, $2, $3, $4, now()) RETURNING id, user_id, amount, type, description, created_at`,
  listLedgerEntries: `SELECT id, user_id, amount, type, description, created_at FROM transactions
    WHERE user_id = $1 ORDER BY created_at DESC`,
  insertNotification: `INSERT INTO notifications (user_id, title, message, type, created_at)
    VALUES ($1, $2, $3, $4, now()) RETURNING id, user_id, title, message, type, read, created_at`,
  listNotifications: `SELECT id, user_id, title, message, type, read, created_at FROM notifications
    WHERE user_id = $1 ORDER BY created_at DESC`,
  deleteProfile: 'DELETE FROM profiles WHERE id = $1',
  deleteBalance: 'DELETE FROM user_balances WHERE user_id = $1',
  deleteLedgerEntries: 'DELETE FROM transactions WHERE user_id = $1',
  deleteNotifications: 'DELETE FROM notifications WHERE user_id = $1',
} as const;

// ─── Row mappers ────────────────────────────────────────────────────────────

function toIdentityUser(row: UserRow): IdentityUser {
  return {
    id: row.id,
    email: row.email,
    metadata: row.metadata ?? {},
    createdAt: row.created_at,
  };
}

function toProfile(row: ProfileRow): ProfileRecord {
  return {
    id: row.id,
    username: row.username,
    avatarUrl: row.avatar_url,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toBalance(row: BalanceRow): BalanceRecord {
  // NUMERIC comes back as a string to avoid precision loss
  return {
    userId: row.user_id,
    balance: Number(row.balance),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toLedgerType(value: string): LedgerEntryType {
  if (value === 'welcome_bonus') return value;
  throw new Error(`Unknown transaction type "${value}"`);
}

function toNotificationType(value: string): NotificationType {
  if (value === 'welcome_bonus') return value;
  throw new Error(`Unknown notification type "${value}"`);
}

function toLedgerEntry(row: LedgerRow): LedgerEntryRecord {
  return {
    id: row.id,
    userId: row.user_id,
    amount: Number(row.amount),
    type: toLedgerType(row.type),
    description: row.description,
    createdAt: row.created_at,
  };
}

function toNotification(row: NotificationRow): NotificationRecord {
  return {
    id: row.id,
    userId: row.user_id,
    title: row.title,
    message: row.message,
    type: toNotificationType(row.type),
    read: row.read,
    createdAt: row.created_at,
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function firstRow<R extends QueryResultRow>(result: QueryResult<R>, statement: string): R {
  const row = result.rows[0];
  if (row === undefined) {
    throw new Error(`${statement} returned no row`);
  }
  return row;
}

// ─── Transaction ────────────────────────────────────────────────────────────

export class PgAccountTransaction implements IAccountTransaction {
  private savepointSeq = 0;

  constructor(
    private readonly client: PoolClient,
    private readonly logger: Logger = new Logger(PgAccountTransaction.name),
  ) {}

  async insertUser(input: IdentityUserCreateInput): Promise<IdentityUser> {
    const result = await this.run<UserRow>(SQL.insertUser, [
      input.id,
      input.email,
      JSON.stringify(input.metadata),
    ]);
    return toIdentityUser(firstRow(result, 'insertUser'));
  }

  async findProfileById(userId: string): Promise<ProfileRecord | null> {
    if (!isValidUuid(userId)) return null;
    const result = await this.run<ProfileRow>(SQL.findProfileById, [userId]);
    return result.rows.length > 0 ? toProfile(result.rows[0]) : null;
  }

  async findUsernameHolder(username: string): Promise<ProfileRecord | null> {
    const result = await this.run<ProfileRow>(SQL.findUsernameHolder, [username]);
    return result.rows.length > 0 ? toProfile(result.rows[0]) : null;
  }

  async insertProfile(input: ProfileCreateInput): Promise<ProfileRecord> {
    const result = await this.run<ProfileRow>(SQL.insertProfile, [input.id, input.username, input.avatarUrl]);
    return toProfile(firstRow(result, 'insertProfile'));
  }

  async insertBalance(userId: string, amount: number): Promise<BalanceRecord> {
    const result = await this.run<BalanceRow>(SQL.insertBalance, [userId, amount]);
    return toBalance(firstRow(result, 'insertBalance'));
  }

  async insertLedgerEntry(input: LedgerEntryCreateInput): Promise<LedgerEntryRecord> {
    const result = await this.run<LedgerRow>(SQL.insertLedgerEntry, [
      input.userId,
      input.amount,
      input.type,
      input.description,
    ]);
    return toLedgerEntry(firstRow(result, 'insertLedgerEntry'));
  }

  async insertNotification(input: NotificationCreateInput): Promise<NotificationRecord> {
    const result = await this.run<NotificationRow>(SQL.insertNotification, [
      input.userId,
      input.title,
      input.message,
      input.type,
    ]);
    return toNotification(firstRow(result, 'insertNotification'));
  }

  async deleteProvisionedRows(userId: string): Promise<void> {
    await this.run(SQL.deleteNotifications, [userId]);
    await this.run(SQL.deleteLedgerEntries, [userId]);
    await this.run(SQL.deleteBalance, [userId]);
    await this.run(SQL.deleteProfile, [userId]);
  }

  async savepoint<T>(fn: () => Promise<T>): Promise<T> {
    const name = `attempt_${++this.savepointSeq}`;
    await this.client.query(`SAVEPOINT ${name}`);
    try {
      const result = await fn();
      await this.client.query(`RELEASE SAVEPOINT ${name}`);
      return result;
    } catch (error) {
      try {
        await this.client.query(`ROLLBACK TO SAVEPOINT ${name}`);
      } catch (rollbackError) {
        this.logger.warn(`ROLLBACK TO SAVEPOINT ${name} failed: ${errorMessage(rollbackError)}`);
      }
      throw error;
    }
  }

  private async run<R extends QueryResultRow>(text: string, values: unknown[]): Promise<QueryResult<R>> {
    try {
      return await this.client.query<R>(text, values);
    } catch (error) {
      throw translatePgError(error);
    }
  }
}

// ─── Store ──────────────────────────────────────────────────────────────────

@Injectable()
export class PgAccountStore implements IAccountStore {
  private readonly logger = new Logger(PgAccountStore.name);

  constructor(private readonly db: DatabaseService) {}

  async transaction<T>(fn: (tx: IAccountTransaction) => Promise<T>): Promise<T> {
    const client = await this.db.connect();
    try {
      await client.query('BEGIN');
      const result = await fn(new PgAccountTransaction(client, this.logger));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        this.logger.warn(`ROLLBACK failed: ${errorMessage(rollbackError)}`);
      }
      throw translatePgError(error);
    } finally {
      client.release();
    }
  }

  async findUserById(userId: string): Promise<IdentityUser | null> {
    if (!isValidUuid(userId)) return null;
    const result = await this.db.pool.query<UserRow>(SQL.findUserById, [userId]);
    return result.rows.length > 0 ? toIdentityUser(result.rows[0]) : null;
  }

  async findProfileById(userId: string): Promise<ProfileRecord | null> {
    if (!isValidUuid(userId)) return null;
    const result = await this.db.pool.query<ProfileRow>(SQL.findProfileById, [userId]);
    return result.rows.length > 0 ? toProfile(result.rows[0]) : null;
  }

  async findProfileByUsername(username: string, excludeUserId?: string): Promise<ProfileRecord | null> {
    const exclude = excludeUserId && isValidUuid(excludeUserId) ? excludeUserId : null;
    const result = await this.db.pool.query<ProfileRow>(SQL.findProfileByUsername, [username, exclude]);
    return result.rows.length > 0 ? toProfile(result.rows[0]) : null;
  }

  async updateProfile(userId: string, data: ProfileUpdateInput): Promise<ProfileRecord | null> {
    if (!isValidUuid(userId)) return null;
    try {
      const result = await this.db.pool.query<ProfileRow>(SQL.updateProfile, [
        userId,
        data.username ?? null,
        data.avatarUrl ?? null,
      ]);
      return result.rows.length > 0 ? toProfile(result.rows[0]) : null;
    } catch (error) {
      throw translatePgError(error);
    }
  }

  async findBalance(userId: string): Promise<BalanceRecord | null> {
    if (!isValidUuid(userId)) return null;
    const result = await this.db.pool.query<BalanceRow>(SQL.findBalance, [userId]);
    return result.rows.length > 0 ? toBalance(result.rows[0]) : null;
  }

  async listLedgerEntries(userId: string): Promise<LedgerEntryRecord[]> {
    if (!isValidUuid(userId)) return [];
    const result = await this.db.pool.query<LedgerRow>(SQL.listLedgerEntries, [userId]);
    return result.rows.map(toLedgerEntry);
  }

  async listNotifications(userId: string): Promise<NotificationRecord[]> {
    if (!isValidUuid(userId)) return [];
    const result = await this.db.pool.query<NotificationRow>(SQL.listNotifications, [userId]);
    return result.rows.map(toNotification);
  }
}
