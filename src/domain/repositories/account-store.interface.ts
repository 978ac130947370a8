/**
 * IAccountStore — persistence port for identity users and the rows the
 * provisioning workflow creates for them (profile, balance, ledger,
 * notifications).
 *
 * Implementations:
 *   - PgAccountStore       (PostgreSQL via pg)
 *   - InMemoryAccountStore (testing / lightweight deployments)
 *
 * Writes that must be atomic go through `transaction()`. Implementations
 * raise `UniquenessRaceError` when a unique constraint fires at insert time;
 * every other storage error propagates as-is.
 */
import type {
  BalanceRecord,
  IdentityUser,
  IdentityUserCreateInput,
  LedgerEntryCreateInput,
  LedgerEntryRecord,
  NotificationCreateInput,
  NotificationRecord,
  ProfileCreateInput,
  ProfileRecord,
  ProfileUpdateInput,
} from '../models/account.model';

export interface IAccountTransaction {
  insertUser(input: IdentityUserCreateInput): Promise<IdentityUser>;

  findProfileById(userId: string): Promise<ProfileRecord | null>;

  /**
   * Case-insensitive lookup of the profile holding `username`.
   *
   * Rows locked by concurrent writers are skipped rather than waited on, so
   * two racing signups never block each other here; the unique index decides.
   */
  findUsernameHolder(username: string): Promise<ProfileRecord | null>;

  insertProfile(input: ProfileCreateInput): Promise<ProfileRecord>;
  insertBalance(userId: string, amount: number): Promise<BalanceRecord>;
  insertLedgerEntry(input: LedgerEntryCreateInput): Promise<LedgerEntryRecord>;
  insertNotification(input: NotificationCreateInput): Promise<NotificationRecord>;

  /** Delete every provisioned row (profile, balance, ledger, notifications) for a user. */
  deleteProvisionedRows(userId: string): Promise<void>;

  /**
   * Run `fn` inside a savepoint. If `fn` throws, its writes are rolled back
   * and the error is rethrown; the enclosing transaction stays usable.
   */
  savepoint<T>(fn: () => Promise<T>): Promise<T>;
}

export interface IAccountStore {
  /** Run `fn` in a transaction; commit when it resolves, roll back when it throws. */
  transaction<T>(fn: (tx: IAccountTransaction) => Promise<T>): Promise<T>;

  findUserById(userId: string): Promise<IdentityUser | null>;

  findProfileById(userId: string): Promise<ProfileRecord | null>;

  /** Case-insensitive lookup, optionally ignoring one profile (for renames). */
  findProfileByUsername(username: string, excludeUserId?: string): Promise<ProfileRecord | null>;

  /** Update a profile; throws `UniquenessRaceError` on a username clash. */
  updateProfile(userId: string, data: ProfileUpdateInput): Promise<ProfileRecord | null>;

  findBalance(userId: string): Promise<BalanceRecord | null>;

  /** Ledger entries for a user, newest first. */
  listLedgerEntries(userId: string): Promise<LedgerEntryRecord[]>;

  /** Notifications for a user, newest first. */
  listNotifications(userId: string): Promise<NotificationRecord[]>;
}
