/**
 * InMemoryAccountStore — IAccountStore backed by in-memory Maps.
 *
 * Transactions buffer their writes and apply them on commit. A transaction
 * that inserts a profile claims the lower-cased username until it commits or
 * rolls back; any other transaction inserting the same key fails at insert
 * time with UniquenessRaceError, the way a PostgreSQL unique index would.
 * Existence checks only see committed rows plus the caller's own writes,
 * which is what `FOR UPDATE SKIP LOCKED` gives against in-flight inserts.
 *
 * Suitable for testing and single-process deployments.
 */
import { Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
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
  NotificationCreateInput,
  NotificationRecord,
  ProfileCreateInput,
  ProfileRecord,
  ProfileUpdateInput,
} from '../../../domain/models/account.model';
import { UniquenessRaceError } from '../../../domain/errors/domain.errors';
import {
  BALANCES_PKEY,
  PROFILES_PKEY,
  PROFILES_USERNAME_KEY,
  USERS_EMAIL_KEY,
} from '../../../domain/repositories/constraint-names';


type PendingWrite =
  | { kind: 'user'; row: IdentityUser }
  | { kind: 'profile'; row: ProfileRecord }
  | { kind: 'balance'; row: BalanceRecord }
  | { kind: 'ledger'; row: LedgerEntryRecord }
  | { kind: 'notification'; row: NotificationRecord }
  | { kind: 'purge'; userId: string };

export interface AccountStoreStats {
  users: number;
  profiles: number;
  balances: number;
  ledgerEntries: number;
  notifications: number;
}

function usernameKey(username: string): string {
  return username.toLowerCase();
}

function newestFirst<T extends { createdAt: Date }>(rows: T[]): T[] {
  // Stable sort keeps insertion order reversed for equal timestamps
  return rows
    .map((row, index) => ({ row, index }))
    .sort((a, b) => b.row.createdAt.getTime() - a.row.createdAt.getTime() || b.index - a.index)
    .map(({ row }) => ({ ...row }));
}

class InMemoryAccountTransaction implements IAccountTransaction {
  private writes: PendingWrite[] = [];
  private readonly claims = new Set<string>();
  private finished = false;

  constructor(private readonly store: InMemoryAccountStore) {}

  async insertUser(input: IdentityUserCreateInput): Promise<IdentityUser> {
    this.assertOpen();
    if (input.email !== null) {
      const email = input.email.toLowerCase();
      const taken =
        this.store.hasEmail(email) ||
        this.pendingUsers().some((u) => u.email?.toLowerCase() === email);
      if (taken) throw new UniquenessRaceError(USERS_EMAIL_KEY);
    }
    const row: IdentityUser = {
      id: input.id,
      email: input.email,
      metadata: { ...input.metadata },
      createdAt: new Date(),
    };
    this.writes.push({ kind: 'user', row });
    return { ...row };
  }

  async findProfileById(userId: string): Promise<ProfileRecord | null> {
    this.assertOpen();
    const pending = this.pendingProfiles().find((p) => p.id === userId);
    if (pending) return { ...pending };
    if (this.purged(userId)) return null;
    return this.store.findProfileById(userId);
  }

  async findUsernameHolder(username: string): Promise<ProfileRecord | null> {
    this.assertOpen();
    const key = usernameKey(username);
    const pending = this.pendingProfiles().find((p) => usernameKey(p.username) === key);
    if (pending) return { ...pending };
    const committed = await this.store.findProfileByUsername(username);
    if (committed && this.purged(committed.id)) return null;
    return committed;
  }

  async insertProfile(input: ProfileCreateInput): Promise<ProfileRecord> {
    this.assertOpen();
    const key = usernameKey(input.username);
    const pending = this.pendingProfiles();
    if (this.store.hasProfile(input.id) || pending.some((p) => p.id === input.id)) {
      throw new UniquenessRaceError(PROFILES_PKEY);
    }
    if (
      this.store.isUsernameTaken(key, this) ||
      pending.some((p) => usernameKey(p.username) === key)
    ) {
      throw new UniquenessRaceError(PROFILES_USERNAME_KEY);
    }
    this.store.claimUsername(key, this);
    this.claims.add(key);

    const now = new Date();
    const row: ProfileRecord = {
      id: input.id,
      username: input.username,
      avatarUrl: input.avatarUrl,
      createdAt: now,
      updatedAt: now,
    };
    this.writes.push({ kind: 'profile', row });
    return { ...row };
  }

  async insertBalance(userId: string, amount: number): Promise<BalanceRecord> {
    this.assertOpen();
    const pending = this.writes.some((w) => w.kind === 'balance' && w.row.userId === userId);
    if (pending || (this.store.hasBalance(userId) && !this.purged(userId))) {
      throw new UniquenessRaceError(BALANCES_PKEY);
    }
    const now = new Date();
    const row: BalanceRecord = { userId, balance: amount, createdAt: now, updatedAt: now };
    this.writes.push({ kind: 'balance', row });
    return { ...row };
  }

  async insertLedgerEntry(input: LedgerEntryCreateInput): Promise<LedgerEntryRecord> {
    this.assertOpen();
    const row: LedgerEntryRecord = { id: randomUUID(), ...input, createdAt: new Date() };
    this.writes.push({ kind: 'ledger', row });
    return { ...row };
  }

  async insertNotification(input: NotificationCreateInput): Promise<NotificationRecord> {
    this.assertOpen();
    const row: NotificationRecord = { id: randomUUID(), ...input, read: false, createdAt: new Date() };
    this.writes.push({ kind: 'notification', row });
    return { ...row };
  }

  async deleteProvisionedRows(userId: string): Promise<void> {
    this.assertOpen();
    this.writes = this.writes.filter((w) => {
      if (w.kind === 'user' || w.kind === 'purge') return true;
      if (w.kind === 'profile') return w.row.id !== userId;
      return w.row.userId !== userId;
    });
    this.releaseUnusedClaims();
    this.writes.push({ kind: 'purge', userId });
  }

  async savepoint<T>(fn: () => Promise<T>): Promise<T> {
    this.assertOpen();
    const mark = this.writes.length;
    try {
      return await fn();
    } catch (error) {
      this.writes = this.writes.slice(0, mark);
      this.releaseUnusedClaims();
      throw error;
    }
  }

  commit(): void {
    this.assertOpen();
    this.store.apply(this.writes);
    this.close();
  }

  rollback(): void {
    if (this.finished) return;
    this.writes = [];
    this.close();
  }

  private close(): void {
    for (const key of this.claims) {
      this.store.releaseUsername(key, this);
    }
    this.claims.clear();
    this.finished = true;
  }

  /** Drop claims whose profile write was rolled back or purged. */
  private releaseUnusedClaims(): void {
    const live = new Set(this.pendingProfiles().map((p) => usernameKey(p.username)));
    for (const key of [...this.claims]) {
      if (!live.has(key)) {
        this.store.releaseUsername(key, this);
        this.claims.delete(key);
      }
    }
  }

  private pendingUsers(): IdentityUser[] {
    const rows: IdentityUser[] = [];
    for (const w of this.writes) if (w.kind === 'user') rows.push(w.row);
    return rows;
  }

  private pendingProfiles(): ProfileRecord[] {
    const rows: ProfileRecord[] = [];
    for (const w of this.writes) if (w.kind === 'profile') rows.push(w.row);
    return rows;
  }

  private purged(userId: string): boolean {
    return this.writes.some((w) => w.kind === 'purge' && w.userId === userId);
  }

  private assertOpen(): void {
    if (this.finished) {
      throw new Error('Transaction already finished');
    }
  }
}

@Injectable()
export class InMemoryAccountStore implements IAccountStore {
  private readonly users = new Map<string, IdentityUser>();
  private readonly profiles = new Map<string, ProfileRecord>();
  private readonly balances = new Map<string, BalanceRecord>();
  private readonly ledger: LedgerEntryRecord[] = [];
  private readonly notifications: NotificationRecord[] = [];

  /** Usernames inserted by transactions that have not finished yet. */
  private readonly usernameClaims = new Map<string, InMemoryAccountTransaction>();

  async transaction<T>(fn: (tx: IAccountTransaction) => Promise<T>): Promise<T> {
    const tx = new InMemoryAccountTransaction(this);
    try {
      const result = await fn(tx);
      tx.commit();
      return result;
    } catch (error) {
      tx.rollback();
      throw error;
    }
  }

  async findUserById(userId: string): Promise<IdentityUser | null> {
    const user = this.users.get(userId);
    return user ? { ...user, metadata: { ...user.metadata } } : null;
  }

  async findProfileById(userId: string): Promise<ProfileRecord | null> {
    const profile = this.profiles.get(userId);
    return profile ? { ...profile } : null;
  }

  async findProfileByUsername(username: string, excludeUserId?: string): Promise<ProfileRecord | null> {
    const key = usernameKey(username);
    for (const profile of this.profiles.values()) {
      if (excludeUserId && profile.id === excludeUserId) continue;
      if (usernameKey(profile.username) === key) return { ...profile };
    }
    return null;
  }

  async updateProfile(userId: string, data: ProfileUpdateInput): Promise<ProfileRecord | null> {
    const existing = this.profiles.get(userId);
    if (!existing) return null;
    if (data.username !== undefined) {
      const key = usernameKey(data.username);
      const holder = await this.findProfileByUsername(data.username, userId);
      const claim = this.usernameClaims.get(key);
      if (holder || claim) {
        throw new UniquenessRaceError(PROFILES_USERNAME_KEY);
      }
    }
    const updated: ProfileRecord = {
      ...existing,
      ...(data.username !== undefined ? { username: data.username } : {}),
      ...(data.avatarUrl !== undefined ? { avatarUrl: data.avatarUrl } : {}),
      updatedAt: new Date(),
    };
    this.profiles.set(userId, updated);
    return { ...updated };
  }

  async findBalance(userId: string): Promise<BalanceRecord | null> {
    const balance = this.balances.get(userId);
    return balance ? { ...balance } : null;
  }

  async listLedgerEntries(userId: string): Promise<LedgerEntryRecord[]> {
    return newestFirst(this.ledger.filter((e) => e.userId === userId));
  }

  async listNotifications(userId: string): Promise<NotificationRecord[]> {
    return newestFirst(this.notifications.filter((n) => n.userId === userId));
  }

  // ─── Transaction support ───────────────────────────────────────────

  hasEmail(emailLower: string): boolean {
    for (const user of this.users.values()) {
      if (user.email?.toLowerCase() === emailLower) return true;
    }
    return false;
  }

  hasProfile(userId: string): boolean {
    return this.profiles.has(userId);
  }

  hasBalance(userId: string): boolean {
    return this.balances.has(userId);
  }

  /** Taken when committed, or claimed by a transaction other than `requester`. */
  isUsernameTaken(key: string, requester: InMemoryAccountTransaction): boolean {
    for (const profile of this.profiles.values()) {
      if (usernameKey(profile.username) === key) return true;
    }
    const claimant = this.usernameClaims.get(key);
    return claimant !== undefined && claimant !== requester;
  }

  claimUsername(key: string, tx: InMemoryAccountTransaction): void {
    this.usernameClaims.set(key, tx);
  }

  releaseUsername(key: string, tx: InMemoryAccountTransaction): void {
    if (this.usernameClaims.get(key) === tx) {
      this.usernameClaims.delete(key);
    }
  }

  apply(writes: PendingWrite[]): void {
    for (const write of writes) {
      switch (write.kind) {
        case 'user':
          this.users.set(write.row.id, write.row);
          break;
        case 'profile':
          this.profiles.set(write.row.id, write.row);
          break;
        case 'balance':
          this.balances.set(write.row.userId, write.row);
          break;
        case 'ledger':
          this.ledger.push(write.row);
          break;
        case 'notification':
          this.notifications.push(write.row);
          break;
        case 'purge':
          this.purge(write.userId);
          break;
      }
    }
  }

  private purge(userId: string): void {
    this.profiles.delete(userId);
    this.balances.delete(userId);
    removeWhere(this.ledger, (e) => e.userId === userId);
    removeWhere(this.notifications, (n) => n.userId === userId);
  }

  // ─── Test helpers ──────────────────────────────────────────────────

  /** Row counts per table. */
  stats(): AccountStoreStats {
    return {
      users: this.users.size,
      profiles: this.profiles.size,
      balances: this.balances.size,
      ledgerEntries: this.ledger.length,
      notifications: this.notifications.length,
    };
  }

  /** Clear all data — useful in test teardowns. */
  clear(): void {
    this.users.clear();
    this.profiles.clear();
    this.balances.clear();
    this.ledger.length = 0;
    this.notifications.length = 0;
    this.usernameClaims.clear();
  }
}

function removeWhere<T>(rows: T[], predicate: (row: T) => boolean): void {
  for (let i = rows.length - 1; i >= 0; i--) {
    if (predicate(rows[i])) rows.splice(i, 1);
  }
}
