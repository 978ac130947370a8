/**
 * Domain models for identity users and the rows provisioned for them.
 *
 * Monetary amounts are plain numbers at the domain boundary; the PostgreSQL
 * repository converts NUMERIC strings on the way out.
 */

/** Identity record. Owned by the account/identity layer, read by provisioning. */
export interface IdentityUser {
  id: string;
  email: string | null;
  metadata: Record<string, unknown>;
  createdAt: Date;
}

export interface IdentityUserCreateInput {
  id: string;
  email: string | null;
  metadata: Record<string, unknown>;
}

export interface ProfileRecord {
  id: string;
  username: string;
  avatarUrl: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface ProfileCreateInput {
  id: string;
  username: string;
  avatarUrl: string;
}

export interface ProfileUpdateInput {
  username?: string;
  avatarUrl?: string;
}

export interface BalanceRecord {
  userId: string;
  balance: number;
  createdAt: Date;
  updatedAt: Date;
}

export type LedgerEntryType = 'welcome_bonus';

export interface LedgerEntryRecord {
  id: string;
  userId: string;
  amount: number;
  type: LedgerEntryType;
  description: string;
  createdAt: Date;
}

export interface LedgerEntryCreateInput {
  userId: string;
  amount: number;
  type: LedgerEntryType;
  description: string;
}

export type NotificationType = 'welcome_bonus';

export interface NotificationRecord {
  id: string;
  userId: string;
  title: string;
  message: string;
  type: NotificationType;
  read: boolean;
  createdAt: Date;
}

export interface NotificationCreateInput {
  userId: string;
  title: string;
  message: string;
  type: NotificationType;
}

/** The four rows created together by the provisioning workflow. */
export interface ProvisionedAccount {
  profile: ProfileRecord;
  balance: BalanceRecord;
  welcomeTransaction: LedgerEntryRecord;
  welcomeNotification: NotificationRecord;
}
