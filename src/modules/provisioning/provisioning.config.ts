import type { ConfigService } from '@nestjs/config';

export const PROVISIONING_OPTIONS = 'PROVISIONING_OPTIONS';

export interface ProvisioningOptions {
  /** Credit granted to every new account. */
  welcomeBonusAmount: number;
  /** Attempt cap for the username race loop. */
  maxAttempts: number;
  /** Wait after failed attempt n (1-based) is `backoffUnitMs * 2^n`: 2, 4, ... units. */
  backoffUnitMs: number;
}

export const DEFAULT_PROVISIONING_OPTIONS: ProvisioningOptions = {
  welcomeBonusAmount: 5,
  maxAttempts: 3,
  backoffUnitMs: 1000,
};

function readNumber(
  config: ConfigService,
  key: string,
  fallback: number,
  accept: (value: number) => boolean,
): number {
  const raw = config.get<string | number>(key);
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) && accept(value) ? value : fallback;
}

export function loadProvisioningOptions(config: ConfigService): ProvisioningOptions {
  const defaults = DEFAULT_PROVISIONING_OPTIONS;
  return {
    welcomeBonusAmount: readNumber(config, 'WELCOME_BONUS_AMOUNT', defaults.welcomeBonusAmount, v => v >= 0),
    maxAttempts: readNumber(config, 'PROVISIONING_MAX_ATTEMPTS', defaults.maxAttempts, v => Number.isInteger(v) && v >= 1),
    backoffUnitMs: readNumber(config, 'PROVISIONING_BACKOFF_UNIT_MS', defaults.backoffUnitMs, v => v >= 0),
  };
}
