import 'dotenv/config';
import { DateTime } from 'luxon';
import { isColumnPreset, type ColumnPreset } from './records.columns.js';

export type RevenueMode = 'strict' | 'loose';

export interface AppConfig {
  port: number;
  sheetId: string | null;
  tabName: string;
  apiKey: string | null;
  timezone: string;
  columnPreset: ColumnPreset;
  revenueMode: RevenueMode;
  serviceAccountFile: string | null;
  serviceAccountJson: string | null;
}

export const DEFAULT_TIMEZONE = 'Europe/Sofia';

type Env = Record<string, string | undefined>;

const readOptional = (env: Env, key: string): string | null => {
  const value = env[key]?.trim();
  return value ? value : null;
};

export const resolveZone = (timezone: string | null | undefined): string => {
  const zone = timezone && timezone.trim() ? timezone.trim() : DEFAULT_TIMEZONE;
  const probe = DateTime.now().setZone(zone);
  if (!probe.isValid) {
    console.warn(`Unknown TIMEZONE "${zone}", falling back to ${DEFAULT_TIMEZONE}.`);
    return DEFAULT_TIMEZONE;
  }
  return zone;
};

const resolvePreset = (value: string | null): ColumnPreset => {
  if (!value) {
    return 'en';
  }
  const normalized = value.toLowerCase();
  if (!isColumnPreset(normalized)) {
    throw new Error(`COLUMN_PRESET must be one of en, bg, legacy (got "${value}").`);
  }
  return normalized;
};

const resolveRevenueMode = (value: string | null): RevenueMode => {
  if (!value) {
    return 'strict';
  }
  const normalized = value.toLowerCase();
  if (normalized !== 'strict' && normalized !== 'loose') {
    throw new Error(`REVENUE_MODE must be "strict" or "loose" (got "${value}").`);
  }
  return normalized;
};

export const loadConfig = (env: Env = process.env): AppConfig => {
  const port = Number(env.PORT ?? 4000);
  return {
    port: Number.isInteger(port) && port > 0 ? port : 4000,
    sheetId: readOptional(env, 'SHEET_ID'),
    tabName: readOptional(env, 'TAB_NAME') ?? 'Data',
    apiKey: readOptional(env, 'API_KEY'),
    timezone: resolveZone(env.TIMEZONE),
    columnPreset: resolvePreset(readOptional(env, 'COLUMN_PRESET')),
    revenueMode: resolveRevenueMode(readOptional(env, 'REVENUE_MODE')),
    serviceAccountFile: readOptional(env, 'SERVICE_ACCOUNT_FILE'),
    serviceAccountJson: readOptional(env, 'SERVICE_ACCOUNT_JSON')
  };
};
