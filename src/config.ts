// src/config.ts

/**
 * Centralized application configuration.
 * Auto-detects Cloud Run vs. local dev and chooses safe defaults.
 */
import { IS_CLOUD_RUN, NODE_ENV, envList, envNumber, envString } from '@/lib/env';

const IS_DEV = NODE_ENV !== 'production' && !IS_CLOUD_RUN;

// -----------------------------
// GCP
// -----------------------------
export const GCP_PROJECT_ID = envString('GCP_PROJECT_ID', 'meeting-log');

// Secret Manager (names, not values). Empty = not used.
export const SERVICE_ACCOUNT_SECRET_NAME = envString('SERVICE_ACCOUNT_SECRET_NAME');
export const RELAY_URL_SECRET_NAME = envString('RELAY_URL_SECRET_NAME');

// -----------------------------
// Record store (spreadsheet)
// -----------------------------
export const SPREADSHEET_ID = envString('SPREADSHEET_ID');
export const DIRECTORY_TABLE = envString('DIRECTORY_TABLE', 'config');
export const RECORDS_TABLE = envString('RECORDS_TABLE', 'records');
export const SHEETS_API_BASE = envString('SHEETS_API_BASE', 'https://sheets.googleapis.com/v4/spreadsheets');
export const SHEETS_SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];

export type StoreDriver = 'sheets' | 'memory';

// Without a spreadsheet id there is nothing to talk to locally; fall back to memory.
export const STORE_DRIVER: StoreDriver =
  envString('STORE_DRIVER') === 'memory' || (!SPREADSHEET_ID && !IS_CLOUD_RUN) ? 'memory' : 'sheets';

// -----------------------------
// Read cache
// -----------------------------
export const CACHE_TTL_SECONDS = envNumber('CACHE_TTL_SECONDS', 60);

// -----------------------------
// Relay (attachments -> public URL)
// -----------------------------
export const RELAY_ENDPOINT = envString('RELAY_ENDPOINT');
export const RELAY_TIMEOUT_MS = envNumber('RELAY_TIMEOUT_MS', 30_000);

export const ATTACHMENT_TYPES = envList('ATTACHMENT_TYPES', ['png', 'jpg', 'jpeg', 'pdf']);
export const MAX_ATTACHMENT_BYTES = envNumber('MAX_ATTACHMENT_BYTES', 10 * 1024 * 1024);

// -----------------------------
// Sessions
// -----------------------------
export const SESSION_IDLE_MINUTES = envNumber('SESSION_IDLE_MINUTES', 720);
export const SESSION_COOKIE = 'ml_session';

// Useful for logs/diagnostics
export const RUNTIME_FLAGS = {
  IS_CLOUD_RUN,
  IS_DEV,
  NODE_ENV,
  STORE_DRIVER,
};
