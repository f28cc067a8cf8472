// src/lib/googleAuth.ts
import { GoogleAuth } from 'google-auth-library';
import { SecretManagerServiceClient } from '@google-cloud/secret-manager';
import * as config from '@/config';

// Make TypeScript happy with global memoization
declare global {
  // eslint-disable-next-line no-var
  var __sheetsAuth__: Promise<GoogleAuth> | undefined;
}

// -------- secrets (single flight, cached for the process) --------
const secretCache = new Map<string, Promise<string>>();

async function readSecret(name: string): Promise<string> {
  const sm = new SecretManagerServiceClient();
  const [v] = await sm.accessSecretVersion({
    name: `projects/${config.GCP_PROJECT_ID}/secrets/${name}/versions/latest`,
  });
  const data = v.payload?.data;
  const s = typeof data === 'string' ? data : data ? Buffer.from(data).toString('utf8') : '';
  if (!s) throw new Error(`Secret ${name} is empty`);
  return s;
}

export function getSecret(name: string): Promise<string> {
  const hit = secretCache.get(name);
  if (hit) return hit;
  const pending = readSecret(name);
  secretCache.set(name, pending);
  // don't pin a failure; the next caller retries
  void pending.catch(() => secretCache.delete(name));
  return pending;
}

// -------- Sheets auth --------
type ServiceAccountKey = { client_email: string; private_key: string };

function isServiceAccountKey(v: unknown): v is ServiceAccountKey {
  return (
    typeof v === 'object' &&
    v !== null &&
    typeof Reflect.get(v, 'client_email') === 'string' &&
    typeof Reflect.get(v, 'private_key') === 'string'
  );
}

async function buildAuth(): Promise<GoogleAuth> {
  if (config.SERVICE_ACCOUNT_SECRET_NAME) {
    const raw = await getSecret(config.SERVICE_ACCOUNT_SECRET_NAME);
    const key: unknown = JSON.parse(raw);
    if (!isServiceAccountKey(key)) {
      throw new Error(`Secret ${config.SERVICE_ACCOUNT_SECRET_NAME} is not a service account key`);
    }
    return new GoogleAuth({
      credentials: { client_email: key.client_email, private_key: key.private_key },
      scopes: config.SHEETS_SCOPES,
    });
  }
  // ADC: GOOGLE_APPLICATION_CREDENTIALS locally, metadata server on Cloud Run
  return new GoogleAuth({ scopes: config.SHEETS_SCOPES });
}

function sheetsAuth(): Promise<GoogleAuth> {
  let pending = global.__sheetsAuth__;
  if (!pending) {
    pending = buildAuth();
    global.__sheetsAuth__ = pending;
    void pending.catch(() => {
      global.__sheetsAuth__ = undefined;
    });
  }
  return pending;
}

export async function getSheetsAccessToken(): Promise<string | null> {
  const auth = await sheetsAuth();
  const token = await auth.getAccessToken();
  return token ?? null;
}

/** Relay endpoint from env, or from Secret Manager when only a secret name is configured. */
export async function resolveRelayEndpoint(): Promise<string> {
  if (config.RELAY_ENDPOINT) return config.RELAY_ENDPOINT;
  if (config.RELAY_URL_SECRET_NAME) return (await getSecret(config.RELAY_URL_SECRET_NAME)).trim();
  return '';
}
