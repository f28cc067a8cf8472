// src/server/relay/client.ts
import { RelayError } from '@/lib/errors';
import { defaultFetch, type FetchLike } from '@/lib/http';

export type RelayClientOptions = {
  /** Endpoint, or a resolver for one (e.g. read from Secret Manager on first use). */
  endpoint: string | (() => Promise<string>);
  timeoutMs: number;
  fetchImpl?: FetchLike;
};

export type RelayRequest = {
  file: string;       // base64
  filename: string;
  mimeType: string;
};

export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

/**
 * Ships one attachment to the relay and returns the public URL it hands back.
 * No retries: the caller decides, since a retry must never re-append a record.
 */
export class RelayClient {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly opts: RelayClientOptions) {
    this.fetchImpl = opts.fetchImpl ?? defaultFetch;
  }

  async upload(bytes: Uint8Array, filename: string, mimeType: string): Promise<string> {
    const endpoint = await this.endpoint();
    const payload: RelayRequest = { file: encodeBase64(bytes), filename, mimeType };

    let resp: Response;
    let text: string;
    try {
      resp = await this.fetchImpl(endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.opts.timeoutMs),
      });
      text = await resp.text();
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new RelayError('transport', `relay request failed: ${msg}`, { cause: e });
    }

    if (!resp.ok) {
      throw new RelayError('transport', `relay answered ${resp.status}: ${text.slice(0, 200)}`, {
        status: resp.status,
      });
    }

    return parseRelayBody(text, resp.status);
  }

  private async endpoint(): Promise<string> {
    const { endpoint } = this.opts;
    let url: string;
    try {
      url = typeof endpoint === 'string' ? endpoint : await endpoint();
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new RelayError('transport', `relay endpoint unavailable: ${msg}`, { cause: e });
    }
    if (!url) throw new RelayError('transport', 'relay endpoint is not configured');
    return url;
  }
}

// Expected: {"status":"success","url":...} or {"status":<other>,"message":...}
function parseRelayBody(text: string, status: number): string {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch (e) {
    throw new RelayError('malformedResponse', `relay returned non-JSON: ${text.slice(0, 120)}`, { status, cause: e });
  }
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new RelayError('malformedResponse', 'relay returned a non-object JSON body', { status });
  }

  const st: unknown = Reflect.get(body, 'status');
  if (typeof st !== 'string') {
    throw new RelayError('malformedResponse', 'relay response has no status', { status });
  }
  if (st !== 'success') {
    const message: unknown = Reflect.get(body, 'message');
    throw new RelayError('applicationError', typeof message === 'string' && message ? message : `relay status ${st}`, {
      status,
    });
  }

  const url: unknown = Reflect.get(body, 'url');
  if (typeof url !== 'string' || !url) {
    throw new RelayError('malformedResponse', 'relay reported success without a url', { status });
  }
  return url;
}
