import { ApiClient } from '../../src/api/client.js';
import { SlidingWindowRateLimiter } from '../../src/api/rate-limit.js';
import type { CredentialEntry } from '../../src/credentials/metadata.js';
import { InMemoryMetadataStore } from '../../src/credentials/metadata.js';
import { CredentialRegistry } from '../../src/credentials/registry.js';
import type { Logger } from '../../src/logging.js';
import type { Notification, Notifier } from '../../src/sync/notifications.js';
import type { Sleeper } from '../../src/sync/sleep.js';

export const silentLogger: Logger = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

export const upstreamError = (code: number, error = 'test error') => ({ error: { code, error } });

/**
 * `fetch` stand-in answering from a handler. A plain value is sent as a 200 JSON
 * body; a Response is returned as is; a thrown error surfaces as a network failure.
 */
export const fakeFetch = (handler: (url: URL) => unknown) => {
  const calls: URL[] = [];
  const impl: typeof fetch = async (input) => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    calls.push(url);
    const result = await handler(url);
    return result instanceof Response ? result : json(result);
  };
  return { fetch: impl, calls };
};

export const testClient = (handler: (url: URL) => unknown, limit = 1_000) => {
  const fake = fakeFetch(handler);
  const client = new ApiClient({
    baseUrl: 'https://api.test',
    fetchImpl: fake.fetch,
    limiter: new SlidingWindowRateLimiter({ limit }),
  });
  return { client, calls: fake.calls };
};

export const credentialEntry = (overrides: Partial<CredentialEntry> & Pick<CredentialEntry, 'envVar'>): CredentialEntry => ({
  owner: 'shared',
  accessLevel: 'Limited Access',
  scopes: ['faction', 'user'],
  lastValidated: null,
  keyType: 'user',
  ...overrides,
});

export const testRegistry = (
  client: ApiClient,
  keys: Record<string, CredentialEntry>,
  env: NodeJS.ProcessEnv,
  now?: () => Date
) =>
  CredentialRegistry.open({
    store: new InMemoryMetadataStore({ keys }),
    client,
    env,
    now,
    logger: silentLogger,
  });

export class RecordingNotifier implements Notifier {
  readonly sent: Notification[] = [];

  async send(notification: Notification): Promise<void> {
    this.sent.push(notification);
  }
}

export const recordingSleeper = () => {
  const waits: number[] = [];
  const sleep: Sleeper = async (ms, signal) => {
    signal?.throwIfAborted();
    waits.push(ms);
  };
  return { sleep, waits };
};

export const fixedClock = (iso: string) => {
  let current = new Date(iso);
  return {
    now: () => new Date(current),
    set: (value: string) => {
      current = new Date(value);
    },
  };
};
