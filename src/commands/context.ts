import type { ApiClient } from '../api/client.js';
import type { CredentialRegistry, ResolvedCredential } from '../credentials/registry.js';
import type { Logger } from '../logging.js';
import { InvalidArgumentError, StorageUnavailableError, type TrackerStore } from '../store/types.js';
import type { Notifier } from '../sync/notifications.js';
import type { Sleeper } from '../sync/sleep.js';

export interface CommandContext {
  /** `null` while the service runs without a reachable database. */
  store: TrackerStore | null;
  client: ApiClient;
  credentials: CredentialRegistry;
  notifier: Notifier;
  retentionDays: number;
  pageDelayMs?: number;
  rateLimitBackoffMs?: number;
  sleep?: Sleeper;
  now?: () => Date;
  logger?: Logger;
  random?: () => number;
}

export const requireStore = (context: CommandContext): TrackerStore => {
  if (!context.store) throw new StorageUnavailableError();
  return context.store;
};

export const requireCredential = (context: CommandContext, scope: string, requester: string): ResolvedCredential => {
  const credential = context.credentials.selectAny(scope, requester);
  if (!credential) {
    throw new InvalidArgumentError(`No API key with ${scope} permission is registered.`, 'no_credential');
  }
  return credential;
};

/** Comma-separated ids or a JSON array; blanks are dropped. */
export const idList = (value: string | Array<string | number>): string[] =>
  (Array.isArray(value) ? value.map(String) : value.split(','))
    .map((entry) => entry.trim())
    .filter(Boolean);
