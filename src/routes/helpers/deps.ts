import type { RequestHandler } from 'express';

import type { ApiClient } from '../../api/client.js';
import type { CredentialRegistry } from '../../credentials/registry.js';
import type { Logger } from '../../logging.js';
import { StorageUnavailableError, type TrackerStore } from '../../store/types.js';

export interface RouteDeps {
  store: TrackerStore | null;
  client: ApiClient;
  credentials: CredentialRegistry;
  authenticate: RequestHandler;
  retentionDays: number;
  now?: () => Date;
  logger?: Logger;
}

export const routeStore = (deps: RouteDeps): TrackerStore => {
  if (!deps.store) throw new StorageUnavailableError();
  return deps.store;
};
