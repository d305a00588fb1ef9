export class StorageUnavailableError extends Error {
  constructor(message = 'Database not available.') {
    super(message);
    this.name = 'StorageUnavailableError';
  }
}

// Socket failures plus Postgres connection exceptions (08xxx) and admin shutdowns (57P0x).
const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EPIPE',
  '08000',
  '08001',
  '08003',
  '08004',
  '08006',
  '57P01',
  '57P02',
  '57P03',
]);

/** True for errors that mean the database went away rather than a query failing. */
export const isStorageConnectionError = (err: unknown): boolean => {
  if (!(err instanceof Error)) return false;
  if ('code' in err && typeof err.code === 'string' && CONNECTION_CODES.has(err.code)) return true;
  return err.message.startsWith('Connection terminated');
};

export const asStorageUnavailable = (err: unknown): StorageUnavailableError | null => {
  if (err instanceof StorageUnavailableError) return err;
  return isStorageConnectionError(err) ? new StorageUnavailableError() : null;
};

export class CompetitionLookupError extends Error {
  constructor(
    message: string,
    public readonly context: { competitionId?: number; teamId?: number; playerId?: number } = {}
  ) {
    super(message);
    this.name = 'CompetitionLookupError';
  }
}

export class PermissionDeniedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PermissionDeniedError';
  }
}

export class TrackedFactionLookupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TrackedFactionLookupError';
  }
}

export class InvalidArgumentError extends Error {
  constructor(
    message: string,
    public readonly code: string = 'invalid_argument'
  ) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}
