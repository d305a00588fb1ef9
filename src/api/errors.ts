export type ApiFailureKind = 'rate_limited' | 'permission' | 'credential' | 'transient' | 'malformed' | 'request';

export const UPSTREAM_ERROR_MESSAGES: Readonly<Record<number, string>> = {
  0: 'Unknown error',
  1: 'Key is empty',
  2: 'Incorrect key',
  3: 'Wrong type',
  4: 'Wrong fields',
  5: 'Too many requests (max 100 per minute)',
  6: 'Incorrect ID',
  7: 'Incorrect ID-entity relation (private data)',
  8: 'IP block (temporary ban due to abuse)',
  9: 'API disabled',
  10: 'Key owner is in federal jail',
  11: 'Key change error (can only change once per 60 seconds)',
  12: 'Key read error',
  13: 'Key temporarily disabled due to owner inactivity (7+ days offline)',
  14: 'Daily read limit reached',
  15: 'Temporary error (testing)',
  16: 'Access level of this key is not high enough',
  17: 'Backend error occurred, please try again',
  18: 'API key has been paused by the owner',
  19: 'Must be migrated to crimes 2.0',
  20: 'Race not yet finished',
  21: 'Incorrect category',
  22: 'This selection is only available in API v1',
  23: 'This selection is only available in API v2',
  24: 'Closed temporarily',
};

const KIND_BY_CODE: Readonly<Record<number, ApiFailureKind>> = {
  2: 'credential',
  5: 'rate_limited',
  7: 'permission',
  8: 'transient',
  9: 'transient',
  10: 'credential',
  13: 'credential',
  14: 'transient',
  15: 'transient',
  16: 'permission',
  17: 'transient',
  18: 'credential',
  24: 'transient',
};

export const classifyUpstreamCode = (code: number): ApiFailureKind => KIND_BY_CODE[code] ?? 'request';

export class ApiError extends Error {
  constructor(
    message: string,
    public readonly kind: ApiFailureKind,
    public readonly context: {
      code?: number;
      status?: number;
      endpoint?: string;
      local?: boolean;
    } = {}
  ) {
    super(message);
    this.name = 'ApiError';
  }

  get code(): number | undefined {
    return this.context.code;
  }

  static fromUpstream(code: number, upstreamMessage: string | undefined, endpoint: string) {
    const message = upstreamMessage?.trim() || UPSTREAM_ERROR_MESSAGES[code] || `Unknown error code ${code}`;
    return new ApiError(`API error ${code}: ${message}`, classifyUpstreamCode(code), { code, endpoint });
  }
}

export const isApiError = (err: unknown): err is ApiError => err instanceof ApiError;
