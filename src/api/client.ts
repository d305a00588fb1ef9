import type { z } from 'zod';

import { ApiError } from './errors.js';
import { SlidingWindowRateLimiter } from './rate-limit.js';
import {
  CrimesPageSchema,
  ErrorEnvelopeSchema,
  FactionBasicSchema,
  FactionContributorsSchema,
  FactionProfileSchema,
  ItemsSchema,
  KeyInfoSchema,
  UserDiscordSchema,
  UserProfileSchema,
  type CrimesPage,
  type FactionBasic,
  type FactionContributors,
  type FactionProfile,
  type ItemEntry,
  type KeyInfo,
  type UserProfile,
} from './schemas.js';

export interface ApiCredential {
  alias: string;
  secret: string;
}

export type ApiVersion = 'v1' | 'v2';

export interface ApiRequestOptions {
  selections?: string[];
  params?: Record<string, string | number | undefined>;
  version?: ApiVersion;
}

export interface ApiClientOptions {
  baseUrl?: string;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
  limiter?: SlidingWindowRateLimiter;
}

export interface CrimesPageQuery {
  offset?: number;
  from?: number;
  sort?: 'ASC' | 'DESC';
  category?: string;
}

export class ApiClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;
  readonly limiter: SlidingWindowRateLimiter;

  constructor(options: ApiClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? 'https://api.torn.com').replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? globalThis.fetch.bind(globalThis);
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.limiter = options.limiter ?? new SlidingWindowRateLimiter();
  }

  async request(credential: ApiCredential, endpoint: string, options: ApiRequestOptions = {}): Promise<unknown> {
    const path = endpoint.replace(/^\/+/, '');
    if (!this.limiter.check(credential.secret)) {
      throw new ApiError(
        `Local rate limit reached for key ${credential.alias}; retry in ${Math.ceil(
          this.limiter.retryAfterMs(credential.secret) / 1000
        )}s`,
        'rate_limited',
        { endpoint: path, local: true }
      );
    }

    const url = new URL(`${this.baseUrl}${options.version === 'v2' ? '/v2' : ''}/${path}`);
    url.searchParams.set('key', credential.secret);
    if (options.selections?.length) {
      url.searchParams.set('selections', options.selections.join(','));
    }
    for (const [name, value] of Object.entries(options.params ?? {})) {
      if (value !== undefined) url.searchParams.set(name, String(value));
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new ApiError(
        `Request to ${path} failed: ${err instanceof Error ? err.message : String(err)}`,
        'transient',
        { endpoint: path }
      );
    } finally {
      this.limiter.record(credential.secret);
    }

    if (response.status !== 200) {
      throw new ApiError(`Request to ${path} failed with status ${response.status}`, 'transient', {
        status: response.status,
        endpoint: path,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new ApiError(`Response from ${path} was not valid JSON`, 'malformed', { status: 200, endpoint: path });
    }

    const envelope = ErrorEnvelopeSchema.safeParse(body);
    if (envelope.success) {
      throw ApiError.fromUpstream(envelope.data.error.code, envelope.data.error.error, path);
    }

    return body;
  }

  getKeyInfo(credential: ApiCredential): Promise<KeyInfo> {
    return this.fetchParsed(credential, 'key', KeyInfoSchema, { selections: ['info'] });
  }

  /** Faction of the key owner (v2 `faction` basic). */
  getOwnFactionBasic(credential: ApiCredential): Promise<FactionBasic> {
    return this.fetchParsed(credential, 'faction', FactionBasicSchema, { selections: ['basic'], version: 'v2' });
  }

  getUserProfile(credential: ApiCredential, playerId?: number): Promise<UserProfile> {
    return this.fetchParsed(credential, playerId ? `user/${playerId}` : 'user', UserProfileSchema, {
      selections: ['profile', 'personalstats'],
    });
  }

  /** Key owner's own profile including battle stats. */
  getOwnBattleProfile(credential: ApiCredential): Promise<UserProfile> {
    return this.fetchParsed(credential, 'user', UserProfileSchema, {
      selections: ['profile', 'battlestats', 'personalstats'],
    });
  }

  getFactionProfile(credential: ApiCredential, factionId: number): Promise<FactionProfile> {
    return this.fetchParsed(credential, `faction/${factionId}`, FactionProfileSchema, { selections: ['basic'] });
  }

  getFactionContributors(
    credential: ApiCredential,
    factionId: number,
    stat: string,
    options: { includeMembers?: boolean } = {}
  ): Promise<FactionContributors> {
    return this.fetchParsed(credential, `faction/${factionId}`, FactionContributorsSchema, {
      selections: options.includeMembers ? ['basic', 'contributors'] : ['contributors'],
      params: { stat },
    });
  }

  getFactionCrimes(credential: ApiCredential, factionId: number, query: CrimesPageQuery = {}): Promise<CrimesPage> {
    return this.fetchParsed(credential, `faction/${factionId}/crimes`, CrimesPageSchema, {
      version: 'v2',
      params: {
        offset: query.offset ?? 0,
        sort: query.sort ?? 'DESC',
        from: query.from,
        cat: query.category,
      },
    });
  }

  async getUserDiscordId(credential: ApiCredential, playerId: number): Promise<string | null> {
    const body = await this.fetchParsed(credential, `user/${playerId}/discord`, UserDiscordSchema, { version: 'v2' });
    const discordId = body.discord?.discord_id;
    if (discordId === undefined || discordId === null || discordId === '') return null;
    return String(discordId);
  }

  async getItem(credential: ApiCredential, itemId: number): Promise<ItemEntry | null> {
    const body = await this.fetchParsed(credential, `torn/${itemId}/items`, ItemsSchema, { version: 'v2' });
    if (Array.isArray(body.items)) {
      return body.items.find((item) => item.id === itemId) ?? body.items.at(0) ?? null;
    }
    return body.items[String(itemId)] ?? null;
  }

  private async fetchParsed<T extends z.ZodTypeAny>(
    credential: ApiCredential,
    endpoint: string,
    schema: T,
    options: ApiRequestOptions
  ): Promise<z.output<T>> {
    const body = await this.request(credential, endpoint, options);
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ApiError(`Unexpected response shape from ${endpoint}: ${parsed.error.issues[0]?.message ?? 'invalid'}`, 'malformed', {
        endpoint,
      });
    }
    return parsed.data;
  }
}
