import type { ApiClient, ApiCredential } from '../api/client.js';
import { isApiError } from '../api/errors.js';
import type { KeyInfo } from '../api/schemas.js';
import { describeError, type Logger } from '../logging.js';
import type { CredentialDocument, CredentialEntry, CredentialMetadataStore } from './metadata.js';

export const SHARED_OWNER = 'shared';
export const FULL_ACCESS_TIER = 'Full Access';

export type CredentialErrorCode = 'unknown_alias' | 'duplicate_alias' | 'missing_secret' | 'not_owner';

export class CredentialError extends Error {
  constructor(
    message: string,
    public readonly code: CredentialErrorCode,
    public readonly alias: string
  ) {
    super(message);
    this.name = 'CredentialError';
  }
}

export interface ResolvedCredential extends ApiCredential {
  owner: string;
  tier: string;
  scopes: string[];
}

export interface CredentialSummary {
  alias: string;
  owner: string;
  keyType: string;
  tier: string;
  scopes: string[];
  lastValidated: string | null;
  maskedKey: string;
}

export type ValidationResult =
  | { valid: true; scopes: string[]; tier: string; validatedAt: string }
  | { valid: false; error: string };

/** alias → owner faction, `null` when the probe could not tell. */
export type Affiliations = Map<string, number | null>;

export const maskSecret = (secret: string): string =>
  secret.length <= 4 ? '****' : `****-****-****-${secret.slice(-4)}`;

const tierFromKeyInfo = (info: KeyInfo): string => {
  if (info.access_type) return info.access_type;
  if (info.access_level !== undefined) return String(info.access_level);
  return 'Unknown';
};

const scopesFromKeyInfo = (info: KeyInfo): string[] => {
  if (!info.selections) return [];
  return Array.isArray(info.selections) ? [...info.selections] : Object.keys(info.selections);
};

export interface CredentialRegistryOptions {
  store: CredentialMetadataStore;
  client: ApiClient;
  env?: NodeJS.ProcessEnv;
  now?: () => Date;
  logger?: Logger;
}

export class CredentialRegistry {
  private document: CredentialDocument = { keys: {} };
  private readonly store: CredentialMetadataStore;
  private readonly client: ApiClient;
  private readonly env: NodeJS.ProcessEnv;
  private readonly now: () => Date;
  private readonly logger: Logger;

  private constructor(options: CredentialRegistryOptions) {
    this.store = options.store;
    this.client = options.client;
    this.env = options.env ?? process.env;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? console;
  }

  static async open(options: CredentialRegistryOptions): Promise<CredentialRegistry> {
    const registry = new CredentialRegistry(options);
    await registry.reload();
    return registry;
  }

  async reload(): Promise<void> {
    this.document = await this.store.load();
  }

  private entry(alias: string): CredentialEntry {
    const entry = this.document.keys[alias];
    if (!entry) {
      throw new CredentialError(`Key alias '${alias}' not found`, 'unknown_alias', alias);
    }
    return entry;
  }

  private secretFor(entry: CredentialEntry): string | undefined {
    const value = this.env[entry.envVar]?.trim();
    return value ? value : undefined;
  }

  async register(
    alias: string,
    envVar: string,
    owner: string,
    options: { keyType?: string; validate?: boolean } = {}
  ): Promise<{ summary: CredentialSummary; validation: ValidationResult | null }> {
    if (this.document.keys[alias]) {
      throw new CredentialError(`Key alias '${alias}' already exists`, 'duplicate_alias', alias);
    }
    if (!this.env[envVar]?.trim()) {
      throw new CredentialError(`Environment variable '${envVar}' is not set`, 'missing_secret', alias);
    }

    this.document.keys[alias] = {
      owner,
      envVar,
      accessLevel: 'Unknown',
      scopes: [],
      lastValidated: null,
      keyType: options.keyType ?? 'user',
    };
    await this.store.save(this.document);
    this.logger.log('credential_registered', { alias, owner });

    const validation = options.validate ? await this.validate(alias) : null;
    return { summary: this.summarize(alias, this.entry(alias)), validation };
  }

  async remove(alias: string, requester: { id: string; isAdmin: boolean }): Promise<void> {
    const entry = this.entry(alias);
    if (entry.owner !== requester.id && !requester.isAdmin) {
      throw new CredentialError(`Only the owner or an administrator can remove '${alias}'`, 'not_owner', alias);
    }
    delete this.document.keys[alias];
    await this.store.save(this.document);
    this.logger.log('credential_removed', { alias });
  }

  async validate(alias: string): Promise<ValidationResult> {
    const entry = this.entry(alias);
    const secret = this.secretFor(entry);
    if (!secret) {
      throw new CredentialError(`Environment variable '${entry.envVar}' is not set`, 'missing_secret', alias);
    }

    let info: KeyInfo;
    try {
      info = await this.client.getKeyInfo({ alias, secret });
    } catch (err) {
      if (!isApiError(err)) throw err;
      this.logger.warn('credential_validation_failed', { alias, kind: err.kind, message: err.message });
      return { valid: false, error: err.message };
    }

    const validatedAt = this.now().toISOString();
    const scopes = scopesFromKeyInfo(info);
    const tier = tierFromKeyInfo(info);
    this.document.keys[alias] = { ...entry, accessLevel: tier, scopes, lastValidated: validatedAt };
    await this.store.save(this.document);
    return { valid: true, scopes, tier, validatedAt };
  }

  hasScope(alias: string, scope: string): boolean {
    const entry = this.document.keys[alias];
    if (!entry) return false;
    if (entry.scopes.includes('*') || entry.accessLevel === FULL_ACCESS_TIER) return true;
    const base = scope.split('.')[0];
    return entry.scopes.includes(base) || entry.scopes.includes(scope);
  }

  resolve(alias: string): ResolvedCredential | null {
    const entry = this.document.keys[alias];
    if (!entry) return null;
    const secret = this.secretFor(entry);
    if (!secret) return null;
    return { alias, secret, owner: entry.owner, tier: entry.accessLevel, scopes: [...entry.scopes] };
  }

  /** Every credential holding `scope` whose secret resolves, in registration order. */
  scoped(scope: string): ResolvedCredential[] {
    const credentials: ResolvedCredential[] = [];
    for (const alias of Object.keys(this.document.keys)) {
      if (!this.hasScope(alias, scope)) continue;
      const credential = this.resolve(alias);
      if (credential) credentials.push(credential);
    }
    return credentials;
  }

  select(scope: string, requester: string): ResolvedCredential | null {
    const candidates = this.scoped(scope);
    return (
      candidates.find((credential) => credential.owner === requester) ??
      candidates.find((credential) => credential.owner === SHARED_OWNER) ??
      null
    );
  }

  /** `select`, falling back to any credential holding the scope. */
  selectAny(scope: string, requester: string): ResolvedCredential | null {
    return this.select(scope, requester) ?? this.scoped(scope).at(0) ?? null;
  }

  /**
   * Probes each scoped credential once for the faction its owner belongs to.
   * A failed probe leaves the credential unaffiliated.
   */
  async buildAffiliations(scope: string): Promise<Affiliations> {
    const affiliations: Affiliations = new Map();
    for (const credential of this.scoped(scope)) {
      affiliations.set(credential.alias, await this.probeFaction(credential));
    }
    return affiliations;
  }

  private async probeFaction(credential: ResolvedCredential): Promise<number | null> {
    try {
      const basic = await this.client.getOwnFactionBasic(credential);
      return basic.basic.id;
    } catch (err) {
      this.logger.warn('credential_faction_probe_failed', {
        alias: credential.alias,
        key: maskSecret(credential.secret),
        message: describeError(err),
      });
    }
    try {
      const profile = await this.client.getUserProfile(credential);
      return profile.faction?.faction_id ?? null;
    } catch (err) {
      this.logger.warn('credential_owner_probe_failed', {
        alias: credential.alias,
        key: maskSecret(credential.secret),
        message: describeError(err),
      });
      return null;
    }
  }

  rankForFaction(scope: string, factionId: number, affiliations: Affiliations): ResolvedCredential[] {
    const candidates = this.scoped(scope);
    const affiliated = candidates.filter((credential) => affiliations.get(credential.alias) === factionId);
    const others = candidates.filter((credential) => affiliations.get(credential.alias) !== factionId);
    return [...affiliated, ...others];
  }

  selectAffiliated(scope: string, factionId: number, affiliations: Affiliations): ResolvedCredential | null {
    return this.rankForFaction(scope, factionId, affiliations).at(0) ?? null;
  }

  list(owner?: string): CredentialSummary[] {
    return Object.entries(this.document.keys)
      .filter(([, entry]) => owner === undefined || entry.owner === owner || entry.owner === SHARED_OWNER)
      .map(([alias, entry]) => this.summarize(alias, entry));
  }

  private summarize(alias: string, entry: CredentialEntry): CredentialSummary {
    return {
      alias,
      owner: entry.owner,
      keyType: entry.keyType,
      tier: entry.accessLevel,
      scopes: [...entry.scopes],
      lastValidated: entry.lastValidated,
      maskedKey: maskSecret(this.secretFor(entry) ?? ''),
    };
  }
}
