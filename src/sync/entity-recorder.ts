import type { ApiClient, ApiCredential } from '../api/client.js';
import { ApiError } from '../api/errors.js';
import { FactionMemberSchema, type FactionProfile, type UserProfile } from '../api/schemas.js';
import { maskSecret } from '../credentials/registry.js';
import type { Logger } from '../logging.js';
import type { FactionRecord, PlayerRecord, TrackerStore } from '../store/types.js';

export interface PlayerSnapshot {
  playerId: number;
  name: string;
  level?: number | null;
  rank?: string | null;
  factionId?: number | null;
  statusState?: string | null;
  statusDescription?: string | null;
  lifeCurrent?: number | null;
  lifeMaximum?: number | null;
  strength?: number | null;
  defense?: number | null;
  speed?: number | null;
  dexterity?: number | null;
  totalStats?: number | null;
  networth?: number | null;
}

export interface FactionSnapshot {
  factionId: number;
  name: string;
  tag?: string | null;
  leaderId?: number | null;
  coLeaderId?: number | null;
  respect?: number | null;
  age?: number | null;
  bestChain?: number | null;
  memberCount?: number | null;
}

const numberOrNull = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

const sumBattleStats = (profile: UserProfile): number | null => {
  if (profile.total !== undefined) return profile.total;
  const parts = [profile.strength, profile.defense, profile.speed, profile.dexterity];
  let total = 0;
  for (const part of parts) {
    if (part === undefined) return null;
    total += part;
  }
  return total;
};

export const playerSnapshotFromProfile = (profile: UserProfile, requestedId?: number): PlayerSnapshot | null => {
  const playerId = profile.player_id ?? requestedId;
  if (playerId === undefined) return null;
  return {
    playerId,
    name: profile.name ?? `Player ${playerId}`,
    level: profile.level ?? null,
    rank: profile.rank ?? null,
    factionId: profile.faction?.faction_id || null,
    statusState: profile.status?.state ?? null,
    statusDescription: profile.status?.description ?? null,
    lifeCurrent: profile.life?.current ?? null,
    lifeMaximum: profile.life?.maximum ?? null,
    strength: profile.strength ?? null,
    defense: profile.defense ?? null,
    speed: profile.speed ?? null,
    dexterity: profile.dexterity ?? null,
    totalStats: sumBattleStats(profile),
    networth: numberOrNull(profile.personalstats?.networth),
  };
};

export const factionSnapshotFromProfile = (profile: FactionProfile, requestedId: number): FactionSnapshot => ({
  factionId: profile.ID ?? requestedId,
  name: profile.name ?? `Faction ${requestedId}`,
  tag: profile.tag ?? null,
  leaderId: profile.leader || null,
  coLeaderId: profile['co-leader'] || null,
  respect: profile.respect ?? null,
  age: profile.age ?? null,
  bestChain: profile.best_chain ?? null,
  memberCount: profile.members ? Object.keys(profile.members).length : null,
});

export interface FactionMember {
  playerId: number;
  name: string;
  level: number | null;
}

/** Members keyed by player id; keys that are not ids are ignored. */
export const factionMembers = (members: Record<string, unknown> | undefined): FactionMember[] => {
  const result: FactionMember[] = [];
  for (const [key, value] of Object.entries(members ?? {})) {
    if (!/^\d+$/.test(key)) continue;
    const playerId = Number(key);
    const parsed = FactionMemberSchema.safeParse(value);
    result.push({
      playerId,
      name: (parsed.success && parsed.data.name) || `Player ${playerId}`,
      level: parsed.success ? parsed.data.level ?? null : null,
    });
  }
  return result;
};

/**
 * Current state is upserted on every observation and exactly one history row
 * is appended; players and factions are plain time series, never diffed.
 */
export class EntityRecorder {
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly store: TrackerStore,
    private readonly client: ApiClient,
    options: { now?: () => Date; logger?: Logger } = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? console;
  }

  async recordPlayer(snapshot: PlayerSnapshot, credentialTag: string): Promise<PlayerRecord> {
    const record = await this.store.upsertPlayer({
      playerId: snapshot.playerId,
      name: snapshot.name,
      level: snapshot.level,
      rank: snapshot.rank,
      factionId: snapshot.factionId,
      statusState: snapshot.statusState,
      statusDescription: snapshot.statusDescription,
      lifeCurrent: snapshot.lifeCurrent,
      lifeMaximum: snapshot.lifeMaximum,
    });
    await this.store.appendPlayerStats({
      playerId: snapshot.playerId,
      strength: snapshot.strength ?? null,
      defense: snapshot.defense ?? null,
      speed: snapshot.speed ?? null,
      dexterity: snapshot.dexterity ?? null,
      totalStats: snapshot.totalStats ?? null,
      level: snapshot.level ?? null,
      lifeMaximum: snapshot.lifeMaximum ?? null,
      networth: snapshot.networth ?? null,
      dataSource: credentialTag,
      timestamp: this.now(),
    });
    return record;
  }

  async recordFaction(snapshot: FactionSnapshot, credentialTag: string): Promise<FactionRecord> {
    const record = await this.store.upsertFaction({
      factionId: snapshot.factionId,
      name: snapshot.name,
      tag: snapshot.tag,
      leaderId: snapshot.leaderId,
      coLeaderId: snapshot.coLeaderId,
      respect: snapshot.respect,
      age: snapshot.age,
      bestChain: snapshot.bestChain,
      memberCount: snapshot.memberCount,
    });
    await this.store.appendFactionHistory({
      factionId: snapshot.factionId,
      respect: snapshot.respect ?? null,
      memberCount: snapshot.memberCount ?? null,
      bestChain: snapshot.bestChain ?? null,
      dataSource: credentialTag,
      timestamp: this.now(),
    });
    return record;
  }

  /** Upserts every member as a player of `factionId`; no stats history is written. */
  async recordMembers(factionId: number, members: Record<string, unknown> | undefined): Promise<FactionMember[]> {
    const parsed = factionMembers(members);
    for (const member of parsed) {
      await this.store.upsertPlayer({
        playerId: member.playerId,
        name: member.name,
        level: member.level ?? undefined,
        factionId,
      });
    }
    return parsed;
  }

  /** Without a player id the key owner is refreshed, battle stats included. */
  async refreshPlayer(playerId: number | undefined, credential: ApiCredential): Promise<PlayerRecord> {
    const profile =
      playerId === undefined
        ? await this.client.getOwnBattleProfile(credential)
        : await this.client.getUserProfile(credential, playerId);
    const snapshot = playerSnapshotFromProfile(profile, playerId);
    if (!snapshot) {
      throw new ApiError('Profile response carried no player id', 'malformed', { endpoint: 'user' });
    }
    const record = await this.recordPlayer(snapshot, maskSecret(credential.secret));
    this.logger.log('player_refreshed', { playerId: record.playerId, key: maskSecret(credential.secret) });
    return record;
  }

  async refreshFaction(factionId: number, credential: ApiCredential): Promise<FactionRecord> {
    const profile = await this.client.getFactionProfile(credential, factionId);
    const record = await this.recordFaction(factionSnapshotFromProfile(profile, factionId), maskSecret(credential.secret));
    this.logger.log('faction_refreshed', { factionId: record.factionId, key: maskSecret(credential.secret) });
    return record;
  }
}
