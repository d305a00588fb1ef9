export interface PlayerRecord {
  playerId: number;
  name: string;
  level: number | null;
  rank: string | null;
  factionId: number | null;
  statusState: string | null;
  statusDescription: string | null;
  lifeCurrent: number | null;
  lifeMaximum: number | null;
  discordId: string | null;
  createdAt: Date;
  lastUpdated: Date;
}

/**
 * Fields left undefined keep their stored value; `null` clears it.
 */
export interface PlayerUpsertInput {
  playerId: number;
  name: string;
  level?: number | null;
  rank?: string | null;
  factionId?: number | null;
  statusState?: string | null;
  statusDescription?: string | null;
  lifeCurrent?: number | null;
  lifeMaximum?: number | null;
}

export interface FactionRecord {
  factionId: number;
  name: string;
  tag: string | null;
  leaderId: number | null;
  coLeaderId: number | null;
  respect: number | null;
  age: number | null;
  bestChain: number | null;
  memberCount: number | null;
  createdAt: Date;
  lastUpdated: Date;
}

export interface FactionUpsertInput {
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

export interface PlayerStatsObservation {
  playerId: number;
  strength: number | null;
  defense: number | null;
  speed: number | null;
  dexterity: number | null;
  totalStats: number | null;
  level: number | null;
  lifeMaximum: number | null;
  networth: number | null;
  dataSource: string | null;
  timestamp: Date;
}

export interface FactionObservation {
  factionId: number;
  respect: number | null;
  memberCount: number | null;
  bestChain: number | null;
  dataSource: string | null;
  timestamp: Date;
}

export interface ContributorObservation {
  playerId: number;
  statName: string;
  value: number;
  factionId: number | null;
  dataSource: string | null;
  timestamp: Date;
}

export interface ItemRecord {
  itemId: number;
  name: string;
  itemType: string | null;
  description: string | null;
  lastUpdated: Date;
}

export interface ItemUpsertInput {
  itemId: number;
  name: string;
  itemType?: string | null;
  description?: string | null;
}
