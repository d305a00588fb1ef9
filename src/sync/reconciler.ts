import type { Logger } from '../logging.js';
import {
  isTerminalStatus,
  type CrimeEventInput,
  type CrimeRecord,
  type TerminalCrimeStatus,
  type TrackerStore,
} from '../store/types.js';
import { normalizeCrime, type NormalizedCrime } from './crime-normalizer.js';

export const HEARTBEAT_MS = 300_000;

export interface CrimeChange {
  changed: boolean;
  events: CrimeEventInput[];
}

export interface ReconcileResult {
  crimesUpdated: number;
  eventsRecorded: number;
  newCrimes: number;
  existingCrimes: number;
  skipped: number;
  events: CrimeEventInput[];
  crimes: NormalizedCrime[];
}

export interface CrimeReconcilerOptions {
  now?: () => Date;
  logger?: Logger;
  heartbeatMs?: number;
}

const uniqueInOrder = (ids: number[]) => Array.from(new Set(ids));

export class CrimeReconciler {
  private readonly now: () => Date;
  private readonly logger: Logger;
  private readonly heartbeatMs: number;

  constructor(
    private readonly store: TrackerStore,
    options: CrimeReconcilerOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? console;
    this.heartbeatMs = options.heartbeatMs ?? HEARTBEAT_MS;
  }

  /**
   * Diffs a complete fetched batch against current state. The batch is compared
   * as a whole so a crime seen on two pages is reconciled once.
   */
  async reconcileBatch(factionId: number, rawCrimes: unknown[], credentialTag: string): Promise<ReconcileResult> {
    const result: ReconcileResult = {
      crimesUpdated: 0,
      eventsRecorded: 0,
      newCrimes: 0,
      existingCrimes: 0,
      skipped: 0,
      events: [],
      crimes: [],
    };

    const seen = new Set<number>();
    for (const raw of rawCrimes) {
      const normalized = normalizeCrime(raw);
      if (!normalized.ok) {
        result.skipped += 1;
        this.logger.warn('crime_record_skipped', { factionId, reason: normalized.reason });
        continue;
      }
      if (seen.has(normalized.crime.crimeId)) {
        result.skipped += 1;
        continue;
      }
      seen.add(normalized.crime.crimeId);
      result.crimes.push(normalized.crime);
    }

    const current = new Map((await this.store.listCurrentCrimes(factionId)).map((crime) => [crime.crimeId, crime]));
    const absentTerminal = result.crimes
      .filter((crime) => !current.has(crime.crimeId) && isTerminalStatus(crime.status))
      .map((crime) => crime.crimeId);
    const alreadyClosed = await this.store.listTerminalCrimeIds(factionId, absentTerminal);

    for (const crime of result.crimes) {
      const existing = current.get(crime.crimeId) ?? null;
      if (existing) result.existingCrimes += 1;
      else result.newCrimes += 1;

      const change = await this.reconcile(factionId, crime, existing, credentialTag, alreadyClosed.has(crime.crimeId));
      if (change.changed) result.crimesUpdated += 1;
      result.eventsRecorded += change.events.length;
      result.events.push(...change.events);
    }

    this.logger.log('crime_batch_reconciled', {
      factionId,
      received: rawCrimes.length,
      newCrimes: result.newCrimes,
      existingCrimes: result.existingCrimes,
      crimesUpdated: result.crimesUpdated,
      eventsRecorded: result.eventsRecorded,
      skipped: result.skipped,
    });
    return result;
  }

  async reconcile(
    factionId: number,
    crime: NormalizedCrime,
    existing: CrimeRecord | null,
    credentialTag: string,
    terminalRecorded = false
  ): Promise<CrimeChange> {
    const now = this.now();
    const base = {
      factionId,
      crimeId: crime.crimeId,
      crimeName: crime.name,
      dataSource: credentialTag,
    };

    if (!existing) {
      if (isTerminalStatus(crime.status)) {
        if (terminalRecorded) return { changed: false, events: [] };
        const events = [this.terminalEvent(base, crime, crime.status, null, [], now)];
        await this.store.appendCrimeEvents(events);
        await this.recordOutcomes(factionId, crime, crime.status, now);
        return { changed: true, events };
      }

      const events: CrimeEventInput[] = [
        {
          ...base,
          eventType: 'created',
          playerId: null,
          oldStatus: null,
          newStatus: crime.status,
          oldParticipants: null,
          newParticipants: [...crime.participants],
          rewards: null,
          occurredAt: crime.timeStarted ?? now,
        },
      ];
      await this.store.appendCrimeEvents(events);
      await this.store.upsertCurrentCrime(this.toUpsert(factionId, crime, credentialTag, now));
      return { changed: true, events };
    }

    const events: CrimeEventInput[] = [];
    if (existing.status !== crime.status) {
      events.push({
        ...base,
        eventType: 'status_changed',
        playerId: null,
        oldStatus: existing.status,
        newStatus: crime.status,
        oldParticipants: null,
        newParticipants: null,
        rewards: null,
        occurredAt: now,
      });
    }

    const before = new Set(existing.participants);
    const after = new Set(crime.participants);
    const participantEvent = (eventType: 'participant_joined' | 'participant_left', playerId: number) => ({
      ...base,
      eventType,
      playerId,
      oldStatus: null,
      newStatus: null,
      oldParticipants: [...existing.participants],
      newParticipants: [...crime.participants],
      rewards: null,
      occurredAt: now,
    });
    for (const playerId of uniqueInOrder(crime.participants)) {
      if (!before.has(playerId)) events.push(participantEvent('participant_joined', playerId));
    }
    for (const playerId of uniqueInOrder(existing.participants)) {
      if (!after.has(playerId)) events.push(participantEvent('participant_left', playerId));
    }

    if (isTerminalStatus(crime.status)) {
      if (!isTerminalStatus(existing.status)) {
        events.push(this.terminalEvent(base, crime, crime.status, existing.status, existing.participants, now));
      }
      await this.store.appendCrimeEvents(events);
      if (!isTerminalStatus(existing.status)) {
        await this.recordOutcomes(factionId, crime, crime.status, now);
      }
      await this.store.deleteCurrentCrime(factionId, crime.crimeId);
      return { changed: true, events };
    }

    const changed = events.length > 0;
    const stale = now.getTime() - existing.lastUpdated.getTime() >= this.heartbeatMs;
    if (changed) {
      await this.store.appendCrimeEvents(events);
    }
    if (changed || stale) {
      await this.store.upsertCurrentCrime(this.toUpsert(factionId, crime, credentialTag, now));
    }
    return { changed, events };
  }

  private terminalEvent(
    base: Pick<CrimeEventInput, 'factionId' | 'crimeId' | 'crimeName' | 'dataSource'>,
    crime: NormalizedCrime,
    status: TerminalCrimeStatus,
    oldStatus: CrimeRecord['status'] | null,
    oldParticipants: number[],
    now: Date
  ): CrimeEventInput {
    return {
      ...base,
      eventType: status,
      playerId: null,
      oldStatus,
      newStatus: status,
      oldParticipants: [...oldParticipants],
      newParticipants: [...crime.participants],
      rewards: { ...crime.rewards },
      occurredAt: crime.timeCompleted ?? now,
    };
  }

  private async recordOutcomes(factionId: number, crime: NormalizedCrime, status: TerminalCrimeStatus, now: Date) {
    if (status === 'cancelled') return;
    for (const playerId of uniqueInOrder(crime.participants)) {
      await this.store.recordParticipantOutcome({
        factionId,
        playerId,
        crimeType: crime.crimeType,
        completed: status === 'completed' ? 1 : 0,
        failed: status === 'failed' ? 1 : 0,
        rewardMoney: crime.rewards.money ?? 0,
        rewardRespect: crime.rewards.respect ?? 0,
        occurredAt: crime.timeCompleted ?? now,
      });
    }
  }

  private toUpsert(factionId: number, crime: NormalizedCrime, credentialTag: string, now: Date) {
    return {
      factionId,
      crimeId: crime.crimeId,
      name: crime.name,
      crimeType: crime.crimeType,
      participants: [...crime.participants],
      requiredParticipants: crime.requiredParticipants,
      status: crime.status,
      timeStarted: crime.timeStarted,
      timeCompleted: crime.timeCompleted,
      readyAt: crime.readyAt,
      rewards: { ...crime.rewards },
      dataSource: credentialTag,
      lastUpdated: now,
    };
  }
}
