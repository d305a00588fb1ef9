import { z } from 'zod';

import type { CrimeRewards, CrimeStatus } from '../store/types.js';

const STATUS_MAP: Readonly<Record<string, CrimeStatus>> = {
  available: 'planning',
  recruiting: 'planning',
  planning: 'planning',
  ready: 'ready',
  completed: 'completed',
  successful: 'completed',
  failure: 'failed',
  failed: 'failed',
  expired: 'cancelled',
  cancelled: 'cancelled',
};

/**
 * Folds upstream status strings into the internal lifecycle. A readiness
 * timestamp promotes the planning bucket to `ready`; terminal strings win.
 */
export const mapCrimeStatus = (upstream: string | null | undefined, readyAt: Date | null): CrimeStatus => {
  const mapped = STATUS_MAP[(upstream ?? 'planning').trim().toLowerCase()] ?? 'planning';
  if (mapped === 'planning' && readyAt) return 'ready';
  return mapped;
};

const INTEGER_TEXT = /^\s*-?\d+\s*$/;

const toInteger = (value: unknown): number | null => {
  if (typeof value === 'number') return Number.isInteger(value) ? value : null;
  if (typeof value === 'string' && INTEGER_TEXT.test(value)) return Number.parseInt(value, 10);
  return null;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const PARTICIPANT_FIELDS = ['id', 'user_id', 'player_id'] as const;

/**
 * Slot occupants normally arrive as a plain id; composite objects are searched
 * for the first of `id`, `user_id`, `player_id` holding an integer.
 */
export const extractParticipantId = (user: unknown): number | null => {
  if (user === null || user === undefined) return null;
  if (isRecord(user)) {
    for (const field of PARTICIPANT_FIELDS) {
      const id = toInteger(user[field]);
      if (id) return id;
    }
    return null;
  }
  return toInteger(user);
};

const NumericId = z.union([z.number().int(), z.string().regex(/^\d+$/).transform(Number)]);
const UnixSeconds = z.number().nullable().optional().catch(null);

const SlotSchema = z
  .object({
    position: z.string().optional().catch(undefined),
    user: z.unknown().optional(),
    item_requirement: z
      .object({
        id: NumericId.optional(),
        is_available: z.boolean().optional(),
      })
      .passthrough()
      .nullable()
      .optional()
      .catch(null),
  })
  .passthrough();

const RawCrimeSchema = z
  .object({
    id: NumericId,
    name: z.string().optional().catch(undefined),
    difficulty: z.union([z.number(), z.string()]).optional().catch(undefined),
    status: z.string().optional().catch(undefined),
    created_at: UnixSeconds,
    executed_at: UnixSeconds,
    ready_at: UnixSeconds,
    slots: z.array(z.unknown()).optional().catch([]),
    rewards: z.record(z.unknown()).nullable().optional().catch(null),
  })
  .passthrough();

export interface CrimeSlot {
  position: string;
  userId: number | null;
  itemRequirement: { itemId: number; available: boolean } | null;
}

export interface NormalizedCrime {
  crimeId: number;
  name: string;
  crimeType: string | null;
  upstreamStatus: string | null;
  status: CrimeStatus;
  participants: number[];
  requiredParticipants: number;
  slots: CrimeSlot[];
  timeStarted: Date | null;
  timeCompleted: Date | null;
  readyAt: Date | null;
  rewards: CrimeRewards;
}

export type NormalizeResult = { ok: true; crime: NormalizedCrime } | { ok: false; reason: string };

const fromUnix = (seconds: number | null | undefined): Date | null =>
  seconds ? new Date(seconds * 1000) : null;

const finiteOrNull = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

const normalizeRewards = (rewards: Record<string, unknown> | null | undefined): CrimeRewards => {
  if (!rewards) return { money: null, respect: null, other: null };
  const { money, respect, ...rest } = rewards;
  return {
    money: finiteOrNull(money),
    respect: finiteOrNull(respect),
    other: Object.keys(rest).length ? rest : null,
  };
};

const normalizeSlot = (raw: unknown): CrimeSlot | null => {
  const parsed = SlotSchema.safeParse(raw);
  if (!parsed.success) return null;
  const requirement = parsed.data.item_requirement;
  return {
    position: parsed.data.position ?? 'Unknown',
    userId: extractParticipantId(parsed.data.user),
    itemRequirement:
      requirement && requirement.id
        ? { itemId: requirement.id, available: requirement.is_available ?? true }
        : null,
  };
};

export const normalizeCrime = (raw: unknown): NormalizeResult => {
  if (!isRecord(raw)) {
    return { ok: false, reason: 'record is not an object' };
  }
  const parsed = RawCrimeSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, reason: `invalid id ${JSON.stringify(raw.id ?? null)}` };
  }

  const record = parsed.data;
  const rawSlots = record.slots ?? [];
  const slots: CrimeSlot[] = [];
  for (const entry of rawSlots) {
    const slot = normalizeSlot(entry);
    if (slot) slots.push(slot);
  }

  const participants: number[] = [];
  for (const slot of slots) {
    if (slot.userId !== null) participants.push(slot.userId);
  }

  const readyAt = fromUnix(record.ready_at);
  return {
    ok: true,
    crime: {
      crimeId: record.id,
      name: record.name?.trim() || `Crime ${record.id}`,
      crimeType: record.difficulty === undefined ? null : String(record.difficulty),
      upstreamStatus: record.status ?? null,
      status: mapCrimeStatus(record.status, readyAt),
      participants,
      requiredParticipants: rawSlots.length,
      slots,
      timeStarted: fromUnix(record.created_at),
      timeCompleted: fromUnix(record.executed_at),
      readyAt,
      rewards: normalizeRewards(record.rewards),
    },
  };
};
