import { z } from 'zod';

const NumericId = z.union([z.number().int(), z.string().regex(/^\d+$/).transform(Number)]);

export const ErrorEnvelopeSchema = z.object({
  error: z.object({
    code: z.coerce.number().int(),
    error: z.string().optional(),
  }),
});

export const KeyInfoSchema = z
  .object({
    access_level: z.union([z.number(), z.string()]).optional(),
    access_type: z.string().optional(),
    selections: z.union([z.record(z.unknown()), z.array(z.string())]).optional(),
  })
  .passthrough();
export type KeyInfo = z.infer<typeof KeyInfoSchema>;

export const FactionBasicSchema = z
  .object({
    basic: z
      .object({
        id: NumericId,
        name: z.string().optional(),
        tag: z.string().optional(),
        leader_id: NumericId.optional(),
        co_leader_id: NumericId.optional(),
        respect: z.number().optional(),
        days_old: z.number().optional(),
        members: z.number().optional(),
        best_chain: z.number().optional(),
      })
      .passthrough(),
  })
  .passthrough();
export type FactionBasic = z.infer<typeof FactionBasicSchema>;

export const UserProfileSchema = z
  .object({
    player_id: NumericId.optional(),
    name: z.string().optional(),
    level: z.number().int().optional(),
    rank: z.string().optional(),
    faction: z
      .object({
        faction_id: NumericId.optional(),
        faction_name: z.string().optional(),
      })
      .passthrough()
      .optional(),
    status: z
      .object({
        state: z.string().optional(),
        description: z.string().optional(),
      })
      .passthrough()
      .optional(),
    life: z
      .object({
        current: z.number().optional(),
        maximum: z.number().optional(),
      })
      .passthrough()
      .optional(),
    strength: z.number().optional(),
    defense: z.number().optional(),
    speed: z.number().optional(),
    dexterity: z.number().optional(),
    total: z.number().optional(),
    personalstats: z.record(z.unknown()).optional(),
  })
  .passthrough();
export type UserProfile = z.infer<typeof UserProfileSchema>;

export const FactionProfileSchema = z
  .object({
    ID: NumericId.optional(),
    name: z.string().optional(),
    tag: z.string().optional(),
    leader: NumericId.optional(),
    'co-leader': NumericId.optional(),
    respect: z.number().optional(),
    age: z.number().optional(),
    best_chain: z.number().optional(),
    members: z.record(z.unknown()).optional(),
  })
  .passthrough();
export type FactionProfile = z.infer<typeof FactionProfileSchema>;

export const FactionMemberSchema = z
  .object({
    name: z.string().optional(),
    level: z.number().int().optional(),
  })
  .passthrough();

/** `contributors[stat][playerId]` entries of the contributors selection. */
export const ContributionSchema = z
  .object({
    contributed: z.number().optional(),
    in_faction: z.union([z.number(), z.boolean()]).optional(),
  })
  .passthrough();

export const FactionContributorsSchema = z
  .object({
    members: z.record(z.unknown()).optional(),
    contributors: z.record(z.unknown()).optional(),
  })
  .passthrough();
export type FactionContributors = z.infer<typeof FactionContributorsSchema>;

export const CrimesPageSchema = z
  .object({
    crimes: z.array(z.unknown()),
    _metadata: z
      .object({
        links: z
          .object({
            next: z.string().nullable().optional(),
            prev: z.string().nullable().optional(),
          })
          .passthrough()
          .optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();
export type CrimesPage = z.infer<typeof CrimesPageSchema>;

export const UserDiscordSchema = z
  .object({
    discord: z
      .object({
        discord_id: z.union([z.string(), z.number()]).nullable().optional(),
      })
      .passthrough()
      .nullable()
      .optional(),
  })
  .passthrough();

const ItemEntrySchema = z
  .object({
    id: NumericId.optional(),
    name: z.string(),
    type: z.string().optional(),
    description: z.string().optional(),
  })
  .passthrough();
export type ItemEntry = z.infer<typeof ItemEntrySchema>;

export const ItemsSchema = z
  .object({
    items: z.union([z.array(ItemEntrySchema), z.record(ItemEntrySchema)]),
  })
  .passthrough();
