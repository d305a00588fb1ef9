import { z } from 'zod';

import { toFactionResponse, toPlayerResponse } from '../routes/helpers/responders.js';
import { EntityRecorder } from '../sync/entity-recorder.js';
import { FACTION_SCOPE } from '../sync/orchestrator.js';
import { requireCredential, requireStore, type CommandContext } from './context.js';
import { defineCommand, ok, type Command } from './registry.js';

const USER_SCOPE = 'user';

export const entityCommands = (context: CommandContext): Command[] => {
  const recorder = () =>
    new EntityRecorder(requireStore(context), context.client, { now: context.now, logger: context.logger });

  return [
    defineCommand({
      name: 'player.refresh',
      description: "Fetch a player's profile and record a stats snapshot",
      requiresStorage: true,
      args: z.object({ player_id: z.coerce.number().int().positive().optional() }),
      async execute(args, invoker) {
        const credential = requireCredential(context, USER_SCOPE, invoker.id);
        const player = await recorder().refreshPlayer(args.player_id, credential);
        return ok(`Recorded ${player.name} [${player.playerId}]`, toPlayerResponse(player));
      },
    }),

    defineCommand({
      name: 'faction.refresh',
      description: 'Fetch a faction profile and record a history snapshot',
      requiresStorage: true,
      args: z.object({ faction_id: z.coerce.number().int().positive() }),
      async execute(args, invoker) {
        const credential = requireCredential(context, FACTION_SCOPE, invoker.id);
        const faction = await recorder().refreshFaction(args.faction_id, credential);
        return ok(`Recorded ${faction.name} [${faction.factionId}]`, toFactionResponse(faction));
      },
    }),
  ];
};
