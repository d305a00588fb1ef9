import type { CommandReply } from '../src/commands/registry.js';

export const CLI_INVOKER = { id: 'cli', isAdmin: true } as const;

/** Prints a command reply; a failed reply sets a non-zero exit code. */
export const printReply = (reply: CommandReply, json: boolean) => {
  if (json) {
    console.log(JSON.stringify(reply, null, 2));
  } else if (reply.ok) {
    console.log(reply.message);
  } else {
    console.error(`${reply.error}: ${reply.message}`);
  }
  if (!reply.ok) process.exitCode = 1;
};
