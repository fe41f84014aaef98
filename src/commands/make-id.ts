/**
 * make-id command - Print the deterministic identifier for a name and seed
 */

import type { CommandContext, CommandResult } from '../types.js';
import { makeId } from '../snippets/identifiers.js';

export interface MakeIdOptions {
  name: string;
  seed: string;
}

export async function makeIdCommand(
  ctx: CommandContext,
  options: MakeIdOptions
): Promise<CommandResult<{ id: string }>> {
  const id = makeId(options.name, options.seed);

  if (ctx.outputFormat === 'human') {
    console.log(id);
  }

  return { success: true, message: id, data: { id } };
}
