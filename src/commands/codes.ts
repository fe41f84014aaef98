/**
 * codes command - List the diagnostic taxonomy
 */

import chalk from 'chalk';
import type { CommandContext, CommandResult } from '../types.js';
import { header } from '../utils/output.js';
import { CODE_CATALOGUE, type CodeInfo } from '../diagnostics/codes.js';

export async function codesCommand(ctx: CommandContext): Promise<CommandResult<CodeInfo[]>> {
  const codes = [...CODE_CATALOGUE];

  if (ctx.outputFormat === 'human') {
    header('Diagnostic Codes');
    for (const code of codes) {
      const label = `${code.severity === 'error' ? 'ERROR' : 'WARNING'} #${code.code}`;
      const color = code.severity === 'error' ? chalk.red : chalk.yellow;
      const suffix = code.deprecated ? chalk.gray(' (no longer reported)') : '';
      console.log(`  ${color(label.padEnd(11))} ${code.summary}${suffix}`);
    }
  }

  return {
    success: true,
    message: `${codes.length} diagnostic codes`,
    data: codes,
  };
}
