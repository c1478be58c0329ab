/**
 * bindsmith CLI - generate TypeScript bindings from a type model
 */

import { Command } from 'commander';
import { createGenerateCommand } from './commands/generate.js';
import { createValidateCommand } from './commands/validate.js';
import type { GlobalOptions } from './config/types.js';
import { applyLogLevel } from './respond.js';
import { logger } from '../utils/logger.js';

const pkg = {
  name: 'bindsmith',
  version: '0.1.0',
  description: 'Schema-driven TypeScript data classes with wire encode/decode logic',
};

/**
 * Main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .option('--log-level <level>', 'Logging verbosity: error, warn, info, debug', 'info')
    .hook('preAction', (thisCommand) => {
      applyLogLevel(thisCommand.opts<GlobalOptions>().logLevel);
    });

  program.addCommand(createGenerateCommand());
  program.addCommand(createValidateCommand());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error('Unexpected error', { error: message });
  console.error(JSON.stringify({
    status: 'error',
    error: {
      code: 'UNEXPECTED_ERROR',
      message,
    },
  }, null, 2));
  process.exit(1);
});
