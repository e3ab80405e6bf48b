/**
 * commands/index.ts — Commander program factory; callers run .parse().
 *
 * Imported by:
 *   src/bin/jailprof.ts   (the `jailprof` executable)
 *   test/commands.test.ts
 */

import { Command, Option } from 'commander';
import { LOG_LEVELS } from '@jailprof/profile-host';
import { catCommand } from './cat.js';
import { checkCommand } from './check.js';
import { diffCommand } from './diff.js';
import { generateStandaloneCommand } from './generate-standalone.js';
import { hasCommand } from './has.js';

/**
 * Build the `jailprof` program. Every call returns fresh command objects.
 */
export function createProgram(): Command {
  const program = new Command();
  program
    .name('jailprof')
    .description(
      'jailprof — read, check and compare sandbox profiles.\n' +
      'Profiles are looked up in the current directory, the user directory and the system directory.',
    )
    .version('0.1.0')
    .addOption(new Option('--log-level <level>', 'Diagnostic log level').choices(LOG_LEVELS))
    .option('--user-dir <dir>', 'User profile directory')
    .option('--system-dir <dir>', 'System profile directory');

  program.addCommand(checkCommand());
  program.addCommand(catCommand());
  program.addCommand(diffCommand());
  program.addCommand(generateStandaloneCommand());
  program.addCommand(hasCommand());

  return program;
}
