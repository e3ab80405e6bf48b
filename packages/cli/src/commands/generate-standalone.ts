/**
 * jailprof generate-standalone — Print a profile with its includes inlined
 *
 * Every unconditional `include` is replaced by the included file, recursively.
 * Includes that exist nowhere are dropped with a warning.
 */

import { Command } from 'commander';
import { ProfileStream, expandIncludes } from '@jailprof/profile-dsl';
import { FileProfileSource, readProfile } from '@jailprof/profile-host';
import { fail, runWithContext } from './context.js';

export const generateStandaloneCommand = (): Command => new Command('generate-standalone')
  .description('Print a profile with all includes inlined')
  .argument('<profile>', 'Profile name (e.g. firefox) or path')
  .option('--keep-inc', 'Keep includes of .inc files')
  .action((name: string, options: { keepInc?: boolean }, command: Command) => {
    runWithContext(command, ({ logger, lookup }) => {
      const result = readProfile(name, lookup);
      if (!result.ok) {
        fail(result.error.message);
        return;
      }

      const expanded = expandIncludes(
        ProfileStream.parse(result.profile.text).stream,
        new FileProfileSource(lookup),
        { keepInc: options.keepInc === true },
      );
      if (!expanded.ok) {
        fail(expanded.error.message);
        return;
      }
      for (const missing of expanded.missing) {
        logger.warn({ include: missing }, 'include not found, dropped');
      }
      process.stdout.write(expanded.stream.toString());
    });
  });
