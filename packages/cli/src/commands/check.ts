/**
 * jailprof check — Report the lines of a profile that do not parse
 *
 * Prints one `<file>:<line>: <message>: <text>` line per invalid line and
 * exits 1 when there is any.
 */

import { Command } from 'commander';
import { ProfileStream } from '@jailprof/profile-dsl';
import { readProfile } from '@jailprof/profile-host';
import { renderCheckReport } from '../output/render.js';
import { fail, runWithContext } from './context.js';

export const checkCommand = (): Command => new Command('check')
  .description('Check a profile for lines that do not parse')
  .argument('<profile>', 'Profile name (e.g. firefox) or path')
  .action((name: string, _options: Record<string, never>, command: Command) => {
    runWithContext(command, ({ logger, lookup }) => {
      const result = readProfile(name, lookup);
      if (!result.ok) {
        fail(result.error.message);
        return;
      }

      const { stream } = ProfileStream.parse(result.profile.text);
      const errors = stream.errors();
      logger.debug({ path: result.profile.path, lines: stream.length, invalid: errors.length }, 'checked profile');
      for (const line of renderCheckReport(result.profile.path, errors)) {
        process.stdout.write(line + '\n');
      }
      if (errors.length > 0) {
        process.exitCode = 1;
      }
    });
  });
