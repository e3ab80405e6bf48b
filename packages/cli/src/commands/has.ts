/**
 * jailprof has — Tell where a profile is found
 *
 * Exits 100 when no search directory has the profile.
 */

import { Command } from 'commander';
import { lookupProfile } from '@jailprof/profile-host';
import { renderHas } from '../output/render.js';
import { runWithContext } from './context.js';

/** Exit code of `has` when the profile does not exist. */
export const NOT_FOUND_EXIT_CODE = 100;

export const hasCommand = (): Command => new Command('has')
  .description('Show where a profile is found')
  .argument('<profile>', 'Profile name (e.g. firefox) or path')
  .action((name: string, _options: Record<string, never>, command: Command) => {
    runWithContext(command, ({ lookup }) => {
      const path = lookupProfile(name, lookup);
      process.stdout.write(renderHas(name, path) + '\n');
      if (path === null) {
        process.exitCode = NOT_FOUND_EXIT_CODE;
      }
    });
  });
