/**
 * jailprof diff — Show the options unique to each of two profiles
 *
 * Comments and blank lines are ignored; lines match by parsed value, so
 * layout differences never show up.
 */

import { Command, Option } from 'commander';
import { ProfileStream, diffStreams } from '@jailprof/profile-dsl';
import { readProfile } from '@jailprof/profile-host';
import { renderDiff } from '../output/render.js';
import { plain, t } from '../output/theme.js';
import { fail, runWithContext } from './context.js';

export const DIFF_FORMATS = ['color', 'simple'] as const;
export type DiffFormat = (typeof DIFF_FORMATS)[number];

export const diffCommand = (): Command => new Command('diff')
  .description('Show the options unique to each of two profiles')
  .argument('<profile1>', 'First profile name or path')
  .argument('<profile2>', 'Second profile name or path')
  .addOption(
    new Option('-f, --format <format>', 'Output format').choices(DIFF_FORMATS).default('color'),
  )
  .action((name1: string, name2: string, options: { format: DiffFormat }, command: Command) => {
    runWithContext(command, ({ lookup }) => {
      const left = readProfile(name1, lookup);
      const right = readProfile(name2, lookup);
      for (const result of [left, right]) {
        if (!result.ok) {
          fail(result.error.message);
        }
      }
      if (!left.ok || !right.ok) {
        return;
      }

      const diff = diffStreams(
        ProfileStream.parse(left.profile.text).stream,
        ProfileStream.parse(right.profile.text).stream,
      );
      const theme = options.format === 'simple' ? plain : t;
      process.stdout.write(renderDiff(diff, left.profile.fullName, right.profile.fullName, theme));
    });
  });
