#!/usr/bin/env -S node --import tsx
/**
 * bin/jailprof.ts — entry point for the `jailprof` CLI command.
 *
 * jailprof check firefox
 * jailprof diff firefox chromium -f simple
 * JAILPROF_LOG_LEVEL=debug jailprof generate-standalone firefox
 */

import { createProgram } from '../commands/index.js'

createProgram().parse()
