#!/usr/bin/env -S node --import tsx
/**
 * bin/plinth.ts — entry point for the `plinth` CLI command.
 *
 * PLINTH_HOME=/tmp/demo plinth status
 * plinth --as 0x…01 dist list --json
 */

import { createProgram } from '../commands/index.js'

createProgram().parse()
