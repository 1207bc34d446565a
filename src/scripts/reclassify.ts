#!/usr/bin/env node
// Re-derives platform/arch/graphics/sounds for every stored asset, after a
// backup of each releases file.
//
// Usage: npm run reclassify -- [--db <dir>] [--verbose]

import { parseArgs, stringFlag } from '../lib/args.js';
import { setLogLevel } from '../lib/log.js';
import { runReclassify } from '../lib/runners/reclassify.js';

const args = parseArgs(process.argv.slice(2), ['verbose']);
setLogLevel(args.flags.verbose ? 'debug' : 'info');

const result = runReclassify(stringFlag(args, 'db') ?? 'db');
process.exitCode = result.status === 'ok' ? 0 : 1;
