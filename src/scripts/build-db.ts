#!/usr/bin/env node
// Builds/updates the release database for every game in the config file.
//
// Usage: npm run build-db -- <config.json> [--token <github token>] [--db <dir>] [--verbose]

import { parseArgs, stringFlag } from '../lib/args.js';
import { loadConfig } from '../lib/config.js';
import { errorMessage } from '../lib/errors.js';
import { GithubClient } from '../lib/github.js';
import { log, setLogLevel } from '../lib/log.js';
import { runSync } from '../lib/runners/sync.js';

const USAGE = 'Usage: npm run build-db -- <config.json> [--token <token>] [--db <dir>] [--verbose]';

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2), ['verbose', 'help']);
  if (args.flags.help) {
    console.log(USAGE);
    return 0;
  }

  const configPath = args.positional[0];
  if (!configPath) {
    console.error(USAGE);
    return 2;
  }

  setLogLevel(args.flags.verbose ? 'debug' : 'info');

  try {
    const config = loadConfig(configPath);
    const client = new GithubClient({ token: stringFlag(args, 'token') ?? process.env.GITHUB_TOKEN });
    const result = await runSync({ config, client, storageRoot: stringFlag(args, 'db') ?? 'db' });

    const updated = result.games.filter((g) => g.status === 'updated').length;
    const errored = result.games.filter((g) => g.status === 'error').length;
    log.info(`Done. ${result.games.length} games, ${updated} updated, ${errored} failed.`);
    return 0;
  } catch (e) {
    log.error(`Application failed: ${errorMessage(e)}`);
    return 1;
  }
}

process.exitCode = await main();
