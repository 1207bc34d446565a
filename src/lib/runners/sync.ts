import type { AppConfig, GameConfig } from '../types.js';
import { loadReleases, loadTags, saveReleases, saveTags, touchIndex } from '../cache.js';
import { errorMessage } from '../errors.js';
import type { ReleaseFetcher } from '../github.js';
import { log } from '../log.js';
import { sleep } from '../sleep.js';
import { filterTags, listTags } from '../tags.js';

export interface SyncRunOptions {
  config: AppConfig;
  client: ReleaseFetcher;
  storageRoot?: string; // default: db
  requestDelayMs?: number; // default 100
  now?: () => Date;
  wait?: (ms: number) => Promise<void>; // default: sleep
}

export interface GameSyncResult {
  gameName: string;
  status: 'updated' | 'unchanged' | 'error';
  candidateTags: number;
  newTags: number;
  addedReleases: number;
  failedTags: number;
  totalReleases: number;
  error?: string;
}

export interface SyncRunResult {
  status: 'ok' | 'warn';
  games: GameSyncResult[];
}

export async function syncGame(
  game: GameConfig,
  opts: Required<Omit<SyncRunOptions, 'config'>>
): Promise<GameSyncResult> {
  const { client, storageRoot, requestDelayMs, now, wait } = opts;
  const name = game.game_name;

  log.info(`Building database for ${name}`);

  const processed = new Set(loadTags(storageRoot, name, 'processed'));
  log.info(`Loaded ${processed.size} previously processed tags from cache`);
  const failed = new Set(loadTags(storageRoot, name, 'failed'));
  log.info(`Loaded ${failed.size} previously failed tags from cache`);

  const releases = loadReleases(storageRoot, name);
  log.info(`Loaded ${releases.length} existing releases from database`);
  // A lost processed cache must not bring back tags that are already stored.
  for (const r of releases) {
    if (r.tagName) processed.add(r.tagName);
  }

  log.info(`Fetching tags from ${game.git_repo}`);
  const allTags = listTags(game.git_repo);
  log.info(`Found ${allTags.length} total tags`);

  const candidates = filterTags(allTags, game.filters);
  log.info(`Filtered to ${candidates.length} relevant tags`);

  const newTags = candidates.filter((t) => !processed.has(t) && !failed.has(t));
  log.info(`Found ${newTags.length} new tags to process (excluding ${failed.size} previously failed tags)`);

  let added = 0;
  let newlyFailed = 0;
  for (const [i, tag] of newTags.entries()) {
    log.info(`Processing new tag ${i + 1}/${newTags.length}: ${tag}`);

    const release = await client.fetchRelease(game.git_repo, tag, name);
    if (release) {
      releases.push(release);
      processed.add(tag);
      added += 1;
      log.debug(`Successfully processed tag: ${tag}`);
    } else {
      failed.add(tag);
      newlyFailed += 1;
      log.debug(`No release found for tag: ${tag}`);
    }

    await wait(requestDelayMs);
  }

  // Attempted tags are recorded even when every fetch failed, so they are never retried.
  if (newTags.length > 0) {
    saveTags(storageRoot, name, 'processed', processed);
    saveTags(storageRoot, name, 'failed', failed);
  }

  const result: GameSyncResult = {
    gameName: name,
    status: 'unchanged',
    candidateTags: candidates.length,
    newTags: newTags.length,
    addedReleases: added,
    failedTags: newlyFailed,
    totalReleases: releases.length,
  };

  log.info(`Successfully retrieved ${releases.length} total releases for ${name}`);
  if (added === 0) {
    log.info(`No changes for ${name}, skipping save and index update`);
    return result;
  }

  log.info(`Added ${added} new releases`);
  if (saveReleases(storageRoot, name, releases)) {
    touchIndex(storageRoot, name, now());
    log.info(`Database updated for ${name}`);
  }
  return { ...result, status: 'updated' };
}

export async function runSync(opts: SyncRunOptions): Promise<SyncRunResult> {
  const { config, client, storageRoot = 'db', requestDelayMs = 100, now = () => new Date(), wait = sleep } = opts;

  const games: GameSyncResult[] = [];
  for (const game of config.games) {
    try {
      games.push(await syncGame(game, { client, storageRoot, requestDelayMs, now, wait }));
    } catch (e) {
      const msg = errorMessage(e);
      log.error(`Failed to build database for ${game.game_name}: ${msg}`);
      games.push({
        gameName: game.game_name,
        status: 'error',
        candidateTags: 0,
        newTags: 0,
        addedReleases: 0,
        failedTags: 0,
        totalReleases: 0,
        error: msg,
      });
    }
  }

  return {
    status: games.some((g) => g.status === 'error') ? 'warn' : 'ok',
    games,
  };
}
