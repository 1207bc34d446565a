import fs from 'node:fs';
import { z } from 'zod';

import { errorMessage } from './errors.js';
import { log } from './log.js';
import { releasesFromRecords, releaseToRecord, sortReleasesByDate } from './release.js';
import { gamePaths, indexPath, tagCachePath, writeJson } from './storage.js';
import type { DatabaseIndex, GameRelease, TagCacheRole } from './types.js';

const TagListSchema = z.array(z.string());
const IndexSchema = z.record(z.object({ version: z.number().int() }));
// Records are checked one by one on load; see releasesFromRecords.
const RecordListSchema = z.array(z.unknown());

// Missing file -> null; unreadable or invalid file -> warning + null.
function readJson<S extends z.ZodTypeAny>(filePath: string, schema: S, label: string): z.output<S> | null {
  if (!fs.existsSync(filePath)) return null;
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    return schema.parse(raw);
  } catch (e) {
    log.warn(`Failed to load ${label}: ${errorMessage(e)}`);
    return null;
  }
}

function tryWrite(filePath: string, data: unknown, label: string): boolean {
  try {
    writeJson(filePath, data);
    return true;
  } catch (e) {
    log.error(`Failed to save ${label}: ${errorMessage(e)}`);
    return false;
  }
}

// --- processed / failed tag sets ---

export function loadTags(storageRoot: string, gameName: string, role: TagCacheRole): string[] {
  return readJson(tagCachePath(storageRoot, gameName, role), TagListSchema, `${role} tags cache for ${gameName}`) ?? [];
}

export function saveTags(storageRoot: string, gameName: string, role: TagCacheRole, tags: Iterable<string>): boolean {
  const sorted = [...new Set(tags)].sort();
  const ok = tryWrite(tagCachePath(storageRoot, gameName, role), sorted, `${role} tags cache for ${gameName}`);
  if (ok) log.debug(`Saved ${sorted.length} ${role} tags to cache for ${gameName}`);
  return ok;
}

// --- release collection ---

export function loadReleases(storageRoot: string, gameName: string): GameRelease[] {
  const records = readJson(gamePaths(storageRoot, gameName).releasesPath, RecordListSchema, `existing releases for ${gameName}`);
  if (!records) return [];
  const releases = releasesFromRecords(records, new Date());
  if (releases.length < records.length) {
    log.warn(`Skipped ${records.length - releases.length} unreadable releases for ${gameName}`);
  }
  return releases;
}

export function saveReleases(storageRoot: string, gameName: string, releases: GameRelease[]): boolean {
  const { releasesPath } = gamePaths(storageRoot, gameName);
  const records = sortReleasesByDate(releases).map(releaseToRecord);
  const ok = tryWrite(releasesPath, records, `releases for ${gameName}`);
  if (ok) log.info(`Saved ${records.length} releases to ${releasesPath} (sorted by date)`);
  return ok;
}

// --- index.json ---

export function loadIndex(storageRoot: string): DatabaseIndex {
  return readJson(indexPath(storageRoot), IndexSchema, 'database index') ?? {};
}

export function saveIndex(storageRoot: string, index: DatabaseIndex): boolean {
  const sorted: DatabaseIndex = {};
  for (const key of Object.keys(index).sort()) {
    const entry = index[key];
    if (entry) sorted[key] = { version: entry.version };
  }
  const ok = tryWrite(indexPath(storageRoot), sorted, 'database index');
  if (ok) log.debug(`Updated database index with ${Object.keys(sorted).length} games`);
  return ok;
}

export function touchIndex(storageRoot: string, gameName: string, now = new Date()): number {
  const index = loadIndex(storageRoot);
  const version = Math.floor(now.getTime() / 1000);
  index[gameName] = { version };
  saveIndex(storageRoot, index);
  log.debug(`Updated database index for ${gameName} with version ${version}`);
  return version;
}
