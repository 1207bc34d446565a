import fs from 'node:fs';
import path from 'node:path';

import type { TagCacheRole } from './types.js';

export interface GamePaths {
  gameDir: string;
  releasesPath: string;
  processedTagsPath: string;
  failedTagsPath: string;
}

export function ensureDir(dir: string) {
  fs.mkdirSync(dir, { recursive: true });
}

export function gamePaths(storageRoot: string, gameName: string): GamePaths {
  const gameDir = path.join(storageRoot, gameName);
  return {
    gameDir,
    releasesPath: path.join(gameDir, `${gameName}_releases.json`),
    processedTagsPath: path.join(gameDir, `${gameName}_processed_tags.json`),
    failedTagsPath: path.join(gameDir, `${gameName}_failed_tags.json`),
  };
}

export function tagCachePath(storageRoot: string, gameName: string, role: TagCacheRole): string {
  const p = gamePaths(storageRoot, gameName);
  return role === 'processed' ? p.processedTagsPath : p.failedTagsPath;
}

export function indexPath(storageRoot: string): string {
  return path.join(storageRoot, 'index.json');
}

// Every <root>/<name>/<name>_releases.json, sorted by game name.
export function findReleaseFiles(storageRoot: string): string[] {
  if (!fs.existsSync(storageRoot)) return [];
  return fs
    .readdirSync(storageRoot, { withFileTypes: true })
    .filter((d) => d.isDirectory())
    .map((d) => gamePaths(storageRoot, d.name).releasesPath)
    .filter((p) => fs.existsSync(p))
    .sort();
}

export function writeJson(filePath: string, data: unknown) {
  ensureDir(path.dirname(filePath));
  fs.writeFileSync(filePath, `${JSON.stringify(data, null, 2)}\n`);
}
