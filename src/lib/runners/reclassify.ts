import fs from 'node:fs';
import { z } from 'zod';

import { classifyAsset } from '../classify.js';
import { errorMessage } from '../errors.js';
import { log } from '../log.js';
import { findReleaseFiles, writeJson } from '../storage.js';
import type { AssetClassification } from '../types.js';

// Records are handled loosely here so fields this tool does not know about
// survive the rewrite untouched.
const LooseReleaseListSchema = z.array(
  z
    .object({
      name: z.unknown().optional(),
      assets: z.array(z.unknown()).optional(),
    })
    .passthrough()
);

const FIELDS = ['platform', 'arch', 'graphics', 'sounds'] as const satisfies ReadonlyArray<keyof AssetClassification>;

export interface FileReclassifyResult {
  file: string;
  updated: number;
  total: number;
}

export interface ReclassifyRunResult {
  status: 'ok' | 'error';
  files: FileReclassifyResult[];
  failedFiles: string[];
  updatedAssets: number;
  totalAssets: number;
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

// Overwrites the four classification fields in place; true when any value differed.
export function reclassifyAssetRecord(asset: Record<string, unknown>): boolean {
  const filename = typeof asset.name === 'string' ? asset.name : '';
  const next = classifyAsset(filename);
  const changes: string[] = [];
  for (const field of FIELDS) {
    if (asset[field] !== next[field]) {
      changes.push(`${field}: ${String(asset[field] ?? 'added')} -> ${next[field]}`);
    }
    asset[field] = next[field];
  }
  if (changes.length > 0) {
    log.debug(`Asset '${filename}': ${changes.join(', ')}`);
  }
  return changes.length > 0;
}

export function reclassifyReleaseFile(filePath: string): FileReclassifyResult {
  log.info(`Starting reprocessing of ${filePath}`);
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  const releases = LooseReleaseListSchema.parse(raw);
  log.info(`Loaded ${releases.length} releases from ${filePath}`);

  let total = 0;
  let updated = 0;
  releases.forEach((release, idx) => {
    const assets = release.assets ?? [];
    const label = typeof release.name === 'string' ? release.name : `Release ${idx}`;
    log.debug(`Processing release '${label}' with ${assets.length} assets`);
    assets.forEach((asset, assetIdx) => {
      if (!isRecord(asset)) {
        log.debug(`Skipping asset ${assetIdx} of release '${label}': not an object`);
        return;
      }
      total += 1;
      if (reclassifyAssetRecord(asset)) updated += 1;
    });
  });

  writeJson(filePath, releases);
  log.info(`Reprocessing complete: ${updated}/${total} assets updated`);
  return { file: filePath, updated, total };
}

export function backupPath(filePath: string): string {
  return `${filePath}.backup`;
}

export function runReclassify(storageRoot: string): ReclassifyRunResult {
  const files = findReleaseFiles(storageRoot);
  const result: ReclassifyRunResult = { status: 'ok', files: [], failedFiles: [], updatedAssets: 0, totalAssets: 0 };

  if (files.length === 0) {
    log.error(`No release database files found under ${storageRoot}`);
    return { ...result, status: 'error' };
  }
  log.info(`Found ${files.length} database(s) to process`);

  for (const file of files) {
    try {
      const backup = backupPath(file);
      log.info(`Creating backup at ${backup}`);
      fs.copyFileSync(file, backup);

      const r = reclassifyReleaseFile(file);
      result.files.push(r);
      result.updatedAssets += r.updated;
      result.totalAssets += r.total;
      log.info(`Updated ${r.updated} out of ${r.total} assets in ${file}`);
    } catch (e) {
      log.error(`Failed to reprocess ${file}: ${errorMessage(e)}`);
      result.failedFiles.push(file);
    }
  }

  log.info(
    `Reprocessing summary: ${result.files.length} ok, ${result.failedFiles.length} failed, ` +
      `${result.updatedAssets}/${result.totalAssets} assets updated`
  );
  return { ...result, status: result.failedFiles.length === 0 ? 'ok' : 'error' };
}
