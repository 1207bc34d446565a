import { z } from 'zod';
import { classifyAsset } from './classify.js';
import { errorMessage, ReleaseError } from './errors.js';
import { log } from './log.js';
import {
  ARCHS,
  CHANNELS,
  GRAPHICS,
  PLATFORMS,
  SOUNDS,
  type GameRelease,
  type GameReleaseRecord,
  type ReleaseAsset,
  type ReleaseAssetRecord,
  type ReleaseChannel,
} from './types.js';

// --- GitHub payloads (GET /repos/{owner}/{repo}/releases/tags/{tag}) ---

const GithubAssetSchema = z.object({
  name: z.string(),
  size: z.number().int().nonnegative(),
  browser_download_url: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});

const GithubReleaseSchema = z.object({
  id: z.number().int(),
  name: z.string().nullable().optional(),
  tag_name: z.string().nullable().optional(),
  prerelease: z.boolean().optional(),
  body: z.string().nullable().optional(),
  published_at: z.string().nullable().optional(),
  created_at: z.string().nullable().optional(),
  assets: z.array(z.unknown()).default([]),
});

// Accepts "2024-01-01T00:00:00Z", "+00:00" offsets and fractional seconds.
export function parseTimestamp(value: unknown): Date | null {
  if (typeof value !== 'string' || !value) return null;
  const t = Date.parse(value);
  if (Number.isNaN(t)) return null;
  return new Date(t);
}

export function inferChannel(name: string, prerelease: boolean): ReleaseChannel {
  if (prerelease || name.toLowerCase().includes('experimental')) return 'experimental';
  return 'stable';
}

export function assetFromGithub(raw: unknown): ReleaseAsset {
  const parsed = GithubAssetSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ReleaseError(`invalid asset payload: ${parsed.error.issues.map((i) => i.path.join('.') || i.message).join(', ')}`);
  }
  const a = parsed.data;
  const createdAt = parseTimestamp(a.created_at);
  const updatedAt = parseTimestamp(a.updated_at);
  if (!createdAt || !updatedAt) {
    throw new ReleaseError(`invalid asset timestamps: ${a.created_at} / ${a.updated_at}`);
  }
  return {
    name: a.name,
    size: a.size,
    downloadUrl: a.browser_download_url,
    ...classifyAsset(a.name),
    createdAt,
    updatedAt,
  };
}

function rawAssetName(raw: unknown): string {
  if (raw && typeof raw === 'object' && 'name' in raw && typeof raw.name === 'string') return raw.name;
  return 'unknown';
}

export function releaseFromGithub(raw: unknown, gameType: string): GameRelease {
  const parsed = GithubReleaseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ReleaseError(`invalid release payload: ${parsed.error.issues.map((i) => i.path.join('.') || i.message).join(', ')}`);
  }
  const r = parsed.data;
  const tagName = r.tag_name ?? null;
  const name = r.name ?? tagName ?? '';
  const prerelease = r.prerelease ?? false;

  const assets: ReleaseAsset[] = [];
  for (const rawAsset of r.assets) {
    try {
      assets.push(assetFromGithub(rawAsset));
    } catch (e) {
      log.warn(`Failed to parse asset ${rawAssetName(rawAsset)}: ${errorMessage(e)}`);
    }
  }

  return {
    id: r.id,
    name,
    tagName,
    prerelease,
    channel: inferChannel(name, prerelease),
    gameType,
    body: r.body ?? null,
    publishedAt: parseTimestamp(r.published_at),
    createdAt: parseTimestamp(r.created_at),
    assets,
  };
}

// --- persisted records ---

function toIso(d: Date | null): string | null {
  return d ? d.toISOString() : null;
}

export function assetToRecord(a: ReleaseAsset): ReleaseAssetRecord {
  return {
    name: a.name,
    size: a.size,
    download_url: a.downloadUrl,
    platform: a.platform,
    arch: a.arch,
    graphics: a.graphics,
    sounds: a.sounds,
    created_at: a.createdAt.toISOString(),
    updated_at: a.updatedAt.toISOString(),
  };
}

export function releaseToRecord(r: GameRelease): GameReleaseRecord {
  return {
    id: r.id,
    name: r.name,
    tag_name: r.tagName,
    prerelease: r.prerelease,
    channel: r.channel,
    game_type: r.gameType,
    published_at: toIso(r.publishedAt),
    created_at: toIso(r.createdAt),
    body: r.body,
    assets: r.assets.map(assetToRecord),
  };
}

// Each field falls back to its default on its own; only a record that is not
// an object is rejected.
const AssetRecordSchema = z.object({
  name: z.string().catch(''),
  size: z.number().catch(0),
  download_url: z.string().catch(''),
  // unknown or missing values are re-derived from the filename on load
  platform: z.enum(PLATFORMS).optional().catch(undefined),
  arch: z.enum(ARCHS).optional().catch(undefined),
  graphics: z.enum(GRAPHICS).optional().catch(undefined),
  sounds: z.enum(SOUNDS).optional().catch(undefined),
  created_at: z.unknown(),
  updated_at: z.unknown(),
});

const ReleaseRecordSchema = z.object({
  id: z.number().catch(0),
  name: z.string().catch(''),
  tag_name: z.string().nullable().catch(null),
  prerelease: z.boolean().catch(false),
  channel: z.enum(CHANNELS).catch('stable'),
  game_type: z.string().catch(''),
  published_at: z.unknown(),
  created_at: z.unknown(),
  body: z.string().nullable().catch(null),
  assets: z.array(z.unknown()).catch([]),
});

function describeIssues(err: z.ZodError): string {
  return err.issues.map((i) => i.message).join(', ');
}

function assetFromRecord(raw: unknown, loadedAt: Date): ReleaseAsset | null {
  const parsed = AssetRecordSchema.safeParse(raw);
  if (!parsed.success) return null;
  const a = parsed.data;
  const inferred = classifyAsset(a.name);
  return {
    name: a.name,
    size: a.size,
    downloadUrl: a.download_url,
    platform: a.platform ?? inferred.platform,
    arch: a.arch ?? inferred.arch,
    graphics: a.graphics ?? inferred.graphics,
    sounds: a.sounds ?? inferred.sounds,
    createdAt: parseTimestamp(a.created_at) ?? loadedAt,
    updatedAt: parseTimestamp(a.updated_at) ?? loadedAt,
  };
}

// null when the stored entry is not an object at all.
export function releaseFromRecord(raw: unknown, loadedAt = new Date()): GameRelease | null {
  const parsed = ReleaseRecordSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn(`Skipping stored release: ${describeIssues(parsed.error)}`);
    return null;
  }
  const rec = parsed.data;
  const label = rec.tag_name ?? rec.name;

  const assets: ReleaseAsset[] = [];
  rec.assets.forEach((rawAsset, idx) => {
    const asset = assetFromRecord(rawAsset, loadedAt);
    if (asset) assets.push(asset);
    else log.warn(`Skipping stored asset ${idx} of release '${label}': not an object`);
  });

  return {
    id: rec.id,
    name: rec.name,
    tagName: rec.tag_name,
    prerelease: rec.prerelease,
    channel: rec.channel,
    gameType: rec.game_type,
    body: rec.body,
    publishedAt: parseTimestamp(rec.published_at),
    createdAt: parseTimestamp(rec.created_at),
    assets,
  };
}

export function releasesFromRecords(raw: readonly unknown[], loadedAt = new Date()): GameRelease[] {
  const releases: GameRelease[] = [];
  for (const rec of raw) {
    const r = releaseFromRecord(rec, loadedAt);
    if (r) releases.push(r);
  }
  return releases;
}

export function effectiveDate(r: GameRelease): number {
  return (r.publishedAt ?? r.createdAt)?.getTime() ?? 0;
}

// Newest first; ties keep their input order.
export function sortReleasesByDate(releases: GameRelease[]): GameRelease[] {
  return [...releases].sort((a, b) => effectiveDate(b) - effectiveDate(a));
}
