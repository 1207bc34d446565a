export type IsoDateTime = string;

export const PLATFORMS = ['windows', 'linux', 'macos', 'android', 'unknown'] as const;
export const ARCHS = ['x32', 'x64', 'arm32', 'arm64', 'universal', 'unknown'] as const;
export const GRAPHICS = ['tiles', 'ascii', 'unknown'] as const;
export const SOUNDS = ['sounds', 'unknown'] as const;
export const CHANNELS = ['stable', 'experimental'] as const;

export type AssetPlatform = (typeof PLATFORMS)[number];
export type AssetArch = (typeof ARCHS)[number];
export type AssetGraphics = (typeof GRAPHICS)[number];
export type AssetSounds = (typeof SOUNDS)[number];
export type ReleaseChannel = (typeof CHANNELS)[number];

export interface AssetClassification {
  platform: AssetPlatform;
  arch: AssetArch;
  graphics: AssetGraphics;
  sounds: AssetSounds;
}

export interface ReleaseAsset extends AssetClassification {
  name: string;
  size: number;
  downloadUrl: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface GameRelease {
  id: number;
  name: string;
  tagName: string | null;
  prerelease: boolean;
  channel: ReleaseChannel;
  gameType: string;
  body: string | null;
  publishedAt: Date | null;
  createdAt: Date | null;
  assets: ReleaseAsset[];
}

// On-disk shapes (<game>_releases.json)
export interface ReleaseAssetRecord {
  name: string;
  size: number;
  download_url: string;
  platform: AssetPlatform;
  arch: AssetArch;
  graphics: AssetGraphics;
  sounds: AssetSounds;
  created_at: IsoDateTime;
  updated_at: IsoDateTime;
}

export interface GameReleaseRecord {
  id: number;
  name: string;
  tag_name: string | null;
  prerelease: boolean;
  channel: ReleaseChannel;
  game_type: string;
  published_at: IsoDateTime | null;
  created_at: IsoDateTime | null;
  body: string | null;
  assets: ReleaseAssetRecord[];
}

export interface GameConfig {
  game_name: string;
  git_repo: string; // owner/name
  filters: string[];
}

export interface AppConfig {
  games: GameConfig[];
}

export type TagCacheRole = 'processed' | 'failed';

// index.json: game name -> unix seconds of the last releases write
export type DatabaseIndex = Record<string, { version: number }>;
