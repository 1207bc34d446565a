import type { AssetArch, AssetClassification, AssetGraphics, AssetPlatform, AssetSounds } from './types.js';

// Every check below is first-match-wins; the order is part of the stored data's
// meaning, so changing it reclassifies existing databases.

function hasAny(hay: string, needles: readonly string[]): boolean {
  return needles.some((n) => hay.includes(n));
}

export function inferPlatform(filename: string): AssetPlatform {
  const f = filename.toLowerCase();
  if (f.includes('android') || f.endsWith('.apk')) return 'android';
  if (f.includes('windows') || f.endsWith('.zip')) return 'windows';
  if (f.includes('linux') || f.endsWith('.tar.gz')) return 'linux';
  if (hasAny(f, ['osx', 'macos']) || f.endsWith('.dmg')) return 'macos';
  return 'unknown';
}

export function inferArch(filename: string): AssetArch {
  const f = filename.toLowerCase();
  if (hasAny(f, ['universal', 'bundle'])) return 'universal';
  if (hasAny(f, ['arm32', 'aarch32', 'android-x32'])) return 'arm32';
  // bare "arm" lands here too, ahead of the x64/x32 checks
  if (hasAny(f, ['arm64', 'aarch64', 'android-x64', 'arm'])) return 'arm64';
  if (hasAny(f, ['x64', 'amd64'])) return 'x64';
  if (hasAny(f, ['x32', 'x86'])) return 'x32';
  return 'unknown';
}

export function inferGraphics(filename: string): AssetGraphics {
  const f = filename.toLowerCase();
  if (hasAny(f, ['with-graphics', 'graphics', 'tiles', 'android'])) return 'tiles';
  if (hasAny(f, ['ascii', 'curses', 'terminal-only'])) return 'ascii';
  return 'unknown';
}

export function inferSounds(filename: string): AssetSounds {
  const f = filename.toLowerCase();
  if (hasAny(f, ['with-sounds', 'sounds', 'and-sounds'])) return 'sounds';
  return 'unknown';
}

export function classifyAsset(filename: string): AssetClassification {
  return {
    platform: inferPlatform(filename),
    arch: inferArch(filename),
    graphics: inferGraphics(filename),
    sounds: inferSounds(filename),
  };
}
