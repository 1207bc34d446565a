import { describe, expect, it } from 'vitest';
import { classifyAsset, inferArch, inferGraphics, inferPlatform, inferSounds } from './classify.js';
import { ARCHS, GRAPHICS, PLATFORMS, SOUNDS } from './types.js';

describe('inferPlatform', () => {
  it('detects platforms by keyword', () => {
    expect(inferPlatform('game-android-x64.apk')).toBe('android');
    expect(inferPlatform('game-windows-tiles-x64.zip')).toBe('windows');
    expect(inferPlatform('game-linux-curses-x64.tar.gz')).toBe('linux');
    expect(inferPlatform('game-osx-tiles-universal.dmg')).toBe('macos');
    expect(inferPlatform('Game-MacOS-build.tar.xz')).toBe('macos');
  });

  it('falls back to extension rules', () => {
    expect(inferPlatform('app.apk')).toBe('android');
    expect(inferPlatform('build.zip')).toBe('windows');
    expect(inferPlatform('build.tar.gz')).toBe('linux');
    expect(inferPlatform('build.dmg')).toBe('macos');
  });

  it('prefers android over windows when both apply', () => {
    expect(inferPlatform('android-bundle.zip')).toBe('android');
  });

  it('returns unknown for unrecognised names', () => {
    expect(inferPlatform('checksums.txt')).toBe('unknown');
    expect(inferPlatform('')).toBe('unknown');
  });
});

describe('inferArch', () => {
  it('detects each architecture', () => {
    expect(inferArch('game-universal.dmg')).toBe('universal');
    expect(inferArch('game-android-bundle.aab')).toBe('universal');
    expect(inferArch('game-android-x32.apk')).toBe('arm32');
    expect(inferArch('game-aarch32.tar.gz')).toBe('arm32');
    expect(inferArch('game-aarch64.tar.gz')).toBe('arm64');
    expect(inferArch('game-android-x64.apk')).toBe('arm64');
    expect(inferArch('game-amd64.tar.gz')).toBe('x64');
    expect(inferArch('game-x86.zip')).toBe('x32');
    expect(inferArch('game.zip')).toBe('unknown');
  });

  it('classifies a name carrying both arm and x64 as arm64', () => {
    expect(inferArch('game-arm-x64.tar.gz')).toBe('arm64');
  });

  it('treats any "arm" substring as arm64', () => {
    expect(inferArch('warmup-x86.zip')).toBe('arm64');
  });
});

describe('inferGraphics / inferSounds', () => {
  it('detects tiles and ascii builds', () => {
    expect(inferGraphics('game-with-graphics.zip')).toBe('tiles');
    expect(inferGraphics('game-android.apk')).toBe('tiles');
    expect(inferGraphics('game-terminal-only.tar.gz')).toBe('ascii');
    expect(inferGraphics('game-curses.tar.gz')).toBe('ascii');
    expect(inferGraphics('game.zip')).toBe('unknown');
  });

  it('detects sound packs', () => {
    expect(inferSounds('game-tiles-and-sounds.zip')).toBe('sounds');
    expect(inferSounds('game-with-sounds.zip')).toBe('sounds');
    expect(inferSounds('game-tiles.zip')).toBe('unknown');
  });
});

describe('classifyAsset', () => {
  it('classifies a full linux build name', () => {
    expect(classifyAsset('game-linux-x64-tiles-with-sounds.tar.gz')).toEqual({
      platform: 'linux',
      arch: 'x64',
      graphics: 'tiles',
      sounds: 'sounds',
    });
  });

  it('classifies a bare apk by extension only', () => {
    expect(classifyAsset('app.apk')).toEqual({
      platform: 'android',
      arch: 'unknown',
      graphics: 'unknown',
      sounds: 'unknown',
    });
  });

  it('is case-insensitive', () => {
    expect(classifyAsset('GAME-WINDOWS-X64-TILES.ZIP')).toEqual(classifyAsset('game-windows-x64-tiles.zip'));
  });

  it('always returns a member of each closed set, deterministically', () => {
    const names = ['', 'x', 'ARM', 'linux-arm32-ascii', 'sounds.dmg', 'osx-bundle-graphics', '日本語.zip'];
    for (const n of names) {
      const a = classifyAsset(n);
      expect(PLATFORMS).toContain(a.platform);
      expect(ARCHS).toContain(a.arch);
      expect(GRAPHICS).toContain(a.graphics);
      expect(SOUNDS).toContain(a.sounds);
      expect(classifyAsset(n)).toEqual(a);
    }
  });
});
