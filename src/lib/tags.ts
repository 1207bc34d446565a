import { execFileSync } from 'node:child_process';

import { errorMessage } from './errors.js';
import { log } from './log.js';

export interface ListTagsOptions {
  host?: string; // default github.com
  timeoutMs?: number; // default 60s
}

// `git ls-remote --tags` output: "<sha>\trefs/tags/<tag>", plus "<tag>^{}" lines
// for the commit an annotated tag points at.
export function parseLsRemote(output: string): string[] {
  const tags: string[] = [];
  for (const line of output.split('\n')) {
    const idx = line.indexOf('refs/tags/');
    if (idx === -1) continue;
    const tag = line.slice(idx + 'refs/tags/'.length).trim();
    if (!tag || tag.endsWith('^{}')) continue;
    tags.push(tag);
  }
  return tags;
}

export function listTags(gitRepo: string, opts: ListTagsOptions = {}): string[] {
  const { host = 'github.com', timeoutMs = 60_000 } = opts;
  const repoUrl = `https://${host}/${gitRepo}.git`;
  try {
    const out = execFileSync('git', ['ls-remote', '--tags', repoUrl], {
      encoding: 'utf8',
      timeout: timeoutMs,
      maxBuffer: 64 * 1024 * 1024,
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    return parseLsRemote(out);
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ETIMEDOUT') {
      log.error(`Timeout getting tags from ${repoUrl}`);
    } else {
      log.error(`Error getting tags from ${repoUrl}: ${errorMessage(e)}`);
    }
    return [];
  }
}

function compilePatterns(patterns: string[]): RegExp[] {
  const compiled: RegExp[] = [];
  for (const p of patterns) {
    try {
      // sticky: the match must begin at index 0, but need not reach the end
      compiled.push(new RegExp(p, 'y'));
    } catch (e) {
      log.warn(`Invalid regex pattern '${p}': ${errorMessage(e)}`);
    }
  }
  return compiled;
}

export function filterTags(tags: string[], patterns: string[]): string[] {
  const compiled = compilePatterns(patterns);
  return tags.filter((tag) =>
    compiled.some((re) => {
      re.lastIndex = 0;
      return re.test(tag);
    })
  );
}
