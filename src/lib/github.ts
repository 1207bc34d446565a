import { request } from 'undici';

import { errorMessage } from './errors.js';
import { log } from './log.js';
import { releaseFromGithub } from './release.js';
import { sleep } from './sleep.js';
import type { GameRelease } from './types.js';

export type HttpHeaders = Record<string, string | string[] | undefined>;

export interface HttpResponse {
  statusCode: number;
  headers: HttpHeaders;
  body: {
    json(): Promise<unknown>;
    dump(): Promise<void>;
  };
}

export type HttpGet = (url: string, headers: Record<string, string>, timeoutMs: number) => Promise<HttpResponse>;

export interface ReleaseFetcher {
  fetchRelease(gitRepo: string, tag: string, gameType: string): Promise<GameRelease | null>;
}

export interface GithubClientOptions {
  token?: string;
  /** default: https://api.github.com */
  baseUrl?: string;
  /** per-request header/body timeout, default 30s */
  timeoutMs?: number;
  /** calls left before the client waits for the window to reset */
  lowWaterMark?: number;
  httpGet?: HttpGet;
  wait?: (ms: number) => Promise<void>;
  now?: () => number;
}

const undiciGet: HttpGet = async (url, headers, timeoutMs) => {
  const res = await request(url, {
    method: 'GET',
    headers,
    headersTimeout: timeoutMs,
    bodyTimeout: timeoutMs,
  });
  return { statusCode: res.statusCode, headers: res.headers, body: res.body };
};

function headerInt(headers: HttpHeaders, name: string): number | null {
  const raw = headers[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  if (value === undefined || value.trim() === '') return null;
  const n = Number(value);
  return Number.isInteger(n) ? n : null;
}

/**
 * Release-by-tag client for the GitHub REST API.
 *
 * Every outcome other than a translated release (404, other statuses, transport
 * failures, unusable payloads) comes back as `null`.
 */
export class GithubClient implements ReleaseFetcher {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly lowWaterMark: number;
  private readonly httpGet: HttpGet;
  private readonly wait: (ms: number) => Promise<void>;
  private readonly now: () => number;

  rateLimitRemaining = 5000;
  rateLimitReset = 0; // unix seconds

  constructor(options: GithubClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? 'https://api.github.com').replace(/\/$/, '');
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.lowWaterMark = options.lowWaterMark ?? 10;
    this.httpGet = options.httpGet ?? undiciGet;
    this.wait = options.wait ?? sleep;
    this.now = options.now ?? Date.now;
    this.headers = {
      'User-Agent': 'release-db-builder',
      Accept: 'application/vnd.github+json',
    };
    if (options.token) {
      this.headers.Authorization = `Bearer ${options.token}`;
    }
  }

  private async handleRateLimit(headers: HttpHeaders): Promise<void> {
    const remaining = headerInt(headers, 'x-ratelimit-remaining');
    const reset = headerInt(headers, 'x-ratelimit-reset');
    if (remaining !== null) this.rateLimitRemaining = remaining;
    if (reset !== null) this.rateLimitReset = reset;

    if (this.rateLimitRemaining < this.lowWaterMark) {
      const waitMs = this.rateLimitReset * 1000 - this.now();
      if (waitMs > 0) {
        log.warn(`Rate limit low (${this.rateLimitRemaining}). Waiting ${Math.round(waitMs / 1000)}s`);
        await this.wait(waitMs + 1000);
      }
    }
  }

  async fetchRelease(gitRepo: string, tag: string, gameType: string): Promise<GameRelease | null> {
    const url = `${this.baseUrl}/repos/${gitRepo}/releases/tags/${encodeURIComponent(tag)}`;

    let res: HttpResponse;
    try {
      res = await this.httpGet(url, this.headers, this.timeoutMs);
    } catch (e) {
      log.error(`Request failed for tag ${tag}: ${errorMessage(e)}`);
      return null;
    }

    try {
      await this.handleRateLimit(res.headers);

      if (res.statusCode === 200) {
        const raw = await res.body.json();
        return releaseFromGithub(raw, gameType);
      }

      await res.body.dump();
      if (res.statusCode === 404) {
        log.debug(`No release found for tag ${tag}`);
      } else {
        log.warn(`API error for tag ${tag}: ${res.statusCode}`);
      }
      return null;
    } catch (e) {
      log.error(`Failed to read release for tag ${tag}: ${errorMessage(e)}`);
      return null;
    }
  }
}
