import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';

import { ConfigError, errorMessage } from './errors.js';
import type { AppConfig } from './types.js';

const GameConfigSchema = z.object({
  game_name: z.string().min(1),
  git_repo: z.string().regex(/^[^/\s]+\/[^/\s]+$/, 'expected owner/name'),
  filters: z.array(z.string()),
});

const AppConfigSchema = z
  .object({
    games: z.array(GameConfigSchema),
  })
  .superRefine((cfg, ctx) => {
    const seen = new Set<string>();
    cfg.games.forEach((g, i) => {
      if (seen.has(g.game_name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['games', i, 'game_name'],
          message: `duplicate game_name '${g.game_name}'`,
        });
      }
      seen.add(g.game_name);
    });
  });

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
}

export function parseConfig(raw: unknown): AppConfig {
  const parsed = AppConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

// JSON is the primary format; .yml/.yaml files go through the YAML parser.
export function loadConfig(configPath: string): AppConfig {
  const resolved = path.resolve(configPath);
  if (!fs.existsSync(resolved)) {
    throw new ConfigError(`Missing config file at ${resolved}`);
  }
  const text = fs.readFileSync(resolved, 'utf8');
  let raw: unknown;
  try {
    raw = /\.ya?ml$/i.test(resolved) ? YAML.parse(text) : JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`Failed to load config: ${errorMessage(e)}`);
  }
  return parseConfig(raw);
}
