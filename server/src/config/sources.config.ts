/**
 * Dictionary sources configuration
 * Loaded from server/config/sources.json, or the file named by SOURCES_CONFIG.
 */

import { readFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigError } from './env.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const DEFAULT_SOURCES_CONFIG_PATH = join(__dirname, '..', '..', 'config', 'sources.json');

const mediaWikiEntrySchema = z.object({
  id: z.string().trim().min(1),
  name: z.string().trim().min(1),
  url: z.string().trim().min(1),
  icon: z.string().optional(),
  enabled: z.boolean().default(true),
  articlePath: z.string().startsWith('/').endsWith('/').optional(),
});

const forvoSchema = z.object({
  enable: z.boolean().default(false),
  /** Empty: use FORVO_API_KEY. */
  apiKey: z.string().default(''),
  languageCodes: z.union([z.string(), z.array(z.string())]).default(''),
});

export const sourcesConfigSchema = z.object({
  mediawikis: z.array(mediaWikiEntrySchema).default([]),
  forvo: forvoSchema.default({}),
});

export type MediaWikiEntry = z.infer<typeof mediaWikiEntrySchema>;
export type ForvoSettings = z.infer<typeof forvoSchema>;
export type SourcesConfig = z.infer<typeof sourcesConfigSchema>;

export function parseSourcesConfig(raw: unknown): SourcesConfig {
  const parsed = sourcesConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid sources configuration: ${problems}`);
  }

  const ids = new Set<string>();
  for (const entry of parsed.data.mediawikis) {
    if (ids.has(entry.id)) {
      throw new ConfigError(`Invalid sources configuration: duplicate source id "${entry.id}"`);
    }
    ids.add(entry.id);
  }
  return parsed.data;
}

export function loadSourcesConfig(path: string = DEFAULT_SOURCES_CONFIG_PATH): SourcesConfig {
  const fullPath = resolve(path);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(fullPath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read sources configuration ${fullPath}: ${reason}`);
  }
  return parseSourcesConfig(raw);
}
