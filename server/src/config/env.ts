import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

/**
 * Placeholder key used when FORVO_API_KEY is not set.
 * Forvo rejects it; deployments that enable Forvo must provide their own key.
 */
export const DEFAULT_FORVO_API_KEY = 'public-demo-key';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  FETCH_TIMEOUT_MS: z.coerce.number().int().min(100).max(120_000).default(10_000),
  MAX_WORD_LENGTH: z.coerce.number().int().min(1).max(1000).default(80),
  MAX_REDIRECT_DEPTH: z.coerce.number().int().min(0).max(10).default(3),
  SEARCH_MATURITY_MS: z.coerce.number().int().min(0).max(5000).default(200),
  FORVO_API_KEY: z.string().trim().optional(),
  FORVO_API_BASE: z.string().url().default('https://apifree.forvo.com'),
  // Absolute: article rewriting scheme-qualifies every root-relative src
  ASSET_BASE_URL: z.string().url().default('http://localhost:3000/assets'),
  SOURCES_CONFIG: z.string().optional(),
});

export interface AppConfig {
  port: number;
  fetchTimeoutMs: number;
  maxWordLength: number;
  maxRedirectDepth: number;
  searchMaturityMs: number;
  forvoApiKey: string;
  forvoApiBase: string;
  assetBaseUrl: string;
  sourcesConfigPath: string | undefined;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Parse configuration from an environment map (defaults to process.env).
 * Throws ConfigError listing every invalid variable.
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    fetchTimeoutMs: values.FETCH_TIMEOUT_MS,
    maxWordLength: values.MAX_WORD_LENGTH,
    maxRedirectDepth: values.MAX_REDIRECT_DEPTH,
    searchMaturityMs: values.SEARCH_MATURITY_MS,
    forvoApiKey: values.FORVO_API_KEY ? values.FORVO_API_KEY : DEFAULT_FORVO_API_KEY,
    forvoApiBase: values.FORVO_API_BASE.replace(/\/+$/, ''),
    assetBaseUrl: values.ASSET_BASE_URL.replace(/\/+$/, ''),
    sourcesConfigPath: values.SOURCES_CONFIG,
  };
}
