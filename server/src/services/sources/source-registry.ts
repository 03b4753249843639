/**
 * Source Registry
 * Enabled dictionary sources, in configuration order (MediaWiki first, then Forvo).
 */

import type { SourcesConfig } from '../../config/sources.config.js';
import { logger as rootLogger } from '../../lib/logger/structured-logger.js';
import { ForvoSource, normalizeLanguageCodes } from './forvo/forvo.source.js';
import { MediaWikiSource } from './mediawiki/mediawiki.source.js';
import { summarizeSource, type DictionarySource, type SourceDependencies, type SourceSummary } from './source.types.js';

export interface ForvoDefaults {
  apiKey: string;
  apiBase: string;
}

export class SourceRegistry {
  private readonly byId = new Map<string, DictionarySource>();

  constructor(sources: readonly DictionarySource[]) {
    for (const source of sources) {
      if (this.byId.has(source.id)) {
        throw new Error(`Duplicate source id: ${source.id}`);
      }
      this.byId.set(source.id, source);
    }
  }

  get(id: string): DictionarySource | undefined {
    return this.byId.get(id);
  }

  list(): DictionarySource[] {
    return [...this.byId.values()];
  }

  summaries(): SourceSummary[] {
    return this.list().map(summarizeSource);
  }

  size(): number {
    return this.byId.size;
  }
}

export function buildSourceRegistry(
  config: SourcesConfig,
  deps: SourceDependencies,
  forvoDefaults: ForvoDefaults
): SourceRegistry {
  const log = deps.log ?? rootLogger;
  const sources: DictionarySource[] = [];

  for (const entry of config.mediawikis) {
    if (!entry.enabled) {
      continue;
    }
    sources.push(new MediaWikiSource(entry, deps));
  }

  const { forvo } = config;
  if (forvo.enable) {
    const apiKey = forvo.apiKey.trim() || forvoDefaults.apiKey;
    for (const languageCode of normalizeLanguageCodes(forvo.languageCodes)) {
      sources.push(new ForvoSource({ languageCode, apiKey, apiBase: forvoDefaults.apiBase }, deps));
    }
  }

  const registry = new SourceRegistry(sources);
  log.info(
    {
      event: 'sources_loaded',
      count: registry.size(),
      sources: sources.map(source => ({ id: source.id, kind: source.kind })),
    },
    '[Sources] Dictionary sources ready'
  );
  return registry;
}
