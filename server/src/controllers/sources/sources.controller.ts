/**
 * Dictionary Sources Controller
 *
 * GET /sources                         - enabled sources
 * GET /sources/:sourceId/article       - article for ?word= (and ?alt= spellings)
 * GET /sources/:sourceId/prefix        - prefix matches for ?word=
 *
 * A lookup still running when the client disconnects is cancelled.
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import type { ZodType, ZodTypeDef } from 'zod';
import { createSourceNotFoundError, createValidationError } from '../../middleware/error.middleware.js';
import type { DictionarySource } from '../../services/sources/source.types.js';
import type { SourceRegistry } from '../../services/sources/source-registry.js';
import { articleQuerySchema, prefixQuerySchema } from './sources.validation.js';

export const NO_DEFINITION_MESSAGE = 'No definition found';

function validateQuery<T>(schema: ZodType<T, ZodTypeDef, unknown>, req: Request): T {
  const validation = schema.safeParse(req.query);
  if (!validation.success) {
    throw createValidationError('Invalid query parameters', validation.error.flatten().fieldErrors);
  }
  return validation.data;
}

function requireSource(registry: SourceRegistry, req: Request): DictionarySource {
  const { sourceId } = req.params;
  const source = registry.get(sourceId);
  if (!source) {
    throw createSourceNotFoundError(sourceId);
  }
  return source;
}

/** Run `onClose` if the connection goes away before a response was written. */
function onClientGone(res: Response, onClose: () => void): void {
  res.on('close', () => {
    if (!res.writableEnded) {
      onClose();
    }
  });
}

export function createSourcesRouter(registry: SourceRegistry): Router {
  const router = Router();

  router.get('/sources', (_req: Request, res: Response) => {
    res.json({ sources: registry.summaries() });
  });

  router.get('/sources/:sourceId/article', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const source = requireSource(registry, req);
      const { word, alt } = validateQuery(articleQuerySchema, req);

      const lookup = source.fetchArticle(word, alt);
      onClientGone(res, () => lookup.cancel());
      await lookup.whenFinished();

      if (lookup.getFinishReason() === 'cancelled') {
        req.log.info({ event: 'article_request_abandoned', sourceId: source.id, word }, '[Sources] Client went away');
        return;
      }

      if (lookup.hasAnyData()) {
        res.json({ sourceId: source.id, word, found: true, html: lookup.text() });
        return;
      }

      const error = lookup.errorMessage();
      res.json({
        sourceId: source.id,
        word,
        found: false,
        message: NO_DEFINITION_MESSAGE,
        ...(error ? { error } : {}),
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/sources/:sourceId/prefix', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const source = requireSource(registry, req);
      const { word } = validateQuery(prefixQuerySchema, req);

      const search = source.searchPrefix(word);
      onClientGone(res, () => search.cancel());
      await search.whenFinished();

      if (res.writableEnded || res.destroyed) {
        return;
      }

      const error = search.errorMessage();
      res.json({
        sourceId: source.id,
        word,
        matches: search.matches(),
        ...(error ? { error } : {}),
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
