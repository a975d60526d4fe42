import cors from 'cors';
import express, { NextFunction, Request, Response, Router } from 'express';
import { z } from 'zod';
import { WikiCacheContext } from '../CacheContext';
import { InvalidArgumentError, isWikiCacheError, WikiCacheErrorCode } from '../errors';
import { CorsConfig } from '../Options';
import { clearTargetOf } from '../retrieval/RetrievalOrchestrator';
import { VERSION } from '../version';
import LibLogger from '../logger';

const logger = LibLogger.get('http');

export const API_PREFIX = '/api/v1/wiki';

const STATUS_BY_CODE: Record<WikiCacheErrorCode, number> = {
  NOT_FOUND: 404,
  INVALID_ARGUMENT: 400,
  UPSTREAM_UNAVAILABLE: 502,
  CACHE_UNAVAILABLE: 503,
  CODEC: 500
};

const IntParam = z.coerce.number().int();

const BooleanParam = z.enum(['true', 'false', '1', '0']).transform(value => value === 'true' || value === '1');

/** `?categories=a,b` and `?categories=a&categories=b` alike */
const ListParam = z
  .union([z.string(), z.array(z.string())])
  .transform(value => (Array.isArray(value) ? value : [value])
    .flatMap(entry => entry.split(','))
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0));

const CategoryQuery = z.object({
  limit: IntParam.optional(),
  offset: IntParam.optional(),
  refresh: BooleanParam.optional()
});

const ItemQuery = z.object({
  category: z.string().min(1).optional()
});

const SearchQuery = z.object({
  q: z.string({ required_error: 'q is required' }),
  categories: ListParam.optional(),
  limit: IntParam.optional(),
  offset: IntParam.optional()
});

const SuggestQuery = z.object({
  q: z.string({ required_error: 'q is required' }),
  limit: IntParam.optional()
});

const ClearQuery = z.object({
  categories: ListParam.optional()
});

const parseQuery = <T extends z.ZodTypeAny>(schema: T, query: unknown): z.output<T> => {
  const result = schema.safeParse(query);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new InvalidArgumentError(`Invalid query parameter ${where}${issue?.message ?? 'unknown issue'}`);
  }
  return result.data;
};

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

/** Forward rejections of an async handler to the error middleware. */
const route = (handler: AsyncRoute) => (req: Request, res: Response, next: NextFunction): void => {
  handler(req, res).catch(next);
};

export const createRouter = (context: WikiCacheContext): Router => {
  const { orchestrator, scheduler, search } = context;
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      name: 'wiki-metadata-cache',
      version: VERSION,
      description: 'Cached metadata of wiki pages',
      endpoints: {
        status: `${API_PREFIX}/status`,
        categories: `${API_PREFIX}/categories`,
        categoryItems: `${API_PREFIX}/categories/{key}`,
        item: `${API_PREFIX}/items/{title}`,
        search: `${API_PREFIX}/search?q={query}`,
        suggest: `${API_PREFIX}/suggest?q={prefix}`,
        refresh: `${API_PREFIX}/refresh/{key|all}`,
        cache: `${API_PREFIX}/cache`
      }
    });
  });

  router.get('/status', route(async (_req, res) => {
    res.json(await orchestrator.status());
  }));

  router.get('/categories', route(async (_req, res) => {
    res.json(await orchestrator.listCategories());
  }));

  router.get('/categories/:key', route(async (req, res) => {
    const query = parseQuery(CategoryQuery, req.query);
    const result = await orchestrator.getCategory(req.params.key ?? '', {
      forceRefresh: query.refresh ?? false,
      ...(query.limit !== undefined ? { limit: query.limit } : {}),
      ...(query.offset !== undefined ? { offset: query.offset } : {})
    });

    if (result.status === 'pending') {
      res.status(202).set('Retry-After', String(result.retryAfterSeconds)).json({
        ...result,
        message: `Data for category "${result.category}" is being fetched, retry later`
      });
      return;
    }
    res.json(result);
  }));

  router.get('/items/:title', route(async (req, res) => {
    const query = parseQuery(ItemQuery, req.query);
    res.json(await orchestrator.getItem(req.params.title ?? '', query.category ? { category: query.category } : {}));
  }));

  router.get('/search', route(async (req, res) => {
    const query = parseQuery(SearchQuery, req.query);
    res.json(await search.search(query.q, {
      ...(query.categories !== undefined ? { categories: query.categories } : {}),
      ...(query.limit !== undefined ? { limit: query.limit } : {}),
      ...(query.offset !== undefined ? { offset: query.offset } : {})
    }));
  }));

  router.get('/suggest', route(async (req, res) => {
    const query = parseQuery(SuggestQuery, req.query);
    res.json({ query: query.q, suggestions: await search.suggest(query.q, query.limit) });
  }));

  router.post('/refresh/:key', (req, res, next) => {
    try {
      const key = req.params.key ?? '';
      if (key === 'all') {
        res.status(202).json({ tasks: scheduler.refreshAll() });
      } else {
        res.status(202).json({ task: scheduler.refresh(key) });
      }
    } catch (error) {
      next(error);
    }
  });

  router.delete('/cache', route(async (req, res) => {
    const query = parseQuery(ClearQuery, req.query);
    res.json(await orchestrator.clearCache(clearTargetOf(query.categories)));
  }));

  return router;
};

const hasHttpStatus = (error: unknown): error is { status: number; message?: unknown } =>
  typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number';

/**
 * Maps service errors onto HTTP statuses; anything else is a generic 500.
 */
export const errorHandler = (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
  if (isWikiCacheError(error) && error.code !== 'CODEC') {
    const status = STATUS_BY_CODE[error.code];
    logger.debug('Request failed', { method: req.method, path: req.path, status, error: error.message });
    res.status(status).json({ error: error.code, message: error.message });
    return;
  }

  if (hasHttpStatus(error) && error.status >= 400 && error.status < 500) {
    res.status(error.status).json({ error: 'BAD_REQUEST', message: 'Malformed request' });
    return;
  }

  logger.error('Unhandled request error', { method: req.method, path: req.path, error });
  res.status(500).json({ error: 'INTERNAL', message: 'Internal server error' });
};

/** `*` among the origins reflects any origin */
export const corsMiddleware = (config: CorsConfig): express.RequestHandler =>
  cors({
    origin: config.origins.includes('*') ? true : config.origins,
    credentials: true
  });

export const createApp = (context: WikiCacheContext): express.Express => {
  const app = express();
  app.disable('x-powered-by');
  app.use(corsMiddleware(context.options.cors));

  app.use((req, _res, next) => {
    logger.trace('Request', { method: req.method, path: req.path });
    next();
  });

  app.use(API_PREFIX, createRouter(context));

  app.use((req, res) => {
    res.status(404).json({ error: 'NOT_FOUND', message: `No route for ${req.method} ${req.path}` });
  });
  app.use(errorHandler);

  return app;
};
