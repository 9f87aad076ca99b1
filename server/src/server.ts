import cors from '@fastify/cors';
import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import path from 'path';
import { fileURLToPath } from 'url';
import { historyPath, librariesPath, loadLibraries, loadSettings, parseLibrary, saveLibraries, type Settings } from './config.js';
import { detectMultiEpisodes, detectSpecialEpisodes, getEpisodeType } from './episodes.js';
import { errorMessage, isApiError, isErrorKind, type ApiError } from './errors.js';
import { loadHistory, recordBatch, rollbackBatch } from './history.js';
import { getLogLevel, getLogs, isLogThreshold, log, setLogLevel } from './logging.js';
import { clearCaches, createClients, MetadataService, type Clients, type LookupResult } from './metadata.js';
import { extractShowInfo } from './parse.js';
import { applyPlans, finalizePlan, planRename } from './renamer.js';
import { scanLibrary } from './scan.js';
import { TemplateError } from './templates.js';
import type { Library, RenamePlan } from './types.js';

export interface ServerDeps {
  settings: Settings;
  clients: Clients;
  /** Where libraries are stored; defaults to CONFIG_PATH. */
  librariesFile?: string;
  /** Where applied renames are recorded; defaults to HISTORY_PATH. */
  historyFile?: string;
  enableCors?: boolean;
}

type LibraryIdBody = { libraryId: string };
type ScanBody = LibraryIdBody & { offset?: number; limit?: number };
type PreviewBody = LibraryIdBody & { lookup?: boolean };
type RenameBody = { plans: RenamePlan[]; libraryId?: string };
type RollbackBody = { batchId?: number };
type VerifyQuery = { artist: string; album?: string; track?: string };

const libraryIdSchema = {
  type: 'object',
  required: ['libraryId'],
  properties: { libraryId: { type: 'string', minLength: 1 } },
} as const;

const planSchema = {
  type: 'object',
  required: ['from', 'to', 'action', 'meta'],
  properties: {
    from: { type: 'string', minLength: 1 },
    to: { type: 'string', minLength: 1 },
    action: { enum: ['hardlink', 'rename'] },
    dryRun: { type: 'boolean' },
    subtitles: {
      type: 'array',
      items: {
        type: 'object',
        required: ['from', 'to', 'language', 'forced', 'sdh'],
        properties: {
          from: { type: 'string', minLength: 1 },
          to: { type: 'string' },
          language: { type: 'string' },
          forced: { type: 'boolean' },
          sdh: { type: 'boolean' },
        },
      },
    },
    meta: { type: 'object', required: ['type', 'title'] },
  },
} as const;

/** HTTP status for a catalog failure. Anything not caused by the caller is a bad gateway. */
export function statusForApiError(err: ApiError): number {
  if (isErrorKind(err, 'NotFound')) return 404;
  if (isErrorKind(err, 'RateLimitExceeded')) return 429;
  if (isErrorKind(err, 'AuthenticationFailure')) return 401;
  if (isErrorKind(err, 'ClientConfigurationFailure')) return 400;
  return 502;
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });
  const librariesFile = deps.librariesFile ?? librariesPath();
  const historyFile = deps.historyFile ?? historyPath();
  const metadata = new MetadataService(deps.clients, deps.settings);

  if (deps.enableCors) {
    await app.register(cors, { origin: true });
    log('info', 'CORS enabled');
  }

  app.setErrorHandler((error: FastifyError, req, reply) => {
    if (error.validation) {
      return reply.status(400).send({ error: error.message });
    }
    if (isApiError(error)) {
      const status = statusForApiError(error);
      log(status === 502 ? 'error' : 'warn', `${req.method} ${req.url} failed: ${error.kind} ${error.message}`);
      if (error.retryAfter !== undefined) reply.header('Retry-After', String(error.retryAfter));
      return reply.status(status).send({ error: error.message, kind: error.kind, vendor: error.vendor });
    }
    if (error instanceof TemplateError) {
      return reply.status(400).send({ error: error.message, template: error.template });
    }
    log('error', `${req.method} ${req.url} failed: ${errorMessage(error)}`);
    return reply.status(500).send({ error: 'Internal error' });
  });

  function findLibrary(id: string): Library | undefined {
    return loadLibraries(librariesFile).find(l => l.id === id);
  }

  app.get('/health', async () => ({ ok: true, uptime: process.uptime() }));

  app.get('/api/libraries', async () => {
    const libs = loadLibraries(librariesFile);
    log('info', `Returned ${libs.length} libraries`);
    return libs;
  });

  app.post<{ Body: unknown[] }>('/api/libraries', { schema: { body: { type: 'array' } } }, async (req, reply) => {
    const libs: Library[] = [];
    for (const entry of req.body) {
      const lib = parseLibrary(entry);
      if (!lib) return reply.status(400).send({ error: 'invalid library entry' });
      libs.push(lib);
    }
    saveLibraries(libs, librariesFile);
    log('info', `Libraries saved: ${libs.map(l => `${l.name}(${l.type})`).join(', ')}`);
    return { ok: true };
  });

  app.delete<{ Params: { id: string } }>('/api/libraries/:id', async req => {
    const next = loadLibraries(librariesFile).filter(l => l.id !== req.params.id);
    saveLibraries(next, librariesFile);
    log('info', `Library deleted: ${req.params.id}`);
    return { ok: true, libraries: next };
  });

  app.post<{ Body: { filename: string } }>('/api/detect', {
    schema: {
      body: { type: 'object', required: ['filename'], properties: { filename: { type: 'string', minLength: 1 } } },
    },
  }, async req => {
    const { filename } = req.body;
    return {
      episodes: detectMultiEpisodes(filename),
      special: detectSpecialEpisodes(filename),
      episodeType: getEpisodeType(filename),
      info: extractShowInfo(filename)?.toRecord() ?? null,
    };
  });

  app.post<{ Body: ScanBody }>('/api/scan', {
    schema: {
      body: {
        ...libraryIdSchema,
        properties: {
          ...libraryIdSchema.properties,
          offset: { type: 'integer', minimum: 0 },
          limit: { type: 'integer', minimum: 1, maximum: 500 },
        },
      },
    },
  }, async (req, reply) => {
    const lib = findLibrary(req.body.libraryId);
    if (!lib) {
      log('warn', `Scan requested for unknown library ${req.body.libraryId}`);
      return reply.status(404).send({ error: 'Library not found' });
    }
    return { items: await scanLibrary(lib, { offset: req.body.offset, limit: req.body.limit }) };
  });

  app.post<{ Body: PreviewBody }>('/api/preview', {
    schema: {
      body: { ...libraryIdSchema, properties: { ...libraryIdSchema.properties, lookup: { type: 'boolean' } } },
    },
  }, async (req, reply) => {
    const lib = findLibrary(req.body.libraryId);
    if (!lib) return reply.status(404).send({ error: 'Library not found' });

    const plans: RenamePlan[] = [];
    // one lookup at a time: each client's cache and limiter are per instance
    for (const item of await scanLibrary(lib)) {
      if (!item.inferred) continue;
      const found: LookupResult = req.body.lookup ? await metadata.lookupOrSkip(item.inferred, lib.type) : { candidate: null };
      const plan = planRename(item, lib, found.candidate, { templates: deps.settings.templates, episodeTitle: found.episodeTitle });
      if (plan) plans.push(finalizePlan(plan));
    }
    log('info', `Preview for ${lib.name}: ${plans.length} plan(s)`);
    return { plans };
  });

  app.post<{ Body: RenameBody }>('/api/rename', {
    schema: {
      body: {
        type: 'object',
        required: ['plans'],
        properties: { plans: { type: 'array', items: planSchema }, libraryId: { type: 'string' } },
      },
    },
  }, async req => {
    const lib = req.body.libraryId ? findLibrary(req.body.libraryId) : undefined;
    const plans = req.body.plans.map(p => ({ ...p, dryRun: false }));
    const { results } = applyPlans(plans, lib?.allowCopyFallback ?? false);
    log('info', `Renamed ${results.length} file(s)`);
    const batch = results.length ? recordBatch(results, { libraryId: lib?.id, file: historyFile }) : null;
    return { results, batchId: batch?.id ?? null };
  });

  app.get('/api/history', async () => ({ batches: loadHistory(historyFile) }));

  app.post<{ Body: RollbackBody }>('/api/rollback', {
    schema: { body: { type: 'object', properties: { batchId: { type: 'integer', minimum: 1 } } } },
  }, async (req, reply) => {
    const id = req.body.batchId;
    const batch = rollbackBatch(id, historyFile);
    if (!batch) {
      return reply.status(404).send({ error: id === undefined ? 'No completed batch to roll back' : `No completed batch ${id}` });
    }
    return { ok: !batch.failed?.length, batch };
  });

  app.get<{ Querystring: VerifyQuery }>('/api/music/verify', {
    schema: {
      querystring: {
        type: 'object',
        required: ['artist'],
        properties: { artist: { type: 'string', minLength: 1 }, album: { type: 'string' }, track: { type: 'string' } },
      },
    },
  }, async req => {
    const { artist, album, track } = req.query;
    return deps.clients.musicbrainz.verifyMusicFile(artist, album || undefined, track || undefined);
  });

  app.delete('/api/cache', async () => {
    clearCaches(deps.clients);
    return { ok: true };
  });

  app.get<{ Querystring: { since?: number } }>('/api/logs', {
    schema: { querystring: { type: 'object', properties: { since: { type: 'integer', minimum: 0 } } } },
  }, async req => getLogs(req.query.since));

  app.get('/api/loglevel', async () => ({ level: getLogLevel() }));

  app.post<{ Body: { level: string } }>('/api/loglevel', {
    schema: { body: { type: 'object', required: ['level'], properties: { level: { type: 'string' } } } },
  }, async (req, reply) => {
    const level = req.body.level.toLowerCase();
    if (!isLogThreshold(level)) return reply.status(400).send({ error: 'invalid level' });
    setLogLevel(level);
    return { ok: true, level };
  });

  return app;
}

export async function bootstrap() {
  const settings = loadSettings();
  const app = await buildServer({
    settings,
    clients: createClients(settings),
    enableCors: process.env.ENABLE_CORS === '1',
  });

  // Make sure the libraries file exists so the UI has somewhere to write.
  saveLibraries(loadLibraries());

  const shutdown = (signal: string) => {
    log('info', `${signal} received, closing server`);
    app.close().then(() => process.exit(0), err => {
      log('error', `Shutdown failed: ${errorMessage(err)}`);
      process.exit(1);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await app.listen({ port: settings.port, host: '0.0.0.0' });
  log('info', `Server listening on ${settings.port}`);
  return app;
}

const entry = process.argv[1];
if (entry && path.resolve(entry) === fileURLToPath(import.meta.url)) {
  bootstrap().catch(err => {
    log('error', `Startup failed: ${errorMessage(err)}`);
    process.exit(1);
  });
}
