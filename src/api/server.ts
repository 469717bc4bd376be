import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { Config } from '../shared/config.js';
import { EventboardError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { loadConfig } from '../shared/config.js';
import { resolvePath } from '../shared/utils.js';
import { todayIn, type CalendarDate } from '../shared/calendarDate.js';
import { SnapshotStore } from '../snapshot/store.js';
import { eventRoutes } from './routes/events.js';
import { systemRoutes } from './routes/system.js';

export interface AppContext {
  config: Config;
  store: SnapshotStore;
  /** Current date for today/tomorrow labels. */
  today: () => CalendarDate;
}

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  app.use('*', cors());

  app.route('/api', eventRoutes(ctx));
  app.route('/api', systemRoutes(ctx));

  app.onError((err, c) => {
    if (err instanceof EventboardError) {
      return c.json({ error: err.message, code: err.code, details: err.details }, errorCodeToHttpStatus(err.code));
    }
    logger.error({ error: err.message, stack: err.stack }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  return app;
}

function errorCodeToHttpStatus(code: string): ContentfulStatusCode {
  switch (code) {
    case 'CONFIG_ERROR':
      return 400;
    case 'SNAPSHOT_MISSING':
      return 404;
    case 'SNAPSHOT_CORRUPT':
      return 500;
    default:
      return 500;
  }
}

export async function startServer(opts: { port?: number; configPath?: string } = {}): Promise<void> {
  const config = await loadConfig({ configPath: opts.configPath });
  const port = opts.port ?? config.server.port;
  const host = config.server.host;

  const app = createApp({
    config,
    store: new SnapshotStore(resolvePath(config.snapshot.path)),
    today: () => todayIn(config.timezone),
  });

  logger.info({ port, host }, 'Starting eventboard server');

  const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    logger.info({ url: `http://${host}:${info.port}/api/events` }, 'Server listening');
  });

  const shutdown = (): void => {
    logger.info('Shutting down...');
    server.close();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
