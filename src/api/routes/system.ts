import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { configuredSourceEntries } from '../../engine/pipeline.js';
import { loadSources } from '../../source/registry.js';

export function systemRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/health: basic health check plus snapshot age
  app.get('/health', (c) => {
    const snapshot = ctx.store.exists() ? ctx.store.load() : null;
    return c.json({
      status: 'ok',
      version: '0.1.0',
      uptime: process.uptime(),
      snapshot_generated_at: snapshot?.generatedAt ?? null,
    });
  });

  // GET /api/sources: configured sources as the registry validates them
  app.get('/sources', (c) => {
    const sources = loadSources(configuredSourceEntries(ctx.config));
    return c.json(sources.map((s) => ({ url: s.url, categories: s.categories })));
  });

  return app;
}
