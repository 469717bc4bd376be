import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { isCalendarDate } from '../../shared/calendarDate.js';
import { buildAgenda } from '../../snapshot/view.js';

const calendarDate = z.string().refine(isCalendarDate, 'Expected YYYY-MM-DD');

const EventsQuerySchema = z.object({
  from: calendarDate.optional(),
  to: calendarDate.optional(),
  category: z.string().min(1).optional(),
  offset: z.coerce.number().int().nonnegative().optional(),
  limit: z.coerce.number().int().positive().max(366).optional(),
});

export function eventRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/events: day groups from the latest snapshot
  app.get('/events', (c) => {
    const query = EventsQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return c.json({ error: 'Invalid query', errors: query.error.flatten().fieldErrors }, 400);
    }

    const snapshot = ctx.store.load();
    const agenda = buildAgenda(snapshot, { today: ctx.today(), ...query.data });
    return c.json({
      generated_at: agenda.generatedAt,
      total_days: agenda.totalDays,
      offset: agenda.offset,
      has_more: agenda.hasMore,
      days: agenda.days.map((day) => ({
        date: day.date,
        label: day.label,
        events: day.events.map((e) => ({
          title: e.title,
          link: e.link,
          place: e.place,
          categories: e.categories,
        })),
      })),
    });
  });

  return app;
}
