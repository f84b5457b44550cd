/**
 * News Calendar
 * Distance to the nearest qualifying economic event. Past and upcoming
 * events both count: the gate blocks on either side of a release.
 */

import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import type { NewsProximity } from '../types/analysis.js';
import type { NewsProvider } from '../types/collaborators.js';
import { createLogger } from './logger.js';

const logger = createLogger('NewsCalendar');

export const NewsEventSchema = z.object({
  title: z.string().min(1),
  country: z.string().min(1),
  impact: z.string().min(1),
  time: z.string().datetime({ offset: true }),
});

export type NewsEvent = z.infer<typeof NewsEventSchema>;

export interface NewsFilter {
  currency: string;
  impact: string;
}

const DEFAULT_FILTER: NewsFilter = {
  currency: 'USD',
  impact: 'High',
};

export const NO_NEWS: NewsProximity = {
  minutesToEvent: Infinity,
  eventName: 'None',
};

export function nearestHighImpactEvent(
  events: readonly NewsEvent[],
  now: Date,
  filter: Partial<NewsFilter> = {}
): NewsProximity {
  const cfg = { ...DEFAULT_FILTER, ...filter };
  let nearest: NewsProximity = NO_NEWS;

  for (const event of events) {
    if (event.country !== cfg.currency || event.impact !== cfg.impact) continue;

    const eventTime = Date.parse(event.time);
    if (Number.isNaN(eventTime)) continue;

    const minutes = Math.abs(eventTime - now.getTime()) / 60_000;
    if (nearest.minutesToEvent === null || minutes < nearest.minutesToEvent) {
      nearest = { minutesToEvent: minutes, eventName: event.title };
    }
  }

  return nearest;
}

/**
 * Serves a fixed calendar, e.g. one loaded from disk at startup
 */
export class StaticNewsProvider implements NewsProvider {
  constructor(
    private readonly events: readonly NewsEvent[],
    private readonly filter: Partial<NewsFilter> = {}
  ) {}

  async nearestHighImpact(now: Date): Promise<NewsProximity> {
    return nearestHighImpactEvent(this.events, now, this.filter);
  }
}

/**
 * Read a JSON array of events. A missing or invalid file yields an empty
 * calendar, which leaves the news gate open.
 */
export function loadNewsCalendar(path: string): NewsEvent[] {
  if (!existsSync(path)) {
    logger.warn(`News calendar not found at ${path}, news gate disabled`);
    return [];
  }

  try {
    const parsed = z.array(NewsEventSchema).safeParse(JSON.parse(readFileSync(path, 'utf-8')));
    if (!parsed.success) {
      logger.warn(`News calendar ${path} is invalid, news gate disabled`, {
        issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
      });
      return [];
    }
    logger.info(`Loaded ${parsed.data.length} calendar events from ${path}`);
    return parsed.data;
  } catch (error) {
    logger.warn(`Failed to read news calendar ${path}`, { error });
    return [];
  }
}
