import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import {
  StaticNewsProvider,
  loadNewsCalendar,
  nearestHighImpactEvent,
  type NewsEvent,
} from '../newsCalendar.js';

const NOW = new Date('2026-01-07T13:00:00Z');

const EVENTS: NewsEvent[] = [
  { title: 'ECB Press Conference', country: 'EUR', impact: 'High', time: '2026-01-07T13:05:00Z' },
  { title: 'Unemployment Claims', country: 'USD', impact: 'Medium', time: '2026-01-07T13:02:00Z' },
  { title: 'Non-Farm Payrolls', country: 'USD', impact: 'High', time: '2026-01-07T13:30:00Z' },
  { title: 'Retail Sales', country: 'USD', impact: 'High', time: '2026-01-07T12:50:00Z' },
];

describe('nearestHighImpactEvent', () => {
  it('picks the closest matching event in either direction', () => {
    expect(nearestHighImpactEvent(EVENTS, NOW)).toEqual({ minutesToEvent: 10, eventName: 'Retail Sales' });
  });

  it('filters by currency and impact', () => {
    expect(nearestHighImpactEvent(EVENTS, NOW, { currency: 'EUR' })).toEqual({
      minutesToEvent: 5,
      eventName: 'ECB Press Conference',
    });
    expect(nearestHighImpactEvent(EVENTS, NOW, { impact: 'Medium' }).eventName).toBe('Unemployment Claims');
  });

  it('reports an infinite distance when nothing qualifies', () => {
    expect(nearestHighImpactEvent([], NOW)).toEqual({ minutesToEvent: Infinity, eventName: 'None' });
  });
});

describe('StaticNewsProvider', () => {
  it('serves proximity from its fixed calendar', async () => {
    const provider = new StaticNewsProvider(EVENTS);
    await expect(provider.nearestHighImpact(new Date('2026-01-07T13:20:00Z'))).resolves.toEqual({
      minutesToEvent: 10,
      eventName: 'Non-Farm Payrolls',
    });
  });
});

describe('loadNewsCalendar', () => {
  const fixture = (name: string): string => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

  it('reads a JSON calendar', () => {
    const events = loadNewsCalendar(fixture('calendar.json'));
    expect(events.map(e => e.title)).toEqual(['CPI m/m', 'FOMC Statement']);
  });

  it('returns an empty calendar for a missing file', () => {
    expect(loadNewsCalendar(fixture('missing.json'))).toEqual([]);
  });
});
