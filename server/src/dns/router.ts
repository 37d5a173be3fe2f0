import { toServiceError } from '../errors.js';
import type { Outcome, Query, QueryHandler } from '../services/types.js';

export const HELP_ZONE = 'help';

function normalizeZone(zone: string): string {
  const z = String(zone ?? '').trim().toLowerCase();
  return z.endsWith('.') ? z.slice(0, -1) : z;
}

/**
 * Exact, case-insensitive match of the top-level label to a handler. Unregistered
 * zones produce an `unknown_zone` outcome without running any service code.
 */
export class ZoneRouter {
  private readonly table = new Map<string, QueryHandler>();

  register(zone: string, handler: QueryHandler): void {
    const key = normalizeZone(zone);
    if (!key || key.includes('.')) throw new Error(`invalid zone label "${zone}"`);
    if (this.table.has(key)) throw new Error(`zone "${key}" already registered`);
    this.table.set(key, handler);
  }

  route(query: Pick<Query, 'zone'>): QueryHandler | null {
    return this.table.get(normalizeZone(query.zone)) ?? null;
  }

  zones(): string[] {
    return Array.from(this.table.keys()).sort();
  }

  /** Runs the routed handler; never rejects. */
  async dispatch(query: Query): Promise<Outcome> {
    const handler = this.route(query);
    if (!handler) return { status: 'unknown_zone' };

    try {
      return { status: 'answer', result: await handler.handle(query) };
    } catch (err) {
      return { status: 'error', error: toServiceError(err) };
    }
  }
}
