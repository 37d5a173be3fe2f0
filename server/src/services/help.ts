import { TTL, type HelpEntry, type Query, type QueryHandler, type ServiceName, type ServiceResult } from './types.js';

const CATALOG: Record<ServiceName, Omit<HelpEntry, 'service'>> = {
  time: { description: 'get time for a city or country code', example: 'mumbai.time' },
  fx: { description: 'convert currency rates (25USD-EUR.fx, 99.5JPY-INR.fx)', example: '25USD-EUR.fx' },
  myip: { description: "get your host's requesting IP", example: 'myip' },
  weather: { description: 'get weather forecast for a city', example: 'berlin.weather' }
};

export function buildHelpEntries(enabled: readonly ServiceName[]): HelpEntry[] {
  return enabled.map((service) => ({ service, ...CATALOG[service] }));
}

/**
 * Static catalog answered on the `help` zone. Built once from the enabled services;
 * the answer never depends on the question.
 */
export class HelpService implements QueryHandler {
  private readonly result: ServiceResult;

  constructor(entries: readonly HelpEntry[], domain: string) {
    this.result = Object.freeze({
      records: entries.map((e) => ({ type: 'TXT' as const, data: [e.description, `dig ${e.example} @${domain}`] })),
      ttl: TTL.STATIC
    });
  }

  async handle(_query: Query): Promise<ServiceResult> {
    return this.result;
  }
}
