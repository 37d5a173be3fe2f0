import { request, type Dispatcher } from 'undici';

import { UpstreamError } from '../errors.js';

export type GetJsonOptions = {
  headers?: Record<string, string>;
  signal?: AbortSignal;
  dispatcher?: Dispatcher;
};

export type JsonGetter = (url: string, opts?: GetJsonOptions) => Promise<unknown>;

/**
 * GET a JSON document. Any transport error, non-2xx status or unparsable body
 * surfaces as UpstreamError.
 */
export async function getJson(url: string, opts: GetJsonOptions = {}): Promise<unknown> {
  let res: Dispatcher.ResponseData;
  try {
    res = await request(url, {
      method: 'GET',
      headers: { accept: 'application/json', ...opts.headers },
      signal: opts.signal,
      dispatcher: opts.dispatcher
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new UpstreamError(`request to ${new URL(url).host} failed: ${message}`, { cause: err });
  }

  if (res.statusCode < 200 || res.statusCode >= 300) {
    // Drain so the socket can be reused.
    await res.body.dump().catch(() => undefined);
    throw new UpstreamError(`HTTP_${res.statusCode} from ${new URL(url).host}`);
  }

  try {
    return await res.body.json();
  } catch (err) {
    throw new UpstreamError(`invalid JSON from ${new URL(url).host}`, { cause: err });
  }
}
