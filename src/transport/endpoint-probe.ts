import { TIMEOUTS } from '../constants.js';
import { getErrorMessage } from '../errors/types.js';
import { getLogger } from '../logging/logger.js';
import { USER_AGENT } from '../version.js';

export type UrlTransport = 'http' | 'sse';

export interface ProbeOptions {
  headers?: Record<string, string>;
  /** Timeout for the HEAD request (default: 5000) */
  headTimeout?: number;
  /** Timeout for the GET request (default: 3000) */
  getTimeout?: number;
}

const logger = getLogger('endpoint-probe');

function isEventStream(response: Response): boolean {
  return (response.headers.get('content-type') ?? '').toLowerCase().includes('text/event-stream');
}

class ProbeTimeout extends Error {
  constructor() {
    super('probe timed out');
    this.name = 'ProbeTimeout';
  }
}

/**
 * Issue one probe request and hand back only its status and headers.
 * The body is never read; the request is aborted once headers arrive.
 */
async function probe(
  url: string,
  method: 'HEAD' | 'GET',
  headers: Record<string, string>,
  timeoutMs: number
): Promise<Response> {
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  try {
    const response = await fetch(url, {
      method,
      headers: { 'User-Agent': USER_AGENT, ...headers },
      signal: controller.signal,
    });
    return response;
  } catch (error) {
    if (timedOut) {
      throw new ProbeTimeout();
    }
    throw error;
  } finally {
    clearTimeout(timer);
    // a streaming body would otherwise keep the connection open
    controller.abort();
  }
}

/**
 * Decide whether a URL speaks plain HTTP or Server-Sent Events.
 *
 * A 406 or an event-stream content type on HEAD means SSE. Otherwise a
 * short GET decides: event-stream or 406 means SSE, and a GET that never
 * answers in time is taken for a stream. Any other failure, HEAD timeouts
 * included, falls back to plain HTTP.
 */
export async function detectUrlTransport(url: string, options: ProbeOptions = {}): Promise<UrlTransport> {
  const headers = options.headers ?? {};
  logger.info({ url }, 'Probing endpoint type');

  try {
    const head = await probe(url, 'HEAD', headers, options.headTimeout ?? TIMEOUTS.TRANSPORT_PROBE);
    if (head.status === 406 || isEventStream(head)) {
      logger.info({ status: head.status }, 'Detected SSE endpoint from HEAD');
      return 'sse';
    }
  } catch (error) {
    logger.warn({ url, error: getErrorMessage(error) }, 'Endpoint probe failed, defaulting to HTTP');
    return 'http';
  }

  try {
    const get = await probe(url, 'GET', headers, options.getTimeout ?? TIMEOUTS.TRANSPORT_PROBE_GET);
    if (get.status === 406 || isEventStream(get)) {
      logger.info({ status: get.status }, 'Detected SSE endpoint from GET');
      return 'sse';
    }
    logger.info({ status: get.status }, 'Detected plain HTTP endpoint');
    return 'http';
  } catch (error) {
    if (error instanceof ProbeTimeout) {
      logger.warn({ url }, 'Probe timed out, assuming an event stream');
      return 'sse';
    }
    logger.warn({ url, error: getErrorMessage(error) }, 'Endpoint probe failed, defaulting to HTTP');
    return 'http';
  }
}
