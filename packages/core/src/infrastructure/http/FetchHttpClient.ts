import type { HttpRequest, HttpResponse } from '../../domain/model/HttpExchange.js';
import type { HttpClient } from '../../domain/ports/HttpClient.js';
import { TransportError } from '../../domain/errors/TransportError.js';
import { abortMessage } from '../../domain/services/cancellation.js';

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT']);

export interface FetchHttpClientOptions {
  /** Base URL that request paths are resolved against (e.g. `https://api.example.com/v1`). */
  readonly baseUrl: string;
  /** Headers sent with every request. */
  readonly headers?: Readonly<Record<string, string>>;
  /** Request timeout in milliseconds. Default: `30000` (30 seconds). */
  readonly timeout?: number;
}

/**
 * HTTP client backed by the Fetch API.
 *
 * Sends JSON bodies and returns the raw response for every status. Requires a
 * runtime with global `fetch` (Node.js >= 18).
 */
export class FetchHttpClient implements HttpClient {
  private readonly baseUrl: string;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly timeout: number;

  constructor(options: FetchHttpClientOptions) {
    this.baseUrl = options.baseUrl.endsWith('/') ? options.baseUrl : `${options.baseUrl}/`;
    this.headers = options.headers ?? {};
    this.timeout = options.timeout ?? 30000;
  }

  async send(request: HttpRequest, signal?: AbortSignal): Promise<HttpResponse> {
    const url = this.resolveUrl(request.path);
    const controller = new AbortController();
    let timedOut = false;

    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeout);
    const onAbort = (): void => {
      controller.abort();
    };

    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    try {
      const response = await fetch(url, {
        method: request.method,
        headers: {
          Accept: 'application/json',
          ...(request.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
          ...this.headers,
          ...request.headers,
        },
        body: request.body !== undefined ? JSON.stringify(request.body) : undefined,
        signal: controller.signal,
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return {
        status: response.status,
        headers,
        body: new Uint8Array(await response.arrayBuffer()),
      };
    } catch (error) {
      if (timedOut) {
        throw new TransportError('timeout', `Request to ${url} timed out after ${String(this.timeout)}ms`, {
          cause: error,
        });
      }
      if (signal?.aborted) {
        throw new TransportError('aborted', abortMessage(signal), { cause: error });
      }
      throw this.classify(error, url);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private resolveUrl(path: string): string {
    return new URL(path.replace(/^\/+/, ''), this.baseUrl).toString();
  }

  private classify(error: unknown, url: string): TransportError {
    const code = findErrorCode(error);
    const message = error instanceof Error ? error.message : String(error);

    if (code === 'ECONNREFUSED') {
      return new TransportError('connection-refused', `Connection refused: ${url}`, { cause: error });
    }
    if (code !== undefined && TIMEOUT_CODES.has(code)) {
      return new TransportError('timeout', `Request to ${url} timed out (${code})`, { cause: error });
    }
    return new TransportError('network', code !== undefined ? `${message} (${code})` : message, { cause: error });
  }
}

/** Fetch wraps socket errors: the system error code sits on the error's cause chain. */
function findErrorCode(error: unknown): string | undefined {
  let current: unknown = error;

  for (let depth = 0; depth < 4 && current instanceof Error; depth++) {
    if ('code' in current && typeof current.code === 'string') return current.code;
    if (current instanceof AggregateError) {
      const nested = current.errors.map(findErrorCode).find((code) => code !== undefined);
      if (nested !== undefined) return nested;
    }
    current = current.cause;
  }

  return undefined;
}
