import type { HttpMethod, HttpRequest, HttpResponse } from '../../domain/model/HttpExchange.js';
import { jsonResponse } from '../../domain/model/HttpExchange.js';
import type { HttpClient } from '../../domain/ports/HttpClient.js';
import { TransportError } from '../../domain/errors/TransportError.js';
import { abortMessage, raceAbort } from '../../domain/services/cancellation.js';

/** Produces the answer for a matched route. May throw a `TransportError` to simulate a network fault. */
export type RouteHandler = (request: HttpRequest) => HttpResponse | Promise<HttpResponse>;

/**
 * In-process HTTP client with scripted routes. Non-networked: for tests,
 * storybooks and offline development. Unmatched routes answer `404`.
 */
export class InMemoryHttpClient implements HttpClient {
  private readonly routes = new Map<string, RouteHandler>();
  private readonly sent: HttpRequest[] = [];

  /** Register the answer for `method path`. Returns `this` for chaining. */
  route(method: HttpMethod, path: string, handler: RouteHandler | HttpResponse): this {
    this.routes.set(this.key(method, path), typeof handler === 'function' ? handler : () => handler);
    return this;
  }

  /** Every request received so far, in order. */
  get requests(): readonly HttpRequest[] {
    return this.sent;
  }

  /** Forget recorded requests (routes are kept). */
  clearRequests(): void {
    this.sent.length = 0;
  }

  send(request: HttpRequest, signal?: AbortSignal): Promise<HttpResponse> {
    if (signal?.aborted) {
      return Promise.reject(new TransportError('aborted', abortMessage(signal)));
    }

    this.sent.push(request);
    const handler = this.routes.get(this.key(request.method, request.path));
    if (!handler) {
      return Promise.resolve(jsonResponse(404, { error: `No route for ${request.method} ${request.path}` }));
    }

    return raceAbort(
      new Promise<HttpResponse>((resolve) => {
        resolve(handler(request));
      }),
      signal,
    );
  }

  private key(method: HttpMethod, path: string): string {
    return `${method} ${path}`;
  }
}
