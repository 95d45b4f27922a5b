import type { HttpRequest, HttpResponse } from '../model/HttpExchange.js';

/**
 * Port for the network collaborator.
 *
 * Resolves with whatever the server answered, whatever the status. Rejects with
 * a `TransportError` only when no response was received (timeout, refused
 * connection, abort). `HttpSubmitter` is the only component that calls it.
 */
export interface HttpClient {
  send(request: HttpRequest, signal?: AbortSignal): Promise<HttpResponse>;
}
