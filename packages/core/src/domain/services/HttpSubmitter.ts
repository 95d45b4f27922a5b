import { z } from 'zod';
import type { CanonicalRequest } from '../model/CanonicalRequest.js';
import type { HttpMethod, HttpResponse } from '../model/HttpExchange.js';
import { isSuccessStatus, readJson, readText } from '../model/HttpExchange.js';
import type { Outcome } from '../model/Outcome.js';
import { failure, success } from '../model/Outcome.js';
import { isTransportError } from '../errors/TransportError.js';
import type { HttpClient } from '../ports/HttpClient.js';
import type { RequestSubmitter, SubmitOptions } from '../ports/RequestSubmitter.js';
import type { ResponseMapper } from '../ports/ResponseMapper.js';
import { abortMessage, raceAbort } from './cancellation.js';

/** Error envelopes commonly returned by backends. Fields of the wrong type are ignored. */
const ErrorEnvelopeSchema = z.object({
  reason: z.string().min(1).optional().catch(undefined),
  error: z.string().min(1).optional().catch(undefined),
  message: z.string().min(1).optional().catch(undefined),
});

/** Configuration for an `HttpSubmitter`. */
export interface HttpSubmitterConfig<TBody, TResult> {
  /** Network collaborator that performs the exchange. */
  readonly client: HttpClient;
  /** Default: `'POST'`. */
  readonly method?: HttpMethod;
  /** Request path, fixed or derived from the request. */
  readonly path: string | ((request: CanonicalRequest<TBody>) => string);
  /** Extra headers sent with every request. */
  readonly headers?: Readonly<Record<string, string>>;
  /** Reads the payload of a 2xx response. */
  readonly responseMapper: ResponseMapper<TResult>;
}

/**
 * Submits a canonical request over HTTP and maps the answer to an outcome.
 *
 * One exchange per call, no retries. 2xx answers go through the response
 * mapper; any other status becomes `ServerRejected` with the reason the server
 * gave. Transport faults become `TransportError`, and an aborted signal becomes
 * `Cancelled` even when the client ignores the signal.
 */
export class HttpSubmitter<TBody, TResult> implements RequestSubmitter<TBody, TResult> {
  private readonly client: HttpClient;
  private readonly method: HttpMethod;
  private readonly path: string | ((request: CanonicalRequest<TBody>) => string);
  private readonly headers: Readonly<Record<string, string>>;
  private readonly responseMapper: ResponseMapper<TResult>;

  constructor(config: HttpSubmitterConfig<TBody, TResult>) {
    this.client = config.client;
    this.method = config.method ?? 'POST';
    this.path = config.path;
    this.headers = config.headers ?? {};
    this.responseMapper = config.responseMapper;
  }

  async submit(request: CanonicalRequest<TBody>, options?: SubmitOptions): Promise<Outcome<TResult>> {
    const signal = options?.signal;
    if (signal?.aborted) {
      return failure('Cancelled', { message: abortMessage(signal) });
    }

    let response: HttpResponse;
    try {
      const exchange = this.client.send(
        {
          method: this.method,
          path: typeof this.path === 'string' ? this.path : this.path(request),
          headers: this.headers,
          body: request.body,
        },
        signal,
      );
      response = await raceAbort(exchange, signal);
    } catch (error) {
      return this.mapTransportFailure(error, signal);
    }

    if (!isSuccessStatus(response.status)) {
      return failure('ServerRejected', {
        statusCode: response.status,
        reason: extractReason(response),
        body: readJson(response),
      });
    }

    try {
      const mapped = this.responseMapper.map(response);
      return mapped.ok
        ? success(mapped.value)
        : failure('UnexpectedResponse', { statusCode: response.status, message: mapped.message });
    } catch (error) {
      return failure('UnexpectedResponse', {
        statusCode: response.status,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private mapTransportFailure(error: unknown, signal: AbortSignal | undefined): Outcome<TResult> {
    if (signal?.aborted) {
      return failure('Cancelled', { message: abortMessage(signal) });
    }

    if (isTransportError(error)) {
      return error.reason === 'aborted'
        ? failure('Cancelled', { message: error.message })
        : failure('TransportError', { reason: error.reason, message: error.message });
    }

    return failure('TransportError', {
      reason: 'network',
      message: error instanceof Error ? error.message : String(error),
    });
  }
}

/** Pull the server's explanation out of a rejected response. */
function extractReason(response: HttpResponse): string {
  const fallback = `HTTP ${String(response.status)}`;
  const json = readJson(response);

  if (json !== undefined) {
    if (typeof json === 'string') return json.trim() !== '' ? json.trim() : fallback;

    // Only a JSON object is an envelope; other JSON values fall through to the text.
    const envelope = ErrorEnvelopeSchema.safeParse(json);
    if (envelope.success) {
      return envelope.data.reason ?? envelope.data.error ?? envelope.data.message ?? fallback;
    }
  }

  const text = readText(response).trim();
  return text !== '' ? text : fallback;
}
