/** HTTP methods a submitter may use. */
export type HttpMethod = 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/** One outgoing request, as handed to an `HttpClient`. */
export interface HttpRequest {
  readonly method: HttpMethod;
  /** Path relative to the client's base URL (e.g. `/users/register`). */
  readonly path: string;
  readonly headers?: Readonly<Record<string, string>>;
  /** JSON-serializable body. */
  readonly body?: unknown;
}

/** The raw answer to an `HttpRequest`. */
export interface HttpResponse {
  readonly status: number;
  /** Header names are lower-cased. */
  readonly headers: Readonly<Record<string, string>>;
  readonly body: Uint8Array;
}

/** Whether a status code is in the 2xx range. */
export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/** Decode a response body as UTF-8 text. */
export function readText(response: HttpResponse): string {
  return new TextDecoder('utf-8').decode(response.body);
}

/** Decode a response body as JSON. Returns `undefined` for an empty or malformed body. */
export function readJson(response: HttpResponse): unknown {
  const text = readText(response).trim();
  if (text === '') return undefined;

  try {
    return JSON.parse(text) as unknown;
  } catch {
    return undefined;
  }
}

/** Build a JSON response, for in-process clients and tests. */
export function jsonResponse(status: number, payload: unknown, headers?: Record<string, string>): HttpResponse {
  return {
    status,
    headers: { 'content-type': 'application/json', ...headers },
    body: new TextEncoder().encode(payload === undefined ? '' : JSON.stringify(payload)),
  };
}

/** Build a plain-text response, for in-process clients and tests. */
export function textResponse(status: number, text: string): HttpResponse {
  return {
    status,
    headers: { 'content-type': 'text/plain' },
    body: new TextEncoder().encode(text),
  };
}
