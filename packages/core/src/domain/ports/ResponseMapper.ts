import type { HttpResponse } from '../model/HttpExchange.js';

/** Result of reading a successful response body. */
export type MappedResponse<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly message: string };

/** Port that turns a 2xx response into the submission's typed payload. */
export interface ResponseMapper<T> {
  map(response: HttpResponse): MappedResponse<T>;
}
