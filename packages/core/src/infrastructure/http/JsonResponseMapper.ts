import type { z } from 'zod';
import type { HttpResponse } from '../../domain/model/HttpExchange.js';
import { readJson } from '../../domain/model/HttpExchange.js';
import type { MappedResponse, ResponseMapper } from '../../domain/ports/ResponseMapper.js';

/** Reads a JSON response body and checks it against a zod schema. */
export class JsonResponseMapper<T> implements ResponseMapper<T> {
  constructor(private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>) {}

  map(response: HttpResponse): MappedResponse<T> {
    const parsed = this.schema.safeParse(readJson(response));

    if (parsed.success) {
      return { ok: true, value: parsed.data };
    }

    const issues = parsed.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    return { ok: false, message: `Response body does not match the expected shape: ${issues}` };
  }
}
