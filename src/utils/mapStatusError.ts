import { z } from 'zod';
import { ClientError } from '../error/clientError.js';
import type { HTTPError } from '../error/httpError.js';
import { NotFoundError } from '../error/notFoundError.js';
import { ServerError } from '../error/serverError.js';
import { type FieldError, UnprocessableEntityError } from '../error/unprocessableEntityError.js';
import type { ApiResponse } from '../transport/response.js';
import { decodeBody } from './decodeBody.js';
import { validator } from './validator.js';

/** Body of a 422 response; a missing `details` means no field errors. Entries are kept as sent. */
const UnprocessableBodySchema = z.object({
  details: z.array(z.union([z.string(), z.record(z.unknown())])).default([]),
});

async function unprocessable(response: ApiResponse): Promise<UnprocessableEntityError> {
  const [errDecode, body] = decodeBody(response);
  if (errDecode) {
    return new UnprocessableEntityError(response, [], { cause: errDecode });
  }

  const [errValidate, parsed] = await validator(body, UnprocessableBodySchema, 'error validating 422 details');
  if (errValidate) {
    return new UnprocessableEntityError(response, [], { cause: errValidate });
  }

  const details: FieldError[] = parsed.details;
  return new UnprocessableEntityError(response, details);
}

/**
 * Maps a response status to the error it raises, or `null` on success.
 * First match wins: 404, 422, >= 500, >= 400.
 */
export async function mapStatusError(response: ApiResponse): Promise<HTTPError | null> {
  const { status } = response;

  switch (true) {
    case status === 404:
      return new NotFoundError(response);
    case status === 422:
      return unprocessable(response);
    case status >= 500:
      return new ServerError(response);
    case status >= 400:
      return new ClientError(response);
    default:
      return null;
  }
}
