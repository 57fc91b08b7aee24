import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

type Result<T extends StandardSchemaV1> = StandardSchemaV1.Result<StandardSchemaV1.InferOutput<T>>;

function toTuple<T extends StandardSchemaV1>(
  result: Result<T>,
  message: string,
): SafeWrap<ValidationError, StandardSchemaV1.InferOutput<T>> {
  if (result.issues) {
    return [new ValidationError(message, [...result.issues]), null];
  }

  return [null, result.value];
}

/**
 * Validates `input` against any @standard-schema schema (zod in this SDK),
 * sync or async, as an error-first tuple.
 *
 * A schema that throws is reported as a {@link ValidationError} with the thrown error as `cause`.
 */
export async function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
  message = 'error validating data',
): SafeWrapAsync<ValidationError, StandardSchemaV1.InferOutput<T>> {
  const [err, result] = await safeWrapAsync<Error, Result<T>>(async () => schema['~standard'].validate(input));
  if (err) {
    return [new ValidationError(`${message}: validation threw`, [], { cause: err }), null];
  }

  return toTuple(result, message);
}

/**
 * Synchronous {@link validator} for schemas known to validate synchronously
 * (used at client construction, which cannot await).
 */
export function validateSync<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
  message = 'error validating data',
): SafeWrap<ValidationError, StandardSchemaV1.InferOutput<T>> {
  const [err, result] = safeWrap<Error, Result<T> | Promise<Result<T>>>(() => schema['~standard'].validate(input));
  if (err) {
    return [new ValidationError(`${message}: validation threw`, [], { cause: err }), null];
  }

  if (result instanceof Promise) {
    return [new ValidationError(`${message}: schema validates asynchronously`, []), null];
  }

  return toTuple(result, message);
}
