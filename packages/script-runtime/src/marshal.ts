/**
 * @module @pkbridge/script-runtime/marshal
 *
 * Typed calls across the runtime boundary: call a named function, then
 * validate what came back before anything host-side reads it.
 */

import type { z } from 'zod';
import {
  BackendError,
  MalformedResultError,
  RuntimeCallError,
  isErrorLike,
  isKnownErrorCode,
  ErrorCode,
} from '@pkbridge/backend-contracts';
import type { EmbeddedRuntime } from './types.js';

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Call `functionName` with `args` and parse the result with `schema`.
 *
 * @throws RuntimeCallError when the script raises
 * @throws MalformedResultError when the result does not match `schema`
 */
export function callRuntime<S extends z.ZodTypeAny>(
  runtime: EmbeddedRuntime,
  functionName: string,
  args: readonly unknown[],
  schema: S
): z.output<S> {
  let raw: unknown;
  try {
    raw = runtime.call(functionName, args);
  } catch (error) {
    if (error instanceof BackendError) {
      throw error;
    }
    throw new RuntimeCallError(
      functionName,
      isErrorLike(error) ? error.message : String(error),
      isErrorLike(error) && isKnownErrorCode(error.code) ? error.code : ErrorCode.INTERNAL_ERROR
    );
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedResultError(functionName, formatIssues(parsed.error), {
      issues: parsed.error.issues.length,
    });
  }
  return parsed.data;
}
