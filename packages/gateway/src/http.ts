/**
 * Mapping between federation results and HTTP replies.
 */

import type { FastifyReply } from "fastify";
import type { ZodError, ZodTypeAny, output } from "zod";
import type {
  FederationError,
  FederationErrorCode,
  Outcome,
} from "@calfed/core";

const STATUS_BY_CODE: Record<FederationErrorCode, number> = {
  MALFORMED_IDENTIFIER: 400,
  INVALID_SEGMENT: 400,
  INVALID_BACKEND: 400,
  BACKEND_NOT_FOUND: 404,
  NOT_FOUND: 404,
  UID_NOT_INDEXED: 404,
  UNSUPPORTED_OPERATION: 501,
  BACKEND_OPERATION_FAILED: 502,
};

export interface ErrorBody {
  error: string;
  code: string;
}

export function statusFor(code: FederationErrorCode): number {
  return STATUS_BY_CODE[code];
}

export function errorBody(error: FederationError): ErrorBody {
  return { error: error.message, code: error.code };
}

/**
 * Send the value of a successful outcome, or the mapped error reply.
 */
export function sendOutcome<T, R>(
  reply: FastifyReply,
  outcome: Outcome<T>,
  render: (value: T) => R,
  status = 200,
): FastifyReply {
  if (!outcome.ok) {
    return reply.code(statusFor(outcome.error.code)).send(errorBody(outcome.error));
  }
  const body = render(outcome.value);
  return body === undefined
    ? reply.code(204).send()
    : reply.code(status).send(body);
}

/**
 * Validate request input; a ZodError reaches the error handler as a 400.
 */
export function parseInput<S extends ZodTypeAny>(
  schema: S,
  input: unknown,
): output<S> {
  return schema.parse(input);
}

export function describeZodError(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
    .join("; ");
}
