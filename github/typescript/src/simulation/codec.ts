/**
 * Payload encodings for recorded interactions.
 * @module simulation/codec
 */

import { z } from 'zod';
import { GitHubError, GitHubErrorKind, parseErrorKind } from '../errors.js';
import type { PayloadSchema } from '../projects/schemas.js';
import { SimulationError, SimulationErrorKind } from './errors.js';

/** Status recorded for a successful call. */
export const SUCCESS_STATUS = 200;

/** Status recorded for a failure that carried no HTTP status. */
export const FALLBACK_ERROR_STATUS = 500;

/**
 * Stored form of a failed call.
 */
export interface ErrorPayload {
  error: string;
  kind: GitHubErrorKind;
  status?: number;
}

const errorPayloadSchema = z.object({
  error: z.string(),
  kind: z.string().optional(),
  status: z.number().int().optional(),
});

/**
 * Decodes a stored success payload into an operation result.
 */
export type PayloadDecoder<T> = (payload: string) => T;

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status <= 299;
}

/**
 * Serializes a result. `undefined` is stored as `null`.
 */
export function encodeSuccess(result: unknown): string {
  return JSON.stringify(result ?? null);
}

/**
 * Serializes a failure and picks the status to record for it.
 */
export function encodeError(error: unknown): { payload: string; status: number } {
  const payload: ErrorPayload = {
    error: error instanceof Error ? error.message : String(error),
    kind: error instanceof GitHubError ? error.kind : GitHubErrorKind.Unknown,
  };
  const upstreamStatus = error instanceof GitHubError ? error.statusCode : undefined;
  if (upstreamStatus !== undefined) {
    payload.status = upstreamStatus;
  }

  return {
    payload: JSON.stringify(payload),
    status: upstreamStatus !== undefined && upstreamStatus >= 400 ? upstreamStatus : FALLBACK_ERROR_STATUS,
  };
}

/**
 * Rebuilds the upstream error from a stored error payload.
 */
export function decodeError(payload: string, status: number): GitHubError {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch {
    return new GitHubError(GitHubErrorKind.Unknown, `API error (status ${status})`);
  }

  const parsed = errorPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    return new GitHubError(GitHubErrorKind.Unknown, `API error (status ${status})`);
  }
  return new GitHubError(parseErrorKind(parsed.data.kind), parsed.data.error, {
    statusCode: parsed.data.status,
  });
}

/**
 * Decoder that parses JSON and validates it against a schema.
 *
 * @throws {SimulationError} `parse_error` when the payload is not JSON or
 *   does not match.
 */
export function jsonDecoder<T>(schema: PayloadSchema<T>): PayloadDecoder<T> {
  return (payload) => {
    let raw: unknown;
    try {
      raw = JSON.parse(payload);
    } catch (error) {
      throw new SimulationError(
        SimulationErrorKind.ParseError,
        `Recorded response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new SimulationError(
        SimulationErrorKind.ParseError,
        `Recorded response does not match the expected shape: ${parsed.error.message}`,
        { cause: parsed.error }
      );
    }
    return parsed.data;
  };
}

/**
 * Decoder for operations without a result. The payload must still be JSON.
 */
export const voidDecoder: PayloadDecoder<void> = jsonDecoder(z.unknown().transform((): void => undefined));
