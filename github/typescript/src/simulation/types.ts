/**
 * Simulation types for recording and replaying Projects API calls.
 * @module simulation/types
 */

import { z } from 'zod';

/**
 * Operating mode of a snapshot client.
 */
export enum SimulationMode {
  /** Serve calls from a recorded snapshot; no network access. */
  Replay = 'replay',
  /** Forward calls to the live API and capture them. */
  Record = 'record',
  /** Forward calls to the live API without capturing. */
  Bypass = 'bypass',
}

/**
 * How a replayed call is checked against the recorded one.
 */
export enum MatchPolicy {
  /** Recorded calls are served in order; the request is not compared. */
  Sequential = 'sequential',
  /** Method and target must equal the recorded ones. */
  Strict = 'strict',
}

/**
 * Identifies a call for recording and matching.
 */
export interface CallDescriptor {
  /** `GET`, `POST`, ... */
  readonly method: string;
  /** URL or `graphql#OperationName`. */
  readonly target: string;
  /** Serialized request arguments. */
  readonly requestBody?: string;
}

/**
 * One captured call. Frozen once appended to a snapshot.
 */
export interface Interaction {
  readonly method: string;
  readonly url: string;
  readonly requestBody?: string;
  readonly statusCode: number;
  /** Serialized success payload or error payload. */
  readonly response: string;
  /** ISO-8601 capture time. */
  readonly timestamp: string;
}

/**
 * Ordered interaction log for one scenario.
 */
export interface Snapshot {
  testName: string;
  calls: Interaction[];
  created: string;
  updated: string;
}

const EPOCH = new Date(0).toISOString();

const timestampSchema = z.string().datetime({ offset: true });

const interactionDocumentSchema = z
  .object({
    method: z.string(),
    url: z.string(),
    request_body: z.string().optional(),
    status_code: z.number().int(),
    response: z.string(),
    timestamp: timestampSchema.default(EPOCH),
  })
  .transform((call): Interaction => {
    const interaction: Interaction = {
      method: call.method,
      url: call.url,
      ...(call.request_body !== undefined ? { requestBody: call.request_body } : {}),
      statusCode: call.status_code,
      response: call.response,
      timestamp: call.timestamp,
    };
    return Object.freeze(interaction);
  });

/**
 * On-disk snapshot document. Field names are snake_case on disk.
 */
export const snapshotDocumentSchema = z
  .object({
    test_name: z.string().default(''),
    calls: z.array(interactionDocumentSchema),
    created: timestampSchema.default(EPOCH),
    updated: timestampSchema.default(EPOCH),
  })
  .transform(
    (doc): Snapshot => ({
      testName: doc.test_name,
      calls: doc.calls,
      created: doc.created,
      updated: doc.updated,
    })
  );

/**
 * Document shape written to disk. Key order is fixed.
 */
export interface SnapshotDocument {
  test_name: string;
  calls: Array<{
    method: string;
    url: string;
    request_body?: string;
    status_code: number;
    response: string;
    timestamp: string;
  }>;
  created: string;
  updated: string;
}

/**
 * Converts an in-memory snapshot to its on-disk document.
 */
export function toSnapshotDocument(snapshot: Snapshot): SnapshotDocument {
  return {
    test_name: snapshot.testName,
    calls: snapshot.calls.map((call) => ({
      method: call.method,
      url: call.url,
      ...(call.requestBody !== undefined ? { request_body: call.requestBody } : {}),
      status_code: call.statusCode,
      response: call.response,
      timestamp: call.timestamp,
    })),
    created: snapshot.created,
    updated: snapshot.updated,
  };
}

/**
 * Creates an empty snapshot for a scenario.
 */
export function createSnapshot(testName: string, now: Date = new Date()): Snapshot {
  const timestamp = now.toISOString();
  return { testName, calls: [], created: timestamp, updated: timestamp };
}

/**
 * Appends a frozen interaction and advances `updated`.
 */
export function appendInteraction(snapshot: Snapshot, interaction: Interaction): Interaction {
  const frozen = Object.freeze({ ...interaction });
  snapshot.calls.push(frozen);
  snapshot.updated = frozen.timestamp;
  return frozen;
}
