/**
 * File storage for scenario snapshots.
 * @module simulation/storage
 */

import { createHash, randomBytes } from 'crypto';
import { promises as fs } from 'fs';
import { dirname, join } from 'path';
import { SimulationError, SimulationErrorKind } from './errors.js';
import { snapshotDocumentSchema, toSnapshotDocument, type Snapshot } from './types.js';

const UNSAFE_CHARACTERS = /[^A-Za-z0-9_-]/g;

/**
 * Turns a scenario name into a file name token.
 *
 * Characters outside `[A-Za-z0-9_-]` become `_`. A name that needed any
 * substitution gets the first 8 hex digits of its SHA-256 appended, so
 * `"a b"` and `"a/b"` land in different files.
 */
export function sanitizeScenarioName(name: string): string {
  const sanitized = name.replace(UNSAFE_CHARACTERS, '_');
  if (sanitized === name && name !== '') {
    return name;
  }
  const digest = createHash('sha256').update(name).digest('hex').slice(0, 8);
  return `${sanitized}-${digest}`;
}

/**
 * `{baseDirectory}/{sanitized name}.json`
 */
export function deriveSnapshotPath(scenarioName: string, baseDirectory: string): string {
  return join(baseDirectory, `${sanitizeScenarioName(scenarioName)}.json`);
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Loads and persists snapshots as JSON files.
 */
export class SnapshotStore {
  derivePath(scenarioName: string, baseDirectory: string): string {
    return deriveSnapshotPath(scenarioName, baseDirectory);
  }

  /**
   * Reads and validates a snapshot.
   *
   * @throws {SimulationError} `snapshot_not_found` when the file is absent,
   *   `parse_error` when it is not a snapshot document, `persistence_error`
   *   for any other read failure.
   */
  async load(path: string): Promise<Snapshot> {
    let content: string;
    try {
      content = await fs.readFile(path, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        throw new SimulationError(
          SimulationErrorKind.SnapshotNotFound,
          `Snapshot not found: ${path}. Run with SNAPSHOT_MODE=record to create it`,
          { path, cause: error }
        );
      }
      throw new SimulationError(
        SimulationErrorKind.PersistenceError,
        `Failed to read snapshot ${path}: ${describe(error)}`,
        { path, cause: error }
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new SimulationError(
        SimulationErrorKind.ParseError,
        `Snapshot ${path} is not valid JSON: ${describe(error)}`,
        { path, cause: error }
      );
    }

    const parsed = snapshotDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SimulationError(
        SimulationErrorKind.ParseError,
        `Snapshot ${path} is malformed: ${parsed.error.message}`,
        { path, cause: parsed.error }
      );
    }
    return parsed.data;
  }

  /**
   * Writes a snapshot, replacing any existing file atomically.
   *
   * @throws {SimulationError} `persistence_error` on any I/O failure.
   */
  async save(snapshot: Snapshot, path: string): Promise<void> {
    const json = `${JSON.stringify(toSnapshotDocument(snapshot), null, 2)}\n`;
    const tempPath = `${path}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`;

    try {
      await fs.mkdir(dirname(path), { recursive: true });
      await fs.writeFile(tempPath, json, 'utf-8');
      await fs.rename(tempPath, path);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch(() => undefined);
      throw new SimulationError(
        SimulationErrorKind.PersistenceError,
        `Failed to write snapshot ${path}: ${describe(error)}`,
        { scenario: snapshot.testName, path, cause: error }
      );
    }
  }

  async exists(path: string): Promise<boolean> {
    try {
      await fs.access(path);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Deletes a snapshot; a missing file is not an error.
   */
  async remove(path: string): Promise<void> {
    try {
      await fs.unlink(path);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        throw new SimulationError(
          SimulationErrorKind.PersistenceError,
          `Failed to delete snapshot ${path}: ${describe(error)}`,
          { path, cause: error }
        );
      }
    }
  }
}
