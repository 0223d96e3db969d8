import { describe, it, expect, vi } from 'vitest';
import { GitHubError, GitHubErrorKind } from '../../errors.js';
import type { Logger } from '../../observability/logging.js';
import { SimulationError, SimulationErrorKind } from '../errors.js';
import { CallRecorder } from '../recorder.js';
import { createSnapshot } from '../types.js';

const fixedClock = () => new Date('2024-06-01T12:00:00.000Z');

describe('CallRecorder', () => {
  it('should return the result and append a success interaction', async () => {
    const snapshot = createSnapshot('recorder', new Date('2024-06-01T11:00:00.000Z'));
    const recorder = new CallRecorder(snapshot, { now: fixedClock });
    const invoke = vi.fn(async () => 'PVTI_1');

    const result = await recorder.record(
      { method: 'POST', target: 'graphql#AddDraftIssue', requestBody: '{"title":"Task"}' },
      invoke
    );

    expect(result).toBe('PVTI_1');
    expect(invoke).toHaveBeenCalledTimes(1);
    expect(snapshot.calls).toEqual([
      {
        method: 'POST',
        url: 'graphql#AddDraftIssue',
        requestBody: '{"title":"Task"}',
        statusCode: 200,
        response: '"PVTI_1"',
        timestamp: '2024-06-01T12:00:00.000Z',
      },
    ]);
    expect(snapshot.updated).toBe('2024-06-01T12:00:00.000Z');
    expect(Object.isFrozen(snapshot.calls[0])).toBe(true);
    expect(recorder.size).toBe(1);
  });

  it('should store null for calls without a result', async () => {
    const snapshot = createSnapshot('void');
    const recorder = new CallRecorder(snapshot, { now: fixedClock });

    await recorder.record({ method: 'POST', target: 'graphql#DeleteProject' }, async () => undefined);

    expect(snapshot.calls[0].response).toBe('null');
    expect(snapshot.calls[0].requestBody).toBeUndefined();
  });

  it('should rethrow the original error and record it', async () => {
    const snapshot = createSnapshot('failure');
    const recorder = new CallRecorder(snapshot, { now: fixedClock });
    const failure = new GitHubError(GitHubErrorKind.Forbidden, 'Resource not accessible', { statusCode: 403 });

    const thrown = await recorder
      .record({ method: 'GET', target: 'user' }, () => Promise.reject(failure))
      .catch((e: unknown) => e);

    expect(thrown).toBe(failure);
    expect(snapshot.calls[0]).toMatchObject({
      statusCode: 403,
      response: '{"error":"Resource not accessible","kind":"forbidden","status":403}',
    });
  });

  it('should not record a result that cannot be serialized', async () => {
    const snapshot = createSnapshot('bigint');
    const recorder = new CallRecorder(snapshot, { now: fixedClock });
    const invoke = vi.fn(async () => ({ id: 1n }));

    const thrown = await recorder.record({ method: 'GET', target: 'user' }, invoke).catch((e: unknown) => e);

    expect(invoke).toHaveBeenCalledTimes(1);
    expect(thrown).toBeInstanceOf(SimulationError);
    expect(thrown).toMatchObject({ kind: SimulationErrorKind.ParseError, scenario: 'bigint' });
    expect(thrown instanceof Error ? thrown.cause : undefined).toBeInstanceOf(TypeError);
    expect(snapshot.calls).toEqual([]);
  });

  it('should keep insertion order', async () => {
    const snapshot = createSnapshot('order');
    const recorder = new CallRecorder(snapshot, { now: fixedClock });

    await recorder.record({ method: 'GET', target: 'user' }, async () => 'alice');
    await recorder.record({ method: 'POST', target: 'graphql#FindProject' }, async () => ({ id: 'PVT_1' }));
    await recorder.record({ method: 'POST', target: 'graphql#GetProjectFields' }, async () => []);

    expect(snapshot.calls.map((call) => call.url)).toEqual(['user', 'graphql#FindProject', 'graphql#GetProjectFields']);
  });

  it('should log each interaction at debug', async () => {
    const logger: Logger = { trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const recorder = new CallRecorder(createSnapshot('logged'), { logger, now: fixedClock });

    await recorder.record({ method: 'GET', target: 'user' }, async () => 'alice');

    expect(logger.debug).toHaveBeenCalledWith('Recorded interaction', {
      scenario: 'logged',
      index: 0,
      method: 'GET',
      url: 'user',
      status: 200,
    });
  });
});
