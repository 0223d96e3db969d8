import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { GitHubError, GitHubErrorKind } from '../../errors.js';
import { decodeError, encodeError, encodeSuccess, isSuccessStatus, jsonDecoder, voidDecoder } from '../codec.js';
import { SimulationErrorKind } from '../errors.js';

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}

describe('Payload codec', () => {
  describe('encodeSuccess', () => {
    it('should serialize results as JSON', () => {
      expect(encodeSuccess('alice')).toBe('"alice"');
      expect(encodeSuccess({ id: 'PVTI_1' })).toBe('{"id":"PVTI_1"}');
    });

    it('should store undefined as null', () => {
      expect(encodeSuccess(undefined)).toBe('null');
    });
  });

  describe('encodeError', () => {
    it('should keep kind and upstream status', () => {
      const error = new GitHubError(GitHubErrorKind.NotFound, 'Not Found', { statusCode: 404 });

      expect(encodeError(error)).toEqual({
        payload: '{"error":"Not Found","kind":"not_found","status":404}',
        status: 404,
      });
    });

    it('should record 500 for failures without an HTTP status', () => {
      const error = GitHubError.connection('connect ECONNREFUSED');

      expect(encodeError(error)).toEqual({
        payload: '{"error":"connect ECONNREFUSED","kind":"connection_failed"}',
        status: 500,
      });
    });

    it('should record 500 when the upstream status is not an error status', () => {
      const error = new GitHubError(GitHubErrorKind.DeserializationError, 'bad body', { statusCode: 200 });

      expect(encodeError(error).status).toBe(500);
    });

    it('should mark foreign errors as unknown', () => {
      expect(encodeError(new TypeError('boom')).payload).toBe('{"error":"boom","kind":"unknown"}');
    });
  });

  describe('decodeError', () => {
    it('should rebuild the upstream error', () => {
      const error = decodeError('{"error":"Bad credentials","kind":"bad_credentials","status":401}', 401);

      expect(error).toBeInstanceOf(GitHubError);
      expect(error.message).toBe('Bad credentials');
      expect(error.kind).toBe(GitHubErrorKind.BadCredentials);
      expect(error.statusCode).toBe(401);
    });

    it('should accept the minimal error payload', () => {
      const error = decodeError('{"error":"connection refused"}', 500);

      expect(error.kind).toBe(GitHubErrorKind.Unknown);
      expect(error.message).toBe('connection refused');
      expect(error.statusCode).toBeUndefined();
    });

    it('should map unrecognised kinds to unknown', () => {
      expect(decodeError('{"error":"x","kind":"teapot"}', 418).kind).toBe(GitHubErrorKind.Unknown);
    });

    it('should fall back to a generic message', () => {
      const error = decodeError('<html>', 502);

      expect(error.kind).toBe(GitHubErrorKind.Unknown);
      expect(error.message).toBe('API error (status 502)');
      expect(decodeError('{"message":"x"}', 503).message).toBe('API error (status 503)');
    });
  });

  describe('decoders', () => {
    const decode = jsonDecoder(z.object({ id: z.string() }));

    it('should validate the payload', () => {
      expect(decode('{"id":"PVT_1"}')).toEqual({ id: 'PVT_1' });
    });

    it('should raise a parse error on invalid JSON', () => {
      expect(thrownBy(() => decode('{'))).toMatchObject({ kind: SimulationErrorKind.ParseError });
    });

    it('should raise a parse error on a shape mismatch', () => {
      expect(thrownBy(() => decode('{"id":1}'))).toMatchObject({ kind: SimulationErrorKind.ParseError });
    });

    it('should accept any JSON for operations without a result', () => {
      expect(voidDecoder('null')).toBeUndefined();
      expect(thrownBy(() => voidDecoder(''))).toMatchObject({ kind: SimulationErrorKind.ParseError });
    });
  });

  it('should treat 2xx as success', () => {
    expect(isSuccessStatus(200)).toBe(true);
    expect(isSuccessStatus(204)).toBe(true);
    expect(isSuccessStatus(199)).toBe(false);
    expect(isSuccessStatus(404)).toBe(false);
  });
});
