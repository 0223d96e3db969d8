import { exportPKCS8, generateKeyPair } from 'jose';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  createMockHttpTransport,
  jsonResponse,
  mockGraphQLData,
  mockHttpTransportError,
  mockHttpTransportJson,
  mockHttpTransportResponse,
  sentBody,
  type MockHttpTransport,
} from '../__mocks__/index.js';
import { AuthMethod } from '../auth.js';
import { GitHubHttpClient } from '../client.js';
import { GitHubConfigBuilder } from '../config.js';
import { GitHubError, GitHubErrorKind } from '../errors.js';
import type { Logger } from '../observability/logging.js';

function createClient(transport: MockHttpTransport, logger?: Logger): GitHubHttpClient {
  const config = new GitHubConfigBuilder().auth(AuthMethod.pat('test-token')).build();
  return new GitHubHttpClient(config, { transport, logger });
}

describe('GitHubHttpClient', () => {
  let transport: MockHttpTransport;
  let client: GitHubHttpClient;

  beforeEach(() => {
    transport = createMockHttpTransport();
    client = createClient(transport);
  });

  describe('requests', () => {
    it('should send authenticated GET requests', async () => {
      mockHttpTransportJson(transport, 200, { login: 'alice' });

      const result = await client.get('user');

      expect(result).toEqual({ login: 'alice' });
      expect(transport.send).toHaveBeenCalledWith({
        method: 'GET',
        url: 'https://api.github.com/user',
        headers: {
          'Accept': 'application/vnd.github+json',
          'X-GitHub-Api-Version': '2022-11-28',
          'User-Agent': 'gh-project-import/0.1.0',
          'Authorization': 'Bearer test-token',
        },
        body: undefined,
        timeout: 30000,
      });
    });

    it('should append defined query parameters', async () => {
      mockHttpTransportJson(transport, 200, []);

      await client.get('/users/octocat/repos', { page: 2, sort: undefined });

      expect(transport.send.mock.calls[0][0].url).toBe('https://api.github.com/users/octocat/repos?page=2');
    });

    it('should serialize POST bodies as JSON', async () => {
      mockHttpTransportJson(transport, 201, { id: 1 });

      await client.post('repos/octo-org/app/issues', { title: 'Bug' });

      const request = transport.send.mock.calls[0][0];
      expect(request.method).toBe('POST');
      expect(request.headers['Content-Type']).toBe('application/json');
      expect(request.body).toBe('{"title":"Bug"}');
    });

    it('should return undefined for empty responses', async () => {
      mockHttpTransportResponse(transport, { status: 204, headers: {}, body: '' });

      await expect(client.delete('repos/octo-org/app')).resolves.toBeUndefined();
    });

    it('should reject unparseable success bodies', async () => {
      mockHttpTransportResponse(transport, { status: 200, headers: {}, body: '<html>' });

      await expect(client.get('user')).rejects.toMatchObject({
        kind: GitHubErrorKind.DeserializationError,
        statusCode: 200,
      });
    });

    it('should propagate transport failures', async () => {
      const failure = GitHubError.timeout('Request timeout after 30000ms');
      mockHttpTransportError(transport, failure);

      await expect(client.get('user')).rejects.toBe(failure);
    });

    it('should log requests and responses at debug', async () => {
      const logger: Logger = { trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      client = createClient(transport, logger);
      mockHttpTransportJson(transport, 200, {});

      await client.get('user');

      expect(logger.debug).toHaveBeenCalledWith('Outgoing request', {
        method: 'GET',
        url: 'https://api.github.com/user',
      });
      expect(logger.debug).toHaveBeenCalledWith('Incoming response', expect.objectContaining({ status: 200 }));
    });
  });

  describe('error responses', () => {
    it('should map status, message and request metadata', async () => {
      mockHttpTransportResponse(
        transport,
        jsonResponse(
          404,
          { message: 'Not Found', documentation_url: 'https://docs.github.com/rest' },
          { 'x-github-request-id': 'ABCD:1234' }
        )
      );

      const error = await client.get('users/nobody').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(GitHubError);
      expect(error).toMatchObject({
        kind: GitHubErrorKind.NotFound,
        message: 'Not Found',
        statusCode: 404,
        requestId: 'ABCD:1234',
        documentationUrl: 'https://docs.github.com/rest',
      });
    });

    it('should detect primary rate limiting', async () => {
      mockHttpTransportJson(transport, 403, { message: 'API rate limit exceeded for user ID 1.' });

      await expect(client.get('user')).rejects.toMatchObject({
        kind: GitHubErrorKind.PrimaryRateLimitExceeded,
      });
    });

    it('should use a plain-text body as the message', async () => {
      mockHttpTransportResponse(transport, { status: 502, headers: {}, body: 'Bad gateway\n' });

      await expect(client.get('user')).rejects.toMatchObject({
        kind: GitHubErrorKind.BadGateway,
        message: 'Bad gateway',
      });
    });
  });

  describe('graphql', () => {
    it('should post the query and return data', async () => {
      mockGraphQLData(transport, { viewer: { login: 'alice' } });

      const data = await client.graphql('query { viewer { login } }', { first: 1 });

      expect(data).toEqual({ viewer: { login: 'alice' } });
      expect(transport.send.mock.calls[0][0].url).toBe('https://api.github.com/graphql');
      expect(sentBody(transport, 0)).toEqual({ query: 'query { viewer { login } }', variables: { first: 1 } });
    });

    it('should raise the first GraphQL error', async () => {
      mockHttpTransportJson(transport, 200, {
        data: null,
        errors: [{ message: "Could not resolve to a node with the global id of 'PVT_x'" }, { message: 'second' }],
      });

      await expect(client.graphql('query { node }')).rejects.toMatchObject({
        kind: GitHubErrorKind.QueryError,
        message: "GraphQL error: Could not resolve to a node with the global id of 'PVT_x'",
      });
    });

    it('should reject responses without data', async () => {
      mockHttpTransportJson(transport, 200, { data: null });

      await expect(client.graphql('query { viewer }')).rejects.toMatchObject({
        kind: GitHubErrorKind.DeserializationError,
      });
    });
  });

  describe('GitHub App authentication', () => {
    it('should exchange the app JWT for a cached installation token', async () => {
      const { privateKey } = await generateKeyPair('RS256', { extractable: true });
      const pem = await exportPKCS8(privateKey);
      const config = new GitHubConfigBuilder().auth(AuthMethod.app(123, pem, 456)).build();
      client = new GitHubHttpClient(config, { transport });

      mockHttpTransportJson(transport, 201, {
        token: 'test-installation-token',
        expires_at: new Date(Date.now() + 60 * 60 * 1000).toISOString(),
      });
      mockHttpTransportJson(transport, 200, { login: 'octo-app[bot]' });
      mockHttpTransportJson(transport, 200, { login: 'octo-app[bot]' });

      await client.get('user');
      await client.get('user');

      const [exchange, first, second] = transport.send.mock.calls.map(([request]) => request);
      expect(transport.send).toHaveBeenCalledTimes(3);
      expect(exchange.method).toBe('POST');
      expect(exchange.url).toBe('https://api.github.com/app/installations/456/access_tokens');
      expect(exchange.headers['Authorization']).toMatch(/^Bearer ey/);
      expect(first.headers['Authorization']).toBe('Bearer test-installation-token');
      expect(second.headers['Authorization']).toBe('Bearer test-installation-token');
    });
  });
});
