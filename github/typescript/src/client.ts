/**
 * GitHub API Client
 *
 * Thin client for the GitHub REST and GraphQL APIs with support for:
 * - Personal access token, Actions token and GitHub App authentication
 * - Request timeouts
 * - Mapping of HTTP and GraphQL failures onto {@link GitHubError}
 *
 * Response bodies are returned as `unknown`; callers validate them.
 *
 * @module client
 */

import { z } from 'zod';
import { AuthManager, type InstallationToken } from './auth.js';
import type { GitHubConfig } from './config.js';
import { validateConfig } from './config.js';
import { GitHubError, GitHubErrorKind } from './errors.js';
import type { Logger } from './observability/logging.js';
import { NoopLogger } from './observability/logging.js';
import { FetchTransport, type HttpMethod, type HttpResponse, type HttpTransport } from './transport.js';

/**
 * Options for constructing a {@link GitHubHttpClient}.
 */
export interface GitHubHttpClientOptions {
  /** Transport used to send requests. Defaults to {@link FetchTransport}. */
  transport?: HttpTransport;
  /** Logger for request/response tracing. */
  logger?: Logger;
}

const errorBodySchema = z.object({
  message: z.string().optional(),
  documentation_url: z.string().optional(),
});

const graphqlResponseSchema = z.object({
  data: z.unknown().optional(),
  errors: z
    .array(z.object({ message: z.string() }).passthrough())
    .optional(),
});

const installationTokenSchema = z.object({
  token: z.string(),
  expires_at: z.string(),
});

/**
 * GitHub API client implementation
 */
export class GitHubHttpClient {
  private readonly config: GitHubConfig;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly authManager?: AuthManager;

  constructor(config: GitHubConfig, options: GitHubHttpClientOptions = {}) {
    validateConfig(config);
    this.config = { ...config };
    this.transport = options.transport ?? new FetchTransport();
    this.logger = options.logger ?? new NoopLogger();

    if (config.auth) {
      this.authManager = new AuthManager(config.auth, (jwt, installationId) =>
        this.requestInstallationToken(jwt, installationId)
      );
    }
  }

  async get(path: string, query?: Record<string, string | number | undefined>): Promise<unknown> {
    return this.request('GET', this.buildUrl(path, query));
  }

  async post(path: string, body?: unknown): Promise<unknown> {
    return this.request('POST', this.buildUrl(path), body);
  }

  async delete(path: string): Promise<unknown> {
    return this.request('DELETE', this.buildUrl(path));
  }

  /**
   * Execute a GraphQL query or mutation and return its `data`.
   *
   * @throws {GitHubError} `query_error` when the response carries GraphQL errors.
   */
  async graphql(query: string, variables?: Record<string, unknown>): Promise<unknown> {
    const body = variables ? { query, variables } : { query };
    const raw = await this.post(this.config.graphqlPath, body);

    const parsed = graphqlResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw GitHubError.deserialization('Malformed GraphQL response');
    }

    const errors = parsed.data.errors;
    if (errors && errors.length > 0) {
      throw GitHubError.query(errors[0].message);
    }

    if (parsed.data.data === undefined || parsed.data.data === null) {
      throw GitHubError.deserialization('GraphQL response contained no data');
    }

    return parsed.data.data;
  }

  /**
   * Core HTTP request method
   */
  private async request(
    method: HttpMethod,
    url: string,
    body?: unknown,
    authorization?: string
  ): Promise<unknown> {
    const headers: Record<string, string> = {
      'Accept': 'application/vnd.github+json',
      'X-GitHub-Api-Version': this.config.apiVersion,
      'User-Agent': this.config.userAgent,
    };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const auth = authorization ?? (await this.authManager?.getAuthHeader());
    if (auth) {
      headers['Authorization'] = auth;
    }

    this.logger.debug('Outgoing request', { method, url });
    const startedAt = Date.now();

    const response = await this.transport.send({
      method,
      url,
      headers,
      body: body !== undefined ? JSON.stringify(body) : undefined,
      timeout: this.config.timeout,
    });

    this.logger.debug('Incoming response', {
      status: response.status,
      durationMs: Date.now() - startedAt,
    });

    if (response.status < 200 || response.status >= 300) {
      throw this.parseErrorResponse(response);
    }

    return this.parseResponseBody(response);
  }

  /**
   * Build full URL with query parameters
   */
  private buildUrl(path: string, query?: Record<string, string | number | undefined>): string {
    const base = this.config.baseUrl.endsWith('/') ? this.config.baseUrl : `${this.config.baseUrl}/`;
    const url = new URL(path.replace(/^\/+/, ''), base);

    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
          url.searchParams.append(key, String(value));
        }
      }
    }

    return url.toString();
  }

  private parseResponseBody(response: HttpResponse): unknown {
    if (response.status === 204 || response.body.trim() === '') {
      return undefined;
    }

    try {
      return JSON.parse(response.body);
    } catch (error) {
      throw new GitHubError(
        GitHubErrorKind.DeserializationError,
        `Failed to parse JSON response: ${error instanceof Error ? error.message : String(error)}`,
        { statusCode: response.status }
      );
    }
  }

  /**
   * Parse error response from GitHub API
   */
  private parseErrorResponse(response: HttpResponse): GitHubError {
    let message = `HTTP ${response.status} error`;
    let documentationUrl: string | undefined;

    try {
      const parsed = errorBodySchema.safeParse(JSON.parse(response.body));
      if (parsed.success) {
        message = parsed.data.message || message;
        documentationUrl = parsed.data.documentation_url;
      }
    } catch {
      if (response.body.trim() !== '') {
        message = response.body.trim();
      }
    }

    return GitHubError.fromResponse(response.status, message, {
      documentationUrl,
      requestId: response.headers['x-github-request-id'],
    });
  }

  private async requestInstallationToken(
    jwt: string,
    installationId: number
  ): Promise<InstallationToken> {
    const raw = await this.request(
      'POST',
      this.buildUrl(`app/installations/${installationId}/access_tokens`),
      undefined,
      `Bearer ${jwt}`
    );

    const parsed = installationTokenSchema.safeParse(raw);
    if (!parsed.success) {
      throw new GitHubError(
        GitHubErrorKind.AppAuthenticationFailed,
        'Unexpected installation token response'
      );
    }

    return {
      token: parsed.data.token,
      expiresAt: new Date(parsed.data.expires_at),
    };
  }
}
