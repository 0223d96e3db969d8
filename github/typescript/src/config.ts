/**
 * Configuration types for the GitHub Projects client.
 * @module config
 */

import { z } from 'zod';
import { authFromEnv, type AuthMethod } from './auth.js';
import { GitHubError, GitHubErrorKind } from './errors.js';

/** Default GitHub API base URL. */
export const DEFAULT_BASE_URL = 'https://api.github.com';

/** Default GitHub API version (date-based). */
export const DEFAULT_API_VERSION = '2022-11-28';

/** Default request timeout in milliseconds. */
export const DEFAULT_TIMEOUT = 30000;

/** Default User-Agent header. */
export const DEFAULT_USER_AGENT = 'gh-project-import/0.1.0';

/** GraphQL endpoint, relative to the base URL. */
export const DEFAULT_GRAPHQL_PATH = 'graphql';

/**
 * GitHub client configuration.
 */
export interface GitHubConfig {
  /** API base URL. */
  baseUrl: string;
  /** GraphQL endpoint path relative to `baseUrl`. */
  graphqlPath: string;
  /** API version header. */
  apiVersion: string;
  /** Authentication method. */
  auth?: AuthMethod;
  /** Request timeout in milliseconds. */
  timeout: number;
  /** User-Agent header. */
  userAgent: string;
}

const urlSchema = z.string().url();

const positiveIntSchema = z.coerce.number().int().positive();

/**
 * Creates a default GitHub configuration.
 */
export function createDefaultConfig(): GitHubConfig {
  return {
    baseUrl: DEFAULT_BASE_URL,
    graphqlPath: DEFAULT_GRAPHQL_PATH,
    apiVersion: DEFAULT_API_VERSION,
    auth: undefined,
    timeout: DEFAULT_TIMEOUT,
    userAgent: DEFAULT_USER_AGENT,
  };
}

/**
 * Validates a GitHub configuration.
 * @throws {GitHubError} If the configuration is invalid.
 */
export function validateConfig(config: GitHubConfig): void {
  if (!config.baseUrl || config.baseUrl.trim() === '') {
    throw new GitHubError(
      GitHubErrorKind.InvalidBaseUrl,
      'Base URL cannot be empty'
    );
  }

  if (!config.baseUrl.startsWith('http://') && !config.baseUrl.startsWith('https://')) {
    throw new GitHubError(
      GitHubErrorKind.InvalidBaseUrl,
      'Base URL must start with http:// or https://'
    );
  }

  const urlResult = urlSchema.safeParse(config.baseUrl);
  if (!urlResult.success) {
    throw new GitHubError(
      GitHubErrorKind.InvalidBaseUrl,
      `Invalid base URL format: ${config.baseUrl}`
    );
  }

  if (!config.userAgent || config.userAgent.trim() === '') {
    throw new GitHubError(
      GitHubErrorKind.InvalidConfiguration,
      'User-Agent is required by GitHub API'
    );
  }

  if (config.timeout <= 0) {
    throw new GitHubError(
      GitHubErrorKind.InvalidConfiguration,
      'Timeout must be greater than 0'
    );
  }
}

/**
 * Builder for GitHubConfig.
 */
export class GitHubConfigBuilder {
  private config: GitHubConfig;

  constructor() {
    this.config = createDefaultConfig();
  }

  baseUrl(url: string): this {
    this.config.baseUrl = url;
    return this;
  }

  graphqlPath(path: string): this {
    this.config.graphqlPath = path;
    return this;
  }

  apiVersion(version: string): this {
    this.config.apiVersion = version;
    return this;
  }

  auth(auth: AuthMethod): this {
    this.config.auth = auth;
    return this;
  }

  /**
   * Sets the request timeout in milliseconds.
   */
  timeout(timeout: number): this {
    this.config.timeout = timeout;
    return this;
  }

  userAgent(userAgent: string): this {
    this.config.userAgent = userAgent;
    return this;
  }

  /**
   * Builds and validates the configuration.
   * @throws {GitHubError} If the configuration is invalid.
   */
  build(): GitHubConfig {
    validateConfig(this.config);
    return { ...this.config };
  }
}

/**
 * Builds a configuration from environment variables.
 *
 * Reads `GITHUB_API_URL`, `GITHUB_GRAPHQL_PATH`, `GITHUB_API_VERSION`,
 * `GITHUB_TIMEOUT` and the credentials understood by {@link authFromEnv}.
 *
 * @throws {GitHubError} If no credentials are set or a value is invalid.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): GitHubConfig {
  const auth = authFromEnv(env);
  if (!auth) {
    throw new GitHubError(
      GitHubErrorKind.MissingAuth,
      'No GitHub authentication credentials found in environment (set GITHUB_TOKEN or GH_TOKEN)'
    );
  }

  const builder = new GitHubConfigBuilder().auth(auth);
  if (env.GITHUB_API_URL) {
    builder.baseUrl(env.GITHUB_API_URL);
  }
  if (env.GITHUB_GRAPHQL_PATH) {
    builder.graphqlPath(env.GITHUB_GRAPHQL_PATH);
  }
  if (env.GITHUB_API_VERSION) {
    builder.apiVersion(env.GITHUB_API_VERSION);
  }
  if (env.GITHUB_TIMEOUT) {
    const timeout = positiveIntSchema.safeParse(env.GITHUB_TIMEOUT);
    if (!timeout.success) {
      throw GitHubError.configuration(`GITHUB_TIMEOUT must be a positive integer, got "${env.GITHUB_TIMEOUT}"`);
    }
    builder.timeout(timeout.data);
  }

  return builder.build();
}

/**
 * Namespace for GitHubConfig-related utilities.
 */
export namespace GitHubConfig {
  export function builder(): GitHubConfigBuilder {
    return new GitHubConfigBuilder();
  }

  export function defaultConfig(): GitHubConfig {
    return createDefaultConfig();
  }

  export function fromEnv(env?: NodeJS.ProcessEnv): GitHubConfig {
    return configFromEnv(env);
  }

  export function validate(config: GitHubConfig): void {
    validateConfig(config);
  }
}
