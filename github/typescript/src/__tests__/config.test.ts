import { describe, expect, it } from 'vitest';
import { AuthMethod } from '../auth.js';
import {
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT,
  GitHubConfig,
  GitHubConfigBuilder,
  configFromEnv,
  createDefaultConfig,
  validateConfig,
} from '../config.js';
import { GitHubErrorKind } from '../errors.js';

describe('GitHub config', () => {
  describe('defaults', () => {
    it('should target the public API', () => {
      const config = createDefaultConfig();

      expect(config.baseUrl).toBe(DEFAULT_BASE_URL);
      expect(config.graphqlPath).toBe('graphql');
      expect(config.timeout).toBe(DEFAULT_TIMEOUT);
      expect(config.auth).toBeUndefined();
    });
  });

  describe('builder', () => {
    it('should build a complete config', () => {
      const config = GitHubConfig.builder()
        .baseUrl('https://ghe.example.com/api/v3')
        .graphqlPath('api/graphql')
        .apiVersion('2022-11-28')
        .auth(AuthMethod.pat('test-token'))
        .timeout(5000)
        .userAgent('importer-tests')
        .build();

      expect(config).toMatchObject({
        baseUrl: 'https://ghe.example.com/api/v3',
        graphqlPath: 'api/graphql',
        timeout: 5000,
        userAgent: 'importer-tests',
      });
      expect(config.auth?.type).toBe('pat');
    });

    it('should reject invalid base URLs', () => {
      expect(() => new GitHubConfigBuilder().baseUrl('').build()).toThrow('Base URL cannot be empty');
      expect(() => new GitHubConfigBuilder().baseUrl('ftp://example.com').build()).toThrow(
        'Base URL must start with http:// or https://'
      );
    });

    it('should reject a non-positive timeout', () => {
      expect(() => new GitHubConfigBuilder().timeout(0).build()).toThrow('Timeout must be greater than 0');
    });

    it('should require a user agent', () => {
      expect(() => validateConfig({ ...createDefaultConfig(), userAgent: ' ' })).toThrow(
        'User-Agent is required by GitHub API'
      );
    });
  });

  describe('configFromEnv', () => {
    it('should require credentials', () => {
      let thrown: unknown;
      try {
        configFromEnv({});
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toMatchObject({ kind: GitHubErrorKind.MissingAuth });
    });

    it('should read connection settings', () => {
      const config = configFromEnv({
        GITHUB_TOKEN: 'test-token',
        GITHUB_API_URL: 'https://ghe.example.com/api/v3',
        GITHUB_GRAPHQL_PATH: 'api/graphql',
        GITHUB_TIMEOUT: '2500',
      });

      expect(config.baseUrl).toBe('https://ghe.example.com/api/v3');
      expect(config.graphqlPath).toBe('api/graphql');
      expect(config.timeout).toBe(2500);
    });

    it('should reject a malformed timeout', () => {
      expect(() => configFromEnv({ GITHUB_TOKEN: 'test-token', GITHUB_TIMEOUT: 'soon' })).toThrow(
        'GITHUB_TIMEOUT must be a positive integer, got "soon"'
      );
    });
  });
});
