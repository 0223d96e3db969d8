/**
 * Authentication mechanisms for the GitHub API.
 * @module auth
 */

import * as jose from 'jose';
import { GitHubError, GitHubErrorKind } from './errors.js';

/**
 * Secret string wrapper to prevent accidental exposure.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value.
   * Use with caution - avoid logging or displaying.
   */
  expose(): string {
    return this.value;
  }

  toString(): string {
    return '***';
  }

  toJSON(): string {
    return '***';
  }
}

/**
 * GitHub App authentication configuration.
 */
export interface AppAuth {
  /** GitHub App ID. */
  appId: number;
  /** Private key (PKCS#8 PEM). */
  privateKey: SecretString;
  /** Installation ID; required to act on projects. */
  installationId?: number;
}

/**
 * Authentication method for the GitHub API.
 */
export type AuthMethod =
  | { type: 'pat'; token: SecretString }
  | { type: 'app'; auth: AppAuth }
  | { type: 'actions'; token: SecretString };

/**
 * Authentication method factory functions.
 */
export namespace AuthMethod {
  /**
   * Creates a personal access token authentication method.
   */
  export function pat(token: string): AuthMethod {
    return { type: 'pat', token: new SecretString(token) };
  }

  /**
   * Creates a GitHub Actions token authentication method.
   */
  export function actions(token: string): AuthMethod {
    return { type: 'actions', token: new SecretString(token) };
  }

  /**
   * Creates a GitHub App authentication method.
   */
  export function app(
    appId: number,
    privateKey: string,
    installationId?: number
  ): AuthMethod {
    return {
      type: 'app',
      auth: {
        appId,
        privateKey: new SecretString(privateKey),
        installationId,
      },
    };
  }

  /**
   * Gets the token prefix for logging.
   */
  export function tokenPrefix(method: AuthMethod): string {
    switch (method.type) {
      case 'pat': {
        const exposed = method.token.expose();
        if (exposed.startsWith('ghp_')) {
          return 'ghp_***';
        } else if (exposed.startsWith('github_pat_')) {
          return 'github_pat_***';
        }
        return '***';
      }
      case 'actions':
        return 'ghs_***';
      case 'app':
        return 'app_jwt';
    }
  }
}

/**
 * Installation token issued for a GitHub App installation.
 */
export interface InstallationToken {
  /** Access token. */
  token: string;
  /** Expiration time. */
  expiresAt: Date;
}

/**
 * Exchanges an app JWT for an installation token.
 */
export type InstallationTokenFetcher = (
  jwt: string,
  installationId: number
) => Promise<InstallationToken>;

interface CachedToken {
  token: SecretString;
  expiresAt: Date;
}

/** Installation tokens are refreshed this long before they expire. */
const TOKEN_REFRESH_BUFFER_MS = 5 * 60 * 1000;

/**
 * Authentication manager for handling token exchange and caching.
 */
export class AuthManager {
  private readonly method: AuthMethod;
  private readonly fetchInstallationToken?: InstallationTokenFetcher;
  private cachedInstallationToken?: CachedToken;

  constructor(method: AuthMethod, fetchInstallationToken?: InstallationTokenFetcher) {
    this.method = method;
    this.fetchInstallationToken = fetchInstallationToken;
  }

  /**
   * Generates the Authorization header value.
   */
  async getAuthHeader(): Promise<string> {
    switch (this.method.type) {
      case 'pat':
      case 'actions':
        return `Bearer ${this.method.token.expose()}`;

      case 'app': {
        const app = this.method.auth;
        const jwt = await this.generateJwt(app);
        if (app.installationId === undefined || !this.fetchInstallationToken) {
          return `Bearer ${jwt}`;
        }

        const cached = this.getCachedInstallationToken();
        if (cached) {
          return `Bearer ${cached.expose()}`;
        }

        const issued = await this.fetchInstallationToken(jwt, app.installationId);
        this.cacheInstallationToken(issued.token, issued.expiresAt);
        return `Bearer ${issued.token}`;
      }
    }
  }

  /**
   * Generates a JWT for GitHub App authentication.
   */
  async generateJwt(app: AppAuth): Promise<string> {
    const now = Math.floor(Date.now() / 1000);
    // Issued 60 seconds in the past for clock drift.
    const iat = now - 60;
    // GitHub caps app JWTs at 10 minutes.
    const exp = now + 9 * 60;

    try {
      const privateKey = await jose.importPKCS8(app.privateKey.expose(), 'RS256');

      return await new jose.SignJWT({})
        .setProtectedHeader({ alg: 'RS256', typ: 'JWT' })
        .setIssuedAt(iat)
        .setExpirationTime(exp)
        .setIssuer(app.appId.toString())
        .sign(privateKey);
    } catch (error) {
      if (error instanceof Error) {
        throw new GitHubError(
          GitHubErrorKind.InvalidAppCredentials,
          `Failed to generate JWT: ${error.message}`,
          { cause: error }
        );
      }
      throw new GitHubError(
        GitHubErrorKind.AppAuthenticationFailed,
        'Failed to generate JWT'
      );
    }
  }

  /**
   * Caches an installation token.
   */
  cacheInstallationToken(token: string, expiresAt: Date): void {
    this.cachedInstallationToken = {
      token: new SecretString(token),
      expiresAt,
    };
  }

  private getCachedInstallationToken(): SecretString | undefined {
    if (!this.cachedInstallationToken) {
      return undefined;
    }

    const refreshAt = this.cachedInstallationToken.expiresAt.getTime() - TOKEN_REFRESH_BUFFER_MS;
    if (refreshAt > Date.now()) {
      return this.cachedInstallationToken.token;
    }

    return undefined;
  }
}

/**
 * Resolves an authentication method from environment variables.
 *
 * Priority: GitHub App > Actions token > personal access token.
 * Returns `undefined` when no credentials are present.
 */
export function authFromEnv(env: NodeJS.ProcessEnv = process.env): AuthMethod | undefined {
  const appId = env.GITHUB_APP_ID;
  const privateKey = env.GITHUB_APP_PRIVATE_KEY;
  if (appId && privateKey) {
    const installationId = env.GITHUB_APP_INSTALLATION_ID;
    return AuthMethod.app(
      parseInt(appId, 10),
      privateKey,
      installationId ? parseInt(installationId, 10) : undefined
    );
  }

  const actionsToken = env.GITHUB_ACTIONS_TOKEN;
  if (actionsToken) {
    return AuthMethod.actions(actionsToken);
  }

  const token = env.GITHUB_TOKEN || env.GH_TOKEN || env.GITHUB_PAT;
  if (token) {
    return AuthMethod.pat(token);
  }

  return undefined;
}
