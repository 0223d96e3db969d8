/**
 * HTTP transport used by the GitHub client.
 * @module transport
 */

import { GitHubError } from './errors.js';

/**
 * HTTP method types
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Outgoing HTTP request.
 */
export interface HttpRequest {
  method: HttpMethod;
  /** Absolute URL. */
  url: string;
  headers: Record<string, string>;
  /** Serialized request body. */
  body?: string;
  /** Request timeout in milliseconds. */
  timeout: number;
}

/**
 * Raw HTTP response; the body is left unparsed.
 */
export interface HttpResponse {
  status: number;
  /** Response headers with lower-cased names. */
  headers: Record<string, string>;
  body: string;
}

/**
 * Sends HTTP requests.
 *
 * Implementations resolve with any HTTP status and reject only when no
 * response was received.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Transport backed by the global `fetch`.
 */
export class FetchTransport implements HttpTransport {
  async send(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), request.timeout);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return {
        status: response.status,
        headers,
        body: await response.text(),
      };
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw GitHubError.timeout(`Request timeout after ${request.timeout}ms`);
      }
      const cause = error instanceof Error ? error : undefined;
      throw GitHubError.connection(
        `Request to ${request.url} failed: ${cause ? cause.message : String(error)}`,
        cause
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
