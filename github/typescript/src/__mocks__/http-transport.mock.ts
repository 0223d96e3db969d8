import { vi, type Mock } from 'vitest';
import type { HttpRequest, HttpResponse, HttpTransport } from '../transport.js';

export interface MockHttpTransport extends HttpTransport {
  send: Mock<[HttpRequest], Promise<HttpResponse>>;
}

export function createMockHttpTransport(): MockHttpTransport {
  return {
    send: vi.fn<[HttpRequest], Promise<HttpResponse>>(),
  };
}

export function jsonResponse(
  status: number,
  body: unknown,
  headers: Record<string, string> = {}
): HttpResponse {
  return {
    status,
    headers: { 'content-type': 'application/json', ...headers },
    body: JSON.stringify(body),
  };
}

export function mockHttpTransportResponse(transport: MockHttpTransport, response: HttpResponse): void {
  transport.send.mockResolvedValueOnce(response);
}

export function mockHttpTransportJson(transport: MockHttpTransport, status: number, body: unknown): void {
  transport.send.mockResolvedValueOnce(jsonResponse(status, body));
}

export function mockGraphQLData(transport: MockHttpTransport, data: unknown): void {
  transport.send.mockResolvedValueOnce(jsonResponse(200, { data }));
}

export function mockHttpTransportError(transport: MockHttpTransport, error: Error): void {
  transport.send.mockRejectedValueOnce(error);
}

/**
 * Parsed JSON body of the nth request sent through the transport.
 */
export function sentBody(transport: MockHttpTransport, index: number): unknown {
  const request = transport.send.mock.calls[index]?.[0];
  return request?.body === undefined ? undefined : JSON.parse(request.body);
}
