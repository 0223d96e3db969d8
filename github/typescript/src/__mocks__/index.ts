export {
  createMockHttpTransport,
  jsonResponse,
  mockGraphQLData,
  mockHttpTransportError,
  mockHttpTransportJson,
  mockHttpTransportResponse,
  sentBody,
} from './http-transport.mock.js';

export type { MockHttpTransport } from './http-transport.mock.js';

export { createFakeProjectsClient } from './projects-client.mock.js';

export type { FakeProjectsClient } from './projects-client.mock.js';
