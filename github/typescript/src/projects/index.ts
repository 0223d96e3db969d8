export type { ProjectsClient } from './client.js';
export { GitHubProjectsClient, parseContentUrl, parseRepositoryUrl } from './github-client.js';
export * from './schemas.js';
