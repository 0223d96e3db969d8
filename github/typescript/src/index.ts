/**
 * GitHub Projects v2 client with a deterministic record/replay harness.
 *
 * @example
 * ```typescript
 * import { GitHubProjectsClient } from 'gh-project-import';
 *
 * const client = GitHubProjectsClient.fromEnv();
 * const project = await client.findProject('octo-org/Roadmap');
 * const itemId = await client.createDraftIssue(project.id, 'Triage backlog', '');
 * ```
 *
 * @module gh-project-import
 */

// Core modules
export * from './auth.js';
export * from './client.js';
export * from './config.js';
export * from './errors.js';
export * from './transport.js';
export * from './types.js';

// Projects
export * from './projects/index.js';

// Record/replay
export * from './simulation/index.js';

// Observability
export * from './observability/index.js';
