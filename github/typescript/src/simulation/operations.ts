/**
 * How each Projects capability is recorded and decoded on replay.
 * @module simulation/operations
 */

import type { ProjectsClient } from '../projects/client.js';
import {
  contentRecordSchema,
  itemIdSchema,
  loginSchema,
  projectFieldsSchema,
  projectSchema,
} from '../projects/schemas.js';
import { jsonDecoder, voidDecoder, type PayloadDecoder } from './codec.js';
import type { CallDescriptor } from './types.js';

/** Name of a {@link ProjectsClient} method. */
export type Capability = keyof ProjectsClient;

type CallDescriptors = {
  [K in Capability]: (...args: Parameters<ProjectsClient[K]>) => CallDescriptor;
};

type ResponseDecoders = {
  [K in Capability]: PayloadDecoder<Awaited<ReturnType<ProjectsClient[K]>>>;
};

function graphqlCall(operationName: string, args: Record<string, unknown>): CallDescriptor {
  return {
    method: 'POST',
    target: `graphql#${operationName}`,
    requestBody: JSON.stringify(args),
  };
}

/**
 * Descriptor recorded for each capability. GraphQL operations share one
 * endpoint, so the target carries the operation name.
 */
export const callDescriptors: CallDescriptors = {
  getUser: () => ({ method: 'GET', target: 'user' }),
  findProject: (identifier) => graphqlCall('FindProject', { identifier }),
  getProjectFields: (projectId) => graphqlCall('GetProjectFields', { projectId }),
  createDraftIssue: (projectId, title, body) => graphqlCall('AddDraftIssue', { projectId, title, body }),
  createProjectItem: (projectId, contentId) => graphqlCall('AddProjectItem', { projectId, contentId }),
  getIssueOrPullRequest: (url) => ({ method: 'GET', target: url }),
  setProjectItemFieldValue: (projectId, itemId, fieldId, value) =>
    graphqlCall('UpdateItemFieldValue', { projectId, itemId, fieldId, value }),
  deleteProjectItem: (projectId, itemId) => graphqlCall('DeleteProjectItem', { projectId, itemId }),
  createProject: (owner, title, description) => graphqlCall('CreateProject', { owner, title, description }),
  deleteProject: (projectId) => graphqlCall('DeleteProject', { projectId }),
};

export const responseDecoders: ResponseDecoders = {
  getUser: jsonDecoder(loginSchema),
  findProject: jsonDecoder(projectSchema),
  getProjectFields: jsonDecoder(projectFieldsSchema),
  createDraftIssue: jsonDecoder(itemIdSchema),
  createProjectItem: jsonDecoder(itemIdSchema),
  getIssueOrPullRequest: jsonDecoder(contentRecordSchema),
  setProjectItemFieldValue: voidDecoder,
  deleteProjectItem: voidDecoder,
  createProject: jsonDecoder(projectSchema),
  deleteProject: voidDecoder,
};
