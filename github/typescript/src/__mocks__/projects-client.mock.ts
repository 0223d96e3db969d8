import { vi, type Mock } from 'vitest';
import type { ProjectsClient } from '../projects/client.js';
import type { ContentRecord, Project, ProjectField, ProjectFieldValue } from '../types.js';

export interface FakeProjectsClient extends ProjectsClient {
  getUser: Mock<[], Promise<string>>;
  findProject: Mock<[string], Promise<Project>>;
  getProjectFields: Mock<[string], Promise<ProjectField[]>>;
  createDraftIssue: Mock<[string, string, string], Promise<string>>;
  createProjectItem: Mock<[string, string], Promise<string>>;
  getIssueOrPullRequest: Mock<[string], Promise<ContentRecord>>;
  setProjectItemFieldValue: Mock<[string, string, string, ProjectFieldValue], Promise<void>>;
  deleteProjectItem: Mock<[string, string], Promise<void>>;
  createProject: Mock<[string, string, string?], Promise<Project>>;
  deleteProject: Mock<[string], Promise<void>>;
}

/**
 * Live-client stand-in; every method rejects until given a behaviour.
 */
export function createFakeProjectsClient(): FakeProjectsClient {
  const unexpected = (name: string) => () => Promise.reject(new Error(`unexpected call to ${name}`));
  return {
    getUser: vi.fn<[], Promise<string>>(unexpected('getUser')),
    findProject: vi.fn<[string], Promise<Project>>(unexpected('findProject')),
    getProjectFields: vi.fn<[string], Promise<ProjectField[]>>(unexpected('getProjectFields')),
    createDraftIssue: vi.fn<[string, string, string], Promise<string>>(unexpected('createDraftIssue')),
    createProjectItem: vi.fn<[string, string], Promise<string>>(unexpected('createProjectItem')),
    getIssueOrPullRequest: vi.fn<[string], Promise<ContentRecord>>(unexpected('getIssueOrPullRequest')),
    setProjectItemFieldValue: vi.fn<[string, string, string, ProjectFieldValue], Promise<void>>(unexpected('setProjectItemFieldValue')),
    deleteProjectItem: vi.fn<[string, string], Promise<void>>(unexpected('deleteProjectItem')),
    createProject: vi.fn<[string, string, string?], Promise<Project>>(unexpected('createProject')),
    deleteProject: vi.fn<[string], Promise<void>>(unexpected('deleteProject')),
  };
}
