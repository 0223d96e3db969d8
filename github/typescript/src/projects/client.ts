/**
 * Capability set of a GitHub Projects client.
 * @module projects/client
 */

import type { ContentRecord, Project, ProjectField, ProjectFieldValue } from '../types.js';

/**
 * Operations the importer performs against GitHub Projects.
 *
 * The live client, the recording decorator, the replaying decorator and the
 * snapshot facade all implement this interface, so callers never branch on
 * which one they hold.
 */
export interface ProjectsClient {
  /** Login of the authenticated user. */
  getUser(): Promise<string>;

  /**
   * Finds a project by `owner/title`, `owner/number` or a bare number
   * (the authenticated user's project).
   */
  findProject(identifier: string): Promise<Project>;

  /** Field schema of a project. */
  getProjectFields(projectId: string): Promise<ProjectField[]>;

  /** Creates a draft issue in a project; resolves with the new item ID. */
  createDraftIssue(projectId: string, title: string, body: string): Promise<string>;

  /** Adds an existing issue or pull request to a project; resolves with the item ID. */
  createProjectItem(projectId: string, contentId: string): Promise<string>;

  /** Issue or pull request behind a github.com URL. */
  getIssueOrPullRequest(url: string): Promise<ContentRecord>;

  setProjectItemFieldValue(
    projectId: string,
    itemId: string,
    fieldId: string,
    value: ProjectFieldValue
  ): Promise<void>;

  deleteProjectItem(projectId: string, itemId: string): Promise<void>;

  /** Creates a project owned by a user or organization login. */
  createProject(owner: string, title: string, description?: string): Promise<Project>;

  deleteProject(projectId: string): Promise<void>;
}
