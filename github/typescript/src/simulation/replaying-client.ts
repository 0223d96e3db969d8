/**
 * Replaying decorator: serves every capability from a snapshot.
 * @module simulation/replaying-client
 */

import type { ProjectsClient } from '../projects/client.js';
import type { ContentRecord, Project, ProjectField, ProjectFieldValue } from '../types.js';
import { callDescriptors, responseDecoders } from './operations.js';
import type { CallReplayer } from './replayer.js';

export class ReplayingProjectsClient implements ProjectsClient {
  constructor(private readonly replayer: CallReplayer) {}

  getUser(): Promise<string> {
    return this.replayer.replay(callDescriptors.getUser(), responseDecoders.getUser);
  }

  findProject(identifier: string): Promise<Project> {
    return this.replayer.replay(callDescriptors.findProject(identifier), responseDecoders.findProject);
  }

  getProjectFields(projectId: string): Promise<ProjectField[]> {
    return this.replayer.replay(
      callDescriptors.getProjectFields(projectId),
      responseDecoders.getProjectFields
    );
  }

  createDraftIssue(projectId: string, title: string, body: string): Promise<string> {
    return this.replayer.replay(
      callDescriptors.createDraftIssue(projectId, title, body),
      responseDecoders.createDraftIssue
    );
  }

  createProjectItem(projectId: string, contentId: string): Promise<string> {
    return this.replayer.replay(
      callDescriptors.createProjectItem(projectId, contentId),
      responseDecoders.createProjectItem
    );
  }

  getIssueOrPullRequest(url: string): Promise<ContentRecord> {
    return this.replayer.replay(
      callDescriptors.getIssueOrPullRequest(url),
      responseDecoders.getIssueOrPullRequest
    );
  }

  setProjectItemFieldValue(
    projectId: string,
    itemId: string,
    fieldId: string,
    value: ProjectFieldValue
  ): Promise<void> {
    return this.replayer.replay(
      callDescriptors.setProjectItemFieldValue(projectId, itemId, fieldId, value),
      responseDecoders.setProjectItemFieldValue
    );
  }

  deleteProjectItem(projectId: string, itemId: string): Promise<void> {
    return this.replayer.replay(
      callDescriptors.deleteProjectItem(projectId, itemId),
      responseDecoders.deleteProjectItem
    );
  }

  createProject(owner: string, title: string, description?: string): Promise<Project> {
    return this.replayer.replay(
      callDescriptors.createProject(owner, title, description),
      responseDecoders.createProject
    );
  }

  deleteProject(projectId: string): Promise<void> {
    return this.replayer.replay(callDescriptors.deleteProject(projectId), responseDecoders.deleteProject);
  }
}
