/**
 * Recording decorator over a live Projects client.
 * @module simulation/recording-client
 */

import type { ProjectsClient } from '../projects/client.js';
import type { ContentRecord, Project, ProjectField, ProjectFieldValue } from '../types.js';
import { callDescriptors } from './operations.js';
import type { CallRecorder } from './recorder.js';

export class RecordingProjectsClient implements ProjectsClient {
  constructor(
    private readonly inner: ProjectsClient,
    private readonly recorder: CallRecorder
  ) {}

  getUser(): Promise<string> {
    return this.recorder.record(callDescriptors.getUser(), () => this.inner.getUser());
  }

  findProject(identifier: string): Promise<Project> {
    return this.recorder.record(callDescriptors.findProject(identifier), () =>
      this.inner.findProject(identifier)
    );
  }

  getProjectFields(projectId: string): Promise<ProjectField[]> {
    return this.recorder.record(callDescriptors.getProjectFields(projectId), () =>
      this.inner.getProjectFields(projectId)
    );
  }

  createDraftIssue(projectId: string, title: string, body: string): Promise<string> {
    return this.recorder.record(callDescriptors.createDraftIssue(projectId, title, body), () =>
      this.inner.createDraftIssue(projectId, title, body)
    );
  }

  createProjectItem(projectId: string, contentId: string): Promise<string> {
    return this.recorder.record(callDescriptors.createProjectItem(projectId, contentId), () =>
      this.inner.createProjectItem(projectId, contentId)
    );
  }

  getIssueOrPullRequest(url: string): Promise<ContentRecord> {
    return this.recorder.record(callDescriptors.getIssueOrPullRequest(url), () =>
      this.inner.getIssueOrPullRequest(url)
    );
  }

  setProjectItemFieldValue(
    projectId: string,
    itemId: string,
    fieldId: string,
    value: ProjectFieldValue
  ): Promise<void> {
    return this.recorder.record(
      callDescriptors.setProjectItemFieldValue(projectId, itemId, fieldId, value),
      () => this.inner.setProjectItemFieldValue(projectId, itemId, fieldId, value)
    );
  }

  deleteProjectItem(projectId: string, itemId: string): Promise<void> {
    return this.recorder.record(callDescriptors.deleteProjectItem(projectId, itemId), () =>
      this.inner.deleteProjectItem(projectId, itemId)
    );
  }

  createProject(owner: string, title: string, description?: string): Promise<Project> {
    return this.recorder.record(callDescriptors.createProject(owner, title, description), () =>
      this.inner.createProject(owner, title, description)
    );
  }

  deleteProject(projectId: string): Promise<void> {
    return this.recorder.record(callDescriptors.deleteProject(projectId), () =>
      this.inner.deleteProject(projectId)
    );
  }
}
