/**
 * Live GitHub Projects v2 client.
 * @module projects/github-client
 */

import type { z } from 'zod';
import { GitHubHttpClient, type GitHubHttpClientOptions } from '../client.js';
import { configFromEnv } from '../config.js';
import { GitHubError } from '../errors.js';
import type { ContentRecord, Project, ProjectField, ProjectFieldValue, ProjectOwnerType } from '../types.js';
import type { ProjectsClient } from './client.js';
import {
  ADD_DRAFT_ISSUE_MUTATION,
  ADD_PROJECT_ITEM_MUTATION,
  CREATE_PROJECT_MUTATION,
  DELETE_PROJECT_ITEM_MUTATION,
  DELETE_PROJECT_MUTATION,
  ORGANIZATION_PROJECTS_QUERY,
  ORGANIZATION_PROJECT_QUERY,
  PROJECT_FIELDS_QUERY,
  UPDATE_ITEM_FIELD_VALUE_MUTATION,
  UPDATE_PROJECT_DESCRIPTION_MUTATION,
  USER_PROJECTS_QUERY,
  USER_PROJECT_QUERY,
  VIEWER_PROJECT_QUERY,
} from './queries.js';
import {
  addDraftIssueResponseSchema,
  addProjectItemResponseSchema,
  contentRecordSchema,
  createProjectResponseSchema,
  fieldNodeSchema,
  fieldsResponseSchema,
  ownerProjectResponseSchema,
  ownerProjectsResponseSchema,
  restUserSchema,
  viewerProjectResponseSchema,
} from './schemas.js';

const CONTENT_URL_PATTERN = /github\.com\/([^/]+)\/([^/]+)\/(?:issues|pull)\/(\d+)/;
const REPOSITORY_URL_PATTERN = /github\.com\/([^/]+)\/([^/]+)/;
const NUMBER_PATTERN = /^\d+$/;

/**
 * Extracts owner and repository name from a GitHub URL.
 */
export function parseRepositoryUrl(url: string): { owner: string; repo: string } {
  const match = REPOSITORY_URL_PATTERN.exec(url);
  if (!match) {
    throw GitHubError.invalidParameter(`invalid GitHub URL format: ${url}`);
  }
  return { owner: match[1], repo: match[2] };
}

/**
 * Extracts owner, repository and number from an issue or pull request URL.
 */
export function parseContentUrl(url: string): { owner: string; repo: string; number: number } {
  const { owner, repo } = parseRepositoryUrl(url);
  const match = CONTENT_URL_PATTERN.exec(url);
  if (!match) {
    throw GitHubError.invalidParameter(`could not extract issue/PR number from URL: ${url}`);
  }
  return { owner, repo, number: parseInt(match[3], 10) };
}

/**
 * {@link ProjectsClient} backed by the GitHub GraphQL and REST APIs.
 */
export class GitHubProjectsClient implements ProjectsClient {
  constructor(private readonly http: GitHubHttpClient) {}

  /**
   * Creates a client from environment credentials (see `configFromEnv`).
   */
  static fromEnv(options?: GitHubHttpClientOptions): GitHubProjectsClient {
    return new GitHubProjectsClient(new GitHubHttpClient(configFromEnv(), options));
  }

  async getUser(): Promise<string> {
    const user = this.expect(restUserSchema, await this.http.get('user'), 'user');
    return user.login;
  }

  async findProject(identifier: string): Promise<Project> {
    const trimmed = identifier.trim();
    if (NUMBER_PATTERN.test(trimmed)) {
      return this.findViewerProject(parseInt(trimmed, 10));
    }

    const separator = trimmed.indexOf('/');
    const owner = separator > 0 ? trimmed.slice(0, separator) : '';
    const name = separator > 0 ? trimmed.slice(separator + 1) : '';
    if (owner === '' || name === '') {
      throw GitHubError.invalidParameter(
        `invalid project identifier format: ${identifier} (expected owner/project-name, owner/number or project-number)`
      );
    }

    const ownerType = await this.getOwnerType(owner);
    if (NUMBER_PATTERN.test(name)) {
      return this.findOwnedProject(owner, ownerType, parseInt(name, 10));
    }
    return this.searchOwnedProject(owner, ownerType, name);
  }

  async getProjectFields(projectId: string): Promise<ProjectField[]> {
    const data = this.expect(
      fieldsResponseSchema,
      await this.http.graphql(PROJECT_FIELDS_QUERY, { projectId }),
      'project fields'
    );
    if (!data.node) {
      throw GitHubError.notFound(`project ${projectId} not found`);
    }

    const fields: ProjectField[] = [];
    for (const node of data.node.fields.nodes) {
      const parsed = fieldNodeSchema.safeParse(node);
      // Field types without a matching fragment come back empty.
      if (parsed.success) {
        fields.push(parsed.data);
      }
    }
    return fields;
  }

  async createDraftIssue(projectId: string, title: string, body: string): Promise<string> {
    const data = this.expect(
      addDraftIssueResponseSchema,
      await this.http.graphql(ADD_DRAFT_ISSUE_MUTATION, { projectId, title, body }),
      'draft issue'
    );
    return data.addProjectV2DraftIssue.projectItem.id;
  }

  async createProjectItem(projectId: string, contentId: string): Promise<string> {
    const data = this.expect(
      addProjectItemResponseSchema,
      await this.http.graphql(ADD_PROJECT_ITEM_MUTATION, { projectId, contentId }),
      'project item'
    );
    return data.addProjectV2ItemById.item.id;
  }

  async getIssueOrPullRequest(url: string): Promise<ContentRecord> {
    const { owner, repo, number } = parseContentUrl(url);

    let raw: unknown;
    try {
      raw = await this.http.get(`repos/${owner}/${repo}/issues/${number}`);
    } catch {
      try {
        raw = await this.http.get(`repos/${owner}/${repo}/pulls/${number}`);
      } catch (pullError) {
        if (pullError instanceof GitHubError) {
          throw new GitHubError(pullError.kind, `failed to get issue/PR ${url}: ${pullError.message}`, {
            statusCode: pullError.statusCode,
            requestId: pullError.requestId,
            cause: pullError,
          });
        }
        throw pullError;
      }
    }

    return this.expect(contentRecordSchema, raw, 'issue or pull request');
  }

  async setProjectItemFieldValue(
    projectId: string,
    itemId: string,
    fieldId: string,
    value: ProjectFieldValue
  ): Promise<void> {
    await this.http.graphql(UPDATE_ITEM_FIELD_VALUE_MUTATION, { projectId, itemId, fieldId, value });
  }

  async deleteProjectItem(projectId: string, itemId: string): Promise<void> {
    await this.http.graphql(DELETE_PROJECT_ITEM_MUTATION, { projectId, itemId });
  }

  async createProject(owner: string, title: string, description?: string): Promise<Project> {
    const user = this.expect(restUserSchema, await this.http.get(`users/${owner}`), 'owner');
    const data = this.expect(
      createProjectResponseSchema,
      await this.http.graphql(CREATE_PROJECT_MUTATION, { ownerId: user.node_id, title }),
      'created project'
    );
    const project = data.createProjectV2.projectV2;

    if (description) {
      await this.http.graphql(UPDATE_PROJECT_DESCRIPTION_MUTATION, {
        projectId: project.id,
        description,
      });
    }

    return project;
  }

  async deleteProject(projectId: string): Promise<void> {
    await this.http.graphql(DELETE_PROJECT_MUTATION, { projectId });
  }

  private async getOwnerType(login: string): Promise<ProjectOwnerType> {
    const user = this.expect(restUserSchema, await this.http.get(`users/${login}`), 'owner');
    return user.type === 'Organization' ? 'Organization' : 'User';
  }

  private async findViewerProject(number: number): Promise<Project> {
    const data = this.expect(
      viewerProjectResponseSchema,
      await this.http.graphql(VIEWER_PROJECT_QUERY, { number }),
      'project'
    );
    if (!data.viewer.projectV2) {
      throw GitHubError.notFound(`project with number ${number} not found`);
    }
    return data.viewer.projectV2;
  }

  private async findOwnedProject(
    owner: string,
    ownerType: ProjectOwnerType,
    number: number
  ): Promise<Project> {
    const raw =
      ownerType === 'Organization'
        ? await this.http.graphql(ORGANIZATION_PROJECT_QUERY, { login: owner, number })
        : await this.http.graphql(USER_PROJECT_QUERY, { login: owner, number });

    const data = this.expect(ownerProjectResponseSchema, raw, 'project');
    const project = (data.organization ?? data.user)?.projectV2;
    if (!project) {
      throw GitHubError.notFound(`project ${owner}/${number} not found`);
    }
    return project;
  }

  private async searchOwnedProject(
    owner: string,
    ownerType: ProjectOwnerType,
    name: string
  ): Promise<Project> {
    const raw =
      ownerType === 'Organization'
        ? await this.http.graphql(ORGANIZATION_PROJECTS_QUERY, { login: owner, search: name })
        : await this.http.graphql(USER_PROJECTS_QUERY, { login: owner, search: name });

    const data = this.expect(ownerProjectsResponseSchema, raw, 'projects');
    const nodes = (data.organization ?? data.user)?.projectsV2.nodes ?? [];

    // The search is fuzzy; only an exact title counts.
    const project = nodes.find((node) => node !== null && node.title === name);
    if (!project) {
      throw GitHubError.notFound(`project ${owner}/${name} not found`);
    }
    return project;
  }

  private expect<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what: string): T {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      throw GitHubError.deserialization(`unexpected ${what} response format: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
