/**
 * zod schemas for Projects v2 payloads.
 *
 * Used both to validate live API responses and to decode recorded ones.
 */

import { z } from 'zod';
import type { ContentRecord, Project, ProjectField, ProjectFieldOption } from '../types.js';

/**
 * Schema whose output is `T`, accepting any input.
 */
export type PayloadSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export const projectSchema: PayloadSchema<Project> = z.object({
  id: z.string(),
  number: z.number().int(),
  title: z.string(),
  url: z.string(),
});

export const projectFieldOptionSchema: PayloadSchema<ProjectFieldOption> = z.object({
  id: z.string(),
  name: z.string(),
});

export const projectFieldSchema: PayloadSchema<ProjectField> = z.object({
  id: z.string(),
  name: z.string(),
  dataType: z.string(),
  options: z.array(projectFieldOptionSchema).optional(),
});

export const projectFieldsSchema: PayloadSchema<ProjectField[]> = z.array(projectFieldSchema);

export const contentRecordSchema: PayloadSchema<ContentRecord> = z.record(z.unknown());

export const itemIdSchema: PayloadSchema<string> = z.string();

/**
 * Login of the authenticated user, stored either as the bare string or as
 * the REST `user` object.
 */
export const loginSchema: PayloadSchema<string> = z.union([
  z.string(),
  z.object({ login: z.string() }).transform((user) => user.login),
]);

// Live API response shapes

export const restUserSchema = z.object({
  login: z.string(),
  node_id: z.string(),
  type: z.string(),
});

export const ownedProjectSchema = z.object({
  projectV2: projectSchema.nullable(),
});

export const projectSearchSchema = z.object({
  projectsV2: z.object({
    nodes: z.array(projectSchema.nullable()),
  }),
});

export const viewerProjectResponseSchema = z.object({
  viewer: ownedProjectSchema,
});

export const ownerProjectResponseSchema = z.object({
  organization: ownedProjectSchema.nullish(),
  user: ownedProjectSchema.nullish(),
});

export const ownerProjectsResponseSchema = z.object({
  organization: projectSearchSchema.nullish(),
  user: projectSearchSchema.nullish(),
});

/**
 * Field node as returned by the `fields` connection. Unsupported field
 * types come back as empty objects and fail this schema.
 */
export const fieldNodeSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    dataType: z.string(),
    options: z.array(projectFieldOptionSchema).optional(),
    configuration: z
      .object({
        iterations: z.array(z.object({ id: z.string(), title: z.string() })),
      })
      .optional(),
  })
  .transform((node): ProjectField => {
    const field: ProjectField = { id: node.id, name: node.name, dataType: node.dataType };
    if (node.options) {
      field.options = node.options;
    } else if (node.configuration) {
      field.options = node.configuration.iterations.map((iteration) => ({
        id: iteration.id,
        name: iteration.title,
      }));
    }
    return field;
  });

export const fieldsResponseSchema = z.object({
  node: z
    .object({
      fields: z.object({
        nodes: z.array(z.unknown()),
      }),
    })
    .nullable(),
});

export const addDraftIssueResponseSchema = z.object({
  addProjectV2DraftIssue: z.object({
    projectItem: z.object({ id: z.string() }),
  }),
});

export const addProjectItemResponseSchema = z.object({
  addProjectV2ItemById: z.object({
    item: z.object({ id: z.string() }),
  }),
});

export const createProjectResponseSchema = z.object({
  createProjectV2: z.object({
    projectV2: projectSchema,
  }),
});
