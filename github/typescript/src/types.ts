/**
 * GitHub Projects (v2) types.
 * @module types
 */

/**
 * A GitHub Projects v2 project.
 */
export interface Project {
  /** GraphQL node ID (`PVT_...`). */
  id: string;
  number: number;
  title: string;
  url: string;
}

/**
 * Option of a single-select field, or an iteration of an iteration field.
 */
export interface ProjectFieldOption {
  id: string;
  name: string;
}

/**
 * A field in a project's schema.
 */
export interface ProjectField {
  id: string;
  name: string;
  /** GraphQL `ProjectV2FieldType`, e.g. `TEXT`, `SINGLE_SELECT`, `ITERATION`. */
  dataType: string;
  options?: ProjectFieldOption[];
}

/**
 * Value written to a project item field (`ProjectV2FieldValue`).
 */
export type ProjectFieldValue =
  | { text: string }
  | { number: number }
  | { date: string }
  | { singleSelectOptionId: string }
  | { iterationId: string };

/**
 * Issue or pull request as returned by the REST API.
 */
export type ContentRecord = Record<string, unknown>;

/**
 * Owner of a project.
 */
export type ProjectOwnerType = 'User' | 'Organization';
