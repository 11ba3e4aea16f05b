/**
 * TypeScript types for GitHub Projects V2 GraphQL responses.
 *
 * These types model the parts of the Projects V2 schema that the
 * portability and bulk-mutation pipeline reads and writes.
 */

// ---------------------------------------------------------------------------
// Pagination
// ---------------------------------------------------------------------------

export interface PageInfo {
  hasNextPage: boolean;
  endCursor: string | null;
}

export interface Connection<T> {
  nodes: T[];
  pageInfo: PageInfo;
  totalCount?: number;
}

// ---------------------------------------------------------------------------
// Rate Limiting
// ---------------------------------------------------------------------------

export interface RateLimitInfo {
  limit: number;
  remaining: number;
  resetAt: string;
  cost: number;
  nodeCount?: number;
}

// ---------------------------------------------------------------------------
// Owners
// ---------------------------------------------------------------------------

export type OwnerKind = "User" | "Organization";

/** GraphQL root field used to reach each owner kind. */
export const OWNER_ROOT_FIELD: Record<OwnerKind, "user" | "organization"> = {
  User: "user",
  Organization: "organization",
};

// ---------------------------------------------------------------------------
// Projects V2 - Fields
// ---------------------------------------------------------------------------

export const FIELD_DATA_TYPES = [
  "ASSIGNEES",
  "DATE",
  "ISSUE_TYPE",
  "ITERATION",
  "LABELS",
  "LINKED_PULL_REQUESTS",
  "MILESTONE",
  "NUMBER",
  "PARENT_ISSUE",
  "REPOSITORY",
  "REVIEWERS",
  "SINGLE_SELECT",
  "SUB_ISSUES_PROGRESS",
  "TEXT",
  "TITLE",
  "TRACKED_BY",
  "TRACKS",
] as const;

export type ProjectV2FieldDataType = (typeof FIELD_DATA_TYPES)[number];

/** Data types accepted by createProjectV2Field. */
export const CREATABLE_FIELD_TYPES = [
  "TEXT",
  "NUMBER",
  "DATE",
  "SINGLE_SELECT",
] as const;

export type CreatableFieldType = (typeof CREATABLE_FIELD_TYPES)[number];

export function isCreatableFieldType(
  dataType: string,
): dataType is CreatableFieldType {
  return CREATABLE_FIELD_TYPES.some((type) => type === dataType);
}

/** Fields every newly created project starts with. */
export const DEFAULT_PROJECT_FIELDS: ReadonlyArray<{
  name: string;
  dataType: ProjectV2FieldDataType;
}> = [
  { name: "Title", dataType: "TITLE" },
  { name: "Assignees", dataType: "ASSIGNEES" },
  { name: "Status", dataType: "SINGLE_SELECT" },
  { name: "Labels", dataType: "LABELS" },
  { name: "Linked pull requests", dataType: "LINKED_PULL_REQUESTS" },
  { name: "Milestone", dataType: "MILESTONE" },
  { name: "Repository", dataType: "REPOSITORY" },
  { name: "Reviewers", dataType: "REVIEWERS" },
  { name: "Parent issue", dataType: "PARENT_ISSUE" },
  { name: "Sub-issues progress", dataType: "SUB_ISSUES_PROGRESS" },
];

export interface ProjectV2SingleSelectFieldOption {
  id: string;
  name: string;
  color?: string;
  description?: string;
}

export interface ProjectV2Field {
  id: string;
  name: string;
  dataType: string;
  options?: ProjectV2SingleSelectFieldOption[];
}

// ---------------------------------------------------------------------------
// Projects V2 - Items
// ---------------------------------------------------------------------------

export type ProjectV2ItemType =
  | "ISSUE"
  | "PULL_REQUEST"
  | "DRAFT_ISSUE"
  | "REDACTED";

// ---------------------------------------------------------------------------
// Projects V2 - Views
// ---------------------------------------------------------------------------

export const VIEW_LAYOUTS = [
  "TABLE_LAYOUT",
  "BOARD_LAYOUT",
  "ROADMAP_LAYOUT",
] as const;

export type ProjectV2ViewLayout = (typeof VIEW_LAYOUTS)[number];

export interface ProjectV2View {
  id: string;
  name: string;
  number: number;
  layout: ProjectV2ViewLayout;
  filter?: string | null;
}

// ---------------------------------------------------------------------------
// Projects V2 - Project
// ---------------------------------------------------------------------------

export interface ProjectV2 {
  id: string;
  title: string;
  number: number;
  url: string;
  shortDescription?: string | null;
  closed: boolean;
  owner?: { login: string };
}

/**
 * A project resolved against a concrete owner kind. Built only by the
 * owner-type resolver; never constructed from raw user input.
 */
export interface ProjectHandle {
  readonly id: string;
  readonly number: number;
  readonly owner: string;
  readonly ownerKind: OwnerKind;
  readonly title: string;
  readonly closed: boolean;
  readonly url: string;
  readonly shortDescription: string | null;
}

// ---------------------------------------------------------------------------
// MCP Tool Helpers
// ---------------------------------------------------------------------------

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{
    type: "text";
    text: string;
  }>;
  isError?: boolean;
}

export function toolSuccess(data: unknown): ToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(data, null, 2) }],
  };
}

export function toolError(message: string): ToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify({ error: message }) }],
    isError: true,
  };
}
