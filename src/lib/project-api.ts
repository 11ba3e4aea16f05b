/**
 * Reads and writes against a single Projects V2 project.
 *
 * Every query is named so the debug log and TransportError carry the
 * operation. Node shapes coming back from GitHub are narrowed with zod;
 * a node that does not match is a malformed response, not a skipped row.
 */

import { z } from "zod";
import type { GitHubClient } from "../github-client.js";
import {
  VIEW_LAYOUTS,
  type CreatableFieldType,
  type ProjectV2Field,
  type ProjectV2ItemType,
  type ProjectV2View,
  type ProjectV2ViewLayout,
} from "../types.js";
import { ResolutionError, TransportError } from "./errors.js";
import { paginateConnection } from "./pagination.js";
import { formatItemReference, type ItemReference } from "./references.js";

// ---------------------------------------------------------------------------
// Node schemas
// ---------------------------------------------------------------------------

const loginNode = z.object({ login: z.string() }).nullable();
const nameNode = z.object({ name: z.string() }).nullable();

const contentSchema = z.object({
  __typename: z.enum(["Issue", "PullRequest", "DraftIssue"]),
  id: z.string(),
  title: z.string(),
  body: z.string().nullish(),
  number: z.number().int().optional(),
  url: z.string().optional(),
  state: z.string().optional(),
  repository: z.object({ nameWithOwner: z.string() }).optional(),
  labels: z.object({ nodes: z.array(nameNode) }).nullish(),
  assignees: z.object({ nodes: z.array(loginNode) }).nullish(),
});

const fieldValueSchema = z.object({
  __typename: z.string().optional(),
  text: z.string().nullish(),
  number: z.number().nullish(),
  date: z.string().nullish(),
  name: z.string().nullish(),
  title: z.string().nullish(),
  field: z.object({ name: z.string().optional() }).nullish(),
});

const itemNodeSchema = z.object({
  id: z.string(),
  type: z.enum(["ISSUE", "PULL_REQUEST", "DRAFT_ISSUE", "REDACTED"]),
  isArchived: z.boolean().optional(),
  content: contentSchema.nullable(),
  fieldValues: z.object({ nodes: z.array(fieldValueSchema.nullable()) }),
});

const fieldOptionSchema = z.object({
  id: z.string(),
  name: z.string(),
  color: z.string().optional(),
  description: z.string().nullish(),
});

const fieldNodeSchema = z.object({
  id: z.string(),
  name: z.string(),
  dataType: z.string(),
  options: z.array(fieldOptionSchema).optional(),
});

const viewNodeSchema = z.object({
  id: z.string(),
  name: z.string(),
  number: z.number().int(),
  layout: z.enum(VIEW_LAYOUTS),
  filter: z.string().nullish(),
});

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type FieldScalar = string | number;

export type ContentType = "Issue" | "PullRequest" | "DraftIssue";

/** A project item flattened to what export, filtering and bulk need. */
export interface ProjectItemRecord {
  id: string;
  type: ProjectV2ItemType;
  isArchived: boolean;
  contentType: ContentType | null;
  contentId: string | null;
  title: string;
  body: string | null;
  number: number | null;
  url: string | null;
  state: string | null;
  /** `owner/repo` of the issue or pull request. */
  repository: string | null;
  labels: string[];
  assignees: string[];
  /** Custom field values keyed by field name. */
  fieldValues: Record<string, FieldScalar>;
}

export interface NewFieldOption {
  name: string;
  color?: string;
  description?: string;
}

export interface CreatedProject {
  id: string;
  title: string;
  number: number;
  url: string;
}

/** Value accepted by updateProjectV2ItemFieldValue. */
export type FieldValueInput =
  | { text: string }
  | { number: number }
  | { date: string }
  | { singleSelectOptionId: string };

type FieldValueNode = z.infer<typeof fieldValueSchema>;

// ---------------------------------------------------------------------------
// Node mapping
// ---------------------------------------------------------------------------

function narrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  operation: string,
  what: string,
): (node: unknown) => T | null {
  return (node) => {
    if (node === null) return null;
    const parsed = schema.safeParse(node);
    if (!parsed.success) {
      throw new TransportError(
        operation,
        new Error(`malformed ${what} in response: ${parsed.error.issues[0]?.message ?? "invalid"}`),
      );
    }
    return parsed.data;
  };
}

/** Scalar for a field value node, or null for built-in or empty values. */
export function fieldValueScalar(node: FieldValueNode): FieldScalar | null {
  switch (node.__typename) {
    case "ProjectV2ItemFieldTextValue":
      return node.text ?? null;
    case "ProjectV2ItemFieldNumberValue":
      return node.number ?? null;
    case "ProjectV2ItemFieldDateValue":
      return node.date ? node.date.slice(0, 10) : null;
    case "ProjectV2ItemFieldSingleSelectValue":
      return node.name ?? null;
    case "ProjectV2ItemFieldIterationValue":
      return node.title ?? null;
    default:
      return null;
  }
}

function toItemRecord(node: z.infer<typeof itemNodeSchema>): ProjectItemRecord {
  const content = node.content;
  const fieldValues: Record<string, FieldScalar> = {};
  for (const value of node.fieldValues.nodes) {
    const fieldName = value?.field?.name;
    if (!value || !fieldName) continue;
    const scalar = fieldValueScalar(value);
    if (scalar !== null) fieldValues[fieldName] = scalar;
  }

  return {
    id: node.id,
    type: node.type,
    isArchived: node.isArchived ?? false,
    contentType: content?.__typename ?? null,
    contentId: content?.id ?? null,
    title: content?.title ?? "",
    body: content?.body ?? null,
    number: content?.number ?? null,
    url: content?.url ?? null,
    state: content?.state ?? null,
    repository: content?.repository?.nameWithOwner ?? null,
    labels: (content?.labels?.nodes ?? []).flatMap((l) => (l ? [l.name] : [])),
    assignees: (content?.assignees?.nodes ?? []).flatMap((a) => (a ? [a.login] : [])),
    fieldValues,
  };
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

const CONTENT_FIELDS = `
  id
  title
  body
  number
  url
  state
  repository { nameWithOwner }
  labels(first: 100) { nodes { name } }
  assignees(first: 10) { nodes { login } }`;

const FIELD_NAME = `field { ... on ProjectV2FieldCommon { name } }`;

const ITEMS_QUERY = `query GetProjectItems($projectId: ID!, $cursor: String, $first: Int!) {
  node(id: $projectId) {
    ... on ProjectV2 {
      items(first: $first, after: $cursor) {
        totalCount
        pageInfo { hasNextPage endCursor }
        nodes {
          id
          type
          isArchived
          content {
            __typename
            ... on Issue {${CONTENT_FIELDS}
            }
            ... on PullRequest {${CONTENT_FIELDS}
            }
            ... on DraftIssue {
              id
              title
              body
              assignees(first: 10) { nodes { login } }
            }
          }
          fieldValues(first: 50) {
            nodes {
              __typename
              ... on ProjectV2ItemFieldTextValue { text ${FIELD_NAME} }
              ... on ProjectV2ItemFieldNumberValue { number ${FIELD_NAME} }
              ... on ProjectV2ItemFieldDateValue { date ${FIELD_NAME} }
              ... on ProjectV2ItemFieldSingleSelectValue { name ${FIELD_NAME} }
              ... on ProjectV2ItemFieldIterationValue { title ${FIELD_NAME} }
            }
          }
        }
      }
    }
  }
}`;

const FIELDS_QUERY = `query GetProjectFields($projectId: ID!, $cursor: String, $first: Int!) {
  node(id: $projectId) {
    ... on ProjectV2 {
      fields(first: $first, after: $cursor) {
        totalCount
        pageInfo { hasNextPage endCursor }
        nodes {
          ... on ProjectV2FieldCommon { id name dataType }
          ... on ProjectV2SingleSelectField {
            options { id name color description }
          }
        }
      }
    }
  }
}`;

const VIEWS_QUERY = `query GetProjectViews($projectId: ID!, $cursor: String, $first: Int!) {
  node(id: $projectId) {
    ... on ProjectV2 {
      views(first: $first, after: $cursor) {
        totalCount
        pageInfo { hasNextPage endCursor }
        nodes { id name number layout filter }
      }
    }
  }
}`;

function executor(client: GitHubClient, signal?: AbortSignal) {
  return (query: string, variables: Record<string, unknown>) =>
    client.query<unknown>(query, variables, { signal });
}

export async function fetchProjectItems(
  client: GitHubClient,
  projectId: string,
  signal?: AbortSignal,
): Promise<ProjectItemRecord[]> {
  const result = await paginateConnection(
    executor(client, signal),
    ITEMS_QUERY,
    { projectId },
    "node.items",
    narrow(itemNodeSchema, "GetProjectItems", "project item"),
  );
  return result.nodes.map(toItemRecord);
}

export async function fetchProjectFields(
  client: GitHubClient,
  projectId: string,
  signal?: AbortSignal,
): Promise<ProjectV2Field[]> {
  const result = await paginateConnection(
    executor(client, signal),
    FIELDS_QUERY,
    { projectId },
    "node.fields",
    narrow(fieldNodeSchema, "GetProjectFields", "project field"),
  );
  return result.nodes.map((field) => ({
    id: field.id,
    name: field.name,
    dataType: field.dataType,
    ...(field.options
      ? {
          options: field.options.map((o) => ({
            id: o.id,
            name: o.name,
            ...(o.color ? { color: o.color } : {}),
            ...(o.description ? { description: o.description } : {}),
          })),
        }
      : {}),
  }));
}

export async function fetchProjectViews(
  client: GitHubClient,
  projectId: string,
  signal?: AbortSignal,
): Promise<ProjectV2View[]> {
  const result = await paginateConnection(
    executor(client, signal),
    VIEWS_QUERY,
    { projectId },
    "node.views",
    narrow(viewNodeSchema, "GetProjectViews", "project view"),
  );
  return result.nodes;
}

/**
 * Look up the node id of an issue or pull request.
 */
export async function resolveContentId(
  client: GitHubClient,
  ref: ItemReference,
  signal?: AbortSignal,
): Promise<string> {
  const result = await client.query<{
    repository: { issueOrPullRequest: { id: string } | null } | null;
  }>(
    `query ResolveContentId($owner: String!, $repo: String!, $number: Int!) {
      repository(owner: $owner, name: $repo) {
        issueOrPullRequest(number: $number) {
          ... on Issue { id }
          ... on PullRequest { id }
        }
      }
    }`,
    { owner: ref.owner, repo: ref.repo, number: ref.number },
    { signal },
  );

  const id = result.repository?.issueOrPullRequest?.id;
  if (!id) {
    throw new ResolutionError(
      `${formatItemReference(ref.owner, ref.repo, ref.number)} not found`,
    );
  }
  return id;
}

// ---------------------------------------------------------------------------
// Mutations
// ---------------------------------------------------------------------------

export async function createProject(
  client: GitHubClient,
  ownerId: string,
  title: string,
  signal?: AbortSignal,
): Promise<CreatedProject> {
  const result = await client.mutate<{
    createProjectV2: { projectV2: CreatedProject };
  }>(
    `mutation CreateProject($ownerId: ID!, $title: String!) {
      createProjectV2(input: { ownerId: $ownerId, title: $title }) {
        projectV2 { id title number url }
      }
    }`,
    { ownerId, title },
    { signal },
  );
  return result.createProjectV2.projectV2;
}

export async function updateProjectDescription(
  client: GitHubClient,
  projectId: string,
  shortDescription: string,
  signal?: AbortSignal,
): Promise<void> {
  await client.mutate(
    `mutation UpdateProjectDescription($projectId: ID!, $shortDescription: String!) {
      updateProjectV2(input: { projectId: $projectId, shortDescription: $shortDescription }) {
        projectV2 { id }
      }
    }`,
    { projectId, shortDescription },
    { signal },
  );
}

function optionInputs(options: NewFieldOption[]) {
  return options.map((o) => ({
    name: o.name,
    color: o.color ?? "GRAY",
    description: o.description ?? "",
  }));
}

export async function createField(
  client: GitHubClient,
  projectId: string,
  field: { name: string; dataType: CreatableFieldType; options?: NewFieldOption[] },
  signal?: AbortSignal,
): Promise<{ id: string; name: string }> {
  const result = await client.mutate<{
    createProjectV2Field: { projectV2Field: { id: string; name: string } };
  }>(
    `mutation CreateProjectField(
      $projectId: ID!,
      $name: String!,
      $dataType: ProjectV2CustomFieldType!,
      $singleSelectOptions: [ProjectV2SingleSelectFieldOptionInput!]
    ) {
      createProjectV2Field(input: {
        projectId: $projectId,
        name: $name,
        dataType: $dataType,
        singleSelectOptions: $singleSelectOptions
      }) {
        projectV2Field {
          ... on ProjectV2FieldCommon { id name }
        }
      }
    }`,
    {
      projectId,
      name: field.name,
      dataType: field.dataType,
      ...(field.dataType === "SINGLE_SELECT"
        ? { singleSelectOptions: optionInputs(field.options ?? []) }
        : {}),
    },
    { signal },
  );
  return result.createProjectV2Field.projectV2Field;
}

/**
 * Replace a single-select field's options. GitHub takes the full list.
 */
export async function updateFieldOptions(
  client: GitHubClient,
  fieldId: string,
  options: NewFieldOption[],
  signal?: AbortSignal,
): Promise<void> {
  await client.mutate(
    `mutation UpdateFieldOptions($fieldId: ID!, $options: [ProjectV2SingleSelectFieldOptionInput!]!) {
      updateProjectV2Field(input: { fieldId: $fieldId, singleSelectOptions: $options }) {
        projectV2Field {
          ... on ProjectV2SingleSelectField { id }
        }
      }
    }`,
    { fieldId, options: optionInputs(options) },
    { signal },
  );
}

export async function createView(
  client: GitHubClient,
  projectId: string,
  view: { name: string; layout: ProjectV2ViewLayout },
  signal?: AbortSignal,
): Promise<{ id: string }> {
  const result = await client.mutate<{
    createProjectV2View: { projectV2View: { id: string } };
  }>(
    `mutation CreateProjectView($projectId: ID!, $name: String!, $layout: ProjectV2ViewLayout!) {
      createProjectV2View(input: { projectId: $projectId, name: $name, layout: $layout }) {
        projectV2View { id }
      }
    }`,
    { projectId, name: view.name, layout: view.layout },
    { signal },
  );
  return result.createProjectV2View.projectV2View;
}

export async function updateViewFilter(
  client: GitHubClient,
  viewId: string,
  filter: string,
  signal?: AbortSignal,
): Promise<void> {
  await client.mutate(
    `mutation UpdateProjectViewFilter($viewId: ID!, $filter: String!) {
      updateProjectV2View(input: { viewId: $viewId, filter: $filter }) {
        projectV2View { id }
      }
    }`,
    { viewId, filter },
    { signal },
  );
}

export async function addItemById(
  client: GitHubClient,
  projectId: string,
  contentId: string,
  signal?: AbortSignal,
): Promise<string> {
  const result = await client.mutate<{
    addProjectV2ItemById: { item: { id: string } };
  }>(
    `mutation AddProjectItem($projectId: ID!, $contentId: ID!) {
      addProjectV2ItemById(input: { projectId: $projectId, contentId: $contentId }) {
        item { id }
      }
    }`,
    { projectId, contentId },
    { signal },
  );
  return result.addProjectV2ItemById.item.id;
}

export async function addDraftIssue(
  client: GitHubClient,
  projectId: string,
  draft: { title: string; body?: string },
  signal?: AbortSignal,
): Promise<string> {
  const result = await client.mutate<{
    addProjectV2DraftIssue: { projectItem: { id: string } };
  }>(
    `mutation AddDraftIssue($projectId: ID!, $title: String!, $body: String) {
      addProjectV2DraftIssue(input: { projectId: $projectId, title: $title, body: $body }) {
        projectItem { id }
      }
    }`,
    { projectId, title: draft.title, body: draft.body ?? null },
    { signal },
  );
  return result.addProjectV2DraftIssue.projectItem.id;
}

export async function updateItemFieldValue(
  client: GitHubClient,
  projectId: string,
  itemId: string,
  fieldId: string,
  value: FieldValueInput,
  signal?: AbortSignal,
): Promise<void> {
  await client.mutate(
    `mutation UpdateItemFieldValue($projectId: ID!, $itemId: ID!, $fieldId: ID!, $value: ProjectV2FieldValue!) {
      updateProjectV2ItemFieldValue(input: {
        projectId: $projectId,
        itemId: $itemId,
        fieldId: $fieldId,
        value: $value
      }) {
        projectV2Item { id }
      }
    }`,
    { projectId, itemId, fieldId, value },
    { signal },
  );
}

export async function deleteItem(
  client: GitHubClient,
  projectId: string,
  itemId: string,
  signal?: AbortSignal,
): Promise<void> {
  await client.mutate(
    `mutation DeleteProjectItem($projectId: ID!, $itemId: ID!) {
      deleteProjectV2Item(input: { projectId: $projectId, itemId: $itemId }) {
        deletedItemId
      }
    }`,
    { projectId, itemId },
    { signal },
  );
}

export async function archiveItem(
  client: GitHubClient,
  projectId: string,
  itemId: string,
  signal?: AbortSignal,
): Promise<void> {
  await client.mutate(
    `mutation ArchiveProjectItem($projectId: ID!, $itemId: ID!) {
      archiveProjectV2Item(input: { projectId: $projectId, itemId: $itemId }) {
        item { id }
      }
    }`,
    { projectId, itemId },
    { signal },
  );
}
