/**
 * In-process stand-in for the GitHub GraphQL API.
 *
 * Implements GitHubClient by dispatching on the operation name of each
 * document against an in-memory model of owners, projects and issue
 * content. Responses are copied through JSON so callers never share
 * state with the fake.
 */

import type { GitHubClient, RequestOptions } from "../../github-client.js";
import { extractOperationName } from "../../lib/debug-logger.js";
import { CancelledError, GhxError, TransportError } from "../../lib/errors.js";
import { DEFAULT_PROJECT_FIELDS, type OwnerKind } from "../../types.js";

// ---------------------------------------------------------------------------
// Model
// ---------------------------------------------------------------------------

export interface FakeContent {
  __typename: "Issue" | "PullRequest";
  id: string;
  title: string;
  body: string;
  number: number;
  url: string;
  state: string;
  repository: { nameWithOwner: string };
  labels: { nodes: Array<{ name: string }> };
  assignees: { nodes: Array<{ login: string }> };
}

export interface FakeDraft {
  __typename: "DraftIssue";
  id: string;
  title: string;
  body: string;
  assignees: { nodes: Array<{ login: string }> };
}

export interface FakeFieldValue {
  __typename: string;
  text?: string;
  number?: number;
  date?: string;
  name?: string;
  title?: string;
  field: { name: string };
}

export interface FakeItem {
  id: string;
  type: "ISSUE" | "PULL_REQUEST" | "DRAFT_ISSUE";
  isArchived: boolean;
  content: FakeContent | FakeDraft;
  fieldValues: { nodes: FakeFieldValue[] };
}

export interface FakeOption {
  id: string;
  name: string;
  color: string;
  description: string;
}

export interface FakeField {
  id: string;
  name: string;
  dataType: string;
  options?: FakeOption[];
}

export interface FakeView {
  id: string;
  name: string;
  number: number;
  layout: string;
  filter: string | null;
}

export interface FakeProject {
  id: string;
  number: number;
  owner: string;
  title: string;
  url: string;
  shortDescription: string | null;
  closed: boolean;
  items: FakeItem[];
  fields: FakeField[];
  views: FakeView[];
}

export interface RecordedCall {
  operation: string;
  kind: "query" | "mutation";
  document: string;
  variables: Record<string, unknown>;
}

type Handler = (variables: Record<string, unknown>) => unknown;

// ---------------------------------------------------------------------------
// Variable helpers
// ---------------------------------------------------------------------------

function str(variables: Record<string, unknown>, name: string): string {
  const value = variables[name];
  if (typeof value !== "string") {
    throw new Error(`variable ${name} must be a string`);
  }
  return value;
}

function int(variables: Record<string, unknown>, name: string): number {
  const value = variables[name];
  if (typeof value !== "number") {
    throw new Error(`variable ${name} must be a number`);
  }
  return value;
}

function optionsInput(value: unknown): Array<{ name: string; color: string; description: string }> {
  if (!Array.isArray(value)) return [];
  return value.map((entry: unknown) => {
    if (!entry || typeof entry !== "object") throw new Error("bad option input");
    const name = Reflect.get(entry, "name");
    const color = Reflect.get(entry, "color");
    const description = Reflect.get(entry, "description");
    if (typeof name !== "string") throw new Error("option name must be a string");
    return {
      name,
      color: typeof color === "string" ? color : "GRAY",
      description: typeof description === "string" ? description : "",
    };
  });
}

// ---------------------------------------------------------------------------
// Fake
// ---------------------------------------------------------------------------

export class FakeGitHub implements GitHubClient {
  readonly calls: RecordedCall[] = [];
  readonly owners = new Map<string, { id: string; kind: OwnerKind }>();
  readonly projects: FakeProject[] = [];
  readonly content = new Map<string, FakeContent>();
  viewer = "test-user";

  private nextId = 1;
  private readonly handlers = new Map<string, Handler>();
  private readonly failures: Array<{
    operation: string;
    when: (variables: Record<string, unknown>) => boolean;
    error: Error;
  }> = [];

  constructor() {
    this.registerDefaultHandlers();
  }

  // -- setup ---------------------------------------------------------------

  id(prefix: string): string {
    return `${prefix}_${this.nextId++}`;
  }

  addUser(login: string): this {
    this.owners.set(login, { id: this.id("U"), kind: "User" });
    return this;
  }

  addOrganization(login: string): this {
    this.owners.set(login, { id: this.id("O"), kind: "Organization" });
    return this;
  }

  addProject(owner: string, number: number, title: string, shortDescription: string | null = null): FakeProject {
    const project: FakeProject = {
      id: this.id("PVT"),
      number,
      owner,
      title,
      url: `https://github.com/users/${owner}/projects/${number}`,
      shortDescription,
      closed: false,
      items: [],
      fields: [],
      views: [],
    };
    this.projects.push(project);
    return project;
  }

  /** Register an issue or pull request that can be added to projects. */
  addContent(
    repo: string,
    number: number,
    title: string,
    extra: { kind?: "Issue" | "PullRequest"; state?: string; labels?: string[]; assignees?: string[] } = {},
  ): FakeContent {
    const kind = extra.kind ?? "Issue";
    const content: FakeContent = {
      __typename: kind,
      id: this.id(kind === "Issue" ? "I" : "PR"),
      title,
      body: "",
      number,
      url: `https://github.com/${repo}/${kind === "Issue" ? "issues" : "pull"}/${number}`,
      state: extra.state ?? "OPEN",
      repository: { nameWithOwner: repo },
      labels: { nodes: (extra.labels ?? []).map((name) => ({ name })) },
      assignees: { nodes: (extra.assignees ?? []).map((login) => ({ login })) },
    };
    this.content.set(`${repo}#${number}`.toLowerCase(), content);
    return content;
  }

  addItem(project: FakeProject, content: FakeContent | FakeDraft): FakeItem {
    const item: FakeItem = {
      id: this.id("PVTI"),
      type:
        content.__typename === "Issue"
          ? "ISSUE"
          : content.__typename === "PullRequest"
            ? "PULL_REQUEST"
            : "DRAFT_ISSUE",
      isArchived: false,
      content,
      fieldValues: { nodes: [] },
    };
    project.items.push(item);
    return item;
  }

  addDraft(project: FakeProject, title: string, body = ""): FakeItem {
    return this.addItem(project, {
      __typename: "DraftIssue",
      id: this.id("DI"),
      title,
      body,
      assignees: { nodes: [] },
    });
  }

  addField(
    project: FakeProject,
    name: string,
    dataType: string,
    options: string[] = [],
  ): FakeField {
    const field: FakeField = {
      id: this.id("PVTF"),
      name,
      dataType,
      ...(dataType === "SINGLE_SELECT"
        ? {
            options: options.map((option) => ({
              id: this.id("OPT"),
              name: option,
              color: "GRAY",
              description: "",
            })),
          }
        : {}),
    };
    project.fields.push(field);
    return field;
  }

  /** The fields every new project starts with; Status has Todo, In Progress and Done. */
  addDefaultFields(project: FakeProject): FakeProject {
    for (const field of DEFAULT_PROJECT_FIELDS) {
      this.addField(
        project,
        field.name,
        field.dataType,
        field.dataType === "SINGLE_SELECT" ? ["Todo", "In Progress", "Done"] : [],
      );
    }
    return project;
  }

  field(project: FakeProject, name: string): FakeField {
    const field = project.fields.find((f) => f.name === name);
    if (!field) throw new Error(`no field ${name}`);
    return field;
  }

  addView(project: FakeProject, name: string, layout: string, filter: string | null = null): FakeView {
    const view: FakeView = {
      id: this.id("PVTV"),
      name,
      number: project.views.length + 1,
      layout,
      filter,
    };
    project.views.push(view);
    return view;
  }

  setValue(item: FakeItem, field: FakeField, value: string | number): void {
    const nodes = item.fieldValues.nodes.filter((v) => v.field.name !== field.name);
    const ref = { name: field.name };
    switch (field.dataType) {
      case "TEXT":
        nodes.push({ __typename: "ProjectV2ItemFieldTextValue", text: String(value), field: ref });
        break;
      case "NUMBER":
        nodes.push({ __typename: "ProjectV2ItemFieldNumberValue", number: Number(value), field: ref });
        break;
      case "DATE":
        nodes.push({ __typename: "ProjectV2ItemFieldDateValue", date: String(value), field: ref });
        break;
      case "SINGLE_SELECT":
        nodes.push({ __typename: "ProjectV2ItemFieldSingleSelectValue", name: String(value), field: ref });
        break;
      default:
        throw new Error(`cannot set a ${field.dataType} value`);
    }
    item.fieldValues.nodes = nodes;
  }

  /** Make the next matching call to `operation` fail. */
  failOn(
    operation: string,
    error: Error,
    when: (variables: Record<string, unknown>) => boolean = () => true,
  ): this {
    this.failures.push({ operation, when, error });
    return this;
  }

  /** Replace or add the handler for one operation. */
  on(operation: string, handler: Handler): this {
    this.handlers.set(operation, handler);
    return this;
  }

  callsTo(operation: string): RecordedCall[] {
    return this.calls.filter((call) => call.operation === operation);
  }

  mutations(): RecordedCall[] {
    return this.calls.filter((call) => call.kind === "mutation");
  }

  // -- GitHubClient ----------------------------------------------------------

  query<T>(queryString: string, variables?: Record<string, unknown>, options?: RequestOptions): Promise<T> {
    return this.dispatch<T>("query", queryString, variables ?? {}, options);
  }

  mutate<T>(mutation: string, variables?: Record<string, unknown>, options?: RequestOptions): Promise<T> {
    return this.dispatch<T>("mutation", mutation, variables ?? {}, options);
  }

  getRateLimitStatus() {
    return { remaining: 5000, resetAt: new Date(0), isLow: false, isCritical: false };
  }

  getAuthenticatedUser(options?: RequestOptions): Promise<string> {
    return this.query<{ viewer: { login: string } }>(
      "query Viewer { viewer { login } }",
      undefined,
      options,
    ).then((result) => result.viewer.login);
  }

  private async dispatch<T>(
    kind: "query" | "mutation",
    document: string,
    variables: Record<string, unknown>,
    options?: RequestOptions,
  ): Promise<T> {
    const operation = extractOperationName(document) ?? kind;
    if (options?.signal?.aborted) {
      throw new CancelledError(`${operation} cancelled`);
    }
    this.calls.push({ operation, kind, document, variables });

    const failure = this.failures.findIndex(
      (f) => f.operation === operation && f.when(variables),
    );
    if (failure >= 0) {
      const [{ error }] = this.failures.splice(failure, 1);
      throw error instanceof GhxError ? error : new TransportError(operation, error);
    }

    const handler = this.handlers.get(operation);
    if (!handler) {
      throw new TransportError(operation, new Error(`no fake handler for ${operation}`));
    }
    try {
      return JSON.parse(JSON.stringify(handler(variables) ?? null));
    } catch (error) {
      throw error instanceof GhxError ? error : new TransportError(operation, error);
    }
  }

  // -- handlers --------------------------------------------------------------

  private project(projectId: string): FakeProject {
    const project = this.projects.find((p) => p.id === projectId);
    if (!project) throw new Error(`Could not resolve to a node with the global id of '${projectId}'`);
    return project;
  }

  private item(project: FakeProject, itemId: string): FakeItem {
    const item = project.items.find((i) => i.id === itemId);
    if (!item) throw new Error(`Could not resolve to ProjectV2Item with the global id of '${itemId}'`);
    return item;
  }

  private page<T>(nodes: T[], variables: Record<string, unknown>) {
    const first = int(variables, "first");
    const cursor = variables.cursor;
    const start = typeof cursor === "string" ? Number.parseInt(cursor, 10) : 0;
    const end = Math.min(start + first, nodes.length);
    return {
      totalCount: nodes.length,
      pageInfo: { hasNextPage: end < nodes.length, endCursor: end < nodes.length ? String(end) : null },
      nodes: nodes.slice(start, end),
    };
  }

  private ownerLookup(kind: OwnerKind, login: string) {
    const owner = this.owners.get(login);
    if (!owner || owner.kind !== kind) {
      throw new Error(`Could not resolve to a ${kind} with the login of '${login}'.`);
    }
    return owner;
  }

  private registerDefaultHandlers(): void {
    for (const kind of ["User", "Organization"] as const) {
      const root = kind === "User" ? "user" : "organization";

      this.on(`Get${kind}Project`, (v) => {
        const login = str(v, "owner");
        this.ownerLookup(kind, login);
        const project = this.projects.find((p) => p.owner === login && p.number === int(v, "number"));
        if (!project) {
          throw new Error(`Could not resolve to a ProjectV2 with the number ${int(v, "number")}.`);
        }
        return {
          [root]: {
            projectV2: {
              id: project.id,
              title: project.title,
              number: project.number,
              url: project.url,
              shortDescription: project.shortDescription,
              closed: project.closed,
            },
          },
        };
      });

      this.on(`Get${kind}Owner`, (v) => {
        const login = str(v, "login");
        const owner = this.ownerLookup(kind, login);
        return { [root]: { id: owner.id, login } };
      });
    }

    this.on("Viewer", () => ({ viewer: { login: this.viewer } }));

    this.on("GetProjectItems", (v) => ({
      node: { items: this.page(this.project(str(v, "projectId")).items, v) },
    }));
    this.on("GetProjectFields", (v) => ({
      node: { fields: this.page(this.project(str(v, "projectId")).fields, v) },
    }));
    this.on("GetProjectViews", (v) => ({
      node: { views: this.page(this.project(str(v, "projectId")).views, v) },
    }));

    this.on("ResolveContentId", (v) => {
      const content = this.content.get(`${str(v, "owner")}/${str(v, "repo")}#${int(v, "number")}`.toLowerCase());
      return { repository: { issueOrPullRequest: content ? { id: content.id } : null } };
    });

    this.on("CreateProject", (v) => {
      const ownerId = str(v, "ownerId");
      const login = [...this.owners.entries()].find(([, o]) => o.id === ownerId)?.[0];
      if (!login) throw new Error(`Could not resolve to a node with the global id of '${ownerId}'`);
      const number = Math.max(0, ...this.projects.filter((p) => p.owner === login).map((p) => p.number)) + 1;
      const project = this.addDefaultFields(this.addProject(login, number, str(v, "title")));
      return {
        createProjectV2: {
          projectV2: { id: project.id, title: project.title, number: project.number, url: project.url },
        },
      };
    });

    this.on("UpdateProjectDescription", (v) => {
      const project = this.project(str(v, "projectId"));
      project.shortDescription = str(v, "shortDescription");
      return { updateProjectV2: { projectV2: { id: project.id } } };
    });

    this.on("CreateProjectField", (v) => {
      const project = this.project(str(v, "projectId"));
      const name = str(v, "name");
      if (project.fields.some((f) => f.name.toLowerCase() === name.toLowerCase())) {
        throw new Error(`Name has already been taken`);
      }
      const field = this.addField(project, name, str(v, "dataType"));
      if (field.dataType === "SINGLE_SELECT") {
        field.options = optionsInput(v.singleSelectOptions).map((o) => ({ id: this.id("OPT"), ...o }));
      }
      return { createProjectV2Field: { projectV2Field: { id: field.id, name: field.name } } };
    });

    this.on("UpdateFieldOptions", (v) => {
      const fieldId = str(v, "fieldId");
      const field = this.projects.flatMap((p) => p.fields).find((f) => f.id === fieldId);
      if (!field) throw new Error(`Could not resolve to a node with the global id of '${fieldId}'`);
      field.options = optionsInput(v.options).map((o) => ({ id: this.id("OPT"), ...o }));
      return { updateProjectV2Field: { projectV2Field: { id: field.id } } };
    });

    this.on("CreateProjectView", (v) => {
      const project = this.project(str(v, "projectId"));
      const view = this.addView(project, str(v, "name"), str(v, "layout"));
      return { createProjectV2View: { projectV2View: { id: view.id } } };
    });

    this.on("UpdateProjectViewFilter", (v) => {
      const viewId = str(v, "viewId");
      const view = this.projects.flatMap((p) => p.views).find((w) => w.id === viewId);
      if (!view) throw new Error(`Could not resolve to a node with the global id of '${viewId}'`);
      view.filter = str(v, "filter");
      return { updateProjectV2View: { projectV2View: { id: view.id } } };
    });

    this.on("AddProjectItem", (v) => {
      const project = this.project(str(v, "projectId"));
      const contentId = str(v, "contentId");
      const existing = project.items.find((i) => i.content.id === contentId);
      if (existing) return { addProjectV2ItemById: { item: { id: existing.id } } };
      const content = [...this.content.values()].find((c) => c.id === contentId);
      if (!content) throw new Error(`Could not resolve to a node with the global id of '${contentId}'`);
      return { addProjectV2ItemById: { item: { id: this.addItem(project, content).id } } };
    });

    this.on("AddDraftIssue", (v) => {
      const project = this.project(str(v, "projectId"));
      const body = v.body;
      const item = this.addDraft(project, str(v, "title"), typeof body === "string" ? body : "");
      return { addProjectV2DraftIssue: { projectItem: { id: item.id } } };
    });

    this.on("UpdateItemFieldValue", (v) => {
      const project = this.project(str(v, "projectId"));
      const item = this.item(project, str(v, "itemId"));
      const fieldId = str(v, "fieldId");
      const field = project.fields.find((f) => f.id === fieldId);
      if (!field) throw new Error(`Could not resolve to a node with the global id of '${fieldId}'`);
      const value = v.value;
      if (!value || typeof value !== "object") throw new Error("value is required");

      const optionId = Reflect.get(value, "singleSelectOptionId");
      if (typeof optionId === "string") {
        const option = field.options?.find((o) => o.id === optionId);
        if (!option) throw new Error(`Invalid option id '${optionId}'`);
        this.setValue(item, field, option.name);
      } else {
        const scalar = Reflect.get(value, "text") ?? Reflect.get(value, "number") ?? Reflect.get(value, "date");
        if (typeof scalar !== "string" && typeof scalar !== "number") throw new Error("unsupported value");
        this.setValue(item, field, scalar);
      }
      return { updateProjectV2ItemFieldValue: { projectV2Item: { id: item.id } } };
    });

    this.on("DeleteProjectItem", (v) => {
      const project = this.project(str(v, "projectId"));
      const item = this.item(project, str(v, "itemId"));
      project.items = project.items.filter((i) => i !== item);
      return { deleteProjectV2Item: { deletedItemId: item.id } };
    });

    this.on("ArchiveProjectItem", (v) => {
      const project = this.project(str(v, "projectId"));
      const item = this.item(project, str(v, "itemId"));
      item.isArchived = true;
      return { archiveProjectV2Item: { item: { id: item.id } } };
    });
  }
}
