/**
 * Owner-type resolution: is a login a user or an organization?
 *
 * GitHub has no "any owner's project" query, so the user-shaped query
 * is tried first and the organization-shaped query second. When both
 * fail, the user-path error is the one surfaced. Nothing is cached; each
 * invocation re-resolves.
 */

import type { GitHubClient } from "../github-client.js";
import {
  OWNER_ROOT_FIELD,
  type OwnerKind,
  type ProjectHandle,
  type ProjectV2,
} from "../types.js";
import { CancelledError, ResolutionError, errorMessage } from "./errors.js";

const OWNER_KINDS: readonly OwnerKind[] = ["User", "Organization"];

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ProjectResolution =
  | { status: "resolved"; ownerKind: OwnerKind; project: ProjectHandle }
  | {
      status: "not_found";
      owner: string;
      number: number;
      userError: string;
      organizationError: string;
    };

export interface ResolvedOwner {
  id: string;
  login: string;
  ownerKind: OwnerKind;
}

export type OwnerResolution =
  | ({ status: "resolved" } & ResolvedOwner)
  | {
      status: "not_found";
      login: string;
      userError: string;
      organizationError: string;
    };

type Attempt<T> = { ok: true; value: T } | { ok: false; error: string };

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

const PROJECT_QUERY = `query GetOWNER_KINDProject($owner: String!, $number: Int!) {
  OWNER_TYPE(login: $owner) {
    projectV2(number: $number) {
      id
      title
      number
      url
      shortDescription
      closed
    }
  }
}`;

const OWNER_QUERY = `query GetOWNER_KINDOwner($login: String!) {
  OWNER_TYPE(login: $login) {
    id
    login
  }
}`;

function shapeFor(template: string, kind: OwnerKind): string {
  return template
    .replace("OWNER_KIND", kind)
    .replace("OWNER_TYPE", OWNER_ROOT_FIELD[kind]);
}

/**
 * Run one owner-kind attempt. Cancellation is not a resolution failure
 * and is re-thrown rather than handed to the next kind.
 */
async function attempt<T>(run: () => Promise<T | null>, missing: string): Promise<Attempt<T>> {
  try {
    const value = await run();
    return value === null ? { ok: false, error: missing } : { ok: true, value };
  } catch (error) {
    if (error instanceof CancelledError) throw error;
    return { ok: false, error: errorMessage(error) };
  }
}

// ---------------------------------------------------------------------------
// Project resolution
// ---------------------------------------------------------------------------

async function queryProjectAs(
  client: GitHubClient,
  kind: OwnerKind,
  owner: string,
  number: number,
  signal?: AbortSignal,
): Promise<Attempt<ProjectV2>> {
  const root = OWNER_ROOT_FIELD[kind];
  return attempt(
    async () => {
      const result = await client.query<
        Partial<Record<string, { projectV2: ProjectV2 | null } | null>>
      >(shapeFor(PROJECT_QUERY, kind), { owner, number }, { signal });
      return result[root]?.projectV2 ?? null;
    },
    `${kind.toLowerCase()} "${owner}" has no project #${number}`,
  );
}

export async function resolveProject(
  client: GitHubClient,
  owner: string,
  number: number,
  signal?: AbortSignal,
): Promise<ProjectResolution> {
  const errors: Record<OwnerKind, string> = { User: "", Organization: "" };

  for (const kind of OWNER_KINDS) {
    const result = await queryProjectAs(client, kind, owner, number, signal);
    if (result.ok) {
      const project = result.value;
      return {
        status: "resolved",
        ownerKind: kind,
        project: Object.freeze({
          id: project.id,
          number: project.number,
          owner,
          ownerKind: kind,
          title: project.title,
          closed: project.closed,
          url: project.url,
          shortDescription: project.shortDescription ?? null,
        }),
      };
    }
    errors[kind] = result.error;
  }

  return {
    status: "not_found",
    owner,
    number,
    userError: errors.User,
    organizationError: errors.Organization,
  };
}

/**
 * Resolve a project or raise a ResolutionError carrying the user-path
 * failure.
 */
export async function requireProject(
  client: GitHubClient,
  owner: string,
  number: number,
  signal?: AbortSignal,
): Promise<ProjectHandle> {
  const resolution = await resolveProject(client, owner, number, signal);
  if (resolution.status === "resolved") return resolution.project;
  throw new ResolutionError(
    `project not found for user or organization ${owner}: ${resolution.userError}`,
  );
}

// ---------------------------------------------------------------------------
// Owner resolution
// ---------------------------------------------------------------------------

export async function resolveOwner(
  client: GitHubClient,
  login: string,
  signal?: AbortSignal,
): Promise<OwnerResolution> {
  const errors: Record<OwnerKind, string> = { User: "", Organization: "" };

  for (const kind of OWNER_KINDS) {
    const root = OWNER_ROOT_FIELD[kind];
    const result = await attempt(
      async () => {
        const response = await client.query<
          Partial<Record<string, { id: string; login: string } | null>>
        >(shapeFor(OWNER_QUERY, kind), { login }, { signal });
        return response[root] ?? null;
      },
      `no ${kind.toLowerCase()} with login "${login}"`,
    );
    if (result.ok) {
      return {
        status: "resolved",
        id: result.value.id,
        login: result.value.login,
        ownerKind: kind,
      };
    }
    errors[kind] = result.error;
  }

  return {
    status: "not_found",
    login,
    userError: errors.User,
    organizationError: errors.Organization,
  };
}

export async function requireOwner(
  client: GitHubClient,
  login: string,
  signal?: AbortSignal,
): Promise<ResolvedOwner> {
  const resolution = await resolveOwner(client, login, signal);
  if (resolution.status === "resolved") {
    return {
      id: resolution.id,
      login: resolution.login,
      ownerKind: resolution.ownerKind,
    };
  }
  throw new ResolutionError(
    `owner not found as user or organization ${login}: ${resolution.userError}`,
  );
}
