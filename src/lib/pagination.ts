/**
 * Cursor-based pagination utility for GitHub GraphQL API.
 *
 * Walks any connection reachable by a dot-separated path in the
 * response, e.g. "node.items" for a project's items.
 */

import type { PageInfo } from "../types.js";
import { extractOperationName } from "./debug-logger.js";
import { TransportError } from "./errors.js";

export interface PaginatedResponse<T> {
  nodes: T[];
  totalCount?: number;
}

export interface PaginateOptions {
  /** Maximum number of items per page (default: 100) */
  pageSize?: number;
  /** Maximum total items to fetch across all pages (default: unlimited) */
  maxItems?: number;
}

interface RawConnection {
  nodes: unknown[];
  pageInfo: PageInfo;
  totalCount?: number;
}

/**
 * Extract a nested value from an object using a dot-separated path.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split(".")) {
    if (current == null || typeof current !== "object") return undefined;
    current = Reflect.get(current, part);
  }
  return current;
}

function isConnection(value: unknown): value is RawConnection {
  if (!value || typeof value !== "object") return false;
  if (!("nodes" in value) || !Array.isArray(value.nodes)) return false;
  if (!("pageInfo" in value)) return false;
  const pageInfo = value.pageInfo;
  return (
    !!pageInfo &&
    typeof pageInfo === "object" &&
    "hasNextPage" in pageInfo &&
    typeof pageInfo.hasNextPage === "boolean"
  );
}

/**
 * Paginate a GraphQL connection query.
 *
 * The query must declare `$first: Int!` and `$cursor: String` and select
 * `pageInfo { hasNextPage endCursor }` on the connection. Nodes are
 * returned as produced by the server; `mapNode` narrows each one.
 */
export async function paginateConnection<T>(
  executeQuery: (
    query: string,
    variables: Record<string, unknown>,
  ) => Promise<unknown>,
  query: string,
  variables: Record<string, unknown>,
  connectionPath: string,
  mapNode: (node: unknown) => T | null,
  options: PaginateOptions = {},
): Promise<PaginatedResponse<T>> {
  const pageSize = options.pageSize ?? 100;
  const maxItems = options.maxItems ?? Infinity;

  const allNodes: T[] = [];
  let cursor: string | null = null;
  let totalCount: number | undefined;

  while (allNodes.length < maxItems) {
    const response = await executeQuery(query, {
      ...variables,
      cursor,
      first: Math.min(pageSize, maxItems - allNodes.length),
    });

    const connection = getNestedValue(response, connectionPath);
    if (!isConnection(connection)) {
      throw new TransportError(
        extractOperationName(query) ?? "query",
        new Error(`Connection not found at path "${connectionPath}" in GraphQL response`),
      );
    }

    if (connection.totalCount !== undefined) {
      totalCount = connection.totalCount;
    }

    for (const raw of connection.nodes) {
      const node = mapNode(raw);
      if (node !== null) allNodes.push(node);
    }

    if (!connection.pageInfo.hasNextPage || !connection.pageInfo.endCursor) {
      break;
    }

    cursor = connection.pageInfo.endCursor;
  }

  return { nodes: allNodes, totalCount };
}
