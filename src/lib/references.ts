/**
 * Parsers for human-entered project and item identifiers.
 *
 * Pure functions: no I/O and no ambient repository context. A bare
 * `#123` is rejected because nothing here knows which repository it
 * belongs to.
 */

import { ValidationError } from "./errors.js";

export interface ProjectReference {
  owner: string;
  number: number;
}

export interface ItemReference {
  owner: string;
  repo: string;
  number: number;
  /** Set when the reference was a URL. */
  kind?: "issue" | "pull";
}

const GITHUB_URL_PREFIX = /^https?:\/\/(www\.)?github\.com\//i;

/**
 * Parse a decimal, positive integer. The offending literal is echoed back
 * in the error.
 */
export function parsePositiveInteger(literal: string, what: string): number {
  const trimmed = literal.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ValidationError(`invalid ${what}: "${literal}"`);
  }
  const value = Number.parseInt(trimmed, 10);
  if (value <= 0 || !Number.isSafeInteger(value)) {
    throw new ValidationError(`invalid ${what}: "${literal}"`);
  }
  return value;
}

/**
 * Parse `owner/number`. Splits on the last `/`.
 */
export function parseProjectReference(ref: string): ProjectReference {
  const slash = ref.lastIndexOf("/");
  const owner = slash >= 0 ? ref.slice(0, slash).trim() : "";
  const numberLiteral = slash >= 0 ? ref.slice(slash + 1) : "";

  if (!owner || !numberLiteral.trim()) {
    throw new ValidationError(
      `invalid project reference format: "${ref}" (expected owner/number)`,
    );
  }

  return {
    owner,
    number: parsePositiveInteger(numberLiteral, "project number in reference"),
  };
}

export function formatProjectReference(owner: string, number: number): string {
  return `${owner}/${number}`;
}

function parseGitHubUrl(url: string): ItemReference {
  const path = url
    .replace(GITHUB_URL_PREFIX, "")
    .replace(/[?#].*$/, "")
    .replace(/\/+$/, "");
  const parts = path.split("/");

  if (parts.length !== 4 || !parts[0] || !parts[1]) {
    throw new ValidationError(`invalid GitHub URL format: "${url}"`);
  }

  const [owner, repo, segment, numberLiteral] = parts;
  if (segment !== "issues" && segment !== "pull") {
    throw new ValidationError(
      `invalid GitHub URL format: "${url}" (expected /issues/N or /pull/N)`,
    );
  }

  return {
    owner,
    repo,
    number: parsePositiveInteger(numberLiteral, "item number in URL"),
    kind: segment === "issues" ? "issue" : "pull",
  };
}

/**
 * Parse `owner/repo#number` or an issue / pull request URL.
 */
export function parseItemReference(ref: string): ItemReference {
  const trimmed = ref.trim();

  if (GITHUB_URL_PREFIX.test(trimmed)) {
    return parseGitHubUrl(trimmed);
  }

  const hash = trimmed.indexOf("#");
  if (hash < 0) {
    throw new ValidationError(`unrecognized item reference format: "${ref}"`);
  }
  if (trimmed.indexOf("#", hash + 1) >= 0) {
    throw new ValidationError(`invalid item reference format: "${ref}"`);
  }

  const repoPath = trimmed.slice(0, hash);
  const numberLiteral = trimmed.slice(hash + 1);

  if (!repoPath) {
    throw new ValidationError(
      `repository context required for reference: "${ref}" (use owner/repo#number)`,
    );
  }

  const repoParts = repoPath.split("/");
  if (repoParts.length !== 2 || !repoParts[0] || !repoParts[1]) {
    throw new ValidationError(
      `invalid repository format in reference: "${ref}" (expected owner/repo#number)`,
    );
  }

  return {
    owner: repoParts[0],
    repo: repoParts[1],
    number: parsePositiveInteger(numberLiteral, "item number in reference"),
  };
}

export function formatItemReference(
  owner: string,
  repo: string,
  number: number,
): string {
  return `${owner}/${repo}#${number}`;
}

/** True when the string looks like an item reference or URL. */
export function looksLikeItemReference(value: string): boolean {
  const trimmed = value.trim();
  return GITHUB_URL_PREFIX.test(trimmed) || trimmed.includes("#");
}
