/**
 * Bulk target assembly.
 *
 * Targets come from up to three sources: a numeric range, a live filter
 * over the project's items, and a file of identifiers. Every identifier
 * is put in canonical form against the project's item index before the
 * union is deduplicated, so `42`, `acme/api#42` and the item's node id
 * collapse to one target when they name the same item.
 */

import { readFile } from "node:fs/promises";
import { ValidationError, errorMessage } from "./errors.js";
import type { ProjectItemRecord } from "./project-api.js";
import {
  formatItemReference,
  looksLikeItemReference,
  parseItemReference,
  parsePositiveInteger,
} from "./references.js";

export const FILTER_KEYS = ["label", "assignee", "state"] as const;
export type FilterKey = (typeof FILTER_KEYS)[number];

export interface TargetFilter {
  key: FilterKey;
  value: string;
}

export interface TargetSources {
  /** `N` or `N-M`. */
  items?: string;
  /** `key:value`. */
  filter?: string;
  /** Path to a file with one identifier per line. */
  file?: string;
  /** Identifiers given inline; taken after the file's. */
  identifiers?: string[];
}

/** Sources after validation, with the file already read. */
export interface LoadedTargetSources {
  range: number[];
  filter?: TargetFilter;
  fileEntries: string[];
}

export type ItemResolution =
  | { ok: true; item: ProjectItemRecord }
  | { ok: false; reason: string };

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Expand `N` or `N-M` to every integer in [N, M]. `N > M` is an error,
 * not an empty range.
 */
export function parseNumberRange(spec: string): number[] {
  const trimmed = spec.trim();
  const dash = trimmed.indexOf("-");

  if (dash < 0) {
    return [parsePositiveInteger(trimmed, "item number in range")];
  }

  const start = parsePositiveInteger(trimmed.slice(0, dash), "range start");
  const end = parsePositiveInteger(trimmed.slice(dash + 1), "range end");
  if (start > end) {
    throw new ValidationError(
      `invalid range "${spec}": start ${start} is greater than end ${end}`,
    );
  }

  const numbers: number[] = [];
  for (let n = start; n <= end; n++) numbers.push(n);
  return numbers;
}

/** Remove duplicates, keeping the first occurrence of each value. */
export function dedupeTargets<T>(values: readonly T[]): T[] {
  return [...new Set(values)];
}

export function parseFilter(expr: string): TargetFilter {
  const colon = expr.indexOf(":");
  const key = colon >= 0 ? expr.slice(0, colon).trim().toLowerCase() : "";
  const value = colon >= 0 ? expr.slice(colon + 1).trim() : "";

  const filterKey = FILTER_KEYS.find((k) => k === key);
  if (!filterKey || !value) {
    throw new ValidationError(
      `invalid filter "${expr}" (expected ${FILTER_KEYS.map((k) => `${k}:<value>`).join(", ")})`,
    );
  }
  return { key: filterKey, value };
}

/** Identifiers from a target file: blank lines and `# ...` comments skipped. */
export function parseTargetFile(contents: string): string[] {
  return contents
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !/^#(\s|$)/.test(line));
}

export async function readTargetFile(path: string): Promise<string[]> {
  let contents: string;
  try {
    contents = await readFile(path, "utf8");
  } catch (error) {
    throw new ValidationError(`cannot read target file "${path}": ${errorMessage(error)}`, {
      cause: error,
    });
  }
  return parseTargetFile(contents);
}

/**
 * Validate every source and read the target file. Runs before any
 * network call.
 */
export async function loadTargetSources(sources: TargetSources): Promise<LoadedTargetSources> {
  const identifiers = (sources.identifiers ?? []).map((id) => id.trim()).filter(Boolean);
  if (!sources.items && !sources.filter && !sources.file && identifiers.length === 0) {
    throw new ValidationError(
      "no targets given: provide an item range, a filter or a target file",
    );
  }
  return {
    range: sources.items ? parseNumberRange(sources.items) : [],
    ...(sources.filter ? { filter: parseFilter(sources.filter) } : {}),
    fileEntries: [
      ...(sources.file ? await readTargetFile(sources.file) : []),
      ...identifiers,
    ],
  };
}

// ---------------------------------------------------------------------------
// Filtering
// ---------------------------------------------------------------------------

function sameText(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export function matchesFilter(item: ProjectItemRecord, filter: TargetFilter): boolean {
  switch (filter.key) {
    case "label":
      return item.labels.some((label) => sameText(label, filter.value));
    case "assignee": {
      const login = filter.value.replace(/^@/, "");
      return item.assignees.some((a) => sameText(a, login));
    }
    case "state":
      return item.state !== null && sameText(item.state, filter.value);
  }
}

// ---------------------------------------------------------------------------
// Item index
// ---------------------------------------------------------------------------

/**
 * The project's items at the time of the call, addressable by number,
 * by `owner/repo#number` and by node id.
 */
export class ProjectItemIndex {
  private readonly byId = new Map<string, ProjectItemRecord>();
  private readonly byNumber = new Map<number, ProjectItemRecord[]>();

  constructor(readonly items: readonly ProjectItemRecord[]) {
    for (const item of items) {
      this.byId.set(item.id, item);
      if (item.contentType !== "DraftIssue" && item.number !== null) {
        const list = this.byNumber.get(item.number) ?? [];
        list.push(item);
        this.byNumber.set(item.number, list);
      }
    }
  }

  /** Canonical identifier for an item in this project. */
  keyFor(item: ProjectItemRecord): string {
    if (item.number === null || item.contentType === "DraftIssue") return item.id;
    const sharing = this.byNumber.get(item.number) ?? [];
    if (sharing.length <= 1 || !item.repository) return String(item.number);
    return `${item.repository}#${item.number}`;
  }

  /**
   * Canonical form of a user-supplied identifier. Identifiers that do not
   * match an item are returned normalized but unresolved.
   */
  canonicalize(identifier: string): string {
    const trimmed = identifier.trim();
    if (/^\d+$/.test(trimmed)) return String(Number.parseInt(trimmed, 10));
    const resolution = this.resolve(trimmed);
    if (resolution.ok) return this.keyFor(resolution.item);
    if (looksLikeItemReference(trimmed)) {
      try {
        const ref = parseItemReference(trimmed);
        return formatItemReference(ref.owner, ref.repo, ref.number);
      } catch {
        return trimmed;
      }
    }
    return trimmed;
  }

  resolve(identifier: string): ItemResolution {
    const trimmed = identifier.trim();

    if (/^\d+$/.test(trimmed)) {
      const matches = this.byNumber.get(Number.parseInt(trimmed, 10)) ?? [];
      if (matches.length === 1) return { ok: true, item: matches[0] };
      if (matches.length === 0) return { ok: false, reason: "not found in project" };
      return {
        ok: false,
        reason: `ambiguous number, matches ${matches
          .map((m) => `${m.repository ?? "?"}#${m.number}`)
          .join(", ")}`,
      };
    }

    if (looksLikeItemReference(trimmed)) {
      let repository: string;
      let number: number;
      try {
        const ref = parseItemReference(trimmed);
        repository = `${ref.owner}/${ref.repo}`;
        number = ref.number;
      } catch (error) {
        return { ok: false, reason: errorMessage(error) };
      }
      const match = (this.byNumber.get(number) ?? []).find(
        (item) => item.repository !== null && sameText(item.repository, repository),
      );
      return match ? { ok: true, item: match } : { ok: false, reason: "not found in project" };
    }

    const item = this.byId.get(trimmed);
    return item ? { ok: true, item } : { ok: false, reason: "not found in project" };
  }
}

// ---------------------------------------------------------------------------
// Assembly
// ---------------------------------------------------------------------------

/**
 * Union of range, filter and file targets in that order, canonicalized
 * and deduplicated with first-seen order kept.
 */
export function assembleTargets(
  sources: LoadedTargetSources,
  index: ProjectItemIndex,
): string[] {
  const { filter } = sources;
  const raw = [
    ...sources.range.map((n) => String(n)),
    ...(filter
      ? index.items
          .filter((item) => matchesFilter(item, filter))
          .map((item) => index.keyFor(item))
      : []),
    ...sources.fileEntries,
  ];
  return dedupeTargets(raw.map((identifier) => index.canonicalize(identifier)));
}
