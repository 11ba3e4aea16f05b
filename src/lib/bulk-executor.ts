/**
 * Bulk mutation executor.
 *
 * Applies one mutation to every target and never stops early on a
 * failed item. Each outcome is stored at its target's position and the
 * result is aggregated in target order, so with any worker count
 * `succeeded + failed === attempted` and `errors.length === failed`.
 * Cancellation stops new items from starting; the result then counts
 * only the items that were attempted.
 */

import type { GitHubClient } from "../github-client.js";
import {
  CREATABLE_FIELD_TYPES,
  isCreatableFieldType,
  type ProjectHandle,
  type ProjectV2Field,
} from "../types.js";
import {
  ProjectItemIndex,
  assembleTargets,
  type LoadedTargetSources,
} from "./bulk-targets.js";
import type { DebugLogger } from "./debug-logger.js";
import { ValidationError, errorMessage } from "./errors.js";
import {
  archiveItem,
  deleteItem,
  fetchProjectFields,
  fetchProjectItems,
  updateItemFieldValue,
  type FieldValueInput,
} from "./project-api.js";

export const MAX_CONCURRENCY = 10;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type MutationSpec =
  | { kind: "update-field"; fieldName: string; value: string }
  | { kind: "delete" }
  | { kind: "archive" };

export type ResolvedMutation =
  | {
      kind: "update-field";
      fieldName: string;
      value: string;
      fieldId: string;
      input: FieldValueInput;
    }
  | { kind: "delete" }
  | { kind: "archive" };

export interface BulkResult {
  attempted: number;
  succeeded: number;
  failed: number;
  /** One entry per failed item, in target order. */
  errors: string[];
  /** True when cancellation left some targets unattempted. */
  cancelled: boolean;
}

export interface ExecuteBulkOptions {
  projectId: string;
  targets: readonly string[];
  index: ProjectItemIndex;
  mutation: ResolvedMutation;
  concurrency?: number;
  signal?: AbortSignal;
  debugLogger?: DebugLogger | null;
}

type Outcome = { ok: true } | { ok: false; error: string };

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export function validateConcurrency(value: number | string | undefined): number {
  if (value === undefined) return 1;
  const n = typeof value === "number" ? value : Number(value);
  if (!Number.isInteger(n) || n < 1 || n > MAX_CONCURRENCY) {
    throw new ValidationError(
      `concurrency must be an integer between 1 and ${MAX_CONCURRENCY}, got "${value}"`,
    );
  }
  return n;
}

/** Checks that need no project data; run before any network call. */
export function validateMutationSpec(spec: MutationSpec): void {
  if (spec.kind !== "update-field") return;
  if (!spec.fieldName.trim()) {
    throw new ValidationError("field name is required");
  }
  if (!spec.value.trim()) {
    throw new ValidationError("value is required");
  }
}

function isValidDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
  const date = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(date.getTime()) && date.toISOString().startsWith(value);
}

/**
 * Bind an update-field spec to the project's field, validating the value
 * against the field's type before any item is touched.
 */
export function resolveMutation(
  spec: MutationSpec,
  fields: readonly ProjectV2Field[],
): ResolvedMutation {
  if (spec.kind !== "update-field") return spec;
  validateMutationSpec(spec);

  const field = fields.find((f) => f.name.toLowerCase() === spec.fieldName.toLowerCase());
  if (!field) {
    throw new ValidationError(
      `field "${spec.fieldName}" not found in project (available: ${fields
        .map((f) => f.name)
        .join(", ")})`,
    );
  }
  if (!isCreatableFieldType(field.dataType)) {
    throw new ValidationError(
      `field "${field.name}" has type ${field.dataType}; only ${CREATABLE_FIELD_TYPES.join(", ")} fields can be updated`,
    );
  }

  const value = spec.value.trim();
  let input: FieldValueInput;
  switch (field.dataType) {
    case "TEXT":
      input = { text: spec.value };
      break;
    case "NUMBER": {
      const number = Number(value);
      if (!Number.isFinite(number)) {
        throw new ValidationError(`value "${spec.value}" is not a number for field "${field.name}"`);
      }
      input = { number };
      break;
    }
    case "DATE":
      if (!isValidDate(value)) {
        throw new ValidationError(
          `value "${spec.value}" is not a date (YYYY-MM-DD) for field "${field.name}"`,
        );
      }
      input = { date: value };
      break;
    case "SINGLE_SELECT": {
      const options = field.options ?? [];
      const option = options.find((o) => o.name.toLowerCase() === value.toLowerCase());
      if (!option) {
        throw new ValidationError(
          `option "${spec.value}" not found for field "${field.name}" (available: ${options
            .map((o) => o.name)
            .join(", ")})`,
        );
      }
      input = { singleSelectOptionId: option.id };
      break;
    }
  }

  return {
    kind: "update-field",
    fieldName: field.name,
    value: spec.value,
    fieldId: field.id,
    input,
  };
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

async function applyMutation(
  client: GitHubClient,
  projectId: string,
  itemId: string,
  mutation: ResolvedMutation,
): Promise<void> {
  switch (mutation.kind) {
    case "update-field":
      await updateItemFieldValue(client, projectId, itemId, mutation.fieldId, mutation.input);
      return;
    case "delete":
      await deleteItem(client, projectId, itemId);
      return;
    case "archive":
      await archiveItem(client, projectId, itemId);
      return;
  }
}

export async function executeBulk(
  client: GitHubClient,
  options: ExecuteBulkOptions,
): Promise<BulkResult> {
  const { targets, index, mutation, signal, projectId } = options;
  const debugLogger = options.debugLogger ?? null;
  const concurrency = validateConcurrency(options.concurrency);
  const outcomes: Array<Outcome | undefined> = new Array(targets.length);

  // The signal is checked between items only: a mutation already sent is
  // never abandoned, so every started item has an outcome.
  async function runOne(target: string): Promise<Outcome> {
    const resolution = index.resolve(target);
    if (!resolution.ok) {
      return { ok: false, error: `item ${target}: ${resolution.reason}` };
    }
    try {
      await applyMutation(client, projectId, resolution.item.id, mutation);
      return { ok: true };
    } catch (error) {
      return { ok: false, error: `item ${target}: ${errorMessage(error)}` };
    }
  }

  let next = 0;
  async function worker(): Promise<void> {
    for (;;) {
      if (signal?.aborted) return;
      const position = next++;
      if (position >= targets.length) return;
      const target = targets[position];
      const outcome = await runOne(target);
      outcomes[position] = outcome;
      debugLogger?.logBulk({
        operation: mutation.kind,
        target,
        ok: outcome.ok,
        ...(outcome.ok ? {} : { error: outcome.error }),
      });
    }
  }

  await Promise.all(
    Array.from({ length: Math.min(concurrency, targets.length) }, () => worker()),
  );

  const result: BulkResult = {
    attempted: 0,
    succeeded: 0,
    failed: 0,
    errors: [],
    cancelled: false,
  };
  for (const outcome of outcomes) {
    if (!outcome) continue;
    result.attempted++;
    if (outcome.ok) {
      result.succeeded++;
    } else {
      result.failed++;
      result.errors.push(outcome.error);
    }
  }
  result.cancelled = result.attempted < targets.length;
  return result;
}

// ---------------------------------------------------------------------------
// Orchestration
// ---------------------------------------------------------------------------

export interface BulkMutateOptions {
  sources: LoadedTargetSources;
  spec: MutationSpec;
  concurrency?: number;
  signal?: AbortSignal;
  debugLogger?: DebugLogger | null;
}

export interface BulkMutateResult extends BulkResult {
  targets: string[];
}

/**
 * Read the project's items (and fields, for updates), assemble the
 * targets and run the mutation over them.
 */
export async function bulkMutate(
  client: GitHubClient,
  project: ProjectHandle,
  options: BulkMutateOptions,
): Promise<BulkMutateResult> {
  const { signal } = options;
  const concurrency = validateConcurrency(options.concurrency);
  validateMutationSpec(options.spec);

  const fields =
    options.spec.kind === "update-field"
      ? await fetchProjectFields(client, project.id, signal)
      : [];
  const mutation = resolveMutation(options.spec, fields);

  const index = new ProjectItemIndex(await fetchProjectItems(client, project.id, signal));
  const targets = assembleTargets(options.sources, index);

  const result = await executeBulk(client, {
    projectId: project.id,
    targets,
    index,
    mutation,
    concurrency,
    signal,
    debugLogger: options.debugLogger,
  });
  return { ...result, targets };
}
