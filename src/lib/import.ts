/**
 * Bundle reconstructor: creates a new project from a bundle.
 *
 * Import runs in two phases. `planImport` is pure and decides every
 * field, item and view action up front; `executePlan` walks that plan in
 * stage order (project, fields, items, views). A dry run walks the same
 * plan with the mutating calls skipped, so its counts are the live
 * counts.
 *
 * A failed stage stops the import. Nothing already created is rolled
 * back; the error names the project that was left behind.
 */

import type { GitHubClient } from "../github-client.js";
import {
  DEFAULT_PROJECT_FIELDS,
  isCreatableFieldType,
  type CreatableFieldType,
  type ProjectV2Field,
} from "../types.js";
import {
  parseBundle,
  type Bundle,
  type BundleField,
  type BundleFieldOption,
  type BundleFieldValue,
  type BundleItem,
  type BundleView,
} from "./bundle.js";
import {
  BundleError,
  CancelledError,
  GhxError,
  ValidationError,
  errorMessage,
  throwIfAborted,
  type GhxErrorKind,
} from "./errors.js";
import { requireOwner } from "./owner-resolution.js";
import {
  addDraftIssue,
  addItemById,
  createField,
  createProject,
  createView,
  fetchProjectFields,
  resolveContentId,
  updateFieldOptions,
  updateItemFieldValue,
  updateProjectDescription,
  updateViewFilter,
  type FieldValueInput,
} from "./project-api.js";
import { parseItemReference, type ItemReference } from "./references.js";

// ---------------------------------------------------------------------------
// Merge strategies
// ---------------------------------------------------------------------------

export const MERGE_STRATEGIES = [
  "merge",
  "replace",
  "append",
  "skip_conflicts",
] as const;

export type MergeStrategy = (typeof MERGE_STRATEGIES)[number];

export const DEFAULT_MERGE_STRATEGY: MergeStrategy = "replace";

export function validateMergeStrategy(value: string): MergeStrategy {
  const normalized = value.trim().toLowerCase();
  const strategy = MERGE_STRATEGIES.find((s) => s === normalized);
  if (!strategy) {
    throw new ValidationError(
      `invalid merge strategy: "${value}" (expected one of: ${MERGE_STRATEGIES.join(", ")})`,
    );
  }
  return strategy;
}

const IMPORTED_SUFFIX = " (imported)";

// ---------------------------------------------------------------------------
// Plan
// ---------------------------------------------------------------------------

export type ImportStage = "project" | "fields" | "items" | "views";

export type FieldAction =
  | {
      kind: "create";
      source: BundleField;
      name: string;
      dataType: CreatableFieldType;
      options: BundleFieldOption[];
    }
  | { kind: "reuse"; source: BundleField; name: string }
  | { kind: "replace_options"; source: BundleField; name: string; options: BundleFieldOption[] }
  | { kind: "merge_options"; source: BundleField; name: string; options: BundleFieldOption[] }
  | { kind: "skip"; source: BundleField; reason: string };

export type ItemAction =
  | { kind: "add_draft"; item: BundleItem }
  | { kind: "add_content"; item: BundleItem; contentId: string }
  | { kind: "add_by_reference"; item: BundleItem; ref: ItemReference };

export interface ImportPlan {
  strategy: MergeStrategy;
  project: { title: string; description?: string };
  stages: ImportStage[];
  fields: FieldAction[];
  items: ItemAction[];
  views: BundleView[];
  /**
   * Bundle field name to the field its values land in. `null` means the
   * values are dropped; names not listed map to themselves.
   */
  fieldNameMap: Record<string, string | null>;
  counts: { fields: number; items: number; views: number };
}

export interface PlanOptions {
  skipItems?: boolean;
  skipFields?: boolean;
  mergeStrategy?: MergeStrategy;
}

function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

function planField(
  field: BundleField,
  strategy: MergeStrategy,
  taken: Set<string>,
): FieldAction {
  const existing = DEFAULT_PROJECT_FIELDS.find((d) => sameName(d.name, field.name));
  const conflict = existing !== undefined || taken.has(field.name.toLowerCase());
  const { dataType } = field;

  if (!conflict) {
    if (!isCreatableFieldType(dataType)) {
      return {
        kind: "skip",
        source: field,
        reason: `fields of type ${dataType} cannot be created`,
      };
    }
    return {
      kind: "create",
      source: field,
      name: field.name,
      dataType,
      options: field.options ?? [],
    };
  }

  if (strategy === "skip_conflicts") {
    return { kind: "skip", source: field, reason: "conflicts with an existing field" };
  }

  if (
    existing !== undefined &&
    existing.dataType === "SINGLE_SELECT" &&
    field.dataType === "SINGLE_SELECT"
  ) {
    if (strategy === "replace") {
      return { kind: "replace_options", source: field, name: existing.name, options: field.options ?? [] };
    }
    if (strategy === "merge") {
      return { kind: "merge_options", source: field, name: existing.name, options: field.options ?? [] };
    }
  }

  if (existing !== undefined && !isCreatableFieldType(existing.dataType)) {
    return { kind: "reuse", source: field, name: existing.name };
  }

  if (!isCreatableFieldType(dataType)) {
    return {
      kind: "skip",
      source: field,
      reason: `fields of type ${dataType} cannot be created`,
    };
  }

  return {
    kind: "create",
    source: field,
    name: `${field.name}${IMPORTED_SUFFIX}`,
    dataType,
    options: field.options ?? [],
  };
}

function contentKey(item: BundleItem): string | null {
  if (item.contentType === "DraftIssue") return null;
  return item.contentId ?? item.url ?? null;
}

function dedupeItems(items: BundleItem[], strategy: MergeStrategy): BundleItem[] {
  if (strategy === "append") return [...items];

  const result: BundleItem[] = [];
  const positions = new Map<string, number>();
  for (const item of items) {
    const key = contentKey(item);
    const seen = key === null ? undefined : positions.get(key);
    if (seen === undefined) {
      if (key !== null) positions.set(key, result.length);
      result.push(item);
    } else if (strategy === "replace") {
      result[seen] = item;
    }
  }
  return result;
}

function planItem(item: BundleItem, index: number): ItemAction {
  if (item.contentType === "DraftIssue") {
    return { kind: "add_draft", item };
  }
  if (item.contentId) {
    return { kind: "add_content", item, contentId: item.contentId };
  }
  if (!item.url) {
    throw new BundleError(
      `invalid bundle: items.${index} (${item.contentType} "${item.title}") has neither contentId nor url`,
    );
  }
  try {
    return { kind: "add_by_reference", item, ref: parseItemReference(item.url) };
  } catch (error) {
    throw new BundleError(`invalid bundle: items.${index}: ${errorMessage(error)}`);
  }
}

/**
 * Decide every action an import will take. Pure: no I/O.
 */
export function planImport(bundle: Bundle, options: PlanOptions = {}): ImportPlan {
  const strategy = options.mergeStrategy ?? DEFAULT_MERGE_STRATEGY;
  const bundleFields = bundle.fields ?? [];
  const bundleItems = bundle.items ?? [];
  const views = bundle.views ?? [];

  const fields: FieldAction[] = [];
  const fieldNameMap: Record<string, string | null> = {};
  if (!options.skipFields) {
    const taken = new Set<string>();
    for (const field of bundleFields) {
      const action = planField(field, strategy, taken);
      fields.push(action);
      fieldNameMap[field.name] = action.kind === "skip" ? null : action.name;
      if (action.kind !== "skip") taken.add(action.name.toLowerCase());
    }
  }

  const items = options.skipItems
    ? []
    : dedupeItems(bundleItems, strategy).map(planItem);

  const stages: ImportStage[] = ["project"];
  if (fields.length > 0) stages.push("fields");
  if (items.length > 0) stages.push("items");
  if (views.length > 0) stages.push("views");

  return {
    strategy,
    project: {
      title: bundle.project.title,
      ...(bundle.project.description ? { description: bundle.project.description } : {}),
    },
    stages,
    fields,
    items,
    views,
    fieldNameMap,
    counts: {
      fields: fields.filter((f) => f.kind !== "skip").length,
      items: items.length,
      views: views.length,
    },
  };
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

export interface ImportOptions {
  /** Login of the user or organization that will own the new project. */
  owner: string;
  dryRun?: boolean;
  skipItems?: boolean;
  skipFields?: boolean;
  /** Validated before any network call. */
  mergeStrategy?: string;
  signal?: AbortSignal;
}

export interface ImportResult {
  projectId: string;
  projectTitle: string;
  projectUrl: string;
  itemCount: number;
  fieldCount: number;
  viewCount: number;
  dryRun: boolean;
}

export class ImportStageError extends GhxError {
  readonly kind: GhxErrorKind;
  readonly stage: ImportStage;
  readonly projectId: string | null;

  constructor(stage: ImportStage, projectId: string | null, cause: unknown) {
    super(
      `import stage "${stage}" failed: ${errorMessage(cause)}` +
        (projectId ? ` (project ${projectId} was created and has not been removed)` : ""),
      { cause },
    );
    this.kind = cause instanceof GhxError ? cause.kind : "transport";
    this.stage = stage;
    this.projectId = projectId;
  }
}

function mergeOptions(
  current: BundleFieldOption[],
  incoming: BundleFieldOption[],
): BundleFieldOption[] {
  const merged = [...current];
  for (const option of incoming) {
    if (!merged.some((o) => sameName(o.name, option.name))) merged.push(option);
  }
  return merged;
}

/**
 * Convert a bundle value to the input for a live field, or null when it
 * cannot be applied (unsupported type, unknown option, non-numeric).
 */
export function toFieldValueInput(
  field: ProjectV2Field,
  value: BundleFieldValue,
): FieldValueInput | null {
  switch (field.dataType) {
    case "TEXT":
      return { text: String(value) };
    case "NUMBER": {
      const number = typeof value === "number" ? value : Number(value);
      return Number.isFinite(number) && String(value).trim() !== "" ? { number } : null;
    }
    case "DATE":
      return { date: String(value) };
    case "SINGLE_SELECT": {
      const option = field.options?.find((o) => sameName(o.name, String(value)));
      return option ? { singleSelectOptionId: option.id } : null;
    }
    default:
      return null;
  }
}

/**
 * Run a plan against GitHub. With `dryRun` the same actions are walked
 * and counted but no mutation is sent.
 */
export async function executePlan(
  client: GitHubClient,
  plan: ImportPlan,
  options: ImportOptions,
): Promise<ImportResult> {
  const dryRun = options.dryRun ?? false;
  const { signal } = options;

  // Resolving the owner is a read and happens in dry runs too.
  const owner = await requireOwner(client, options.owner, signal);

  let projectId: string | null = null;
  const result: ImportResult = {
    projectId: "",
    projectTitle: plan.project.title,
    projectUrl: "",
    itemCount: 0,
    fieldCount: 0,
    viewCount: 0,
    dryRun,
  };

  async function stage(name: ImportStage, run: () => Promise<void>): Promise<void> {
    throwIfAborted(signal);
    try {
      await run();
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      throw new ImportStageError(name, projectId, error);
    }
  }

  await stage("project", async () => {
    if (dryRun) return;
    const created = await createProject(client, owner.id, plan.project.title, signal);
    projectId = created.id;
    result.projectId = created.id;
    result.projectTitle = created.title;
    result.projectUrl = created.url;
    if (plan.project.description) {
      await updateProjectDescription(client, created.id, plan.project.description, signal);
    }
  });

  const target = (): string => {
    if (projectId === null) throw new Error("project was not created");
    return projectId;
  };

  if (plan.stages.includes("fields")) {
    await stage("fields", async () => {
      const live = dryRun ? [] : await fetchProjectFields(client, target(), signal);
      const liveField = (name: string): ProjectV2Field => {
        const field = live.find((f) => sameName(f.name, name));
        if (!field) throw new Error(`field "${name}" not found in new project`);
        return field;
      };

      for (const action of plan.fields) {
        throwIfAborted(signal);
        switch (action.kind) {
          case "skip":
            continue;
          case "reuse":
            break;
          case "create":
            if (!dryRun) {
              await createField(
                client,
                target(),
                { name: action.name, dataType: action.dataType, options: action.options },
                signal,
              );
            }
            break;
          case "replace_options":
            if (!dryRun) {
              await updateFieldOptions(client, liveField(action.name).id, action.options, signal);
            }
            break;
          case "merge_options":
            if (!dryRun) {
              const field = liveField(action.name);
              await updateFieldOptions(
                client,
                field.id,
                mergeOptions(field.options ?? [], action.options),
                signal,
              );
            }
            break;
        }
        result.fieldCount++;
      }
    });
  }

  if (plan.stages.includes("items")) {
    await stage("items", async () => {
      const live = dryRun ? [] : await fetchProjectFields(client, target(), signal);
      const fieldsByName = new Map(live.map((f) => [f.name.toLowerCase(), f]));

      for (const action of plan.items) {
        throwIfAborted(signal);
        if (!dryRun) {
          let itemId: string;
          switch (action.kind) {
            case "add_draft":
              itemId = await addDraftIssue(
                client,
                target(),
                { title: action.item.title, body: action.item.body },
                signal,
              );
              break;
            case "add_content":
              itemId = await addItemById(client, target(), action.contentId, signal);
              break;
            case "add_by_reference":
              itemId = await addItemById(
                client,
                target(),
                await resolveContentId(client, action.ref, signal),
                signal,
              );
              break;
          }

          for (const [name, value] of Object.entries(action.item.fieldValues)) {
            const mapped = name in plan.fieldNameMap ? plan.fieldNameMap[name] : name;
            const field = mapped ? fieldsByName.get(mapped.toLowerCase()) : undefined;
            const input = field ? toFieldValueInput(field, value) : null;
            if (field && input) {
              await updateItemFieldValue(client, target(), itemId, field.id, input, signal);
            }
          }
        }
        result.itemCount++;
      }
    });
  }

  if (plan.stages.includes("views")) {
    await stage("views", async () => {
      for (const view of plan.views) {
        throwIfAborted(signal);
        if (!dryRun) {
          const created = await createView(
            client,
            target(),
            { name: view.name, layout: view.layout },
            signal,
          );
          if (view.filter) {
            await updateViewFilter(client, created.id, view.filter, signal);
          }
        }
        result.viewCount++;
      }
    });
  }

  return result;
}

/**
 * Import a bundle given as JSON or YAML text.
 */
export async function importProject(
  client: GitHubClient,
  bundleText: string,
  options: ImportOptions,
): Promise<ImportResult> {
  const mergeStrategy = validateMergeStrategy(options.mergeStrategy ?? DEFAULT_MERGE_STRATEGY);
  if (!options.owner.trim()) {
    throw new ValidationError("owner is required");
  }
  const bundle = parseBundle(bundleText);
  const plan = planImport(bundle, {
    skipItems: options.skipItems,
    skipFields: options.skipFields,
    mergeStrategy,
  });
  return executePlan(client, plan, options);
}
