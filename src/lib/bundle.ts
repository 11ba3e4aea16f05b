/**
 * The portable bundle: schema, versioning, encoding and decoding.
 *
 * `metadata.formatVersion` selects the schema. Current bundles (2.x) use
 * camelCase keys; 1.x bundles used snake_case metadata, `items[].type`,
 * `items[].fields` and `fields[].data_type`, and are upgraded on read.
 * New keys are only ever added as optional.
 */

import { parse as yamlParse, stringify as yamlStringify } from "yaml";
import { z } from "zod";
import { VIEW_LAYOUTS, type ProjectV2ViewLayout } from "../types.js";
import { BundleError, ValidationError, errorMessage } from "./errors.js";

export const BUNDLE_FORMAT_VERSION = "2.0";

export const BUNDLE_FORMATS = ["json", "yaml"] as const;
export type BundleFormat = (typeof BUNDLE_FORMATS)[number];

export const CONTENT_TYPES = ["Issue", "PullRequest", "DraftIssue"] as const;
export type BundleContentType = (typeof CONTENT_TYPES)[number];

// ---------------------------------------------------------------------------
// Bundle types
// ---------------------------------------------------------------------------

export type BundleFieldValue = string | number;

export interface BundleMetadata {
  formatVersion: string;
  exportedAt: string;
  exportedBy: string;
  toolVersion: string;
}

export interface BundleProject {
  id: string;
  title: string;
  description?: string;
  url: string;
  owner: string;
  number: number;
  closed: boolean;
}

export interface BundleItem {
  id: string;
  title: string;
  body?: string;
  contentType: BundleContentType;
  url?: string;
  /** Node id of the issue or pull request; absent for drafts. */
  contentId?: string;
  fieldValues: Record<string, BundleFieldValue>;
}

export interface BundleFieldOption {
  name: string;
  color?: string;
  description?: string;
}

export interface BundleField {
  id: string;
  name: string;
  dataType: string;
  options?: BundleFieldOption[];
}

export interface BundleView {
  id: string;
  name: string;
  layout: ProjectV2ViewLayout;
  filter?: string;
}

/**
 * Absent collections were not requested at export time; an empty list
 * means they were requested and the project had none.
 */
export interface Bundle {
  metadata: BundleMetadata;
  project: BundleProject;
  items?: BundleItem[];
  fields?: BundleField[];
  views?: BundleView[];
}

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const CONTENT_TYPE_ALIASES: Record<string, BundleContentType> = {
  ISSUE: "Issue",
  PULL_REQUEST: "PullRequest",
  PULLREQUEST: "PullRequest",
  DRAFT_ISSUE: "DraftIssue",
  DRAFTISSUE: "DraftIssue",
};

function normalizeContentType(value: unknown): unknown {
  return typeof value === "string"
    ? (CONTENT_TYPE_ALIASES[value.toUpperCase()] ?? value)
    : value;
}

function normalizeLayout(value: unknown): unknown {
  if (typeof value !== "string") return value;
  const upper = value.toUpperCase();
  return upper.endsWith("_LAYOUT") ? upper : `${upper}_LAYOUT`;
}

const optionalText = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);

const contentTypeSchema = z.preprocess(normalizeContentType, z.enum(CONTENT_TYPES));

const fieldValueSchema = z.union([z.string(), z.number()]);

const optionSchema = z.object({
  name: z.string(),
  color: z.string().optional(),
  description: optionalText,
});

const viewSchema = z.object({
  id: z.string().default(""),
  name: z.string().min(1),
  layout: z.preprocess(normalizeLayout, z.enum(VIEW_LAYOUTS)),
  filter: optionalText,
});

const projectSchema = z.object({
  id: z.string().default(""),
  title: z.string().min(1),
  description: optionalText,
  url: z.string().default(""),
  owner: z.string().default(""),
  number: z.number().int().default(0),
  closed: z.boolean().default(false),
});

const currentSchema = z.object({
  metadata: z.object({
    formatVersion: z.string(),
    exportedAt: z.string().default(""),
    exportedBy: z.string().default(""),
    toolVersion: z.string().default(""),
  }),
  project: projectSchema,
  items: z
    .array(
      z.object({
        id: z.string().default(""),
        title: z.string(),
        body: optionalText,
        contentType: contentTypeSchema,
        url: optionalText,
        contentId: optionalText,
        fieldValues: z.record(fieldValueSchema).default({}),
      }),
    )
    .nullish(),
  fields: z
    .array(
      z.object({
        id: z.string().default(""),
        name: z.string().min(1),
        dataType: z.string(),
        options: z.array(optionSchema).nullish(),
      }),
    )
    .nullish(),
  views: z.array(viewSchema).nullish(),
});

const legacySchema = z.object({
  metadata: z.object({
    version: z.string(),
    exported_at: z.union([z.string(), z.date()]).optional(),
    exported_by: z.string().default(""),
    tool_version: z.string().default(""),
  }),
  project: projectSchema,
  items: z
    .array(
      z.object({
        id: z.string().default(""),
        title: z.string(),
        body: optionalText,
        type: contentTypeSchema,
        url: optionalText,
        fields: z.record(z.unknown()).nullish(),
      }),
    )
    .nullish(),
  fields: z
    .array(
      z.object({
        id: z.string().default(""),
        name: z.string().min(1),
        data_type: z.string(),
        options: z.array(optionSchema).nullish().catch(undefined),
      }),
    )
    .nullish(),
  views: z.array(viewSchema).nullish(),
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

function majorVersion(version: string): number {
  const major = Number.parseInt(version.split(".")[0] ?? "", 10);
  return Number.isNaN(major) ? -1 : major;
}

function compactOptions(
  options: Array<z.infer<typeof optionSchema>> | null | undefined,
): BundleFieldOption[] | undefined {
  if (!options) return undefined;
  return options.map((o) => ({
    name: o.name,
    ...(o.color ? { color: o.color } : {}),
    ...(o.description ? { description: o.description } : {}),
  }));
}

function compactView(view: z.infer<typeof viewSchema>): BundleView {
  return {
    id: view.id,
    name: view.name,
    layout: view.layout,
    ...(view.filter ? { filter: view.filter } : {}),
  };
}

function compactProject(project: z.infer<typeof projectSchema>): BundleProject {
  return {
    id: project.id,
    title: project.title,
    ...(project.description !== undefined ? { description: project.description } : {}),
    url: project.url,
    owner: project.owner,
    number: project.number,
    closed: project.closed,
  };
}

// ---------------------------------------------------------------------------
// Versioned decoding
// ---------------------------------------------------------------------------

function fromCurrent(doc: z.infer<typeof currentSchema>): Bundle {
  return {
    metadata: doc.metadata,
    project: compactProject(doc.project),
    ...(doc.items
      ? {
          items: doc.items.map((item) => ({
            id: item.id,
            title: item.title,
            ...(item.body !== undefined ? { body: item.body } : {}),
            contentType: item.contentType,
            ...(item.url ? { url: item.url } : {}),
            ...(item.contentId ? { contentId: item.contentId } : {}),
            fieldValues: item.fieldValues,
          })),
        }
      : {}),
    ...(doc.fields
      ? {
          fields: doc.fields.map((field) => {
            const options = compactOptions(field.options);
            return {
              id: field.id,
              name: field.name,
              dataType: field.dataType,
              ...(options ? { options } : {}),
            };
          }),
        }
      : {}),
    ...(doc.views ? { views: doc.views.map(compactView) } : {}),
  };
}

function upgradeLegacy(doc: z.infer<typeof legacySchema>): Bundle {
  const exportedAt = doc.metadata.exported_at;
  return {
    metadata: {
      formatVersion: doc.metadata.version,
      exportedAt:
        exportedAt instanceof Date ? exportedAt.toISOString() : (exportedAt ?? ""),
      exportedBy: doc.metadata.exported_by,
      toolVersion: doc.metadata.tool_version,
    },
    project: compactProject(doc.project),
    ...(doc.items
      ? {
          items: doc.items.map((item) => {
            const fieldValues: Record<string, BundleFieldValue> = {};
            for (const [name, value] of Object.entries(item.fields ?? {})) {
              if (typeof value === "string" || typeof value === "number") {
                fieldValues[name] = value;
              }
            }
            return {
              id: item.id,
              title: item.title,
              ...(item.body !== undefined ? { body: item.body } : {}),
              contentType: item.type,
              ...(item.url ? { url: item.url } : {}),
              fieldValues,
            };
          }),
        }
      : {}),
    ...(doc.fields
      ? {
          fields: doc.fields.map((field) => {
            const options = compactOptions(field.options);
            return {
              id: field.id,
              name: field.name,
              dataType: field.data_type,
              ...(options ? { options } : {}),
            };
          }),
        }
      : {}),
    ...(doc.views ? { views: doc.views.map(compactView) } : {}),
  };
}

/**
 * Validate a decoded document and bring it to the current shape.
 */
export function toBundle(doc: unknown): Bundle {
  if (!isRecord(doc)) {
    throw new BundleError("invalid bundle: top level must be a mapping");
  }
  const metadata = doc.metadata;
  if (!isRecord(metadata)) {
    throw new BundleError("invalid bundle: metadata is required");
  }

  if (typeof metadata.formatVersion === "string" && majorVersion(metadata.formatVersion) >= 2) {
    const parsed = currentSchema.safeParse(doc);
    if (!parsed.success) {
      throw new BundleError(`invalid bundle: ${formatIssues(parsed.error)}`);
    }
    return fromCurrent(parsed.data);
  }

  if (typeof metadata.version === "string" && majorVersion(metadata.version) === 1) {
    const parsed = legacySchema.safeParse(doc);
    if (!parsed.success) {
      throw new BundleError(`invalid bundle: ${formatIssues(parsed.error)}`);
    }
    return upgradeLegacy(parsed.data);
  }

  const declared = metadata.formatVersion ?? metadata.version;
  throw new BundleError(
    typeof declared === "string"
      ? `unsupported bundle format version "${declared}"`
      : "invalid bundle: metadata.formatVersion is required",
  );
}

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

export function validateFormat(value: string): BundleFormat {
  const format = BUNDLE_FORMATS.find((f) => f === value.toLowerCase());
  if (!format) {
    throw new ValidationError(
      `unsupported format: "${value}" (expected ${BUNDLE_FORMATS.join(" or ")})`,
    );
  }
  return format;
}

/**
 * Encode a bundle. Both encodings carry the same keys and nesting.
 */
export function serializeBundle(bundle: Bundle, format: BundleFormat): string {
  switch (format) {
    case "json":
      return JSON.stringify(bundle, null, 2) + "\n";
    case "yaml":
      return yamlStringify(bundle);
  }
}

/**
 * Decode bundle text without a format hint: JSON first, YAML when JSON
 * decoding fails. Text valid in both is read as JSON.
 */
export function parseBundle(text: string): Bundle {
  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch {
    try {
      doc = yamlParse(text);
    } catch (yamlError) {
      throw new BundleError(
        `bundle is neither valid JSON nor YAML: ${errorMessage(yamlError)}`,
      );
    }
  }
  return toBundle(doc);
}
