/**
 * Bundle serializer: walks a resolved project and produces a Bundle.
 *
 * Export is all-or-nothing. Every collection is fetched before anything
 * is written, and the file only appears once it is complete.
 */

import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { randomBytes } from "node:crypto";
import type { GitHubClient } from "../github-client.js";
import {
  DEFAULT_PROJECT_FIELDS,
  isCreatableFieldType,
  type ProjectHandle,
} from "../types.js";
import {
  BUNDLE_FORMAT_VERSION,
  type Bundle,
  type BundleField,
  type BundleItem,
  type BundleView,
} from "./bundle.js";
import { TOOL_VERSION } from "./config.js";
import { throwIfAborted } from "./errors.js";
import {
  fetchProjectFields,
  fetchProjectItems,
  fetchProjectViews,
  type ProjectItemRecord,
} from "./project-api.js";

export interface ExportOptions {
  includeItems?: boolean;
  includeFields?: boolean;
  includeViews?: boolean;
  signal?: AbortSignal;
  /** Clock override for metadata.exportedAt. */
  now?: () => Date;
}

/** Names of built-in fields whose values are implied by the item itself. */
const BUILT_IN_FIELD_NAMES = new Set(
  DEFAULT_PROJECT_FIELDS.filter((f) => !isCreatableFieldType(f.dataType)).map(
    (f) => f.name,
  ),
);

function toBundleItem(item: ProjectItemRecord): BundleItem | null {
  if (!item.contentType) return null;

  const fieldValues: BundleItem["fieldValues"] = {};
  for (const [name, value] of Object.entries(item.fieldValues)) {
    if (!BUILT_IN_FIELD_NAMES.has(name)) fieldValues[name] = value;
  }

  return {
    id: item.id,
    title: item.title,
    ...(item.body ? { body: item.body } : {}),
    contentType: item.contentType,
    ...(item.url ? { url: item.url } : {}),
    ...(item.contentType !== "DraftIssue" && item.contentId
      ? { contentId: item.contentId }
      : {}),
    fieldValues,
  };
}

export async function exportProject(
  client: GitHubClient,
  project: ProjectHandle,
  options: ExportOptions = {},
): Promise<Bundle> {
  const { signal } = options;
  const now = options.now ?? (() => new Date());

  const bundle: Bundle = {
    metadata: {
      formatVersion: BUNDLE_FORMAT_VERSION,
      exportedAt: now().toISOString(),
      exportedBy: await client.getAuthenticatedUser({ signal }),
      toolVersion: TOOL_VERSION,
    },
    project: {
      id: project.id,
      title: project.title,
      ...(project.shortDescription ? { description: project.shortDescription } : {}),
      url: project.url,
      owner: project.owner,
      number: project.number,
      closed: project.closed,
    },
  };

  if (options.includeItems) {
    throwIfAborted(signal);
    const items = await fetchProjectItems(client, project.id, signal);
    bundle.items = items.flatMap((item) => {
      const exported = toBundleItem(item);
      return exported ? [exported] : [];
    });
  }

  if (options.includeFields) {
    throwIfAborted(signal);
    const fields = await fetchProjectFields(client, project.id, signal);
    bundle.fields = fields
      .filter((field) => isCreatableFieldType(field.dataType))
      .map(
        (field): BundleField => ({
          id: field.id,
          name: field.name,
          dataType: field.dataType,
          ...(field.options
            ? {
                options: field.options.map((o) => ({
                  name: o.name,
                  ...(o.color ? { color: o.color } : {}),
                  ...(o.description ? { description: o.description } : {}),
                })),
              }
            : {}),
        }),
      );
  }

  if (options.includeViews) {
    throwIfAborted(signal);
    const views = await fetchProjectViews(client, project.id, signal);
    bundle.views = views.map(
      (view): BundleView => ({
        id: view.id,
        name: view.name,
        layout: view.layout,
        ...(view.filter ? { filter: view.filter } : {}),
      }),
    );
  }

  return bundle;
}

/**
 * Write a serialized bundle through a temporary file and a rename, so a
 * failed write leaves no partial bundle at `path`.
 */
export async function writeBundleFile(path: string, contents: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmpPath = `${path}.${randomBytes(4).toString("hex")}.tmp`;
  try {
    await writeFile(tmpPath, contents, { encoding: "utf8", mode: 0o600 });
    await rename(tmpPath, path);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
}
