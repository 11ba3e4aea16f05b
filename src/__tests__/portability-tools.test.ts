import { describe, it, expect } from "vitest";
import {
  handleBulkMutate,
  handleExportProject,
  handleImportProject,
  type BulkMutateArgs,
  type ExportProjectArgs,
  type ImportProjectArgs,
} from "../tools/portability-tools.js";
import type { ToolResult } from "../types.js";
import { FakeGitHub } from "./fixtures/fake-github.js";

function seed(): FakeGitHub {
  const github = new FakeGitHub().addUser("octocat");
  const project = github.addDefaultFields(github.addProject("octocat", 1, "Roadmap"));
  github.addField(project, "Priority", "SINGLE_SELECT", ["High", "Low"]);
  github.addItem(project, github.addContent("octocat/hello", 1, "First"));
  github.addItem(project, github.addContent("octocat/hello", 2, "Second"));
  return github;
}

function payload(result: ToolResult): unknown {
  return JSON.parse(result.content[0]?.text ?? "null");
}

const EXPORT: ExportProjectArgs = {
  project: "octocat/1",
  includeItems: true,
  includeFields: true,
  includeViews: true,
  format: "json",
};

const IMPORT: ImportProjectArgs = {
  owner: "octocat",
  dryRun: true,
  skipItems: false,
  skipFields: false,
  mergeStrategy: "replace",
};

describe("ghx__export_project", () => {
  it("returns the bundle as JSON", async () => {
    const github = seed();

    const result = await handleExportProject({ client: github, debugLogger: null }, EXPORT);

    expect(result.isError).toBeUndefined();
    expect(payload(result)).toMatchObject({
      metadata: { formatVersion: "2.0" },
      project: { title: "Roadmap", owner: "octocat", number: 1 },
      items: [{ title: "First" }, { title: "Second" }],
    });
  });

  it("returns YAML as a document string", async () => {
    const github = seed();

    const result = await handleExportProject(
      { client: github, debugLogger: null },
      { ...EXPORT, format: "yaml" },
    );

    const body = payload(result);
    expect(body).toMatchObject({ format: "yaml" });
    expect(JSON.stringify(body)).toContain('formatVersion: \\"2.0\\"');
  });

  it("reports a malformed reference as a tool error", async () => {
    const github = seed();

    const result = await handleExportProject(
      { client: github, debugLogger: null },
      { ...EXPORT, project: "octocat/nine" },
    );

    expect(result.isError).toBe(true);
    expect(payload(result)).toEqual({
      error: 'Failed to export project: invalid project number in reference: "nine"',
    });
  });
});

describe("ghx__import_project", () => {
  it("plans an inline bundle without mutating in dry-run", async () => {
    const github = seed();
    const exported = payload(
      await handleExportProject({ client: github, debugLogger: null }, EXPORT),
    );

    const result = await handleImportProject(
      { client: github, debugLogger: null },
      { ...IMPORT, bundle: JSON.stringify(exported) },
    );

    expect(payload(result)).toMatchObject({ projectTitle: "Roadmap", itemCount: 2, dryRun: true });
    expect(github.mutations()).toEqual([]);
  });

  it("requires a bundle or a file path", async () => {
    const github = seed();

    const result = await handleImportProject({ client: github, debugLogger: null }, IMPORT);

    expect(result.isError).toBe(true);
    expect(payload(result)).toEqual({
      error: "Failed to import project: either bundle or filePath is required",
    });
    expect(github.calls).toEqual([]);
  });
});

describe("ghx__bulk_mutate_items", () => {
  const ARCHIVE: BulkMutateArgs = { project: "octocat/1", operation: "archive", items: "1-2" };

  it("archives a range of items", async () => {
    const github = seed();

    const result = await handleBulkMutate({ client: github, debugLogger: null }, ARCHIVE);

    expect(payload(result)).toEqual({
      attempted: 2,
      succeeded: 2,
      failed: 0,
      errors: [],
      cancelled: false,
      targets: ["1", "2"],
    });
    expect(github.callsTo("ArchiveProjectItem")).toHaveLength(2);
  });

  it("rejects a missing field name before any request", async () => {
    const github = seed();

    const result = await handleBulkMutate(
      { client: github, debugLogger: null },
      { ...ARCHIVE, operation: "update-field", value: "Done" },
    );

    expect(payload(result)).toEqual({ error: "Bulk mutation failed: field name is required" });
    expect(github.calls).toEqual([]);
  });
});
