import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { NotARepositoryError, PathNotFoundError, fetchCommits } from "./index.js";

const cleanupPaths: string[] = [];

afterEach(async () => {
  for (const path of cleanupPaths.splice(0, cleanupPaths.length)) {
    await rm(path, { recursive: true, force: true });
  }
});

describe("fetchCommits", () => {
  it("raises PathNotFoundError for a path that does not exist", () => {
    expect(() => fetchCommits("/nonexistent/commitlens-target")).toThrow(PathNotFoundError);
  });

  it("raises NotARepositoryError for a directory without a repository", async () => {
    const root = await mkdtemp(join(tmpdir(), "commitlens-plain-"));
    cleanupPaths.push(root);

    expect(() => fetchCommits(root)).toThrow(NotARepositoryError);
    expect(() => fetchCommits(root, 0)).toThrow(NotARepositoryError);
  });
});
