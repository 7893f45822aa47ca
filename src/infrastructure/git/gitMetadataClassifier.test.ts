/**
 * Tests for the Git Metadata Classifier
 */
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { GitMetadataClassifier, readCoreBare } from "./gitMetadataClassifier";
import { NodeFileSystem } from "../filesystem";
import { ProjectResolver } from "../../domain/services";
import { createBareRepository, createRepository } from "../../tests/helpers/gitFixtures";
import { MemoryFileSystem } from "../../tests/helpers/memoryFileSystem";

describe("GitMetadataClassifier", () => {
  const classifier = new GitMetadataClassifier(new NodeFileSystem());
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "pathpick-git-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("classifies a plain directory as none", async () => {
    const dir = path.join(tempDir, "plain");
    await fs.mkdir(dir);

    expect(await classifier.classify(dir)).toEqual({ kind: "none" });
  });

  it("classifies a directory with .git as a repository", async () => {
    const dir = path.join(tempDir, "repo");
    await createRepository(dir);

    expect(await classifier.classify(dir)).toEqual({ kind: "repository" });
  });

  it("classifies a worktree checkout (gitfile) as a repository", async () => {
    const bare = path.join(tempDir, "bare");
    await createBareRepository(bare, ["main"]);

    expect(await classifier.classify(path.join(bare, "main"))).toEqual({
      kind: "repository",
    });
  });

  it("lists the worktrees of a bare repository in name order", async () => {
    const bare = path.join(tempDir, "proj2");
    await createBareRepository(bare, ["wt-b", "wt-a"]);

    expect(await classifier.classify(bare)).toEqual({
      kind: "bare",
      worktrees: ["wt-a", "wt-b"],
    });
  });

  it("reports a bare repository without worktrees", async () => {
    const bare = path.join(tempDir, "empty.git");
    await createBareRepository(bare);

    expect(await classifier.classify(bare)).toEqual({ kind: "bare", worktrees: [] });
  });

  it("ignores worktree admin directories without a gitdir file", async () => {
    const bare = path.join(tempDir, "proj");
    await createBareRepository(bare, ["live"]);
    await fs.mkdir(path.join(bare, "worktrees", "half-removed"));

    expect(await classifier.classify(bare)).toEqual({ kind: "bare", worktrees: ["live"] });
  });

  it("expands a bare repository kept in .git", async () => {
    const proj = path.join(tempDir, "proj");
    await createBareRepository(proj, ["wt-b", "wt-a"], "dotgit");

    expect(await classifier.classify(proj)).toEqual({
      kind: "bare",
      worktrees: ["wt-a", "wt-b"],
    });
  });

  it("follows a .git file to a bare repository", async () => {
    const proj = path.join(tempDir, "proj");
    await createBareRepository(proj, ["wt-a"], "gitfile");

    expect(await classifier.classify(proj)).toEqual({ kind: "bare", worktrees: ["wt-a"] });
  });

  it("classifies a worktree of a bare repository kept in .git as a repository", async () => {
    const proj = path.join(tempDir, "proj");
    await createBareRepository(proj, ["wt-a"], "dotgit");

    expect(await classifier.classify(path.join(proj, "wt-a"))).toEqual({
      kind: "repository",
    });
  });

  it("treats a .git file without a gitdir line as a repository", async () => {
    const dir = path.join(tempDir, "odd");
    await fs.mkdir(dir);
    await fs.writeFile(path.join(dir, ".git"), "not a pointer\n");

    expect(await classifier.classify(dir)).toEqual({ kind: "repository" });
  });

  it("reads bare written without a value", async () => {
    const proj = path.join(tempDir, "proj");
    await createBareRepository(proj, [], "dotgit");
    await fs.writeFile(path.join(proj, ".git", "config"), "[core]\n\tbare\n");

    expect(await classifier.classify(proj)).toEqual({ kind: "bare", worktrees: [] });
  });

  it("only honours bare = true in the core section", async () => {
    const dir = path.join(tempDir, "odd");
    await createBareRepository(dir);
    await fs.writeFile(
      path.join(dir, "config"),
      '[core]\n\tbare = false\n[remote "origin"]\n\tbare = true\n'
    );

    expect(await classifier.classify(dir)).toEqual({ kind: "repository" });
  });
});

describe("GitMetadataClassifier with unreadable metadata", () => {
  let fileSystem: MemoryFileSystem;

  beforeEach(() => {
    fileSystem = new MemoryFileSystem()
      .addFile("/code/bare/HEAD", "ref: refs/heads/main\n")
      .addDir("/code/bare/objects")
      .addDir("/code/bare/refs")
      .addFile("/code/bare/config", "[core]\n\tbare = true\n")
      .addFile("/code/bare/worktrees/wt-a/gitdir", "/code/bare/wt-a/.git\n");
  });

  function classify(dirpath: string) {
    return new GitMetadataClassifier(fileSystem).classify(dirpath);
  }

  it("reports a config file that cannot be read", async () => {
    fileSystem.markUnreadable("/code/bare/config");

    await expect(classify("/code/bare")).rejects.toMatchObject({
      name: "AppError",
      code: "ROOT_UNREADABLE",
      message: "Could not read /code/bare/config",
    });
  });

  it("reports a worktrees directory that cannot be listed", async () => {
    fileSystem.markUnreadable("/code/bare/worktrees");

    await expect(classify("/code/bare")).rejects.toMatchObject({
      code: "ROOT_UNREADABLE",
      message: "Could not read directory /code/bare/worktrees",
    });
  });

  it("fails discovery with a typed error", async () => {
    fileSystem.markUnreadable("/code/bare/config");
    const resolver = new ProjectResolver({
      fileSystem,
      classifier: new GitMetadataClassifier(fileSystem),
    });

    await expect(resolver.discover(["/code"])).rejects.toMatchObject({
      code: "ROOT_UNREADABLE",
    });
  });
});

describe("readCoreBare", () => {
  it.each([
    ["[core]\n\tbare\n", true],
    ["[core]\n\tbare = yes\n", true],
    ["[core]\n\tbare = on\n", true],
    ["[core]\n\tbare = 1\n", true],
    ["[core]\n\tbare = true # cloned with --bare\n", true],
    ["[core]\n\tBare = TRUE\n", true],
    ['[core]\n\tbare = "true"\n', true],
    ["[core] bare = true\n", true],
    ["[core]\n\tbare = off\n", false],
    ["[core]\n\tbare = true\n\tbare = false\n", false],
    ["[core]\n\tbarefoot = true\n", false],
    ["[user]\n\tbare = true\n", false],
    ["", false],
  ])("reads %j as %s", (content, expected) => {
    expect(readCoreBare(content)).toBe(expected);
  });
});
