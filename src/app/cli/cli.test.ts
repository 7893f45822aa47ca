/**
 * Tests for the command line front end
 */
import { beforeEach, describe, expect, it } from "vitest";
import { runCli } from "./cli";
import { MemoryFileSystem } from "../../tests/helpers/memoryFileSystem";
import { createMockLogger } from "../../tests/helpers/mockLogger";

const HOME = "/home/alice";
const CODE = `${HOME}/code`;
const CONFIG = "/cfg/pathpick/config.json";
const STORE = `${HOME}/.cache/pp.json`;

describe("runCli", () => {
  let fileSystem: MemoryFileSystem;
  let logger: ReturnType<typeof createMockLogger>;
  let output: string;

  beforeEach(() => {
    fileSystem = new MemoryFileSystem();
    logger = createMockLogger();
    output = "";

    fileSystem
      .addFile(CONFIG, JSON.stringify({ projectHomes: ["~/code"], cachePath: "~/.cache/pp.json" }))
      .addDir(`${CODE}/.git`)
      .addDir(`${CODE}/proj1`)
      // bare repository with two linked worktrees
      .addFile(`${CODE}/proj2/HEAD`, "ref: refs/heads/main\n")
      .addDir(`${CODE}/proj2/objects`)
      .addDir(`${CODE}/proj2/refs`)
      .addFile(`${CODE}/proj2/config`, "[core]\n\tbare = true\n")
      .addFile(`${CODE}/proj2/worktrees/wt-a/gitdir`, `${CODE}/proj2/wt-a/.git\n`)
      .addFile(`${CODE}/proj2/worktrees/wt-b/gitdir`, `${CODE}/proj2/wt-b/.git\n`)
      .addDir(`${CODE}/proj2/wt-a`)
      .addDir(`${CODE}/proj2/wt-b`);
  });

  function run(argv: string[], cwd = HOME): Promise<number> {
    return runCli(argv, {
      write: (text) => {
        output += text;
      },
      logger,
      fileSystem,
      cwd,
      homeDir: HOME,
      env: { XDG_CONFIG_HOME: "/cfg" },
    });
  }

  describe("list", () => {
    it("prints worktrees of bare repositories instead of the repository", async () => {
      expect(await run(["list"])).toBe(0);

      expect(output).toBe(
        [`${CODE}/proj1`, `${CODE}/proj2/wt-a`, `${CODE}/proj2/wt-b`, ""].join("\n")
      );
    });

    it("lists when no command is given", async () => {
      expect(await run([])).toBe(0);

      expect(output.split("\n")).toHaveLength(4);
    });

    it("orders by recorded access in recent mode", async () => {
      const store = JSON.stringify({ [`${CODE}/proj2/wt-b`]: 200, [`${CODE}/proj1`]: 100 });
      fileSystem.addFile(STORE, store);

      expect(await run(["list", "--sort", "recent"])).toBe(0);

      expect(output).toBe(
        [`${CODE}/proj2/wt-b`, `${CODE}/proj1`, `${CODE}/proj2/wt-a`, ""].join("\n")
      );
      expect(await fileSystem.readFile(STORE)).toBe(store);
    });

    it("falls back to alphabetical order when the store is corrupt", async () => {
      fileSystem.addFile(STORE, "garbage");

      expect(await run(["list", "-s", "recent"])).toBe(0);

      expect(output.split("\n")[0]).toBe(`${CODE}/proj1`);
      expect(logger.warn).toHaveBeenCalledWith(
        `Access cache ${STORE} is not valid JSON; listing without access history`
      );
    });

    it("drops the current directory when skipCurrent is set", async () => {
      fileSystem.addFile(
        CONFIG,
        JSON.stringify({ projectHomes: ["~/code"], skipCurrent: true })
      );

      expect(await run(["list"], `${CODE}/proj1`)).toBe(0);

      expect(output).toBe([`${CODE}/proj2/wt-a`, `${CODE}/proj2/wt-b`, ""].join("\n"));
    });

    it("reads the config file given with --config", async () => {
      fileSystem.addDir("/srv/only").addFile("/etc/other.json", '{"projectHomes":["/srv"]}');

      expect(await run(["list", "--config", "/etc/other.json"])).toBe(0);

      expect(output).toBe("/srv/only\n");
    });

    it("fails when no projects are found", async () => {
      fileSystem.addDir("/empty").addFile(CONFIG, '{"projectHomes":["/empty"]}');

      expect(await run(["list"])).toBe(1);

      expect(output).toBe("");
      expect(logger.error).toHaveBeenCalledWith("No projects found");
    });

    it("rejects an unknown sort mode", async () => {
      expect(await run(["list", "--sort", "newest"])).toBe(1);

      expect(logger.error).toHaveBeenCalledWith(
        "Invalid sort mode: newest. Expected one of: alphabetical, recent"
      );
    });
  });

  describe("record", () => {
    it("stores the normalized path", async () => {
      expect(await run(["record", "~/code/proj1"])).toBe(0);

      const stored: unknown = JSON.parse(await fileSystem.readFile(STORE));
      expect(Object.keys(stored ?? {})).toEqual([`${CODE}/proj1`]);
    });

    it("leaves a corrupt store untouched", async () => {
      fileSystem.addFile(STORE, "garbage");

      expect(await run(["record", `${CODE}/proj1`])).toBe(1);

      expect(logger.error).toHaveBeenCalledWith(`Access cache ${STORE} is not valid JSON`);
      expect(await fileSystem.readFile(STORE)).toBe("garbage");
    });

    it("requires a path", async () => {
      expect(await run(["record"])).toBe(1);

      expect(logger.error).toHaveBeenCalledWith("record requires a project path");
    });
  });

  it("reports a missing config file", async () => {
    expect(await run(["list", "-c", "/nowhere.json"])).toBe(1);

    expect(logger.error).toHaveBeenCalledWith("Config file not found: /nowhere.json");
  });

  it("rejects unknown commands", async () => {
    expect(await run(["frobnicate"])).toBe(1);

    expect(logger.error).toHaveBeenCalledWith("Unknown command: frobnicate");
  });

  it("prints the version", async () => {
    expect(await run(["--version"])).toBe(0);

    expect(output).toBe("pathpick v0.1.0\n");
  });

  it("prints command help on stdout", async () => {
    expect(await run(["record", "--help"])).toBe(0);

    expect(output.trim().split("\n")[0]).toBe(
      "pathpick record - Remember that a project was just opened"
    );
  });
});
