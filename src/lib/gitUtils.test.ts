import assert from "assert/strict";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import {
  createGitFunctions,
  diffTreeArgs,
  parseLogOutput,
  parseRawDiffTree,
} from "./gitUtils.js";
import { runCommand } from "./commandUtils.js";

const F = "\x1f";

suite("git output parsing", () => {
  test("parses log entries oldest first", () => {
    const stdout =
      `aaa${F}bbb${F}Alice${F}alice@example.com${F}1700000000 +0000${F}` +
      "Add parser\n\nDetails\n\0" +
      `ccc${F}aaa${F}Bob${F}bob@example.com${F}1700000100 +0100${F}` +
      "Fix parser\n\0";
    assert.deepEqual(parseLogOutput(stdout), [
      {
        id: "aaa",
        commitHash: "aaa",
        parents: ["bbb"],
        parentHashes: ["bbb"],
        message: "Add parser\n\nDetails",
        author: {
          name: "Alice",
          email: "alice@example.com",
          date: "1700000000 +0000",
        },
      },
      {
        id: "ccc",
        commitHash: "ccc",
        parents: ["aaa"],
        parentHashes: ["aaa"],
        message: "Fix parser",
        author: {
          name: "Bob",
          email: "bob@example.com",
          date: "1700000100 +0100",
        },
      },
    ]);
  });

  test("root and merge commits keep their parent lists", () => {
    const stdout =
      `r00t${F}${F}A${F}a@example.com${F}1 +0000${F}Root\0` +
      `m3rg${F}p1 p2${F}A${F}a@example.com${F}2 +0000${F}Merge\0`;
    assert.deepEqual(
      parseLogOutput(stdout).map((c) => c.parents),
      [[], ["p1", "p2"]],
    );
  });

  test("rejects truncated log entries", () => {
    assert.throws(
      () => parseLogOutput(`aaa${F}bbb\0`),
      /Failed to parse git log entry/,
    );
  });

  test("parses raw diff-tree output with renames", () => {
    const stdout =
      ":100644 100644 aaa bbb M\0src/a.ts\0" +
      ":000000 100755 0000 ccc A\0bin/run\0" +
      ":100644 100644 ddd ddd R100\0old.txt\0moved.txt\0";
    assert.deepEqual(parseRawDiffTree(stdout), [
      {
        oldMode: "100644",
        newMode: "100644",
        oldBlob: "aaa",
        newBlob: "bbb",
        status: "M",
        oldPath: "src/a.ts",
        newPath: "src/a.ts",
      },
      {
        oldMode: "000000",
        newMode: "100755",
        oldBlob: "0000",
        newBlob: "ccc",
        status: "A",
        oldPath: "bin/run",
        newPath: "bin/run",
      },
      {
        oldMode: "100644",
        newMode: "100644",
        oldBlob: "ddd",
        newBlob: "ddd",
        status: "R100",
        oldPath: "old.txt",
        newPath: "moved.txt",
      },
    ]);
  });

  test("diffs a commit against its first parent", () => {
    assert.deepEqual(
      diffTreeArgs({ commitHash: "m3rg", parentHashes: ["p1", "p2"] }).slice(
        -2,
      ),
      ["p1", "m3rg"],
    );
  });

  test("diffs a root commit against the empty tree", () => {
    assert.deepEqual(
      diffTreeArgs({ commitHash: "r00t", parentHashes: [] }).slice(-2),
      ["--root", "r00t"],
    );
  });
});

suite("git repository", () => {
  const env = {
    GIT_AUTHOR_NAME: "Test User",
    GIT_AUTHOR_EMAIL: "test@example.com",
    GIT_COMMITTER_NAME: "Test User",
    GIT_COMMITTER_EMAIL: "test@example.com",
    GIT_CONFIG_NOSYSTEM: "1",
    GIT_CONFIG_GLOBAL: "/dev/null",
  };
  let dir: string;

  const git = (...args: string[]) =>
    runCommand("git", args, { cwd: dir, env });
  const commitFile = async (name: string, message: string) => {
    await writeFile(join(dir, name), `${name}\n`);
    await git("add", name);
    await git("commit", "-q", "-m", message);
  };

  setup(async () => {
    dir = await mkdtemp(join(tmpdir(), "phab-stack-git-"));
    await git("init", "-q");
    await commitFile("a.txt", "Base");
  });

  teardown(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("a merge commit lists the changes its side branch brings in", async () => {
    await git("checkout", "-q", "-b", "side");
    await commitFile("b.txt", "Side");
    await git("checkout", "-q", "-");
    await commitFile("c.txt", "Main");
    await git("merge", "-q", "--no-ff", "--no-edit", "side");

    const revParse = async (rev: string) =>
      (await git("rev-parse", rev)).trim();
    const commitHash = await revParse("HEAD");
    const parentHashes = [await revParse("HEAD^1"), await revParse("HEAD^2")];
    const vcs = createGitFunctions({
      binaryPath: "git",
      cwd: dir,
      remotes: [],
    });

    const changes = await vcs.readChanges(
      {
        id: commitHash,
        commitHash,
        parents: parentHashes,
        parentHashes,
        message: "Merge branch 'side'",
        author: { name: "Test User", email: "test@example.com", date: "" },
      },
      { lessContext: false },
    );
    assert.deepEqual(
      changes.map((change) => [change.path, change.kind]),
      [["b.txt", "add"]],
    );
  });
});
