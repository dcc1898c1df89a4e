import assert from "assert/strict";
import { parseCommand, parseSubmitArgs } from "./args.js";
import { UsageError } from "../lib/errors.js";

suite("command line", () => {
  test("defaults", () => {
    assert.deepEqual(parseSubmitArgs([], "/repo"), {
      options: {
        start: null,
        end: null,
        single: false,
        upstreams: [],
        lessContext: false,
        force: false,
        wip: null,
        reviewers: { reviewers: [], blockers: [] },
        comment: null,
        allowReorder: false,
        bug: null,
        noBug: false,
      },
      yes: false,
      dryRun: false,
      path: "/repo",
    });
  });

  test("revisions and flags", () => {
    const args = parseSubmitArgs(
      [
        "main",
        "feature",
        "-y",
        "--force",
        "--dry-run",
        "--wip",
        "--less-context",
        "--allow-reorder",
      ],
      "/repo",
    );
    assert.equal(args.options.start, "main");
    assert.equal(args.options.end, "feature");
    assert.equal(args.yes, true);
    assert.equal(args.dryRun, true);
    assert.equal(args.options.force, true);
    assert.equal(args.options.wip, true);
    assert.equal(args.options.lessContext, true);
    assert.equal(args.options.allowReorder, true);
  });

  test("value flags take the next argument or an = value", () => {
    const args = parseSubmitArgs(
      [
        "-r",
        "alice,bob",
        "--reviewer=carol",
        "-R",
        "dave",
        "--upstream=origin",
        "-m",
        "Rebased",
        "--path",
        "/other",
      ],
      "/repo",
    );
    assert.deepEqual(args.options.reviewers, {
      reviewers: ["alice", "bob", "carol"],
      blockers: ["dave"],
    });
    assert.deepEqual(args.options.upstreams, ["origin"]);
    assert.equal(args.options.comment, "Rebased");
    assert.equal(args.path, "/other");
  });

  test("--no-wip forces review", () => {
    assert.equal(parseSubmitArgs(["--no-wip"], "/repo").options.wip, false);
  });

  test("bug flags", () => {
    assert.equal(parseSubmitArgs(["-b", "123"], "/repo").options.bug, "123");
    assert.equal(parseSubmitArgs(["--bug=45"], "/repo").options.bug, "45");
    assert.equal(parseSubmitArgs(["--no-bug"], "/repo").options.noBug, true);
    assert.throws(() => parseSubmitArgs(["--bug", "abc"], "/repo"), {
      message: "Bug ID must be a number: abc",
    });
    assert.throws(() => parseSubmitArgs(["-b", "1", "--no-bug"], "/repo"), {
      message: "--bug and --no-bug can't be used together",
    });
  });

  test("rejects bad arguments", () => {
    assert.throws(() => parseSubmitArgs(["--bogus"], "/repo"), {
      name: "UsageError",
      message: "Unknown option: --bogus",
    });
    assert.throws(() => parseSubmitArgs(["-r"], "/repo"), {
      message: "Option -r needs a value",
    });
    assert.throws(() => parseSubmitArgs(["a", "b", "c"], "/repo"), {
      message: "Too many revisions: a b c",
    });
    assert.throws(() => parseSubmitArgs(["--wip", "--no-wip"], "/repo"), {
      message: "--wip and --no-wip can't be used together",
    });
    assert.throws(() => parseSubmitArgs(["--force=yes"], "/repo"), UsageError);
  });

  test("dispatches commands", () => {
    assert.deepEqual(parseCommand([], "/repo"), { command: "help" });
    assert.deepEqual(parseCommand(["--help"], "/repo"), { command: "help" });
    assert.deepEqual(parseCommand(["submit", "-h"], "/repo"), {
      command: "help",
    });
    assert.deepEqual(parseCommand(["auth"], "/repo"), {
      command: "auth",
      subcommand: "help",
    });
    assert.deepEqual(parseCommand(["auth", "test"], "/repo"), {
      command: "auth",
      subcommand: "test",
    });

    const submit = parseCommand(["submit", "--single", "HEAD"], "/repo");
    assert.equal(submit.command, "submit");
    if (submit.command === "submit") {
      assert.equal(submit.options.single, true);
      assert.equal(submit.options.start, "HEAD");
    }
  });

  test("rejects unknown commands", () => {
    assert.throws(() => parseCommand(["land"], "/repo"), {
      message: "Unknown command: land",
    });
    assert.throws(() => parseCommand(["auth", "login"], "/repo"), {
      message: "Unknown auth command: login",
    });
  });
});
