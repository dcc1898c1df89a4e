import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import assert from "assert/strict";
import {
  configFilePath,
  conduitApiUrl,
  loadArcConfig,
  loadConfig,
  parseArcConfig,
  parseArcrcToken,
  parseConfig,
} from "./config.js";
import { ConfigError } from "./errors.js";

const ARCCONFIG = '{"phabricator.uri":"https://phabricator.test/"}';

const DEFAULTS = {
  submit: { autoSubmit: false, alwaysBlocking: false, requireBugId: false },
  git: { remote: [], binaryPath: "git" },
  jj: { binaryPath: "jj" },
};

suite("config", () => {
  let dir: string;

  setup(async () => {
    dir = await mkdtemp(join(tmpdir(), "phab-stack-config-"));
  });

  teardown(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("empty file gives the defaults", () => {
    assert.deepEqual(parseConfig("{}"), DEFAULTS);
  });

  test("values override the defaults per key", () => {
    const config = parseConfig(
      '{"submit":{"alwaysBlocking":true},"git":{"remote":["upstream"]}}',
    );
    assert.deepEqual(config, {
      submit: { autoSubmit: false, alwaysBlocking: true, requireBugId: false },
      git: { remote: ["upstream"], binaryPath: "git" },
      jj: { binaryPath: "jj" },
    });
  });

  test("names the offending key", () => {
    assert.throws(
      () => parseConfig('{"submit":{"autoSubmit":"yes"}}'),
      (error: unknown) =>
        error instanceof ConfigError &&
        /^Invalid config\.json: submit\.autoSubmit: /.test(error.message),
    );
  });

  test("rejects malformed JSON", () => {
    assert.throws(
      () => parseConfig("{", "/home/test/config.json"),
      (error: unknown) =>
        error instanceof ConfigError &&
        error.message.startsWith(
          "/home/test/config.json is not valid JSON: ",
        ),
    );
  });

  test("config path comes from the environment or the home directory", () => {
    assert.equal(
      configFilePath({}, "/home/test"),
      "/home/test/.config/phab-stack/config.json",
    );
    assert.equal(
      configFilePath(
        { PHAB_STACK_CONFIG: "/etc/phab-stack.json" },
        "/home/test",
      ),
      "/etc/phab-stack.json",
    );
  });

  test("missing config file gives the defaults", async () => {
    assert.deepEqual(await loadConfig({}, dir), DEFAULTS);
  });

  test("loads the file named in the environment", async () => {
    const path = join(dir, "custom.json");
    await writeFile(path, '{"submit":{"autoSubmit":true}}', "utf-8");
    const config = await loadConfig({ PHAB_STACK_CONFIG: path }, dir);
    assert.equal(config.submit.autoSubmit, true);
  });

  suite("arc files", () => {
    test("reads the server and callsign from .arcconfig", () => {
      assert.deepEqual(
        parseArcConfig(
          JSON.stringify({
            "phabricator.uri": "https://phabricator.test/",
            "repository.callsign": "APP",
          }),
        ),
        { url: "https://phabricator.test/", callsign: "APP" },
      );
      assert.deepEqual(parseArcConfig(ARCCONFIG), {
        url: "https://phabricator.test/",
        callsign: null,
      });
    });

    test(".arcconfig needs a server URL", () => {
      assert.throws(
        () => parseArcConfig('{"phabricator.uri":"not a url"}'),
        ConfigError,
      );
      assert.throws(() => parseArcConfig("{}"), ConfigError);
    });

    test("missing .arcconfig is an error", async () => {
      await assert.rejects(loadArcConfig(dir), ConfigError);
    });

    test("loads .arcconfig from the repository root", async () => {
      await writeFile(join(dir, ".arcconfig"), ARCCONFIG, "utf-8");
      assert.deepEqual(await loadArcConfig(dir), {
        url: "https://phabricator.test/",
        callsign: null,
      });
    });

    test("API URL ends in api/", () => {
      const api = "https://phabricator.test/api/";
      assert.equal(conduitApiUrl("https://phabricator.test"), api);
      assert.equal(conduitApiUrl("https://phabricator.test/"), api);
    });

    test("finds the token for the server in .arcrc", () => {
      const arcrc = JSON.stringify({
        hosts: {
          "https://other.test/api/": { token: "other-secret" },
          "https://phabricator.test/api/": { token: "test-secret" },
        },
      });
      assert.equal(
        parseArcrcToken(arcrc, "https://phabricator.test"),
        "test-secret",
      );
      assert.equal(parseArcrcToken(arcrc, "https://missing.test/"), null);
      assert.equal(parseArcrcToken("{}", "https://phabricator.test/"), null);
    });
  });
});
