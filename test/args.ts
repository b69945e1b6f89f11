import test from "ava";
import fs from "fs-extra";
import path from "node:path";
import { type ArgumentTable, groupArgs, helpText } from "../src/args.js";
import { loadConfig } from "../src/config.js";
import { IoError, UsageError } from "../src/errors.js";
import { tempDir } from "./helpers/temp-dir.js";

const supportedArguments: ArgumentTable = {
  "--author": { args: ["NAME"], alternate: "-a", description: "An author" },
  "-a": { hidden: true, args: ["NAME"] },
  "--list": { description: "Lists" },
};

test("group args", (t) => {
  t.deepEqual(
    groupArgs(supportedArguments, [
      "-a",
      "John Doe",
      "--list",
      "--author",
      "--list",
      "extra",
    ]),
    [["-a", "John Doe"], ["--list"], ["--author", "--list"], ["extra"]]
  );
});

test("missing argument", (t) => {
  const error = t.throws(() => groupArgs(supportedArguments, ["--author"]), {
    instanceOf: UsageError,
  });

  t.is(error?.message, "missing argument for --author");
});

test("help", (t) => {
  t.is(
    helpText("apply-license [OPTIONS]", supportedArguments),
    [
      "Usage: apply-license [OPTIONS]",
      "",
      "Options:",
      "  -a, --author <NAME>   An author",
      "      --list" + " ".repeat(12) + "Lists",
    ].join("\n")
  );
});

test("config", async (t) => {
  const dir = await tempDir(t);
  const configPath = path.join(dir, "license.json");

  await fs.writeJson(configPath, {
    authors: ["John Doe"],
    license: "MIT",
    outputDir: "out",
  });

  t.deepEqual(await loadConfig(configPath), {
    authors: ["John Doe"],
    license: "MIT",
    outputDir: path.join(dir, "out"),
  });
});

test("invalid config", async (t) => {
  const dir = await tempDir(t);
  const configPath = path.join(dir, "license.json");

  await t.throwsAsync(loadConfig(configPath), { instanceOf: IoError });

  await fs.writeJson(configPath, { author: "John Doe" });
  await t.throwsAsync(loadConfig(configPath), { instanceOf: UsageError });

  await fs.writeFile(configPath, "{");
  await t.throwsAsync(loadConfig(configPath), { instanceOf: UsageError });
});
