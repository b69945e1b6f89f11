#!/usr/bin/env node
import path from "node:path";
import { applyLicense, defaultCatalog, UsageError } from "./index.js";
import {
  type ArgumentTable,
  groupArgs,
  helpText,
  readVersion,
} from "./args.js";
import { type Config, loadConfig } from "./config.js";
import { logErrorChain, logInfo } from "./log.js";

const supportedArguments: ArgumentTable = {
  "--author": {
    args: ["NAME"],
    alternate: "-a",
    description:
      "An author of the project, can be given multiple times. Accepts `Name <email>`",
  },
  "-a": { hidden: true, args: ["NAME"] },
  "--license": {
    args: ["EXPRESSION"],
    alternate: "-l",
    description: "An SPDX license expression, such as `MIT OR Apache-2.0`",
  },
  "-l": { hidden: true, args: ["EXPRESSION"] },
  "--output-dir": {
    args: ["DIR"],
    alternate: "-o",
    description: "Writes license files to DIR rather than the current directory",
  },
  "-o": { hidden: true, args: ["DIR"] },
  "--config": {
    args: ["FILE_NAME"],
    description:
      "Reads authors, license, and outputDir from a JSON file, arguments take precedence",
  },
  "--list": {
    description: "Lists the SPDX IDs of every license with bundled text",
  },
  "--version": { alternate: "-v" },
  "-v": { hidden: true },
  "--help": { alternate: "-h" },
  "-h": { hidden: true },
};

async function main(argv: string[]) {
  const authors: string[] = [];
  let license: string | undefined;
  let outputDir: string | undefined;
  let config: Config = {};
  let list = false;

  for (const group of groupArgs(supportedArguments, argv)) {
    switch (group[0]) {
      case "-a":
      case "--author":
        authors.push(group[1]);
        break;

      case "-l":
      case "--license":
        license = group[1];
        break;

      case "-o":
      case "--output-dir":
        outputDir = group[1];
        break;

      case "--config":
        config = await loadConfig(group[1]);
        break;

      case "--list":
        list = true;
        break;

      case "-v":
      case "--version":
        console.log(await readVersion());
        return;

      case "-h":
      case "--help":
        console.log(helpText("apply-license [OPTIONS]", supportedArguments));
        return;

      default:
        throw new UsageError(`unsupported argument '${group[0]}'`);
    }
  }

  if (list) {
    for (const entry of defaultCatalog().licenses) {
      console.log(entry.spdx);
    }

    return;
  }

  license = license ?? config.license;
  outputDir = outputDir ?? config.outputDir ?? process.cwd();

  if (!license) {
    throw new UsageError("missing required argument --license");
  }

  const { files } = await applyLicense({
    authors: [...(config.authors ?? []), ...authors],
    license,
    outputDir,
  });

  for (const file of files) {
    logInfo(path.join(outputDir, file));
  }
}

main(process.argv.slice(2)).catch((e) => {
  logErrorChain(e);
  process.exit(1);
});
