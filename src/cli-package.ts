#!/usr/bin/env node
import path from "node:path";
import { applyPackageLicense, UsageError } from "./index.js";
import {
  type ArgumentTable,
  groupArgs,
  helpText,
  readVersion,
} from "./args.js";
import { logErrorChain, logInfo } from "./log.js";

const supportedArguments: ArgumentTable = {
  "--manifest-path": {
    args: ["PATH"],
    description: "Path to package.json, defaults to the current directory's",
  },
  "--license": {
    args: ["EXPRESSION"],
    description:
      "An SPDX license expression, overrides the license in package.json",
  },
  "--version": { alternate: "-v" },
  "-v": { hidden: true },
  "--help": { alternate: "-h" },
  "-h": { hidden: true },
};

async function main(argv: string[]) {
  let manifestPath: string | undefined;
  let license: string | undefined;

  for (const group of groupArgs(supportedArguments, argv)) {
    switch (group[0]) {
      case "--manifest-path":
        manifestPath = group[1];
        break;

      case "--license":
        license = group[1];
        break;

      case "-v":
      case "--version":
        console.log(await readVersion());
        return;

      case "-h":
      case "--help":
        console.log(
          helpText("npm-apply-license [OPTIONS]", supportedArguments)
        );
        return;

      default:
        throw new UsageError(`unsupported argument '${group[0]}'`);
    }
  }

  const output = await applyPackageLicense({ manifestPath, license });

  for (const file of output.files) {
    logInfo(path.join(output.outputDir, file));
  }

  if (output.manifestUpdated) {
    const manifestName = manifestPath ?? "package.json";
    logInfo(`"license": "${output.license}" in ${manifestName}`);
  }
}

main(process.argv.slice(2)).catch((e) => {
  logErrorChain(e);
  process.exit(1);
});
