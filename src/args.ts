import * as fs from "node:fs/promises";
import { z } from "zod";
import { UsageError } from "./errors.js";

export type ArgumentConfig = {
  args?: string[];
  alternate?: string;
  description?: string;
  hidden?: true;
};

export type ArgumentTable = { [key: string]: ArgumentConfig };

/**
 * Groups each argument with the values it expects, `["--author", "John Doe"]`
 *
 * Arguments missing from the table are grouped alone and left for the caller to reject.
 */
export function groupArgs(
  supportedArguments: ArgumentTable,
  argv: readonly string[]
): string[][] {
  const processedArgs: string[][] = [];
  let expectedArgs = 0;

  for (const arg of argv) {
    if (expectedArgs > 0) {
      processedArgs[processedArgs.length - 1].push(arg);
      expectedArgs -= 1;
      continue;
    }

    const argConfig = supportedArguments[arg];
    expectedArgs = argConfig?.args?.length || 0;

    processedArgs.push([arg]);
  }

  if (expectedArgs > 0) {
    throw new UsageError(
      "missing argument for " + processedArgs[processedArgs.length - 1][0]
    );
  }

  return processedArgs;
}

export function helpText(
  usage: string,
  supportedArguments: ArgumentTable
): string {
  const lines = [`Usage: ${usage}`, "", "Options:"];

  const argsHelp: [string, string][] = [];
  let widestHelpLength = 0;

  for (const key in supportedArguments) {
    const argConfig = supportedArguments[key];

    if (argConfig.hidden) {
      continue;
    }

    // document arg name
    const alternate = argConfig.alternate ? argConfig.alternate + "," : "   ";
    let text = "  " + alternate + " " + key + " ";

    // document arg's args
    if (argConfig.args) {
      for (const name of argConfig.args) {
        text += `<${name}> `;
      }
    }

    argsHelp.push([key, text]);

    if (text.length > widestHelpLength) {
      widestHelpLength = text.length;
    }
  }

  for (const [key, text] of argsHelp) {
    const description = supportedArguments[key].description || "";

    lines.push((text.padEnd(widestHelpLength + 2) + description).trimEnd());
  }

  return lines.join("\n");
}

const PACKAGE_VERSION_SCHEMA = z.object({
  name: z.string(),
  version: z.string(),
});

/** `name version` of this program, read from its own package.json */
export async function readVersion(): Promise<string> {
  const packageJson = await fs.readFile(
    new URL("../package.json", import.meta.url),
    "utf8"
  );
  const packageMeta = PACKAGE_VERSION_SCHEMA.parse(JSON.parse(packageJson));

  return `${packageMeta.name} ${packageMeta.version}`;
}
