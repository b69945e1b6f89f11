import path from "node:path";
import { z } from "zod";
import { LocalFs } from "./fs.js";
import { UsageError } from "./errors.js";

// make sure to update the --config help if this changes
const CONFIG_SCHEMA = z
  .object({
    authors: z.array(z.string()).optional(),
    license: z.string().optional(),
    outputDir: z.string().optional(),
  })
  .strict();

export type Config = z.infer<typeof CONFIG_SCHEMA>;

/** Reads a JSON config file, `outputDir` is resolved against the file's directory */
export async function loadConfig(configPath: string): Promise<Config> {
  const configDir = path.dirname(configPath);
  const text = await new LocalFs(configDir).readFile(path.basename(configPath));

  let config: Config;

  try {
    config = CONFIG_SCHEMA.parse(JSON.parse(text));
  } catch (e) {
    throw new UsageError(`invalid config file "${configPath}"`, { cause: e });
  }

  if (config.outputDir !== undefined) {
    config.outputDir = path.resolve(configDir, config.outputDir);
  }

  return config;
}
