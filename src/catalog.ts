import * as fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { CatalogError } from "./errors.js";

/** An open-source license with text bundled in the program */
export type License = {
  /**
   * Names the license's file when several are written, `LICENSE-APACHE` vs `LICENSE-MIT`
   */
  readonly identifier: string;
  /** SPDX license identifier, unique within a catalog */
  readonly spdx: string;
  /** Mustache template of the license text, filled with `year` and `copyright_holders` */
  readonly text: string;
};

const CATALOG_SCHEMA = z.array(
  z.object({
    // used in file names
    identifier: z.string().regex(/^[A-Za-z0-9.-]+$/),
    spdx: z.string().min(1),
    template: z.string().min(1),
  })
);

export const BUNDLED_LICENSES_DIR = fileURLToPath(
  new URL("../licenses/", import.meta.url)
);

export class Catalog {
  readonly licenses: readonly License[];

  constructor(licenses: License[]) {
    const seen = new Set<string>();

    for (const license of licenses) {
      if (seen.has(license.spdx)) {
        throw new CatalogError(
          `license catalog lists ${license.spdx} more than once`
        );
      }

      seen.add(license.spdx);
    }

    this.licenses = Object.freeze(
      licenses.map((license) => Object.freeze({ ...license }))
    );
  }

  findBySpdx(id: string): License | undefined {
    return this.licenses.find((license) => license.spdx == id);
  }
}

/**
 * Reads `catalog.json` and the templates it names from `dir`
 *
 * Throws a `CatalogError` when the data is malformed, there's no recovering from that
 */
export function loadCatalog(dir: string = BUNDLED_LICENSES_DIR): Catalog {
  const catalogPath = path.join(dir, "catalog.json");
  let entries: z.infer<typeof CATALOG_SCHEMA>;

  try {
    entries = CATALOG_SCHEMA.parse(
      JSON.parse(fs.readFileSync(catalogPath, "utf8"))
    );
  } catch (e) {
    throw new CatalogError(`failed to load "${catalogPath}"`, { cause: e });
  }

  // several SPDX IDs can share a template, the GPL family does
  const templates = new Map<string, string>();

  const licenses = entries.map((entry) => {
    let text = templates.get(entry.template);

    if (text === undefined) {
      const templatePath = path.join(dir, entry.template);

      try {
        text = fs.readFileSync(templatePath, "utf8");
      } catch (e) {
        throw new CatalogError(
          `missing template "${templatePath}" for ${entry.spdx}`,
          { cause: e }
        );
      }

      templates.set(entry.template, text);
    }

    return { identifier: entry.identifier, spdx: entry.spdx, text };
  });

  return new Catalog(licenses);
}

let bundledCatalog: Catalog | undefined;

export function defaultCatalog(): Catalog {
  if (!bundledCatalog) {
    bundledCatalog = loadCatalog();
  }

  return bundledCatalog;
}
