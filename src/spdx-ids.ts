import { createRequire } from "node:module";
import spdxCorrect from "spdx-correct";
import { CatalogError } from "./errors.js";

const require = createRequire(import.meta.url);

/** The SPDX license list, deprecated identifiers included */
export class SpdxIds {
  private ids: ReadonlySet<string>;

  constructor(ids: Iterable<string>) {
    this.ids = new Set(ids);
  }

  /** Case sensitive, `mit` is not `MIT` */
  isValid(id: string): boolean {
    return this.ids.has(id);
  }

  /** Suggests a valid identifier for a misspelled one, `apache 2` → `Apache-2.0` */
  suggest(id: string): string | undefined {
    let corrected: ReturnType<typeof spdxCorrect>;

    try {
      corrected = spdxCorrect(id);
    } catch {
      // spdx-correct throws on some punctuation-only input, such as `+`
      return;
    }

    if (corrected && corrected != id && this.isValid(corrected)) {
      return corrected;
    }
  }
}

export function loadSpdxIds(): SpdxIds {
  return new SpdxIds([
    ...readIdList("spdx-license-ids"),
    ...readIdList("spdx-license-ids/deprecated"),
  ]);
}

function readIdList(specifier: string): string[] {
  const list: unknown = require(specifier);

  if (
    !Array.isArray(list) ||
    !list.every((id): id is string => typeof id == "string")
  ) {
    throw new CatalogError(`"${specifier}" is not a list of license ids`);
  }

  return list;
}

let bundledIds: SpdxIds | undefined;

export function defaultSpdxIds(): SpdxIds {
  if (!bundledIds) {
    bundledIds = loadSpdxIds();
  }

  return bundledIds;
}
