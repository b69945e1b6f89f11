import { type Catalog, type License, defaultCatalog } from "./catalog.js";
import { type SpdxIds, defaultSpdxIds } from "./spdx-ids.js";
import {
  EmptyExpressionError,
  InvalidSpdxIdError,
  UnsupportedLicenseError,
} from "./errors.js";
import { logWarning } from "./log.js";

const OPERATORS = ["WITH", "OR", "AND"];

export type ResolveContext = {
  catalog: Catalog;
  spdxIds: SpdxIds;
};

/**
 * Splits an expression into license identifiers
 *
 * Manifests have historically joined licenses with `/`, `MIT/Apache-2.0`, so
 * an expression containing `/` is split on it instead of whitespace.
 * Operators are dropped without honoring them.
 */
export function tokenizeExpression(expression: string): string[] {
  const tokens = expression.includes("/")
    ? expression.split("/")
    : expression.split(/\s+/);

  return tokens
    .map((token) => token.trim())
    .filter((token) => token != "" && !OPERATORS.includes(token));
}

/**
 * Resolves every license named by the expression, in order of appearance
 *
 * Fails on the first token that is not a valid SPDX ID or has no bundled text.
 */
export default function resolveExpression(
  expression: string,
  context?: Partial<ResolveContext>
): License[] {
  const catalog = context?.catalog ?? defaultCatalog();
  const spdxIds = context?.spdxIds ?? defaultSpdxIds();

  const resolved: License[] = [];

  for (const id of tokenizeExpression(expression)) {
    if (!spdxIds.isValid(id)) {
      throw new InvalidSpdxIdError(id, spdxIds.suggest(id));
    }

    const license = catalog.findBySpdx(id);

    if (!license) {
      throw new UnsupportedLicenseError(id);
    }

    // a repeated identifier would overwrite its own file
    const existing = resolved.find(
      (other) => other.identifier == license.identifier
    );

    if (existing) {
      logWarning(
        `ignoring ${id} in "${expression}", it would overwrite the file of ${existing.spdx}`
      );
      continue;
    }

    resolved.push(license);
  }

  if (resolved.length == 0) {
    throw new EmptyExpressionError(expression);
  }

  return resolved;
}
