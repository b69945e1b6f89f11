import path from "node:path";
import { z } from "zod";
import { LocalFs } from "./fs.js";
import { ManifestError } from "./errors.js";
import {
  PACKAGE_META_SCHEMA,
  type PackageMeta,
  type Person,
} from "./package-meta.js";
import normalizeAuthors from "./normalize-authors.js";

export const DEFAULT_LICENSE = "MIT OR Apache-2.0";

type ManifestFormat = {
  indent: string;
  newline: "\n" | "\r\n";
  trailingNewline: boolean;
};

export type Manifest = {
  path: string;
  meta: PackageMeta;
  /** The parsed document in its original key order */
  document: Record<string, unknown>;
  format: ManifestFormat;
};

export async function readManifest(manifestPath: string): Promise<Manifest> {
  const fs = new LocalFs(path.dirname(manifestPath));
  const text = await fs.readFile(path.basename(manifestPath));

  let json: unknown;

  try {
    json = JSON.parse(text);
  } catch (e) {
    throw new ManifestError(manifestPath, "invalid JSON", e);
  }

  const document = z.record(z.unknown()).safeParse(json);

  if (!document.success) {
    throw new ManifestError(manifestPath, "expected a JSON object");
  }

  const meta = PACKAGE_META_SCHEMA.safeParse(json);

  if (!meta.success) {
    throw new ManifestError(
      manifestPath,
      "unexpected package metadata",
      meta.error
    );
  }

  return {
    path: manifestPath,
    meta: meta.data,
    document: document.data,
    format: detectFormat(text),
  };
}

function detectFormat(text: string): ManifestFormat {
  const indent = /^[ \t]+(?=\S)/m.exec(text)?.[0];

  return {
    indent: indent ?? (text.trim().includes("\n") ? "  " : ""),
    newline: text.includes("\r\n") ? "\r\n" : "\n",
    trailingNewline: /\n$/.test(text),
  };
}

/** `author` followed by `contributors`, as display names */
export function manifestAuthors(meta: PackageMeta): string[] {
  const people: Person[] = [];

  if (meta.author) {
    people.push(meta.author);
  }

  people.push(...(meta.contributors ?? []));

  return normalizeAuthors(
    people.map((person) => (typeof person == "string" ? person : person.name))
  );
}

/**
 * Serializes the manifest with `license` set to the expression
 *
 * The deprecated `licenses` list is dropped, every other key keeps its place.
 */
export function updateManifestLicense(
  manifest: Manifest,
  license: string
): string {
  const updated: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(manifest.document)) {
    if (key == "licenses") {
      continue;
    }

    updated[key] = key == "license" ? license : value;
  }

  if (!("license" in updated)) {
    updated.license = license;
  }

  const { indent, newline, trailingNewline } = manifest.format;
  let text = JSON.stringify(updated, null, indent);

  if (newline != "\n") {
    text = text.replace(/\n/g, newline);
  }

  return trailingNewline ? text + newline : text;
}
