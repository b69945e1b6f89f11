import path from "node:path";
import {
  Catalog,
  type License,
  defaultCatalog,
  loadCatalog,
} from "./catalog.js";
import { SpdxIds, defaultSpdxIds, loadSpdxIds } from "./spdx-ids.js";
import resolveExpression, {
  type ResolveContext,
  tokenizeExpression,
} from "./resolve-expression.js";
import normalizeAuthors, { parseGitStyleAuthor } from "./normalize-authors.js";
import renderLicenseText, {
  type RenderOptions,
  licenseFileName,
} from "./render-license.js";
import { type Fs, LocalFs, writeLicenseFiles } from "./fs.js";
import {
  DEFAULT_LICENSE,
  manifestAuthors,
  readManifest,
  updateManifestLicense,
} from "./manifest.js";
import normalizePackageLicense from "./normalize-package-license.js";

export * from "./errors.js";
export type { License, ResolveContext, RenderOptions, Fs };
export {
  Catalog,
  SpdxIds,
  LocalFs,
  DEFAULT_LICENSE,
  defaultCatalog,
  loadCatalog,
  defaultSpdxIds,
  loadSpdxIds,
  resolveExpression,
  tokenizeExpression,
  normalizeAuthors,
  parseGitStyleAuthor,
  renderLicenseText,
  licenseFileName,
  writeLicenseFiles,
};

export type Options = RenderOptions & {
  /** Author names, git style `John Doe <jd@example.com>` is accepted */
  authors: string[];
  /** SPDX license expression, `MIT OR Apache-2.0` */
  license: string;
  /** Defaults to the current working directory */
  outputDir?: string;
  /** Overrides where the files are written, takes precedence over outputDir */
  fs?: Fs;
  /** Defaults to the bundled catalog and SPDX license list */
  context?: Partial<ResolveContext>;
};

export type Output = {
  licenses: License[];
  /** File names written, relative to the output directory */
  files: string[];
};

export async function applyLicense(options: Options): Promise<Output> {
  const authors = normalizeAuthors(options.authors);
  const licenses = resolveExpression(options.license, options.context);

  // render everything before writing anything
  const rendered = renderLicenseText(licenses, authors, options);
  const fs = options.fs ?? new LocalFs(options.outputDir ?? process.cwd());
  const files = await writeLicenseFiles(fs, rendered);

  return { licenses, files };
}

export type PackageOptions = RenderOptions & {
  /** Defaults to package.json in the current working directory */
  manifestPath?: string;
  /** Overrides the manifest's license */
  license?: string;
  context?: Partial<ResolveContext>;
};

export type PackageOutput = Output & {
  /** The expression that was applied */
  license: string;
  /** License files are written beside the manifest */
  outputDir: string;
  /** Whether the manifest was rewritten with a new license */
  manifestUpdated: boolean;
};

export async function applyPackageLicense(
  options?: PackageOptions
): Promise<PackageOutput> {
  const manifestPath = path.resolve(options?.manifestPath ?? "package.json");
  const manifest = await readManifest(manifestPath);
  const authors = manifestAuthors(manifest.meta);

  const license =
    options?.license ??
    normalizePackageLicense(manifest.meta) ??
    DEFAULT_LICENSE;
  const licenses = resolveExpression(license, options?.context);
  const rendered = renderLicenseText(licenses, authors, options);

  const outputDir = path.dirname(manifestPath);
  const fs = new LocalFs(outputDir);
  const files = await writeLicenseFiles(fs, rendered);

  const manifestUpdated = manifest.meta.license !== license;

  if (manifestUpdated) {
    await fs.writeFile(
      path.basename(manifestPath),
      updateManifestLicense(manifest, license)
    );
  }

  return { license, licenses, files, outputDir, manifestUpdated };
}
