import Mustache from "mustache";
import type { License } from "./catalog.js";
import { TemplateSyntaxError } from "./errors.js";

export type RenderOptions = {
  /** Defaults to the current year in local time */
  year?: number;
};

type TemplateData = {
  year: number;
  copyright_holders: string;
};

/** `LICENSE` when it's the only license, `LICENSE-{identifier}` otherwise */
export function licenseFileName(license: License, licenseCount: number) {
  return licenseCount == 1 ? "LICENSE" : `LICENSE-${license.identifier}`;
}

/**
 * Renders each license with the year and authors, keyed by file name
 *
 * Authors are expected to be normalized already.
 */
export default function renderLicenseText(
  licenses: readonly License[],
  authors: readonly string[],
  options?: RenderOptions
): Map<string, string> {
  const data: TemplateData = {
    year: options?.year ?? new Date().getFullYear(),
    copyright_holders: authors.join(", "),
  };

  const rendered = new Map<string, string>();

  for (const license of licenses) {
    let text: string;

    try {
      text = Mustache.render(license.text, data);
    } catch (e) {
      throw new TemplateSyntaxError(license.spdx, e);
    }

    rendered.set(licenseFileName(license, licenses.length), text);
  }

  return rendered;
}
