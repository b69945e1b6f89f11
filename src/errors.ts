export class ApplyLicenseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NoAuthorsError extends ApplyLicenseError {
  constructor() {
    super("at least one author is required");
  }
}

export class InvalidSpdxIdError extends ApplyLicenseError {
  readonly token: string;
  readonly suggestion?: string;

  constructor(token: string, suggestion?: string) {
    const hint = suggestion ? ` (did you mean '${suggestion}'?)` : "";
    super(`invalid SPDX license ID: ${token}${hint}`);
    this.token = token;
    this.suggestion = suggestion;
  }
}

export class UnsupportedLicenseError extends ApplyLicenseError {
  readonly spdx: string;

  constructor(spdx: string) {
    super(
      `SPDX ID '${spdx}' is valid, but unsupported by this program. Please open a PR adding its text!`
    );
    this.spdx = spdx;
  }
}

export class EmptyExpressionError extends ApplyLicenseError {
  readonly expression: string;

  constructor(expression: string) {
    super(`license expression "${expression}" does not name any license`);
    this.expression = expression;
  }
}

export class TemplateSyntaxError extends ApplyLicenseError {
  readonly spdx: string;

  constructor(spdx: string, cause: unknown) {
    super(`syntax error in the ${spdx} license template`, { cause });
    this.spdx = spdx;
  }
}

/** The bundled license catalog is malformed */
export class CatalogError extends ApplyLicenseError {}

export class ManifestError extends ApplyLicenseError {
  readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super(`${path}: ${message}`, { cause });
    this.path = path;
  }
}

export class IoError extends ApplyLicenseError {
  readonly path: string;

  constructor(action: "read" | "write", path: string, cause: unknown) {
    super(`failed to ${action} "${path}"`, { cause });
    this.path = path;
  }
}

export class UsageError extends ApplyLicenseError {}
