import { NoAuthorsError } from "./errors.js";

const GIT_STYLE_AUTHOR = /(?<name>.+) <(?<email>.+)>/;

/**
 * Returns the name from a git style author, `John Doe <jd@example.com>`
 *
 * The name runs up to the last `<...>` pair and is not trimmed.
 */
export function parseGitStyleAuthor(author: string): string | undefined {
  return GIT_STYLE_AUTHOR.exec(author)?.groups?.name;
}

export default function normalizeAuthors(authors: readonly string[]): string[] {
  if (authors.length == 0) {
    throw new NoAuthorsError();
  }

  return authors.map((author) => parseGitStyleAuthor(author) ?? author);
}
