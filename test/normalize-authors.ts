import test from "ava";
import normalizeAuthors, {
  parseGitStyleAuthor,
} from "../src/normalize-authors.js";
import { NoAuthorsError } from "../src/errors.js";

test("git style authors", (t) => {
  t.deepEqual(normalizeAuthors(["John Doe <jd@example.com>"]), ["John Doe"]);
  t.deepEqual(
    normalizeAuthors(["John Doe <jd@example.com>", "Jane Roe"]),
    ["John Doe", "Jane Roe"]
  );
});

test("plain authors", (t) => {
  t.deepEqual(normalizeAuthors(["John Doe"]), ["John Doe"]);
});

test("no authors", (t) => {
  t.throws(() => normalizeAuthors([]), { instanceOf: NoAuthorsError });
});

test("parse git style author", (t) => {
  const authors: [string, string | undefined][] = [
    ["John Doe <jd@example.com>", "John Doe"],
    // the name extends to the last pair
    ["Jane <x> Roe <jr@example.com>", "Jane <x> Roe"],
    // npm style, trailing url
    ["John Doe <jd@example.com> (https://example.com)", "John Doe"],
    // whitespace is kept, apart from the space before <
    ["  John  Doe  <jd@example.com>", "  John  Doe "],
    ["<jd@example.com>", undefined],
    ["John Doe <>", undefined],
    ["John Doe", undefined],
  ];

  for (const [author, expected] of authors) {
    t.is(parseGitStyleAuthor(author), expected, author);
  }
});
