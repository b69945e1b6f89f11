import test, { type ExecutionContext } from "ava";
import fs from "fs-extra";
import path from "node:path";
import { Catalog, defaultCatalog, loadCatalog } from "../src/catalog.js";
import { CatalogError } from "../src/errors.js";
import { tempDir } from "./helpers/temp-dir.js";

async function catalogDir(
  t: ExecutionContext,
  files: { [name: string]: string }
): Promise<string> {
  const dir = await tempDir(t);

  for (const [name, contents] of Object.entries(files)) {
    await fs.writeFile(path.join(dir, name), contents);
  }

  return dir;
}

test("bundled catalog", (t) => {
  const catalog = defaultCatalog();

  t.is(defaultCatalog(), catalog);
  t.is(catalog.findBySpdx("MIT")?.identifier, "MIT");
  t.is(catalog.findBySpdx("Apache-2.0")?.identifier, "APACHE");
  t.is(catalog.findBySpdx("MPL-2.0"), undefined);

  const spdxIds = catalog.licenses.map((license) => license.spdx);
  t.is(new Set(spdxIds).size, spdxIds.length);
});

test("gpl family shares a template", (t) => {
  const catalog = defaultCatalog();
  const only = catalog.findBySpdx("GPL-3.0-only");

  t.assert(only?.text.includes("GNU GENERAL PUBLIC LICENSE"));
  t.is(catalog.findBySpdx("GPL-3.0-or-later")?.text, only?.text);
});

test("load catalog", async (t) => {
  const dir = await catalogDir(t, {
    "catalog.json": JSON.stringify([
      { identifier: "MIT", spdx: "MIT", template: "mit.txt" },
      { identifier: "EXPAT", spdx: "MIT-0", template: "mit.txt" },
    ]),
    "mit.txt": "Copyright {{year}} {{{copyright_holders}}}\n",
  });

  const catalog = loadCatalog(dir);

  t.deepEqual(
    catalog.licenses.map((license) => [license.identifier, license.spdx]),
    [
      ["MIT", "MIT"],
      ["EXPAT", "MIT-0"],
    ]
  );
  t.is(
    catalog.findBySpdx("MIT-0")?.text,
    "Copyright {{year}} {{{copyright_holders}}}\n"
  );
});

test("malformed catalogs", async (t) => {
  const catalogs: { [name: string]: string }[] = [
    { "catalog.json": "[" },
    { "catalog.json": JSON.stringify([{ identifier: "MIT" }]) },
    {
      "catalog.json": JSON.stringify([
        { identifier: "../MIT", spdx: "MIT", template: "mit.txt" },
      ]),
      "mit.txt": "",
    },
    {
      "catalog.json": JSON.stringify([
        { identifier: "MIT", spdx: "MIT", template: "missing.txt" },
      ]),
    },
    {
      "catalog.json": JSON.stringify([
        { identifier: "MIT", spdx: "MIT", template: "mit.txt" },
        { identifier: "EXPAT", spdx: "MIT", template: "mit.txt" },
      ]),
      "mit.txt": "",
    },
  ];

  for (const files of catalogs) {
    const dir = await catalogDir(t, files);

    t.throws(() => loadCatalog(dir), { instanceOf: CatalogError });
  }
});

test("catalog entries are read only", (t) => {
  const catalog = new Catalog([{ identifier: "MIT", spdx: "MIT", text: "" }]);

  t.assert(Object.isFrozen(catalog.licenses));
  t.assert(Object.isFrozen(catalog.licenses[0]));
});
