import { z } from "zod";

const PERSON_SCHEMA = z.union([
  z.string(),
  z.object({
    name: z.string(),
    email: z.string().optional(),
    url: z.string().optional(),
  }),
]);

const LICENSE_OBJECT_SCHEMA = z.object({
  type: z.string(),
  url: z.string().optional(),
});

/** The package.json fields this program reads, anything else is left alone */
export const PACKAGE_META_SCHEMA = z.object({
  author: PERSON_SCHEMA.optional(),
  contributors: z.array(PERSON_SCHEMA).optional(),
  license: z
    .union([z.string(), LICENSE_OBJECT_SCHEMA, z.array(LICENSE_OBJECT_SCHEMA)])
    .optional(),
  // deprecated by npm, still found in older packages
  licenses: z.array(LICENSE_OBJECT_SCHEMA).optional(),
});

export type Person = z.infer<typeof PERSON_SCHEMA>;
export type PackageMeta = z.infer<typeof PACKAGE_META_SCHEMA>;
