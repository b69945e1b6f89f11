import type { PackageMeta } from "./package-meta.js";

export default function normalizePackageLicense(
  packageMeta: PackageMeta
): string | undefined {
  const metaLicense = packageMeta.license;

  if (typeof metaLicense == "string") {
    return metaLicense;
  }

  if (Array.isArray(metaLicense)) {
    return joinLegacyLicenses(metaLicense);
  }

  if (metaLicense) {
    return metaLicense.type;
  }

  return joinLegacyLicenses(packageMeta.licenses ?? []);
}

// the legacy lists offered a choice between licenses
function joinLegacyLicenses(
  licenses: { type: string }[]
): string | undefined {
  if (licenses.length == 0) {
    return;
  }

  return licenses.map((license) => license.type).join(" OR ");
}
