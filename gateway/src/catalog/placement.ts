import type { CatalogRepository } from "../store/types.js";
import { CatalogError } from "./errors.js";
import type { Arch, Package } from "./types.js";

/**
 * Throws unless `pkg` may sit on the channel: same application, same
 * architecture, and the channel is not on the package's blacklist.
 * Blacklists are small arrays, so membership is a linear scan.
 */
export function checkPlacement(pkg: Package, channelId: string, applicationId: string, arch: Arch): void {
  if (pkg.applicationId !== applicationId) {
    throw new CatalogError("InvalidPackage");
  }
  if (pkg.arch !== arch) {
    throw new CatalogError("ArchMismatch", `package arch ${pkg.arch} does not match channel arch ${arch}`);
  }
  if (pkg.channelsBlacklist.includes(channelId)) {
    throw new CatalogError("BlacklistedChannel");
  }
}

export async function validatePackagePlacement(
  catalog: CatalogRepository,
  packageId: string,
  channelId: string,
  applicationId: string,
  arch: Arch,
): Promise<Package> {
  const pkg = await catalog.getPackage(packageId);
  if (!pkg) {
    throw new CatalogError("NotFound", `package ${packageId} not found`);
  }
  checkPlacement(pkg, channelId, applicationId, arch);
  return pkg;
}
