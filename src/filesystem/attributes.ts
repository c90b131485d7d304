import { PathNotFoundError } from "../errors/index.js";
import { pathExists, resolvePath, type PathInput } from "./paths.js";
import { getPlatformAttributes } from "./platform.js";

async function resolveExisting(input: PathInput): Promise<string> {
  const resolved = await resolvePath(input);
  if (!(await pathExists(resolved))) {
    throw new PathNotFoundError(resolved);
  }
  return resolved;
}

/**
 * Whether the path is hidden by the platform's convention.
 */
export async function isHidden(input: PathInput): Promise<boolean> {
  const resolved = await resolveExisting(input);
  return getPlatformAttributes().isHidden(resolved);
}

/**
 * Whether the path cannot be written by the current user.
 */
export async function isReadonly(input: PathInput): Promise<boolean> {
  const resolved = await resolveExisting(input);
  return getPlatformAttributes().isReadonly(resolved);
}
