import fs from "fs/promises";
import { constants } from "fs";
import { execFile } from "child_process";
import { promisify } from "util";
import { hasHiddenName } from "./validation.js";
import { getConfig } from "../config/loader.js";
import { getLogger } from "../utils/logger.js";
import { getErrorMessage } from "../errors/index.js";

const execFileAsync = promisify(execFile);

export type PlatformName = "posix" | "win32";

/**
 * Hidden/read-only detection for one platform family.
 * Paths passed in are already resolved and known to exist.
 */
export interface PlatformAttributes {
  readonly name: PlatformName;
  isHidden(resolvedPath: string): Promise<boolean>;
  isReadonly(resolvedPath: string): Promise<boolean>;
}

async function lacksWriteAccess(resolvedPath: string): Promise<boolean> {
  try {
    await fs.access(resolvedPath, constants.W_OK);
    return false;
  } catch {
    return true;
  }
}

/**
 * Dot-prefix names and access bits.
 */
export class PosixAttributes implements PlatformAttributes {
  readonly name = "posix";

  async isHidden(resolvedPath: string): Promise<boolean> {
    return hasHiddenName(resolvedPath);
  }

  async isReadonly(resolvedPath: string): Promise<boolean> {
    return lacksWriteAccess(resolvedPath);
  }
}

/**
 * Reads the attribute letters (R, H, S, A, ...) set on a path.
 */
export type AttributeReader = (resolvedPath: string) => Promise<Set<string>>;

/**
 * Parse `attrib <path>` output: the flag letters come before the path.
 */
export function parseAttribOutput(stdout: string, resolvedPath: string): Set<string> {
  const line = stdout.split(/\r?\n/).find((l) => l.trim().length > 0) ?? "";
  const pathIndex = line.toLowerCase().indexOf(resolvedPath.toLowerCase());
  if (pathIndex === -1) {
    throw new Error(`Unexpected attrib output: ${line.trim()}`);
  }
  const flags = line.slice(0, pathIndex).replace(/\s+/g, "").toUpperCase();
  return new Set(flags.split("").filter((flag) => flag.length > 0));
}

export const readAttribFlags: AttributeReader = async (resolvedPath) => {
  const { stdout } = await execFileAsync("attrib", [resolvedPath], { windowsHide: true });
  return parseAttribOutput(stdout, resolvedPath);
};

/**
 * File attribute bits, falling back to the POSIX conventions when the
 * attribute query fails.
 */
export class Win32Attributes implements PlatformAttributes {
  readonly name = "win32";
  private readonly fallback = new PosixAttributes();

  constructor(private readonly readAttributes: AttributeReader = readAttribFlags) {}

  async isHidden(resolvedPath: string): Promise<boolean> {
    const flags = await this.queryFlags(resolvedPath);
    return flags ? flags.has("H") : this.fallback.isHidden(resolvedPath);
  }

  async isReadonly(resolvedPath: string): Promise<boolean> {
    const flags = await this.queryFlags(resolvedPath);
    return flags ? flags.has("R") : this.fallback.isReadonly(resolvedPath);
  }

  // Null when the attribute query failed
  private async queryFlags(resolvedPath: string): Promise<Set<string> | null> {
    try {
      return await this.readAttributes(resolvedPath);
    } catch (error) {
      getLogger().debug(
        { path: resolvedPath, error: getErrorMessage(error) },
        "Attribute query failed, using fallback check"
      );
      return null;
    }
  }
}

export function createPlatformAttributes(platform: NodeJS.Platform | PlatformName): PlatformAttributes {
  return platform === "win32" ? new Win32Attributes() : new PosixAttributes();
}

// Selected once, on first use, from config or the running platform
let activeAttributes: PlatformAttributes | null = null;

export function getPlatformAttributes(): PlatformAttributes {
  if (!activeAttributes) {
    const configured = getConfig().platform.attributes;
    activeAttributes = createPlatformAttributes(
      configured === "auto" ? process.platform : configured
    );
  }
  return activeAttributes;
}

export function setPlatformAttributes(attributes: PlatformAttributes | null): void {
  activeAttributes = attributes;
}
