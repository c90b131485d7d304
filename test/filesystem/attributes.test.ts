import fs from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  PosixAttributes,
  Win32Attributes,
  createPlatformAttributes,
  getPlatformAttributes,
  isHidden,
  isReadonly,
  parseAttribOutput,
  setPlatformAttributes,
} from "../../src/filesystem/index.js";
import { PathNotFoundError } from "../../src/errors/index.js";
import { configure, resetConfig } from "../../src/index.js";
import { makeScratchDir, permissionsEnforced, removeScratchDir } from "../helpers.js";

describe("parseAttribOutput", () => {
  it("reads the flag letters before the path", () => {
    const flags = parseAttribOutput("A    H        C:\\Users\\me\\.secret\r\n", "C:\\Users\\me\\.secret");
    expect([...flags].sort()).toEqual(["A", "H"]);
  });

  it("matches the path case-insensitively", () => {
    const flags = parseAttribOutput("     R       c:\\data\\report.txt\r\n", "C:\\Data\\Report.txt");
    expect(flags.has("R")).toBe(true);
    expect(flags.size).toBe(1);
  });

  it("returns no flags for a plain file", () => {
    expect(parseAttribOutput("             C:\\f.txt", "C:\\f.txt").size).toBe(0);
  });

  it("throws on output that does not name the path", () => {
    expect(() => parseAttribOutput("File not found - C:\\x", "C:\\y")).toThrow(
      "Unexpected attrib output: File not found - C:\\x"
    );
  });
});

describe("Win32Attributes", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeScratchDir();
  });

  afterEach(async () => {
    await removeScratchDir(dir);
  });

  it("reports the hidden and read-only flags", async () => {
    const attributes = new Win32Attributes(async () => new Set(["H", "R"]));
    await expect(attributes.isHidden("C:\\any")).resolves.toBe(true);
    await expect(attributes.isReadonly("C:\\any")).resolves.toBe(true);
  });

  it("ignores a dot prefix when the flag is absent", async () => {
    const attributes = new Win32Attributes(async () => new Set(["A"]));
    await expect(attributes.isHidden(path.join(dir, ".config"))).resolves.toBe(false);
    await expect(attributes.isReadonly(path.join(dir, ".config"))).resolves.toBe(false);
  });

  it("falls back to name and access checks when the query fails", async () => {
    const file = path.join(dir, ".hidden");
    await fs.writeFile(file, "x");
    const attributes = new Win32Attributes(async () => {
      throw new Error("attrib unavailable");
    });

    await expect(attributes.isHidden(file)).resolves.toBe(true);
    await expect(attributes.isReadonly(file)).resolves.toBe(false);
  });
});

describe("PosixAttributes", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeScratchDir();
  });

  afterEach(async () => {
    await removeScratchDir(dir);
  });

  it("treats dot names as hidden", async () => {
    const attributes = new PosixAttributes();
    await expect(attributes.isHidden(path.join(dir, ".env"))).resolves.toBe(true);
    await expect(attributes.isHidden(path.join(dir, "env"))).resolves.toBe(false);
  });

  it.skipIf(!permissionsEnforced)("reports files without write access as read-only", async () => {
    const file = path.join(dir, "locked.txt");
    await fs.writeFile(file, "x");
    const attributes = new PosixAttributes();

    await expect(attributes.isReadonly(file)).resolves.toBe(false);
    await fs.chmod(file, 0o400);
    await expect(attributes.isReadonly(file)).resolves.toBe(true);
  });
});

describe("isHidden / isReadonly", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeScratchDir();
    setPlatformAttributes(new PosixAttributes());
  });

  afterEach(async () => {
    setPlatformAttributes(null);
    await removeScratchDir(dir);
  });

  it("checks existing paths", async () => {
    const hidden = path.join(dir, ".segredo");
    const visible = path.join(dir, "aberto.txt");
    await fs.writeFile(hidden, "x");
    await fs.writeFile(visible, "x");

    await expect(isHidden(hidden)).resolves.toBe(true);
    await expect(isHidden(visible)).resolves.toBe(false);
    await expect(isReadonly(visible)).resolves.toBe(false);
  });

  it("rejects missing paths", async () => {
    const missing = path.join(dir, ".nada");
    await expect(isHidden(missing)).rejects.toBeInstanceOf(PathNotFoundError);
    await expect(isReadonly(missing)).rejects.toBeInstanceOf(PathNotFoundError);
  });

  it("uses the injected implementation", async () => {
    const file = path.join(dir, "plain.txt");
    await fs.writeFile(file, "x");
    setPlatformAttributes(new Win32Attributes(async () => new Set(["H"])));

    await expect(isHidden(file)).resolves.toBe(true);
  });
});

describe("platform selection", () => {
  afterEach(() => {
    resetConfig();
  });

  it("maps platforms to implementations", () => {
    expect(createPlatformAttributes("win32").name).toBe("win32");
    expect(createPlatformAttributes("linux").name).toBe("posix");
    expect(createPlatformAttributes("darwin").name).toBe("posix");
  });

  it("follows the configured override", async () => {
    await configure({
      envConfig: {},
      overrides: { platform: { attributes: "win32" }, logging: { level: "silent" } },
    });
    expect(getPlatformAttributes().name).toBe("win32");

    await configure({
      envConfig: {},
      overrides: { platform: { attributes: "posix" }, logging: { level: "silent" } },
    });
    expect(getPlatformAttributes().name).toBe("posix");
  });
});
