import fs from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Logger, getLogger, initLogger, resetLogger } from "../../src/utils/logger.js";
import { makeScratchDir, removeScratchDir } from "../helpers.js";

describe("Logger", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeScratchDir();
  });

  afterEach(async () => {
    resetLogger();
    await removeScratchDir(dir);
  });

  it("builds the shared logger from config on first use", () => {
    const logger = getLogger();
    expect(getLogger()).toBe(logger);
    expect(logger.isLevelEnabled("error")).toBe(false);
  });

  it("replaces the shared logger on init", () => {
    const before = getLogger();
    const after = initLogger({ level: "debug", format: "json", destination: path.join(dir, "a.log") });

    expect(after).not.toBe(before);
    expect(getLogger()).toBe(after);
    expect(after.isLevelEnabled("debug")).toBe(true);
  });

  it("writes JSON lines to the destination", async () => {
    const destination = path.join(dir, "fileguard.log");
    const logger = new Logger({ level: "info", format: "json", destination });

    logger.info({ path: "/tmp/x" }, "created");
    logger.debug("not written");

    const lines = (await fs.readFile(destination, "utf-8")).trim().split("\n");
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? "")).toMatchObject({
      level: 30,
      service: "fileguard",
      path: "/tmp/x",
      msg: "created",
    });
  });

  it("logs completed operations at debug level", async () => {
    const destination = path.join(dir, "ops.log");
    const logger = new Logger({ level: "debug", format: "json", destination });

    logger.operation("delete_file", { path: "/tmp/y" });

    const entry: unknown = JSON.parse((await fs.readFile(destination, "utf-8")).trim());
    expect(entry).toMatchObject({
      level: 20,
      operation: "delete_file",
      params: { path: "/tmp/y" },
      msg: "Operation completed: delete_file",
    });
  });
});
