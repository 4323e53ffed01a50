import { describe, expect, it } from "vitest";
import { ValidationLevel } from "../core/validation-level.js";
import { ValidationLogger } from "../core/validation-logger.js";
import { LogLevel, StructuredLogger } from "./structured-logger.js";

function capture(options: { level?: LogLevel; component?: string } = {}) {
  const lines: string[] = [];
  const logger = new StructuredLogger({ ...options, writer: (line) => lines.push(line) });
  return { lines, logger };
}

describe("StructuredLogger", () => {
  it("writes one JSON object per call", () => {
    const { lines, logger } = capture();
    logger.info("schema loaded", { fields: 3 });

    const parsed = JSON.parse(lines[0]);
    expect(parsed.level).toBe("info");
    expect(parsed.msg).toBe("schema loaded");
    expect(parsed.fields).toBe(3);
    expect(parsed.time).toBeTypeOf("string");
  });

  it("drops calls below the minimum level", () => {
    const { lines, logger } = capture({ level: LogLevel.WARN });
    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");
    logger.error("shown");

    expect(lines.map((line) => JSON.parse(line).level)).toEqual(["warn", "error"]);
  });

  it("tags lines with the component", () => {
    const { lines, logger } = capture({ component: "address-validator" });
    logger.warn("zip missing");
    expect(JSON.parse(lines[0]).component).toBe("address-validator");
  });

  it("child loggers share the writer but change the component", () => {
    const { lines, logger } = capture({ component: "parent", level: LogLevel.INFO });
    logger.child("nested").debug("hidden");
    logger.child("nested").info("visible");

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0]).component).toBe("nested");
  });

  it("flattens Error values into message and stack", () => {
    const { lines, logger } = capture();
    logger.error("validator crashed", { error: new Error("boom") });

    const parsed = JSON.parse(lines[0]);
    expect(parsed.error).toBe("boom");
    expect(parsed.errorStack).toContain("boom");
  });

  it("falls back when the context cannot be serialized", () => {
    const { lines, logger } = capture();
    const loop: Record<string, unknown> = {};
    loop.self = loop;
    logger.info("cyclic", { loop });

    const parsed = JSON.parse(lines[0]);
    expect(parsed.msg).toBe("cyclic");
    expect(parsed.serializationError).toBe(true);
    expect(parsed.loop).toBeUndefined();
  });

  it("receives validation messages with property and scope", () => {
    const { lines, logger } = capture({ component: "orders" });
    const vl = new ValidationLogger({ enabledLevels: ValidationLevel.All, logger });
    vl.withScope("order 7", () => vl.warning("quantity", "rounded down"));

    const parsed = JSON.parse(lines[0]);
    expect(parsed).toMatchObject({
      level: "warn",
      msg: "rounded down",
      component: "orders",
      property: "quantity",
      scope: ["order 7"],
    });
  });
});
