/**
 * Tests for logger construction.
 */

import { describe, it, expect } from "vitest";
import { pino } from "pino";
import { componentLogger, createLogger } from "../src/logger.js";

describe("createLogger", () => {
  it("defaults to info", () => {
    expect(createLogger().level).toBe("info");
  });

  it("takes the requested level", () => {
    expect(createLogger({ level: "warn" }).level).toBe("warn");
  });
});

describe("componentLogger", () => {
  it("binds the component and extra fields", () => {
    const lines: Record<string, unknown>[] = [];
    const parent = pino(
      { level: "debug" },
      {
        write(msg: string) {
          const parsed: unknown = JSON.parse(msg);
          if (parsed !== null && typeof parsed === "object") lines.push({ ...parsed });
        },
      },
    );

    componentLogger("dispatcher", parent, { ledger: "ilp.usd." }).info("hello");
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ component: "dispatcher", ledger: "ilp.usd.", msg: "hello" });
  });

  it("overrides the parent's level for the child only", () => {
    const parent = pino({ level: "debug" });
    const child = componentLogger("adaptor", parent, {}, "error");
    expect(child.level).toBe("error");
    expect(parent.level).toBe("debug");
  });

  it("is silent without a parent", () => {
    expect(componentLogger("adaptor").level).toBe("silent");
  });
});
