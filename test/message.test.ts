import { describe, it, expect } from "vitest";
import { ZodError } from "zod";

import {
  FlashMessage,
  LEVELS,
  isAtLeast,
  levelRank,
  parseFlashMessages,
} from "../src/flash/message";

describe("levels", () => {
  it("ranks levels by declaration order", () => {
    expect(LEVELS.map(levelRank)).toEqual([0, 1, 2, 3, 4]);
  });

  it("compares ordinally rather than lexically", () => {
    // "error" < "info" as strings, but error outranks info.
    expect(isAtLeast("error", "info")).toBe(true);
    expect(isAtLeast("debug", "info")).toBe(false);
    expect(isAtLeast("success", "success")).toBe(true);
    expect(isAtLeast("success", "warning")).toBe(false);
  });
});

describe("FlashMessage", () => {
  it("builds messages through per-level constructors", () => {
    expect(FlashMessage.debug("a").level).toBe("debug");
    expect(FlashMessage.info("b").level).toBe("info");
    expect(FlashMessage.success("c").level).toBe("success");
    expect(FlashMessage.warning("d").level).toBe("warning");
    expect(FlashMessage.error("e").level).toBe("error");
    expect(FlashMessage.error("e").content).toBe("e");
  });

  it("is frozen once built", () => {
    const message = FlashMessage.info("Hey there!");
    expect(Object.isFrozen(message)).toBe(true);
  });

  it("serializes the level by name", () => {
    expect(JSON.stringify([FlashMessage.warning("Check your email")])).toBe(
      '[{"content":"Check your email","level":"warning"}]'
    );
  });

  it("renders as content - level", () => {
    expect(String(FlashMessage.info("Hey there!"))).toBe("Hey there! - info");
  });

  it("parses a list of records in order", () => {
    const parsed = parseFlashMessages([
      { content: "first", level: "error" },
      { content: "second", level: "debug" },
    ]);

    expect(parsed.map((m) => [m.content, m.level])).toEqual([
      ["first", "error"],
      ["second", "debug"],
    ]);
    expect(parsed[0]).toBeInstanceOf(FlashMessage);
  });

  it("rejects ordinal levels and unknown names", () => {
    expect(() => parseFlashMessages([{ content: "x", level: 1 }])).toThrow(ZodError);
    expect(() => parseFlashMessages([{ content: "x", level: "Info" }])).toThrow(ZodError);
    expect(() => FlashMessage.fromJSON({ content: "x", level: "critical" })).toThrow(ZodError);
  });

  it("rejects records with unexpected fields", () => {
    expect(() => parseFlashMessages([{ content: "x", level: "info", extra: true }])).toThrow(ZodError);
  });
});
