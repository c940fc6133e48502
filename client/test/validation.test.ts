import { describe, it, expect, afterEach, vi } from "vitest";
import {
  isValidPlayerId,
  normalizeDifficulty,
  normalizeMapname,
  normalizeMode,
  optionalPlayerId,
  parseIsoDate,
  requirePlayerId,
} from "../src/validation.js";
import { createConsoleLogger, isLogLevel, silentLogger } from "../src/logger.js";
import { KNOWN_MAPS, isKnownMap } from "../src/maps.js";
import { BadArgumentError } from "../src/errors.js";

describe("validation", () => {
  describe("mapname", () => {
    it("stringifies numbers", () => {
      expect(normalizeMapname(5.1, "leaderboards")).toBe("5.1");
      expect(normalizeMapname(" 5.1 ", "leaderboards")).toBe("5.1");
    });

    it("accepts special maps", () => {
      expect(normalizeMapname("rumble", "leaderboards")).toBe("rumble");
      expect(normalizeMapname("DQ12", "leaderboards")).toBe("DQ12");
    });

    it("requires a known map", () => {
      expect(() => normalizeMapname("", "leaderboards")).toThrow("leaderboards: mapname is required");
      expect(() => normalizeMapname(7.1, "runtimeLeaderboards")).toThrow("runtimeLeaderboards: Invalid map: 7.1");
    });
  });

  describe("playerid", () => {
    it("checks the id format", () => {
      expect(isValidPlayerId("U-E9BP-FSN9-H6ENMQ")).toBe(true);
      expect(isValidPlayerId("u-e9bp-fsn9-h6enmq")).toBe(false);
      expect(isValidPlayerId("U-E9BP-FSN9-H6ENM")).toBe(false);
    });

    it("trims and validates required ids", () => {
      expect(requirePlayerId(" U-E9BP-FSN9-H6ENMQ ", "player")).toBe("U-E9BP-FSN9-H6ENMQ");
      expect(() => requirePlayerId(undefined, "player")).toThrow(BadArgumentError);
    });

    it("treats blank optional ids as missing", () => {
      expect(optionalPlayerId("", "leaderboards")).toBeUndefined();
      expect(optionalPlayerId(undefined, "leaderboards")).toBeUndefined();
      expect(() => optionalPlayerId("nobody", "leaderboards")).toThrow("leaderboards: Invalid playerid: nobody");
    });
  });

  describe("enums", () => {
    it("defaults mode and difficulty", () => {
      expect(normalizeMode(undefined, "leaderboards")).toBe("score");
      expect(normalizeDifficulty(undefined, "leaderboards")).toBe("NORMAL");
    });

    it("rejects values outside the enums", () => {
      expect(() => normalizeMode("time", "leaderboards")).toThrow(
        "leaderboards: Invalid mode (must be one of score, waves): time",
      );
      expect(() => normalizeDifficulty("HARD", "leaderboards")).toThrow(
        "leaderboards: Invalid difficulty (must be one of EASY, NORMAL, ENDLESS_I): HARD",
      );
    });
  });

  describe("dates", () => {
    it("accepts real calendar days only", () => {
      expect(parseIsoDate("2024-02-29")).toBe("2024-02-29");
      expect(parseIsoDate("2023-02-29")).toBeUndefined();
      expect(parseIsoDate("29/02/2024")).toBeUndefined();
    });
  });

  describe("maps", () => {
    it("loads the map list", () => {
      expect(KNOWN_MAPS.size).toBe(65);
      expect(isKnownMap("5.b2")).toBe(true);
      expect(isKnownMap("DQ2")).toBe(false);
    });
  });
});

describe("logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops entries below the minimum level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = createConsoleLogger("warn");

    logger.log("info", "request", { url: "http://localhost/" });
    logger.log("warn", "date.invalid", { date: "never" });

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(warn.mock.calls[0][0]));
    expect(line).toMatchObject({ level: "warn", event: "date.invalid", details: { date: "never" } });
  });

  it("strips control characters from string details", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    createConsoleLogger("debug").log("debug", "response.body", { body: "a\u202Eb\u0007c", status: 200 });

    const line: unknown = JSON.parse(String(log.mock.calls[0][0]));
    expect(line).toMatchObject({ details: { body: "abc", status: 200 } });
  });

  it("writes errors to stderr", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    createConsoleLogger("debug").log("error", "failure", {});
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("recognizes level names", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(() => silentLogger.log("error", "ignored", {})).not.toThrow();
  });
});
