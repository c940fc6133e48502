import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DEFAULT_BASE_URL, DEFAULT_BETA_BASE_URL } from "infinitode-client";
import { loadConfig, resolveEnvVars, resolvePlayerId, validateConfig } from "../src/config.js";
import type { InfinitodeCliConfig } from "../src/config.js";

describe("config", () => {
  let dir: string;
  let savedPlayer: string | undefined;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "infinitode-cli-"));
    vi.stubEnv("INFINITODE_BASE_URL", "");
    vi.stubEnv("INFINITODE_BETA_BASE_URL", "");
    vi.stubEnv("INFINITODE_LOG_LEVEL", "");
    savedPlayer = process.env.INFINITODE_PLAYER_ID;
    delete process.env.INFINITODE_PLAYER_ID;
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    if (savedPlayer === undefined) {
      delete process.env.INFINITODE_PLAYER_ID;
    } else {
      process.env.INFINITODE_PLAYER_ID = savedPlayer;
    }
  });

  describe("loadConfig", () => {
    it("falls back to defaults without files", () => {
      expect(loadConfig({ cwd: dir })).toEqual({
        baseUrl: DEFAULT_BASE_URL,
        betaBaseUrl: DEFAULT_BETA_BASE_URL,
        player: undefined,
        logLevel: "warn",
        beta: false,
      });
    });

    it("reads infinitode.yaml and resolves placeholders", () => {
      vi.stubEnv("TEST_PLAYER", "U-AAAA-BBBB-CCCCCC");
      writeFileSync(
        join(dir, "infinitode.yaml"),
        ['baseUrl: "http://localhost:8080"', 'player: "${TEST_PLAYER}"', "logLevel: info", "beta: true", ""].join("\n"),
      );

      expect(loadConfig({ cwd: dir })).toEqual({
        baseUrl: "http://localhost:8080",
        betaBaseUrl: DEFAULT_BETA_BASE_URL,
        player: "U-AAAA-BBBB-CCCCCC",
        logLevel: "info",
        beta: true,
      });
    });

    it("lets env vars override YAML values", () => {
      vi.stubEnv("INFINITODE_BASE_URL", "http://localhost:9090");
      vi.stubEnv("INFINITODE_LOG_LEVEL", "error");
      writeFileSync(join(dir, "infinitode.yaml"), "baseUrl: http://localhost:8080\nlogLevel: info\n");

      const config = loadConfig({ cwd: dir });
      expect(config.baseUrl).toBe("http://localhost:9090");
      expect(config.logLevel).toBe("error");
    });

    it("lets flags override env vars", () => {
      vi.stubEnv("INFINITODE_LOG_LEVEL", "error");

      expect(loadConfig({ cwd: dir, verbose: true }).logLevel).toBe("info");
      expect(loadConfig({ cwd: dir, verbose: true, debug: true }).logLevel).toBe("debug");
      expect(loadConfig({ cwd: dir, beta: true }).beta).toBe(true);
    });

    it("loads .env from the working directory", () => {
      writeFileSync(join(dir, ".env"), "INFINITODE_PLAYER_ID=U-DDDD-EEEE-FFFFFF\n");

      expect(loadConfig({ cwd: dir }).player).toBe("U-DDDD-EEEE-FFFFFF");
    });

    it("reads an explicit config path", () => {
      writeFileSync(join(dir, "custom.yaml"), "betaBaseUrl: http://localhost:7070\n");

      expect(loadConfig({ cwd: dir, configPath: "custom.yaml" }).betaBaseUrl).toBe("http://localhost:7070");
    });

    it("fails when an explicit config path does not exist", () => {
      expect(() => loadConfig({ cwd: dir, configPath: "missing.yaml" })).toThrow(
        `Config file not found: ${join(dir, "missing.yaml")}`,
      );
    });

    it("ignores YAML documents that are not mappings", () => {
      writeFileSync(join(dir, "infinitode.yaml"), "- just\n- a list\n");

      expect(loadConfig({ cwd: dir }).baseUrl).toBe(DEFAULT_BASE_URL);
    });
  });

  describe("resolveEnvVars", () => {
    it("replaces placeholders", () => {
      vi.stubEnv("TEST_HOST", "localhost");
      expect(resolveEnvVars("http://${TEST_HOST}:8080")).toBe("http://localhost:8080");
    });

    it("warns on unknown variables and leaves them empty", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

      expect(resolveEnvVars("a${INFINITODE_TEST_UNSET_VAR}b")).toBe("ab");
      expect(warn).toHaveBeenCalledWith(
        "Warning: Environment variable ${INFINITODE_TEST_UNSET_VAR} not found. Set it in .env or your shell.",
      );
    });
  });

  describe("validateConfig", () => {
    const valid: InfinitodeCliConfig = {
      baseUrl: DEFAULT_BASE_URL,
      betaBaseUrl: DEFAULT_BETA_BASE_URL,
      player: "U-AAAA-BBBB-CCCCCC",
      logLevel: "warn",
      beta: false,
    };

    it("accepts a valid config", () => {
      expect(validateConfig(valid)).toEqual([]);
    });

    it("reports every invalid field", () => {
      const errors = validateConfig({ ...valid, baseUrl: "not a url", player: "someone", logLevel: "loud" });

      expect(errors).toEqual([
        "Invalid baseUrl: not a url. Set baseUrl in infinitode.yaml or the matching INFINITODE_* variable in .env",
        "Invalid default player id: someone. Expected the form U-XXXX-XXXX-XXXXXX",
        "Invalid log level: loud. Use one of debug, info, warn, error",
      ]);
    });
  });

  describe("resolvePlayerId", () => {
    it("prefers the argument over the configured player", () => {
      const config = loadConfig({ cwd: dir });
      expect(resolvePlayerId({ ...config, player: "U-AAAA-BBBB-CCCCCC" }, "U-DDDD-EEEE-FFFFFF")).toBe("U-DDDD-EEEE-FFFFFF");
      expect(resolvePlayerId({ ...config, player: "U-AAAA-BBBB-CCCCCC" }, undefined)).toBe("U-AAAA-BBBB-CCCCCC");
      expect(resolvePlayerId(config, undefined)).toBeUndefined();
    });
  });
});
