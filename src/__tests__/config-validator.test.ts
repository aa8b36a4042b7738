import { describe, it, expect } from "vitest";
import { assertConfig, validateConfig } from "../config-validator.js";
import { config, type AppConfig } from "../config.js";
import { FatalConfig } from "../errors.js";

function validConfig(overrides: (c: AppConfig) => void = () => {}): AppConfig {
  const c = structuredClone(config);
  c.flow.apiKey = "test-key";
  c.oracle.apiKey = "test-key";
  c.notify.webhookUrl = "https://hooks.example.test/notify";
  c.shadowMode = false;
  c.broker.port = 7497;
  c.venue.timezone = "America/New_York";
  c.scheduler.cycleIntervalMs = 300_000;
  c.scheduler.cycleDeadlineMs = 240_000;
  overrides(c);
  return c;
}

describe("validateConfig", () => {
  it("passes a complete config", () => {
    expect(validateConfig(validConfig())).toEqual({ errors: [], warnings: [] });
  });

  it("requires the provider credentials", () => {
    const result = validateConfig(
      validConfig((c) => {
        c.flow.apiKey = "";
        c.oracle.apiKey = "";
      }),
    );
    expect(result.errors).toEqual(["UW_API_KEY is required", "ANTHROPIC_API_KEY is required"]);
  });

  it("rejects a broker port out of range", () => {
    const result = validateConfig(validConfig((c) => (c.broker.port = 0)));
    expect(result.errors).toContain("IBKR port must be between 1 and 65535, got 0");
  });

  it("rejects an exceptional conviction below the minimum", () => {
    const result = validateConfig(
      validConfig((c) => {
        c.gate.minConviction = 80;
        c.gate.exceptionalConviction = 70;
      }),
    );
    expect(result.errors).toEqual(["gate.exceptionalConviction (70) must be >= gate.minConviction (80)"]);
  });

  it("rejects fractions outside (0, 1]", () => {
    const result = validateConfig(validConfig((c) => (c.gate.maxConcentration = 1.5)));
    expect(result.errors).toEqual(["gate.maxConcentration must be in (0, 1], got 1.5"]);
  });

  it("rejects a deadline that does not fit inside the interval", () => {
    const result = validateConfig(validConfig((c) => (c.scheduler.cycleDeadlineMs = 300_000)));
    expect(result.errors).toEqual([
      "scheduler.cycleDeadlineMs (300000) must be < scheduler.cycleIntervalMs (300000)",
    ]);
  });

  it("rejects an inverted DTE window", () => {
    const result = validateConfig(
      validConfig((c) => {
        c.flow.minDte = 50;
        c.flow.maxDte = 45;
      }),
    );
    expect(result.errors).toEqual(["flow.minDte (50) must be <= flow.maxDte (45)"]);
  });

  it("rejects an unknown timezone", () => {
    const result = validateConfig(validConfig((c) => (c.venue.timezone = "Mars/Olympus")));
    expect(result.errors).toEqual(["venue.timezone is not a valid IANA timezone: Mars/Olympus"]);
  });

  it("warns about shadow mode and a missing webhook", () => {
    const result = validateConfig(
      validConfig((c) => {
        c.shadowMode = true;
        c.notify.webhookUrl = "";
      }),
    );
    expect(result.errors).toEqual([]);
    expect(result.warnings).toHaveLength(2);
    expect(result.warnings[1]).toBe("Shadow mode is ON: decisions run end to end but no orders are sent");
  });
});

describe("assertConfig", () => {
  it("throws FatalConfig carrying every error", () => {
    const bad = validConfig((c) => (c.flow.apiKey = ""));
    expect(() => assertConfig(bad)).toThrow(FatalConfig);
    try {
      assertConfig(bad);
    } catch (e: unknown) {
      expect(e instanceof FatalConfig && e.errors).toEqual(["UW_API_KEY is required"]);
    }
  });
});
