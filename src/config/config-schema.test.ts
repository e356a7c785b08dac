import { describe, expect, it } from "vitest";
import { ConfigError } from "../errors.js";
import {
  DEFAULT_EXEC_FLAGS,
  DEFAULT_JOB_CONFIG,
  parseCommand,
  resolveExecFlags,
  resolveJobConfig,
} from "../types/config.js";
import { pollIntervalSchema } from "./config-schema.js";

describe("job config validation", () => {
  it("resolves an empty config to the defaults", () => {
    const config = resolveJobConfig();
    expect(config).toEqual(DEFAULT_JOB_CONFIG);
  });

  it("applies defaults for omitted fields", () => {
    const config = resolveJobConfig({ pollIntervalMs: 25 });
    expect(config.pollIntervalMs).toBe(25);
    expect(config.readerPollMs).toBe(120);
    expect(config.killGracePeriodMs).toBe(5000);
  });

  it("keeps an explicit null poll interval", () => {
    expect(resolveJobConfig({ pollIntervalMs: null }).pollIntervalMs).toBeNull();
  });

  it("rejects a zero poll interval", () => {
    expect(() => resolveJobConfig({ pollIntervalMs: 0 })).toThrow(ConfigError);
  });

  it("rejects a non-integer reader poll interval", () => {
    expect(() => resolveJobConfig({ readerPollMs: 12.5 })).toThrow("Invalid job configuration");
  });

  it("rejects negative kill grace periods", () => {
    expect(() => resolveJobConfig({ killGracePeriodMs: -1 })).toThrow("killGracePeriodMs");
  });

  it("rejects unknown keys", () => {
    const config = JSON.parse('{"pollMillis": 10}');
    expect(() => resolveJobConfig(config)).toThrow(ConfigError);
  });

  it("merges partial flags over the defaults", () => {
    const config = resolveJobConfig({ flags: { groupLeader: true } });
    expect(config.flags).toEqual({ mode: "async", hideConsole: false, groupLeader: true });
  });

  it("passes cwd and env through", () => {
    const config = resolveJobConfig({ cwd: "/srv/jobs", env: { LANG: "C" } });
    expect(config.cwd).toBe("/srv/jobs");
    expect(config.env).toEqual({ LANG: "C" });
  });
});

describe("resolveExecFlags", () => {
  it("ignores explicitly undefined fields", () => {
    expect(resolveExecFlags({ mode: undefined, hideConsole: true })).toEqual({
      ...DEFAULT_EXEC_FLAGS,
      hideConsole: true,
    });
  });
});

describe("parseCommand", () => {
  it("returns a copy of a valid argv", () => {
    const argv = ["node", "-e", "process.exit(0)"];
    const parsed = parseCommand(argv);
    expect(parsed).toEqual(argv);
    expect(parsed).not.toBe(argv);
  });

  it("rejects an empty argv", () => {
    expect(() => parseCommand([])).toThrow("command must name a program");
  });

  it("rejects a blank program name", () => {
    expect(() => parseCommand(["  ", "arg"])).toThrow("program name must not be empty");
  });
});

describe("pollIntervalSchema", () => {
  it("accepts positive integers and null", () => {
    expect(pollIntervalSchema.safeParse(10).success).toBe(true);
    expect(pollIntervalSchema.safeParse(null).success).toBe(true);
  });

  it("truncates fractional milliseconds", () => {
    expect(pollIntervalSchema.parse(12.5)).toBe(12);
    expect(pollIntervalSchema.safeParse(0.5).success).toBe(false);
  });

  it("rejects strings", () => {
    expect(pollIntervalSchema.safeParse("10").success).toBe(false);
  });
});
