import { describe, it, expect } from "vitest";
import { Command, InvalidArgumentError, Option } from "commander";
import { ConfigError, envName, parseFlags } from "./config";

function parseMs(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError("Not a number.");
  return n;
}

function newCommand(): Command {
  return new Command("test")
    .exitOverride()
    .option("--flag-default <value>", "testing default value", "default")
    .option("--flag-set <value>", "testing set value", "default");
}

describe("envName", () => {
  it("upper-cases and swaps dashes", () => {
    expect(envName("set-flag")).toBe("SET_FLAG");
    expect(envName("port")).toBe("PORT");
  });
});

describe("parseFlags", () => {
  it("still parses the command line", () => {
    const command = parseFlags(["--flag-set=set"], newCommand(), {});
    expect(command.opts()).toEqual({ flagDefault: "default", flagSet: "set" });
  });

  it("overrides defaults from the environment", () => {
    const command = parseFlags([], newCommand(), { FLAG_SET: "set" });
    expect(command.opts()).toEqual({ flagDefault: "default", flagSet: "set" });
    expect(command.getOptionValueSource("flagSet")).toBe("env");
  });

  it("reads the variable named after the flag", () => {
    const command = new Command("test").exitOverride().option("--set-flag <value>", "a flag", "default");
    parseFlags([], command, { SET_FLAG: "override" });
    expect(command.getOptionValue("setFlag")).toBe("override");
  });

  it("lets the command line win", () => {
    const command = parseFlags(["--flag-set", "cli"], newCommand(), { FLAG_SET: "env" });
    expect(command.getOptionValue("flagSet")).toBe("cli");
    expect(command.getOptionValueSource("flagSet")).toBe("cli");
  });

  it("mentions the variable in the usage", () => {
    const command = parseFlags([], newCommand(), {});
    expect(command.options[0].description).toBe("testing default value\nAlso set by environment variable FLAG_DEFAULT");
    expect(command.helpInformation()).toContain("Also set by environment variable FLAG_DEFAULT");
  });

  it("coerces values through the option's parser", () => {
    const command = new Command("test").exitOverride().option("--timeout <ms>", "timeout", parseMs, 1000);
    parseFlags([], command, { TIMEOUT: "250" });
    expect(command.getOptionValue("timeout")).toBe(250);
  });

  it("accepts switches for boolean and negated flags", () => {
    const command = new Command("test").exitOverride().option("--verbose", "talk more").option("--no-color", "plain output");
    parseFlags([], command, { VERBOSE: "yes", NO_COLOR: "true" });
    expect(command.opts()).toEqual({ verbose: true, color: false });
  });

  it("fails on values the flag does not accept", () => {
    const command = new Command("test")
      .exitOverride()
      .option("--timeout <ms>", "timeout", parseMs, 1000)
      .addOption(new Option("--mode <mode>", "mode").choices(["fast", "safe"]))
      .option("--verbose", "talk more");

    expect(() => parseFlags([], command, { TIMEOUT: "soon", MODE: "slow", VERBOSE: "maybe" })).toThrow(
      new ConfigError(
        "parsing flags: could not set timeout to soon: Not a number.; " +
          "could not set mode to slow: Allowed choices are fast, safe.; " +
          "could not set verbose to maybe: Not a boolean.",
      ),
    );
  });

  it("applies no override when one fails", () => {
    const command = newCommand().option("--timeout <ms>", "timeout", parseMs, 1000);

    let caught: unknown;
    try {
      parseFlags([], command, { FLAG_SET: "set", TIMEOUT: "soon" });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError ? caught.causes : []).toEqual(["could not set timeout to soon: Not a number."]);
    expect(command.getOptionValue("flagSet")).toBe("default");
    expect(command.getOptionValueSource("flagSet")).toBe("default");
  });

  it("refuses to parse twice", () => {
    const command = parseFlags(["--flag-set=set"], newCommand(), {});
    expect(() => parseFlags(["--flag-set=again"], command, {})).toThrow(new ConfigError("flags were already parsed"));
    expect(command.getOptionValue("flagSet")).toBe("set");
  });

  it("refuses a command parsed directly", () => {
    const command = newCommand();
    command.parse(["--flag-set=set"], { from: "user" });
    expect(() => parseFlags([], command, { FLAG_SET: "env" })).toThrow(new ConfigError("flags were already parsed"));
    expect(command.getOptionValue("flagSet")).toBe("set");
  });

  it("notes the variable once across retries", () => {
    const command = newCommand().option("--timeout <ms>", "timeout", parseMs, 1000);
    expect(() => parseFlags([], command, { TIMEOUT: "soon" })).toThrow(ConfigError);
    parseFlags([], command, {});
    expect(command.options[0].description).toBe("testing default value\nAlso set by environment variable FLAG_DEFAULT");
  });
});
