import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { promises as fs } from "node:fs";
import path from "node:path";
import os from "node:os";
import { findConfigFile, loadConfig, parseConfigFile } from "./config";
import { ConfigError } from "./errors";

describe("config", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "fndoc-config-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeConfig(content: string, dir = tempDir): Promise<string> {
    await fs.mkdir(dir, { recursive: true });
    const configPath = path.join(dir, "fndoc.toml");
    await fs.writeFile(configPath, content);
    return configPath;
  }

  it("parses prefix and resolves script against the config directory", async () => {
    const configPath = await writeConfig('prefix = "cmd_"\nscript = "bin/tool.sh"\n');

    expect(parseConfigFile(configPath)).toEqual({
      prefix: "cmd_",
      script: path.join(tempDir, "bin", "tool.sh"),
    });
  });

  it("keeps absolute script paths", async () => {
    const configPath = await writeConfig('script = "/opt/tools/run.sh"\n');
    expect(parseConfigFile(configPath).script).toBe("/opt/tools/run.sh");
  });

  it("accepts an empty file", async () => {
    const configPath = await writeConfig("");
    expect(parseConfigFile(configPath)).toEqual({});
  });

  it("rejects unknown keys", async () => {
    const configPath = await writeConfig('colour = "red"\n');

    expect(() => parseConfigFile(configPath)).toThrow(ConfigError);
    try {
      parseConfigFile(configPath);
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect(err).toMatchObject({
        code: "INVALID_CONFIG",
        configPath,
        issues: ["(root): Unrecognized key(s) in object: 'colour'"],
      });
    }
  });

  it("rejects an empty prefix", async () => {
    const configPath = await writeConfig('prefix = ""\n');
    expect(() => parseConfigFile(configPath)).toThrow(`Invalid config in ${configPath}`);
    try {
      parseConfigFile(configPath);
    } catch (err) {
      expect(err).toMatchObject({ issues: ["prefix: Prefix cannot be empty"] });
    }
  });

  it("rejects values of the wrong type", async () => {
    const configPath = await writeConfig("prefix = 3\n");
    expect(() => parseConfigFile(configPath)).toThrow(ConfigError);
  });

  it("rejects malformed TOML", async () => {
    const configPath = await writeConfig('prefix = "unterminated\n');
    expect(() => parseConfigFile(configPath)).toThrow(ConfigError);
  });

  it("finds the nearest config in a parent directory", async () => {
    const configPath = await writeConfig('prefix = "cmd_"\n');
    const nested = path.join(tempDir, "a", "b");
    await fs.mkdir(nested, { recursive: true });

    expect(findConfigFile(nested)).toBe(configPath);
  });

  it("prefers the closest config", async () => {
    await writeConfig('prefix = "outer_"\n');
    const inner = path.join(tempDir, "inner");
    const innerConfig = await writeConfig('prefix = "inner_"\n', inner);

    expect(loadConfig(inner)).toEqual({
      config: { prefix: "inner_" },
      path: innerConfig,
    });
  });
});
