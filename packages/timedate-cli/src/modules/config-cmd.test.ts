import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { Command } from "commander";
import { parse as parseYaml } from "yaml";

vi.mock("fs", () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
  mkdirSync: vi.fn(),
  writeFileSync: vi.fn(),
}));

// Mock chalk to avoid color codes in tests
vi.mock("chalk", () => {
  const identity = (s: string) => s;
  return {
    default: {
      red: Object.assign(identity, { bold: identity }),
      green: identity,
      yellow: identity,
      cyan: identity,
      gray: identity,
      dim: identity,
    },
  };
});

import { existsSync, readFileSync, mkdirSync, writeFileSync } from "fs";
import {
  checkConfigFiles,
  registerConfigCommands,
  renderExampleConfig,
  toConfigDocument,
} from "./config-cmd.js";
import { ConfigFileSchema, SYSTEM_CONFIG_PATH, USER_CONFIG_PATH } from "../lib/config.js";
import { initContext, resetContext } from "../lib/cli-context.js";

const onlyExists = (...paths: string[]) => {
  vi.mocked(existsSync).mockImplementation((path) => paths.some((p) => p === path));
};

describe("config-cmd", () => {
  let program: Command;
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    vi.resetAllMocks();
    program = new Command();
    program.exitOverride();
    registerConfigCommands(program);

    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    process.exitCode = undefined;
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    resetContext();
    process.exitCode = undefined;
  });

  describe("renderExampleConfig", () => {
    it("parses to the defaults when no zone is given", () => {
      const parsed: unknown = parseYaml(renderExampleConfig());

      expect(parsed).toEqual({
        displayOptions: ["time"],
        baseId: "timedate",
        logging: { level: "info", json: false },
      });
      expect(ConfigFileSchema.safeParse(parsed).success).toBe(true);
    });

    it("fills in the zone when one is given", () => {
      const parsed: unknown = parseYaml(renderExampleConfig("Asia/Tokyo"));

      expect(parsed).toMatchObject({ timeZone: "Asia/Tokyo" });
      expect(ConfigFileSchema.safeParse(parsed).success).toBe(true);
    });
  });

  describe("toConfigDocument", () => {
    it("leaves out an unset zone", () => {
      expect(
        toConfigDocument({
          timeZone: undefined,
          displayOptions: ["beat"],
          baseId: "desk",
          logLevel: "warn",
          logJson: true,
        })
      ).toEqual({
        displayOptions: ["beat"],
        baseId: "desk",
        logging: { level: "warn", json: true },
      });
    });
  });

  describe("checkConfigFiles", () => {
    it("reports each file on its own", () => {
      onlyExists("/good.yaml", "/bad.yaml");
      vi.mocked(readFileSync).mockImplementation((path) =>
        path === "/good.yaml" ? "timeZone: UTC\n" : "displayOptions: [weekday]\n"
      );

      const checks = checkConfigFiles(["/good.yaml", "/bad.yaml", "/none.yaml"]);

      expect(checks.map((c) => c.status)).toEqual(["valid", "invalid", "missing"]);
      expect(checks[1].error).toMatch(/^Config file \/bad\.yaml has errors\ndisplayOptions\.0: /);
    });
  });

  describe("config init", () => {
    it("writes the user file", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "timedate", "config", "init"]);

      expect(mkdirSync).toHaveBeenCalledWith(expect.stringContaining("timedate"), {
        recursive: true,
      });
      expect(writeFileSync).toHaveBeenCalledWith(USER_CONFIG_PATH, renderExampleConfig(), "utf-8");
      expect(consoleLogSpy).toHaveBeenCalledWith(`Wrote ${USER_CONFIG_PATH}`);
      expect(consoleLogSpy).toHaveBeenCalledWith("Set timeZone before running show or watch.");
    });

    it("writes the system file with --global and a zone", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync([
        "node",
        "timedate",
        "config",
        "init",
        "--global",
        "--time-zone",
        "Europe/Berlin",
      ]);

      expect(writeFileSync).toHaveBeenCalledWith(
        SYSTEM_CONFIG_PATH,
        expect.stringContaining("\ntimeZone: Europe/Berlin\n"),
        "utf-8"
      );
    });

    it("rejects an unknown zone before writing", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "timedate", "config", "init", "-z", "Mars/Base"]);

      expect(writeFileSync).not.toHaveBeenCalled();
      expect(consoleErrorSpy).toHaveBeenCalledWith('✗ Unknown time zone "Mars/Base"');
      expect(process.exitCode).toBe(1);
    });

    it("keeps an existing file", async () => {
      vi.mocked(existsSync).mockReturnValue(true);

      await program.parseAsync(["node", "timedate", "config", "init"]);

      expect(writeFileSync).not.toHaveBeenCalled();
      expect(consoleErrorSpy).toHaveBeenCalledWith(`${USER_CONFIG_PATH} already exists`);
      expect(process.exitCode).toBe(1);
    });

    it("replaces an existing file with --force", async () => {
      vi.mocked(existsSync).mockReturnValue(true);

      await program.parseAsync(["node", "timedate", "config", "init", "--force"]);

      expect(writeFileSync).toHaveBeenCalledTimes(1);
      expect(process.exitCode).toBeUndefined();
    });

    it("suggests sudo when the system file can't be written", async () => {
      vi.mocked(existsSync).mockReturnValue(false);
      vi.mocked(writeFileSync).mockImplementation(() => {
        throw new Error("Permission denied");
      });

      await program.parseAsync(["node", "timedate", "config", "init", "--global"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith(
        `Couldn't write ${SYSTEM_CONFIG_PATH}: Permission denied`
      );
      expect(consoleErrorSpy).toHaveBeenCalledWith("Writing under /etc usually needs sudo.");
      expect(process.exitCode).toBe(1);
    });
  });

  describe("config validate", () => {
    it("checks the standard locations", async () => {
      onlyExists(USER_CONFIG_PATH);
      vi.mocked(readFileSync).mockReturnValue("timeZone: UTC\n");

      await program.parseAsync(["node", "timedate", "config", "validate"]);

      expect(consoleLogSpy).toHaveBeenCalledWith(`✓ ${USER_CONFIG_PATH}`);
      expect(consoleErrorSpy).not.toHaveBeenCalled();
      expect(process.exitCode).toBeUndefined();
    });

    it("prints the issues of an invalid file", async () => {
      onlyExists("/bad.yaml");
      vi.mocked(readFileSync).mockReturnValue("timeZone: Mars/Base\n");

      await program.parseAsync(["node", "timedate", "config", "validate", "-c", "/bad.yaml"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith("✗ /bad.yaml");
      expect(consoleErrorSpy).toHaveBeenCalledWith(
        "Config file /bad.yaml has errors\ntimeZone: Unknown time zone"
      );
      expect(process.exitCode).toBe(1);
    });

    it("fails when a named file does not exist", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "timedate", "config", "validate", "-c", "/none.yaml"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith("✗ /none.yaml does not exist");
      expect(process.exitCode).toBe(1);
    });

    it("explains when there is nothing to check", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "timedate", "config", "validate"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("No configuration files found.");
      expect(process.exitCode).toBeUndefined();
    });

    it("reports in JSON mode", async () => {
      initContext(["--json"], {});
      onlyExists("/good.yaml");
      vi.mocked(readFileSync).mockReturnValue("baseId: desk\n");

      await program.parseAsync(["node", "timedate", "config", "validate", "-c", "/good.yaml"]);

      expect(JSON.parse(String(consoleLogSpy.mock.calls[0][0]))).toEqual({
        success: true,
        data: { valid: true, files: [{ path: "/good.yaml", status: "valid" }] },
      });
    });
  });

  describe("config show", () => {
    it("prints the merged settings as YAML", async () => {
      onlyExists("/custom/config.yaml");
      vi.mocked(readFileSync).mockReturnValue(
        "timeZone: Europe/Berlin\ndisplayOptions: [time, beat]\n"
      );

      await program.parseAsync([
        "node",
        "timedate",
        "config",
        "show",
        "--config",
        "/custom/config.yaml",
      ]);

      expect(consoleLogSpy.mock.calls.map(([line]) => line)).toEqual([
        "# sources: /custom/config.yaml",
        [
          "timeZone: Europe/Berlin",
          "displayOptions:",
          "  - time",
          "  - beat",
          "baseId: timedate",
          "logging:",
          "  level: info",
          "  json: false",
        ].join("\n"),
      ]);
    });

    it("flags a missing time zone", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "timedate", "config", "show", "-c", "/none.yaml"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("# sources: defaults only");
      expect(consoleLogSpy).toHaveBeenCalledWith(
        "timeZone is not set; show and watch will refuse to start."
      );
    });

    it("renders a broken file as an error", async () => {
      onlyExists("/bad.yaml");
      vi.mocked(readFileSync).mockReturnValue("logging: [\n");

      await program.parseAsync(["node", "timedate", "config", "show", "-c", "/bad.yaml"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith("✗ Config file /bad.yaml has errors");
      expect(process.exitCode).toBe(1);
    });
  });

  describe("config path", () => {
    it("lists both locations", async () => {
      onlyExists(USER_CONFIG_PATH);

      await program.parseAsync(["node", "timedate", "config", "path"]);

      const table = String(consoleLogSpy.mock.calls[0][0]);
      expect(table).toContain(USER_CONFIG_PATH);
      expect(table).toContain(SYSTEM_CONFIG_PATH);
      expect(table).toContain("not found");
    });
  });
});
