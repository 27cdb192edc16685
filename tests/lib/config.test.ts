import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import {
  configFilePath,
  isSettingKey,
  loadConfig,
  parsePublishMode,
  parseSimpleYaml,
  resolveSettings,
  saveConfig,
  serializeSimpleYaml,
  setSetting,
} from "../../src/lib/config.js";
import { ConfigError } from "../../src/lib/errors.js";

describe("medallion.yml", () => {
  describe("parseSimpleYaml", () => {
    it("parses top-level scalars and nested sections", () => {
      const result = parseSimpleYaml("name: warehouse\npaths:\n  db_path: data/w.duckdb\n  retries: 3\n");
      expect(result).toEqual({ name: "warehouse", paths: { db_path: "data/w.duckdb", retries: 3 } });
    });

    it("parses list sections", () => {
      expect(parseSimpleYaml("tables:\n  - crm_cust_info\n  - erp_loc_a101\n")).toEqual({
        tables: ["crm_cust_info", "erp_loc_a101"],
      });
    });

    it("strips quotes and skips comments", () => {
      const result = parseSimpleYaml(`# settings\nsilver:\n  publish_mode: "table"\n\nname: 'x'\n`);
      expect(result).toEqual({ silver: { publish_mode: "table" }, name: "x" });
    });
  });

  it("serializes back to the same structure", () => {
    const config = { project: { name: "warehouse" }, silver: { publish_mode: "batch" } };
    const yaml = serializeSimpleYaml(config);
    expect(yaml).toBe("project:\n  name: warehouse\nsilver:\n  publish_mode: batch\n");
    expect(parseSimpleYaml(yaml)).toEqual(config);
  });

  describe("files", () => {
    let root: string;

    beforeEach(async () => {
      root = await fs.mkdtemp(path.join(os.tmpdir(), "medallion-config-"));
    });

    afterEach(async () => {
      await fs.rm(root, { recursive: true, force: true });
    });

    it("returns null when medallion.yml is absent", async () => {
      expect(await loadConfig(root)).toBeNull();
    });

    it("saves and loads known sections only", async () => {
      await fs.writeFile(configFilePath(root), "paths:\n  data_folder: raw\nextra:\n  key: value\n", "utf-8");
      expect(await loadConfig(root)).toEqual({ paths: { data_folder: "raw" } });

      await saveConfig({ silver: { publish_mode: "table" } }, root);
      expect(await fs.readFile(configFilePath(root), "utf-8")).toBe("silver:\n  publish_mode: table\n");
    });

    it("falls back to defaults under the project root", async () => {
      const { settings, entries } = await resolveSettings(root, {});
      expect(settings).toEqual({
        dbPath: path.join(root, "data", "warehouse.duckdb"),
        dataFolder: path.join(root, "data"),
        logDir: path.join(root, ".medallion", "logs"),
        publishMode: "batch",
      });
      expect(entries.every((e) => e.source === "default")).toBe(true);
    });

    it("prefers env over the file and the file over defaults", async () => {
      await fs.writeFile(
        configFilePath(root),
        "paths:\n  db_path: store/w.duckdb\n  data_folder: raw\nsilver:\n  publish_mode: table\n",
        "utf-8"
      );
      const { settings, entries } = await resolveSettings(root, { DATA_FOLDER: "/srv/extracts" });

      expect(settings.dbPath).toBe(path.join(root, "store", "w.duckdb"));
      expect(settings.dataFolder).toBe("/srv/extracts");
      expect(settings.publishMode).toBe("table");
      expect(entries.map((e) => [e.key, e.source])).toEqual([
        ["db_path", "file"],
        ["data_folder", "env"],
        ["log_dir", "default"],
        ["publish_mode", "file"],
      ]);
    });

    it("rejects an invalid publish mode", async () => {
      await expect(resolveSettings(root, { SILVER_PUBLISH_MODE: "nightly" })).rejects.toBeInstanceOf(ConfigError);
    });

    it("sets one key and keeps the rest", async () => {
      await fs.writeFile(configFilePath(root), "project:\n  name: warehouse\n", "utf-8");
      await setSetting("publish_mode", "table", root);
      await setSetting("db_path", "w.duckdb", root);
      expect(await loadConfig(root)).toEqual({
        project: { name: "warehouse" },
        silver: { publish_mode: "table" },
        paths: { db_path: "w.duckdb" },
      });
    });

    it("refuses to save an invalid publish mode", async () => {
      await expect(setSetting("publish_mode", "sometimes", root)).rejects.toThrow(
        "Invalid publish_mode 'sometimes' (expected one of: batch, table)"
      );
      expect(await loadConfig(root)).toBeNull();
    });
  });
});

describe("setting keys", () => {
  it("recognises known keys", () => {
    expect(isSettingKey("db_path")).toBe(true);
    expect(isSettingKey("DB_PATH")).toBe(false);
  });

  it("parses publish modes", () => {
    expect(parsePublishMode("batch")).toBe("batch");
    expect(() => parsePublishMode("")).toThrow(ConfigError);
  });
});
