/**
 * medallion.yml: project-level configuration file support.
 *
 * Settings resolve from environment variables first, then medallion.yml in the
 * project root, then built-in defaults.
 *
 * Example medallion.yml:
 *   project:
 *     name: sales-warehouse
 *   paths:
 *     db_path: data/warehouse.duckdb
 *     data_folder: data
 *     log_dir: .medallion/logs
 *   silver:
 *     publish_mode: batch
 */

import * as fs from "fs/promises";
import * as path from "path";
import { ConfigError } from "./errors.js";
import { projectRoot } from "./paths.js";
import { PUBLISH_MODES, type PublishMode } from "../silver/transformer.js";

type Section = Record<string, string | number>;

export interface MedallionConfig {
  project?: Section;
  paths?: Section;
  silver?: Section;
}

export const SETTING_KEYS = ["db_path", "data_folder", "log_dir", "publish_mode"] as const;
export type SettingKey = (typeof SETTING_KEYS)[number];

export function isSettingKey(key: string): key is SettingKey {
  return SETTING_KEYS.some((k) => k === key);
}

/** Where each setting lives in medallion.yml and which env var overrides it. */
const SETTING_SOURCES: Record<SettingKey, { section: "paths" | "silver"; env: string }> = {
  db_path: { section: "paths", env: "DB_PATH" },
  data_folder: { section: "paths", env: "DATA_FOLDER" },
  log_dir: { section: "paths", env: "MEDALLION_LOG_DIR" },
  publish_mode: { section: "silver", env: "SILVER_PUBLISH_MODE" },
};

export interface Settings {
  dbPath: string;
  dataFolder: string;
  logDir: string;
  publishMode: PublishMode;
}

export interface SettingEntry {
  key: SettingKey;
  env: string;
  value: string;
  source: "env" | "file" | "default";
}

export function configFilePath(root: string = projectRoot()): string {
  return path.join(root, "medallion.yml");
}

function stripQuotes(value: string): string {
  return value.replace(/^["']|["']$/g, "");
}

/**
 * Lightweight YAML parser for the subset this file uses:
 * top-level keys, one level of nested keys, and `- ` arrays.
 */
export function parseSimpleYaml(raw: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  let section: Section | null = null;
  let list: string[] | null = null;
  let sectionKey: string | null = null;

  for (const line of raw.split("\n")) {
    if (!line.trim() || line.trim().startsWith("#")) continue;

    const topMatch = line.match(/^([a-zA-Z_][a-zA-Z0-9_]*):\s*(.*)/);
    if (topMatch && !line.startsWith(" ") && !line.startsWith("\t")) {
      const key = topMatch[1];
      const val = topMatch[2].trim();
      section = null;
      list = null;
      sectionKey = null;
      if (val) {
        result[key] = stripQuotes(val);
      } else {
        section = {};
        sectionKey = key;
        result[key] = section;
      }
      continue;
    }

    if (!sectionKey) continue;
    const trimmed = line.trim();

    if (trimmed.startsWith("- ")) {
      if (!list) {
        list = [];
        section = null;
        result[sectionKey] = list;
      }
      list.push(stripQuotes(trimmed.slice(2).trim()));
      continue;
    }

    const nestedMatch = trimmed.match(/^([a-zA-Z_][a-zA-Z0-9_]*):\s*(.*)/);
    if (nestedMatch && section) {
      const val = stripQuotes(nestedMatch[2].trim());
      section[nestedMatch[1]] = /^\d+$/.test(val) ? parseInt(val, 10) : val;
    }
  }

  return result;
}

export function serializeSimpleYaml(config: Record<string, unknown>): string {
  const lines: string[] = [];

  for (const [key, value] of Object.entries(config)) {
    if (value === null || value === undefined) continue;

    if (Array.isArray(value)) {
      lines.push(`${key}:`);
      for (const item of value) lines.push(`  - ${item}`);
    } else if (typeof value === "object") {
      lines.push(`${key}:`);
      for (const [k, v] of Object.entries(value)) {
        if (v !== null && v !== undefined) lines.push(`  ${k}: ${v}`);
      }
    } else {
      lines.push(`${key}: ${value}`);
    }
  }

  return lines.join("\n") + "\n";
}

function toSection(value: unknown): Section | undefined {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return undefined;
  const section: Section = {};
  for (const [k, v] of Object.entries(value)) {
    if (typeof v === "string" || typeof v === "number") section[k] = v;
  }
  return section;
}

/** Keep only the sections medallion.yml defines. */
export function toConfig(parsed: Record<string, unknown>): MedallionConfig {
  const config: MedallionConfig = {};
  for (const name of ["project", "paths", "silver"] as const) {
    const section = toSection(parsed[name]);
    if (section) config[name] = section;
  }
  return config;
}

/** Load medallion.yml; null when the file does not exist. */
export async function loadConfig(root?: string): Promise<MedallionConfig | null> {
  let raw: string;
  try {
    raw = await fs.readFile(configFilePath(root), "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
  return toConfig(parseSimpleYaml(raw));
}

export async function saveConfig(config: MedallionConfig, root?: string): Promise<string> {
  const cfgPath = configFilePath(root);
  await fs.writeFile(cfgPath, serializeSimpleYaml({ ...config }), "utf-8");
  return cfgPath;
}

export function parsePublishMode(value: string): PublishMode {
  const mode = PUBLISH_MODES.find((m) => m === value);
  if (!mode) {
    throw new ConfigError(`Invalid publish_mode '${value}' (expected one of: ${PUBLISH_MODES.join(", ")})`);
  }
  return mode;
}

function defaultValue(key: SettingKey, root: string): string {
  switch (key) {
    case "db_path":
      return path.join(root, "data", "warehouse.duckdb");
    case "data_folder":
      return path.join(root, "data");
    case "log_dir":
      return path.join(root, ".medallion", "logs");
    case "publish_mode":
      return "batch";
  }
}

/** Resolve every setting along with where its value came from. */
export async function resolveSettings(
  root: string = projectRoot(),
  env: NodeJS.ProcessEnv = process.env
): Promise<{ settings: Settings; entries: SettingEntry[] }> {
  const config = (await loadConfig(root)) ?? {};

  const entries = SETTING_KEYS.map((key): SettingEntry => {
    const { section, env: envKey } = SETTING_SOURCES[key];
    const fromEnv = env[envKey];
    if (fromEnv) return { key, env: envKey, value: fromEnv, source: "env" };
    const fromFile = config[section]?.[key];
    if (fromFile !== undefined && fromFile !== "") {
      const value = String(fromFile);
      // relative paths in medallion.yml are relative to the project root
      const resolved = section === "paths" ? path.resolve(root, value) : value;
      return { key, env: envKey, value: resolved, source: "file" };
    }
    return { key, env: envKey, value: defaultValue(key, root), source: "default" };
  });

  const value = (key: SettingKey): string => entries.find((e) => e.key === key)?.value ?? defaultValue(key, root);
  return {
    settings: {
      dbPath: value("db_path"),
      dataFolder: value("data_folder"),
      logDir: value("log_dir"),
      publishMode: parsePublishMode(value("publish_mode")),
    },
    entries,
  };
}

/** Write one setting into medallion.yml, keeping the rest of the file. */
export async function setSetting(key: SettingKey, value: string, root?: string): Promise<string> {
  if (key === "publish_mode") parsePublishMode(value);
  const config = (await loadConfig(root)) ?? {};
  const { section } = SETTING_SOURCES[key];
  config[section] = { ...(config[section] ?? {}), [key]: value };
  return saveConfig(config, root);
}
