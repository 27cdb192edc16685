/**
 * `medallion config`: show and edit settings.
 *
 * Each setting resolves from its environment variable, then medallion.yml,
 * then the built-in default. `set` writes medallion.yml.
 */

import { SETTING_KEYS, configFilePath, isSettingKey, resolveSettings, setSetting } from "../lib/config.js";
import { die, jsonMode, output, table } from "../lib/output.js";

export async function configCommand(sub: string | undefined, rest: string[], root: string): Promise<void> {
  switch (sub) {
    case "set": {
      const [key, value] = rest;
      if (!key || !value) die("Usage: medallion config set <key> <value>");
      if (!isSettingKey(key)) die(`Unknown config key: ${key}\nValid keys: ${SETTING_KEYS.join(", ")}`);
      const file = await setSetting(key, value, root);
      if (jsonMode) {
        output({ key, value, saved: true, file });
      } else {
        console.log(`✓ ${key}: ${value}  (saved to ${file})`);
      }
      return;
    }

    case "get": {
      const key = rest[0];
      if (!key) die("Usage: medallion config get <key>");
      if (!isSettingKey(key)) die(`Unknown config key: ${key}`);
      const { entries } = await resolveSettings(root);
      const entry = entries.find((e) => e.key === key);
      if (!entry) die(`Unknown config key: ${key}`);
      output(jsonMode ? entry : entry.value);
      return;
    }

    case "path": {
      const file = configFilePath(root);
      output(jsonMode ? { path: file } : file);
      return;
    }

    case "help":
    case "--help":
    case "-h":
      printConfigHelp();
      return;

    default: {
      if (sub && sub !== "list") console.error(`Unknown config command: ${sub}\n`);
      const { entries } = await resolveSettings(root);
      if (jsonMode) {
        output(entries);
      } else {
        table(entries.map((e) => ({ ...e })));
      }
      return;
    }
  }
}

function printConfigHelp(): void {
  console.log("Usage: medallion config [subcommand]\n");
  console.log("Subcommands:");
  console.log("  (none)             Show every setting and where its value comes from");
  console.log("  get <key>          Print a single value");
  console.log("  set <key> <value>  Save a value to medallion.yml");
  console.log("  path               Print the path to medallion.yml");
  console.log("\nKeys (environment override in parentheses):");
  console.log("  db_path       (DB_PATH)");
  console.log("  data_folder   (DATA_FOLDER)");
  console.log("  log_dir       (MEDALLION_LOG_DIR)");
  console.log("  publish_mode  (SILVER_PUBLISH_MODE)  batch | table");
}
