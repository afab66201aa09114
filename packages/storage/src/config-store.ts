import { existsSync, mkdirSync } from "node:fs";
import { storedConfigSchema } from "@modkeeper/core";
import type { AppConfig, AppPaths, StoredConfig } from "@modkeeper/core";
import { createLogger } from "@modkeeper/logger";
import { readJsonFile, writeJsonFile } from "./json-file.js";
import { resolveStoredPath, toStoredPath } from "./stored-path.js";

const log = createLogger("storage:config");

/**
 * cfg/mod_manager_config.json. Relative paths inside it are resolved against
 * the application root.
 */
export class ConfigStore {
  constructor(private readonly paths: AppPaths) {}

  /** Raw stored record, or null when the file is missing or unreadable. */
  readStored(): StoredConfig | null {
    const read = readJsonFile(this.paths.configFile);
    if (read.status === "not-found") return null;
    if (read.status === "invalid") {
      log.error(`Config file ${this.paths.configFile} is not valid JSON, using defaults: ${read.error}`);
      return null;
    }
    const parsed = storedConfigSchema.safeParse(read.value);
    if (!parsed.success) {
      log.error(`Config file ${this.paths.configFile} has an unexpected shape, using defaults`);
      return null;
    }
    return parsed.data;
  }

  load(): AppConfig {
    return this.toAppConfig(this.readStored() ?? {});
  }

  /** Merge `patch` into the stored record, keeping keys this tool does not manage. */
  save(patch: Partial<AppConfig>): AppConfig {
    const stored: StoredConfig = { ...(this.readStored() ?? {}) };
    const root = this.paths.root;
    if (patch.installRoot !== undefined) stored.mod_install_dir = toStoredPath(patch.installRoot, root);
    if (patch.backupDir !== undefined) stored.backup_dir = toStoredPath(patch.backupDir, root);
    if (patch.gameInstallDir !== undefined) stored.game_install_dir = toStoredPath(patch.gameInstallDir, root);
    if (patch.updateUrl !== undefined) stored.update_url = patch.updateUrl;

    writeJsonFile(this.paths.configFile, stored);
    log.info("Config saved");
    return this.toAppConfig(stored);
  }

  /** Create the default install directory and a config file naming it. */
  ensureDefaults(): AppConfig {
    mkdirSync(this.paths.defaultInstallDir, { recursive: true });
    if (!existsSync(this.paths.configFile)) {
      log.info(`Creating config file at ${this.paths.configFile}`);
      return this.save({ installRoot: this.paths.defaultInstallDir });
    }
    return this.load();
  }

  private toAppConfig(stored: StoredConfig): AppConfig {
    const root = this.paths.root;
    const config: AppConfig = {
      installRoot: resolveStoredPath(stored.mod_install_dir, root, this.paths.defaultInstallDir),
      updateUrl: stored.update_url ?? "",
    };
    if (stored.backup_dir) config.backupDir = resolveStoredPath(stored.backup_dir, root, root);
    if (stored.game_install_dir) config.gameInstallDir = resolveStoredPath(stored.game_install_dir, root, root);
    return config;
  }
}
