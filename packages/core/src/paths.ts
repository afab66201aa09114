import { join, resolve } from "node:path";

/** Install root used when neither the profile nor the config names one. */
export const DEFAULT_INSTALL_DIR = "userdata";

/** Directory (under the application root) holding user configuration. */
export const CONFIG_DIR_NAME = "cfg";

/**
 * Locations of the files the tool reads and writes, derived once from the
 * application root and handed to every store and service that needs them.
 */
export interface AppPaths {
  readonly root: string;
  readonly configDir: string;
  readonly configFile: string;
  readonly profilesFile: string;
  /** Ships with every release; holds program_version and game_version */
  readonly versionFile: string;
  readonly logFile: string;
  readonly defaultInstallDir: string;
}

export function resolveAppPaths(root: string): AppPaths {
  const base = resolve(root);
  const configDir = join(base, CONFIG_DIR_NAME);
  return Object.freeze({
    root: base,
    configDir,
    configFile: join(configDir, "mod_manager_config.json"),
    profilesFile: join(configDir, "mod_profiles.json"),
    versionFile: join(base, "version.json"),
    logFile: join(base, "mod_debug.log"),
    defaultInstallDir: join(base, DEFAULT_INSTALL_DIR),
  });
}
