import { z } from "zod/v4";

/**
 * On-disk shape of cfg/mod_manager_config.json. Keys the tool does not know
 * about are kept so other front ends can share the file.
 */
export const storedConfigSchema = z.looseObject({
  mod_install_dir: z.string().optional(),
  backup_dir: z.string().optional(),
  game_install_dir: z.string().optional(),
  update_url: z.string().optional(),
});

export type StoredConfig = z.infer<typeof storedConfigSchema>;

export interface AppConfig {
  /** Default install root for new profiles */
  installRoot: string;
  backupDir?: string;
  gameInstallDir?: string;
  /** Releases API endpoint used for self-update; empty disables update checks */
  updateUrl: string;
}
