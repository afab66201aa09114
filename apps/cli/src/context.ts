import { resolveAppPaths } from "@modkeeper/core";
import type { AppPaths } from "@modkeeper/core";
import { ArchiveInstaller } from "@modkeeper/installer";
import { ConfigStore, ProfileStore, readVersionRecord } from "@modkeeper/storage";
import { PreserveReplaceOrchestrator } from "@modkeeper/updater";

/** Version reported when version.json is missing. */
export const PROGRAM_VERSION = "1.1.0";

/** Everything a command needs, built once per invocation. */
export interface CliContext {
  paths: AppPaths;
  config: ConfigStore;
  profiles: ProfileStore;
  installer: ArchiveInstaller;
  orchestrator: PreserveReplaceOrchestrator;
  print: (line: string) => void;
  printError: (line: string) => void;
  /** Set by commands that fail; the entry point turns it into the process exit code */
  exitCode: number;
  currentVersion(): string;
}

export interface ContextOptions {
  print?: (line: string) => void;
  printError?: (line: string) => void;
  /** Parent directory for download scratch space */
  scratchRoot?: string;
}

export function createContext(root: string, options: ContextOptions = {}): CliContext {
  const paths = resolveAppPaths(root);
  const config = new ConfigStore(paths);
  const appConfig = config.ensureDefaults();

  return {
    paths,
    config,
    profiles: new ProfileStore(paths, { defaultInstallRoot: appConfig.installRoot }),
    installer: new ArchiveInstaller({ scratchRoot: options.scratchRoot }),
    orchestrator: new PreserveReplaceOrchestrator({ scratchRoot: options.scratchRoot }),
    print: options.print ?? ((line) => console.log(line)),
    printError: options.printError ?? ((line) => console.error(line)),
    exitCode: 0,
    currentVersion: () => readVersionRecord(paths.versionFile)?.programVersion ?? PROGRAM_VERSION,
  };
}
