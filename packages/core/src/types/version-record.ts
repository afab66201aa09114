/** Contents of version.json. A self-update stamps programVersion and carries gameVersion over from before the update. */
export interface VersionRecord {
  /** The tool's own version */
  programVersion?: string;
  /** Separately versioned game build installed by the launcher */
  gameVersion?: string;
}
