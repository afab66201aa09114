/** Release information extracted from the releases API. */
export interface ReleaseMetadata {
  /** Version token taken from the tag (or the title for placeholder tags) */
  tagVersion: string;
  /** Release title */
  title: string;
  /** Release notes (markdown) */
  releaseNotes: string;
  /** Packaged .zip asset, else the source snapshot URL */
  downloadUrl: string | null;
  isExperimental: boolean;
}
