import { z } from "zod/v4";
import { contentTypeSchema, modSchema, ProfileError } from "@modkeeper/core";
import type { AppPaths, Mod, Profile } from "@modkeeper/core";
import { createLogger } from "@modkeeper/logger";
import { readJsonFile, writeJsonFile } from "./json-file.js";
import { resolveStoredPath, toStoredPath } from "./stored-path.js";

const log = createLogger("storage:profiles");

export const DEFAULT_PROFILE_NAME = "Default";

const storedModSchema = z.looseObject({
  url: z.string().optional(),
  /** Older key for mod_subdir */
  subdir: z.string().optional(),
  mod_subdir: z.string().optional(),
  install_subdir: z.string().nullable().optional(),
  keep_structure: z.boolean().optional(),
  install_type: z.string().optional(),
});

const storedProfileSchema = z.union([
  z.array(storedModSchema),
  z.looseObject({
    mods: z.array(storedModSchema).optional(),
    mod_install_dir: z.string().optional(),
  }),
]);

const profilesFileSchema = z.looseObject({
  profiles: z.record(z.string(), storedProfileSchema).optional(),
  current_profile: z.string().nullable().optional(),
});

const profileExportSchema = z.record(z.string(), storedProfileSchema);

type StoredMod = z.infer<typeof storedModSchema>;
type StoredProfile = z.infer<typeof storedProfileSchema>;

/**
 * Profiles have been persisted in two shapes over time. Each is classified
 * once at load time and migrated to {@link Profile}.
 */
export type StoredProfileVariant =
  | { kind: "legacy-list"; mods: StoredMod[] }
  | { kind: "v2"; mods: StoredMod[]; installDir?: string };

export function classifyStoredProfile(stored: StoredProfile): StoredProfileVariant {
  if (Array.isArray(stored)) return { kind: "legacy-list", mods: stored };
  return { kind: "v2", mods: stored.mods ?? [], installDir: stored.mod_install_dir };
}

/** Stored mod entry to a validated Mod; entries without a URL are dropped. */
export function migrateStoredMod(stored: StoredMod): Mod | null {
  const sourceUrl = stored.url?.trim();
  if (!sourceUrl) return null;

  const mod: Mod = {
    sourceUrl,
    preserveOriginalLayout: stored.keep_structure ?? true,
  };
  const contentSubpath = stored.mod_subdir ?? stored.subdir;
  if (contentSubpath) mod.contentSubpath = contentSubpath;
  if (stored.install_subdir) mod.installSubpath = stored.install_subdir;
  if (stored.install_type) {
    const type = contentTypeSchema.safeParse(stored.install_type);
    if (type.success) {
      mod.contentType = type.data;
    } else {
      log.warn(`Unknown install type "${stored.install_type}" for ${sourceUrl}, treating it as a mod`);
    }
  }
  return mod;
}

export function toStoredMod(mod: Mod): StoredMod {
  return {
    url: mod.sourceUrl,
    mod_subdir: mod.contentSubpath ?? "",
    install_subdir: mod.installSubpath ?? "",
    keep_structure: mod.preserveOriginalLayout,
    install_type: mod.contentType ?? "mod",
  };
}

export interface ProfileStoreOptions {
  /** Base for relative install roots. Defaults to the application root. */
  baseDir?: string;
  /** Install root given to profiles that do not name one */
  defaultInstallRoot?: string;
}

export interface ImportResult {
  imported: string[];
  skipped: string[];
}

/**
 * cfg/mod_profiles.json. Exactly one profile is current at any time and the
 * last remaining profile cannot be deleted. Every mutation is saved at once.
 */
export class ProfileStore {
  private readonly baseDir: string;
  private readonly defaultInstallRoot: string;
  private profiles = new Map<string, Profile>();
  private currentName = DEFAULT_PROFILE_NAME;

  constructor(
    private readonly paths: AppPaths,
    options: ProfileStoreOptions = {},
  ) {
    this.baseDir = options.baseDir ?? paths.root;
    this.defaultInstallRoot = options.defaultInstallRoot ?? paths.defaultInstallDir;
    this.load();
  }

  list(): Profile[] {
    return [...this.profiles.values()].map(cloneProfile);
  }

  get(name: string): Profile | undefined {
    const profile = this.profiles.get(name);
    return profile ? cloneProfile(profile) : undefined;
  }

  get current(): Profile {
    return cloneProfile(this.require(this.currentName));
  }

  get currentProfileName(): string {
    return this.currentName;
  }

  create(name: string, installRoot?: string): Profile {
    const trimmed = name.trim();
    if (!trimmed) throw new ProfileError("Profile name must not be empty");
    if (this.profiles.has(trimmed)) throw new ProfileError(`Profile "${trimmed}" already exists`);

    const profile: Profile = {
      name: trimmed,
      installRoot: installRoot ? resolveStoredPath(installRoot, this.baseDir, this.defaultInstallRoot) : this.defaultInstallRoot,
      mods: [],
    };
    this.profiles.set(trimmed, profile);
    this.currentName = trimmed;
    this.save();
    log.info(`Created profile "${trimmed}"`);
    return cloneProfile(profile);
  }

  rename(oldName: string, newName: string): void {
    const trimmed = newName.trim();
    const profile = this.require(oldName);
    if (!trimmed) throw new ProfileError("Profile name must not be empty");
    if (trimmed === oldName) return;
    if (this.profiles.has(trimmed)) throw new ProfileError(`Profile "${trimmed}" already exists`);

    const renamed = new Map<string, Profile>();
    for (const [name, entry] of this.profiles) {
      if (name === oldName) renamed.set(trimmed, { ...profile, name: trimmed });
      else renamed.set(name, entry);
    }
    this.profiles = renamed;
    if (this.currentName === oldName) this.currentName = trimmed;
    this.save();
    log.info(`Renamed profile "${oldName}" to "${trimmed}"`);
  }

  delete(name: string): void {
    this.require(name);
    if (this.profiles.size <= 1) throw new ProfileError("Cannot delete the only profile");
    this.profiles.delete(name);
    if (this.currentName === name) {
      this.currentName = this.profiles.keys().next().value ?? DEFAULT_PROFILE_NAME;
    }
    this.save();
    log.info(`Deleted profile "${name}"`);
  }

  switchTo(name: string): Profile {
    const profile = this.require(name);
    this.currentName = name;
    this.save();
    return cloneProfile(profile);
  }

  setInstallRoot(name: string, installRoot: string): void {
    const profile = this.require(name);
    profile.installRoot = resolveStoredPath(installRoot, this.baseDir, this.defaultInstallRoot);
    this.save();
  }

  /** Append a mod to the current profile. */
  addMod(mod: Mod): void {
    const profile = this.require(this.currentName);
    profile.mods.push(validateMod(mod));
    this.save();
  }

  editMod(index: number, mod: Mod): void {
    const profile = this.require(this.currentName);
    checkIndex(profile, index);
    profile.mods[index] = validateMod(mod);
    this.save();
  }

  removeMod(index: number): Mod {
    const profile = this.require(this.currentName);
    checkIndex(profile, index);
    const [removed] = profile.mods.splice(index, 1);
    this.save();
    return removed;
  }

  /** Write `{ [name]: profile }` to a standalone JSON file. */
  exportProfile(name: string, filePath: string): void {
    const profile = this.require(name);
    writeJsonFile(filePath, { [name]: this.toStoredProfile(profile) });
    log.info(`Exported profile "${name}" to ${filePath}`);
  }

  /**
   * Import every profile from an exported file. Existing names are skipped
   * unless `overwrite` is set. The last imported profile becomes current.
   */
  importProfiles(filePath: string, overwrite = false): ImportResult {
    const read = readJsonFile(filePath);
    if (read.status === "not-found") throw new ProfileError(`Profile file not found: ${filePath}`);
    if (read.status === "invalid") throw new ProfileError(`Profile file is not valid JSON: ${read.error}`);
    const parsed = profileExportSchema.safeParse(read.value);
    if (!parsed.success) throw new ProfileError(`Profile file has an unexpected shape: ${filePath}`);

    const result: ImportResult = { imported: [], skipped: [] };
    for (const [name, stored] of Object.entries(parsed.data)) {
      if (this.profiles.has(name) && !overwrite) {
        result.skipped.push(name);
        continue;
      }
      this.profiles.set(name, this.migrateProfile(name, classifyStoredProfile(stored)));
      result.imported.push(name);
    }

    const last = result.imported.at(-1);
    if (last !== undefined) {
      this.currentName = last;
      this.save();
    }
    log.info(`Imported ${result.imported.length} profile(s), skipped ${result.skipped.length}`);
    return result;
  }

  private load(): void {
    const read = readJsonFile(this.paths.profilesFile);
    let needsRewrite = read.status !== "ok";

    let storedProfiles: Record<string, StoredProfile> = {};
    let storedCurrent: string | null | undefined;
    if (read.status === "invalid") {
      log.error(`Profiles file ${this.paths.profilesFile} is not valid JSON: ${read.error}`);
    } else if (read.status === "ok") {
      const parsed = profilesFileSchema.safeParse(read.value);
      if (parsed.success) {
        storedProfiles = parsed.data.profiles ?? {};
        storedCurrent = parsed.data.current_profile;
      } else {
        log.error(`Profiles file ${this.paths.profilesFile} has an unexpected shape, starting empty`);
        needsRewrite = true;
      }
    }

    this.profiles = new Map();
    for (const [name, stored] of Object.entries(storedProfiles)) {
      const variant = classifyStoredProfile(stored);
      if (variant.kind === "legacy-list") {
        log.info(`Migrating legacy list-shaped profile "${name}"`);
        needsRewrite = true;
      } else if (variant.installDir && toStoredPath(variant.installDir, this.baseDir) !== variant.installDir) {
        log.info(`Migrating absolute install dir of profile "${name}" to a relative path`);
        needsRewrite = true;
      }
      this.profiles.set(name, this.migrateProfile(name, variant));
    }

    if (this.profiles.size === 0) {
      this.profiles.set(DEFAULT_PROFILE_NAME, {
        name: DEFAULT_PROFILE_NAME,
        installRoot: this.defaultInstallRoot,
        mods: [],
      });
      needsRewrite = true;
    }

    if (storedCurrent && this.profiles.has(storedCurrent)) {
      this.currentName = storedCurrent;
    } else {
      this.currentName = this.profiles.keys().next().value ?? DEFAULT_PROFILE_NAME;
      needsRewrite = true;
    }

    if (needsRewrite) this.save();
    log.info(`Profiles loaded, current profile: ${this.currentName}`);
  }

  private migrateProfile(name: string, variant: StoredProfileVariant): Profile {
    const mods: Mod[] = [];
    for (const stored of variant.mods) {
      const mod = migrateStoredMod(stored);
      if (mod) mods.push(mod);
      else log.warn(`Dropping mod without a URL from profile "${name}"`);
    }
    const installDir = variant.kind === "v2" ? variant.installDir : undefined;
    return {
      name,
      installRoot: resolveStoredPath(installDir, this.baseDir, this.defaultInstallRoot),
      mods,
    };
  }

  private toStoredProfile(profile: Profile): { mods: StoredMod[]; mod_install_dir: string } {
    return {
      mods: profile.mods.map(toStoredMod),
      mod_install_dir: toStoredPath(profile.installRoot, this.baseDir),
    };
  }

  private save(): void {
    const profiles: Record<string, { mods: StoredMod[]; mod_install_dir: string }> = {};
    for (const [name, profile] of this.profiles) {
      profiles[name] = this.toStoredProfile(profile);
    }
    writeJsonFile(this.paths.profilesFile, { profiles, current_profile: this.currentName });
  }

  private require(name: string): Profile {
    const profile = this.profiles.get(name);
    if (!profile) throw new ProfileError(`Profile "${name}" not found`);
    return profile;
  }
}

function validateMod(mod: Mod): Mod {
  const parsed = modSchema.safeParse(mod);
  if (!parsed.success) {
    throw new ProfileError(`Invalid mod: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  }
  return parsed.data;
}

function checkIndex(profile: Profile, index: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= profile.mods.length) {
    throw new ProfileError(`No mod at position ${index} in profile "${profile.name}"`);
  }
}

function cloneProfile(profile: Profile): Profile {
  return { ...profile, mods: profile.mods.map((mod) => ({ ...mod })) };
}
