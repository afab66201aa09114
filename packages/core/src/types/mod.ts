import { z } from "zod/v4";

/** Kind of content a package provides; selects its default install folder. */
export type ContentType = "mod" | "tileset" | "soundpack";

/** Folder under the install root used when a mod has no install subpath. */
export const CONTENT_TYPE_DIRS: Readonly<Record<ContentType, string>> = {
  mod: "mods",
  tileset: "gfx",
  soundpack: "sound",
};

export const contentTypeSchema = z.enum(["mod", "tileset", "soundpack"]);

export const modSchema = z.object({
  /** Archive location (zip or tar.gz) */
  sourceUrl: z.string().trim().min(1, "Mod source URL must not be empty"),
  /** Path inside the archive to treat as the package root */
  contentSubpath: z.string().optional(),
  /** Path under the install root to place files; absolute paths are used as-is */
  installSubpath: z.string().optional(),
  /** Copy everything under the resolved root verbatim instead of auto-detecting modinfo.json roots */
  preserveOriginalLayout: z.boolean(),
  contentType: contentTypeSchema.optional(),
});

/** One content package a user wants installed. */
export type Mod = z.infer<typeof modSchema>;
