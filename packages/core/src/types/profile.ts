import type { Mod } from "./mod.js";

export interface Profile {
  /** Unique key */
  name: string;
  /** Absolute install root, resolved at load time */
  installRoot: string;
  /** Mods in install order */
  mods: Mod[];
}
