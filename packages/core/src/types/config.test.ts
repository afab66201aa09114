import { describe, it, expect } from "vitest";
import { storedConfigSchema } from "./config.js";
import { modSchema } from "./mod.js";

describe("storedConfigSchema", () => {
  it("accepts a valid config", () => {
    const result = storedConfigSchema.safeParse({
      mod_install_dir: "userdata",
      backup_dir: "backups",
      game_install_dir: "game",
      update_url: "https://api.github.com/repos/example/tool/releases/latest",
    });
    expect(result.success).toBe(true);
  });

  it("accepts an empty object", () => {
    expect(storedConfigSchema.safeParse({}).success).toBe(true);
  });

  it("keeps keys it does not know about", () => {
    const result = storedConfigSchema.parse({ mod_install_dir: "userdata", theme: "dark" });
    expect(result).toEqual({ mod_install_dir: "userdata", theme: "dark" });
  });

  it("rejects non-string paths", () => {
    const result = storedConfigSchema.safeParse({ backup_dir: 42 });
    expect(result.success).toBe(false);
  });
});

describe("modSchema", () => {
  it("accepts a minimal mod", () => {
    const result = modSchema.safeParse({
      sourceUrl: "https://example.com/mod.zip",
      preserveOriginalLayout: false,
    });
    expect(result.success).toBe(true);
  });

  it("rejects an empty source URL", () => {
    const result = modSchema.safeParse({ sourceUrl: "   ", preserveOriginalLayout: true });
    expect(result.success).toBe(false);
  });

  it("rejects an unknown content type", () => {
    const result = modSchema.safeParse({
      sourceUrl: "https://example.com/mod.zip",
      preserveOriginalLayout: true,
      contentType: "music",
    });
    expect(result.success).toBe(false);
  });
});
