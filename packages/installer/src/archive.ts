import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, join, relative, resolve, sep } from "node:path";
import AdmZip from "adm-zip";
import * as tar from "tar";
import { ArchiveError, WriteError, formatError } from "@modkeeper/core";
import { createLogger } from "@modkeeper/logger";
import type { MemberMapping } from "./root-resolver.js";
import type { ArchiveFormat, ArchiveReader } from "./types.js";

const log = createLogger("installer:archive");

/** Pick the reader by file name; anything that is not a gzip tar is read as zip. */
export function detectArchiveFormat(fileName: string): ArchiveFormat {
  const lower = fileName.toLowerCase();
  if (lower.endsWith(".tar.gz") || lower.endsWith(".tgz")) return "tar.gz";
  return "zip";
}

/** Tar entry types unpacked as members; links and devices are skipped. */
const REGULAR_TAR_TYPES: ReadonlySet<string> = new Set(["File", "OldFile", "ContiguousFile", "Directory"]);

function isRegularTarEntry(entry: { type: string }): boolean {
  return REGULAR_TAR_TYPES.has(entry.type);
}

function normalizeMemberName(name: string): string {
  return name.replace(/\\/g, "/").replace(/^(\.\/)+/, "");
}

class ZipArchive implements ArchiveReader {
  readonly format = "zip";
  readonly members: readonly string[];
  private readonly entryNames = new Map<string, string>();

  constructor(
    readonly filePath: string,
    private readonly zip: AdmZip,
  ) {
    const members: string[] = [];
    for (const entry of zip.getEntries()) {
      let name = normalizeMemberName(entry.entryName);
      if (entry.isDirectory && !name.endsWith("/")) name += "/";
      if (!name) continue;
      this.entryNames.set(name, entry.entryName);
      members.push(name);
    }
    this.members = members;
  }

  async readMember(member: string): Promise<Buffer> {
    const entryName = this.entryNames.get(member);
    const entry = entryName === undefined ? null : this.zip.getEntry(entryName);
    if (!entry) {
      throw new ArchiveError(this.filePath, `Archive has no member '${member}'`);
    }
    try {
      return entry.getData();
    } catch (err) {
      throw new ArchiveError(this.filePath, `Cannot read '${member}': ${formatError(err)}`, { cause: err });
    }
  }

  async extractAll(destDir: string): Promise<void> {
    await mkdir(destDir, { recursive: true });
    try {
      this.zip.extractAllTo(destDir, true);
    } catch (err) {
      throw new ArchiveError(this.filePath, `Cannot unpack archive: ${formatError(err)}`, { cause: err });
    }
  }
}

class TarGzArchive implements ArchiveReader {
  readonly format = "tar.gz";
  private unpacked: Promise<string> | null = null;

  constructor(
    readonly filePath: string,
    readonly members: readonly string[],
    private readonly scratchDir: string,
  ) {}

  /** Tar members cannot be read at random; the first read unpacks the whole archive. */
  async readMember(member: string): Promise<Buffer> {
    if (!this.members.includes(member)) {
      throw new ArchiveError(this.filePath, `Archive has no member '${member}'`);
    }
    this.unpacked ??= this.unpackToScratch();
    const dir = await this.unpacked;
    try {
      return await readFile(join(dir, member));
    } catch (err) {
      throw new ArchiveError(this.filePath, `Cannot read '${member}': ${formatError(err)}`, { cause: err });
    }
  }

  async extractAll(destDir: string): Promise<void> {
    await mkdir(destDir, { recursive: true });
    try {
      await tar.x({
        file: this.filePath,
        cwd: destDir,
        strict: true,
        filter: (_path, entry) => !("type" in entry) || isRegularTarEntry(entry),
      });
    } catch (err) {
      throw new ArchiveError(this.filePath, `Cannot unpack archive: ${formatError(err)}`, { cause: err });
    }
  }

  private async unpackToScratch(): Promise<string> {
    const dir = join(this.scratchDir, "unpacked");
    await this.extractAll(dir);
    return dir;
  }
}

export interface OpenArchiveOptions {
  /** Overrides detection from the file name */
  format?: ArchiveFormat;
  /** Working directory for formats that must be unpacked before reading */
  scratchDir: string;
}

/**
 * Open a zip or gzip tar and list its members.
 *
 * @throws ArchiveError when the file is not a readable archive of that format.
 */
export async function openArchive(filePath: string, options: OpenArchiveOptions): Promise<ArchiveReader> {
  const format = options.format ?? detectArchiveFormat(filePath);

  // AdmZip holds the whole file in memory
  if (format === "zip") {
    try {
      return new ZipArchive(filePath, new AdmZip(filePath));
    } catch (err) {
      throw new ArchiveError(filePath, `Not a readable zip archive: ${formatError(err)}`, { cause: err });
    }
  }

  const members: string[] = [];
  try {
    await tar.t({
      file: filePath,
      strict: true,
      onReadEntry: (entry) => {
        if (!isRegularTarEntry(entry)) {
          log.warn(`Skipping ${entry.type} entry ${entry.path} in ${filePath}`);
          return;
        }
        let name = normalizeMemberName(entry.path);
        if (entry.type === "Directory" && !name.endsWith("/")) name += "/";
        if (name) members.push(name);
      },
    });
  } catch (err) {
    throw new ArchiveError(filePath, `Not a readable tar.gz archive: ${formatError(err)}`, { cause: err });
  }
  return new TarGzArchive(filePath, members, options.scratchDir);
}

/** Target path for `relativePath` below `destDir`, refusing anything that escapes it. */
export function safeTargetPath(destDir: string, relativePath: string, archivePath: string): string {
  const base = resolve(destDir);
  const target = resolve(base, relativePath);
  const rel = relative(base, target);
  if (isAbsolute(relativePath) || rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new ArchiveError(archivePath, `Archive member '${relativePath}' would be written outside ${destDir}`);
  }
  return target;
}

/**
 * Write mapped members below `destDir`, creating parent directories as
 * needed. Existing files are overwritten; nothing else is removed.
 *
 * @returns Number of files written.
 */
export async function writeMembers(
  reader: ArchiveReader,
  mappings: readonly MemberMapping[],
  destDir: string,
): Promise<number> {
  // Validate every path before the first write
  const targets = mappings.map((m) => safeTargetPath(destDir, m.relativePath, reader.filePath));

  let files = 0;
  for (const [i, mapping] of mappings.entries()) {
    const target = targets[i];
    if (mapping.isDirectory) {
      await mkdir(target, { recursive: true }).catch((err: unknown) => {
        throw new WriteError(target, err);
      });
      continue;
    }
    const data = await reader.readMember(mapping.member);
    try {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, data);
    } catch (err) {
      throw new WriteError(target, err);
    }
    files++;
  }
  log.debug(`Wrote ${files} files to ${destDir}`);
  return files;
}
