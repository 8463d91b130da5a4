// src/io/file-classifier.ts
import type { ZipEntry } from "./unzip";

const LAYOUT_EXTENSIONS = [".gds", ".gds2", ".gdsii", ".gds.bin", ".strm"];
const CONFIG_EXTENSIONS = [".json"];

/**
 * Optional patterns that pick which layout and config to use when a
 * bundle holds several. Matched against the base name, "*" is a wildcard.
 */
export interface BundleHints {
  layout?: string;
  config?: string;
}

export interface ClassifiedLayoutFile {
  name: string;
  rawEntry: ZipEntry;
  getBytes: () => Promise<Uint8Array>;
}

export interface ClassifiedConfigFile {
  name: string;
  rawEntry: ZipEntry;
  /** Entry text with any byte order mark removed. */
  getText: () => Promise<string>;
}

export interface ClassifiedFiles {
  layouts: ClassifiedLayoutFile[];
  configs: ClassifiedConfigFile[];
  ignored: ZipEntry[];
}

/**
 * Classify zip entries into layout streams, layer configs and ignored
 * files. Entries matching a hint are moved to the front of their list.
 */
export function classifyFiles(
  entries: ZipEntry[],
  hints: BundleHints = {}
): ClassifiedFiles {
  const layouts: ClassifiedLayoutFile[] = [];
  const configs: ClassifiedConfigFile[] = [];
  const ignored: ZipEntry[] = [];

  for (const entry of entries) {
    const lowerName = entry.name.toLowerCase();

    if (isArchiveJunk(entry.name)) {
      ignored.push(entry);
      continue;
    }

    if (hasExtension(lowerName, LAYOUT_EXTENSIONS)) {
      layouts.push({
        name: entry.name,
        rawEntry: entry,
        getBytes: () => entry.bytes(),
      });
      continue;
    }

    if (hasExtension(lowerName, CONFIG_EXTENSIONS)) {
      configs.push({
        name: entry.name,
        rawEntry: entry,
        getText: async () => stripBom(await entry.text()),
      });
      continue;
    }

    // readme, fabrication notes, etc
    ignored.push(entry);
  }

  return {
    layouts: preferMatching(layouts, hints.layout),
    configs: preferMatching(configs, hints.config),
    ignored,
  };
}

function hasExtension(lowerName: string, extensions: string[]): boolean {
  return extensions.some((ext) => lowerName.endsWith(ext));
}

/** Resource forks and metadata written by archivers. */
function isArchiveJunk(name: string): boolean {
  const baseName = baseNameOf(name);
  return name.startsWith("__MACOSX/") || baseName.startsWith("._");
}

function baseNameOf(name: string): string {
  return name.split("/").pop() || name;
}

function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

function preferMatching<T extends { name: string }>(files: T[], pattern?: string): T[] {
  if (!pattern) return files;
  const hit = files.filter((f) => matchesPattern(baseNameOf(f.name), pattern));
  const rest = files.filter((f) => !matchesPattern(baseNameOf(f.name), pattern));
  return [...hit, ...rest];
}

/**
 * Simple pattern match helper:
 * - If pattern contains "*" treat as wildcard
 * - Else do case sensitive equality
 */
export function matchesPattern(name: string, pattern: string): boolean {
  if (pattern.includes("*")) {
    const regexPattern = "^" + pattern.split("*").map(escapeRegex).join(".*") + "$";
    return new RegExp(regexPattern).test(name);
  }
  return name === pattern;
}

function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
