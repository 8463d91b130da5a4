// src/io/unzip.ts
import JSZip from "jszip";

export type BundleInput = Blob | ArrayBuffer | Uint8Array;

/**
 * A single entry inside an unzipped layout bundle
 */
export interface ZipEntry {
  /** Normalized path style name, always forward slashes */
  name: string;
  /** Read entry as UTF-8 text */
  text: () => Promise<string>;
  /** Read entry as raw bytes */
  bytes: () => Promise<Uint8Array>;
}

/**
 * Accepts a Blob, ArrayBuffer or Uint8Array holding a zip archive and
 * returns a list of ZipEntry helpers, directories excluded.
 */
export async function unzipBundle(input: BundleInput): Promise<ZipEntry[]> {
  const data = input instanceof Blob ? await input.arrayBuffer() : input;
  const zip = await JSZip.loadAsync(data);

  const entries: ZipEntry[] = [];

  zip.forEach((rawName, file) => {
    if (file.dir) return;

    entries.push({
      name: normalizeZipPath(rawName),
      text: () => file.async("text"),
      bytes: () => file.async("uint8array"),
    });
  });

  return entries;
}

/**
 * Normalize zip entry paths:
 * - Replace backslashes with forward slashes
 * - Remove leading "./" and "/"
 */
export function normalizeZipPath(path: string): string {
  let p = path.replace(/\\/g, "/");
  if (p.startsWith("./")) {
    p = p.slice(2);
  }
  if (p.startsWith("/")) {
    p = p.slice(1);
  }
  return p;
}
