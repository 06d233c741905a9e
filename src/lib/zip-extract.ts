/**
 * ZIP archive support using JSZip.
 * ROM collections are commonly distributed as zip files; the file picker
 * accepts them and loads one program image from inside.
 */

import JSZip from "jszip";
import { RomLoadError } from "@/cpu/chip8";

/** File extensions CHIP-8 program images are published under. */
const ROM_EXTENSION = /\.(ch8|c8|rom|bin)$/i;

/**
 * Check if data looks like a ZIP file (PK magic bytes).
 */
export function isZipData(data: Uint8Array): boolean {
  return data.length >= 4 && data[0] === 0x50 && data[1] === 0x4b;
}

/**
 * Extract a program image from an archive. Without a path, the first file
 * with a ROM extension is taken, or the first file if none has one.
 */
export async function extractRom(data: Uint8Array, filePath?: string): Promise<Uint8Array> {
  const zip = await JSZip.loadAsync(data);

  let path = filePath;
  if (path === undefined) {
    const files = Object.values(zip.files)
      .filter((file) => !file.dir)
      .map((file) => file.name)
      .sort((a, b) => a.localeCompare(b));
    path = files.find((name) => ROM_EXTENSION.test(name)) ?? files[0];
    if (path === undefined) {
      throw new RomLoadError("Archive contains no files");
    }
  }

  const file = zip.file(path);
  if (!file) {
    throw new RomLoadError(`File not found in archive: ${path}`);
  }
  return file.async("uint8array");
}
