/**
 * CHIP-8 ROM images are raw program bytes with no header, loaded at $200.
 * Any byte sequence that fits is accepted; validation is size only.
 */

import { RomLoadError } from "@/cpu/chip8";
import { MAX_ROM_SIZE } from "@/emulator/chip8/memory";
import { extractRom, isZipData } from "@/lib/zip-extract";

/** Copy and validate a program image. */
export function parseRom(data: ArrayBuffer | Uint8Array): Uint8Array {
  const bytes = data instanceof Uint8Array ? data.slice() : new Uint8Array(data.slice(0));

  if (bytes.length === 0) {
    throw new RomLoadError("ROM is empty", 0);
  }
  if (bytes.length > MAX_ROM_SIZE) {
    throw new RomLoadError(
      `ROM too large (${bytes.length} bytes, max ${MAX_ROM_SIZE})`,
      bytes.length
    );
  }
  return bytes;
}

/**
 * Read a file chosen in the browser's file picker. Zip archives are
 * unpacked and their first ROM is used.
 */
export async function readRomFile(file: Blob): Promise<Uint8Array> {
  const bytes = new Uint8Array(await file.arrayBuffer());
  // "PK" (0x504B) is not a valid CHIP-8 instruction, so no raw ROM starts with it
  if (isZipData(bytes)) {
    return parseRom(await extractRom(bytes));
  }
  return parseRom(bytes);
}
