/**
 * EBCDIC (code page 037) to Latin-1 translation.
 *
 * iconv-lite has no EBCDIC codecs, so documents that start with the EBCDIC
 * form of "<?xm" are translated byte by byte through a lookup table.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";

const tableSchema = z.array(z.number().int().min(0).max(255)).length(256);

let cachedTable: readonly number[] | undefined;

function loadTable(): readonly number[] {
  if (!cachedTable) {
    const raw = readFileSync(new URL("./data/ebcdic-cp037.json", import.meta.url), "utf-8");
    cachedTable = Object.freeze(tableSchema.parse(JSON.parse(raw)));
  }
  return cachedTable;
}

/**
 * Translates EBCDIC bytes into a string of the equivalent Latin-1 characters.
 */
export function decodeEbcdic(bytes: Uint8Array): string {
  const table = loadTable();
  let text = "";
  for (const byte of bytes) {
    text += String.fromCharCode(table[byte]);
  }
  return text;
}
