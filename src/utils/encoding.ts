import iconv from "iconv-lite";

/** BOM-aware UTF-8: decoding drops a leading byte-order mark. */
export const UTF8_SIG = "utf-8-sig";

const utf8Aliases = new Set(["utf-8", "utf8", "utf-8-sig", "ascii", "us-ascii"]);

export function normalizeEncoding(guess: string | null | undefined): string {
  if (!guess) return UTF8_SIG;
  return utf8Aliases.has(guess.trim().toLowerCase()) ? UTF8_SIG : guess;
}

export function decodeBuffer(buffer: Buffer, encoding: string): string {
  const target = encoding === UTF8_SIG ? "utf8" : encoding;
  if (!iconv.encodingExists(target)) {
    throw new Error(`Unsupported encoding '${encoding}'`);
  }
  return iconv.decode(buffer, target, { stripBOM: true });
}
