import { open } from "fs/promises";

/** Files at or above this size are never treated as error pages. */
export const SUSPICIOUS_SIZE_BYTES = 1000;

export const SNIFF_BYTES = 100;

const ERROR_MARKERS = ["<html", "<!doctype", "<?xml", "error"] as const;

/**
 * Whether the head of a small payload carries markup or an error token.
 */
export function looksLikeErrorPage(head: Uint8Array): boolean {
  const text = Buffer.from(head).toString("latin1").toLowerCase();
  return ERROR_MARKERS.some((marker) => text.includes(marker));
}

/**
 * Check a downloaded file for a disguised error response.
 * Returns the file size.
 */
export async function sniffFile(path: string): Promise<{ size: number; suspicious: boolean }> {
  const handle = await open(path, "r");
  try {
    const { size } = await handle.stat();
    if (size >= SUSPICIOUS_SIZE_BYTES) {
      return { size, suspicious: false };
    }
    const head = Buffer.alloc(Math.min(SNIFF_BYTES, size));
    const { bytesRead } = await handle.read(head, 0, head.length, 0);
    return { size, suspicious: looksLikeErrorPage(head.subarray(0, bytesRead)) };
  } finally {
    await handle.close();
  }
}
