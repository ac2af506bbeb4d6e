import type { ByteRange } from "./events";
import { logger } from "./logger";

/**
 * Reports a substituted chunk whose replacement is longer than `threshold`
 * UTF-8 bytes. Entity decoding and smart punctuation never produce such a
 * chunk, so one showing up means the tokenizer changed underneath the
 * normalizer. Returns whether anything was logged.
 */
export function verifySubstitution(source: string, range: ByteRange, replacement: string, threshold: number): boolean {
  if (Buffer.byteLength(replacement, "utf8") <= threshold) return false;
  logger.error(
    `Substituted text longer than expected (${threshold} bytes).\nSource: ${source.slice(range.start, range.end)}\nParsed: ${replacement}`,
  );
  return true;
}
