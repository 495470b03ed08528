import { TextDecoder } from "node:util";
import { CorpusEncodingError, type DecodeAttempt } from "./errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("corpus.encoding");

export interface DecodedText {
  text: string;
  encoding: string;
}

/**
 * Decode `bytes` with the first encoding in `encodings` that accepts them.
 *
 * Decoders run in fatal mode, so any invalid byte sequence rejects the
 * candidate instead of producing replacement characters.
 */
export function decodeWithFallback(bytes: Uint8Array, encodings: readonly string[], path?: string): DecodedText {
  const attempts: DecodeAttempt[] = [];

  for (const encoding of encodings) {
    let decoder: TextDecoder;
    try {
      decoder = new TextDecoder(encoding, { fatal: true });
    } catch (err: unknown) {
      attempts.push({ encoding, reason: err instanceof Error ? err.message : String(err) });
      log.warn({ encoding, path }, "unsupported encoding label");
      continue;
    }

    try {
      const text = decoder.decode(bytes);
      log.info({ encoding, path }, "decoded corpus");
      return { text, encoding };
    } catch (err: unknown) {
      attempts.push({ encoding, reason: err instanceof Error ? err.message : String(err) });
      log.warn({ encoding, path }, "failed to decode corpus");
    }
  }

  throw new CorpusEncodingError(attempts, path);
}
