import { getLogger } from '@posledger/logger';

const logger = getLogger('TextDecoding');

// Tried in order when the declared encoding rejects the bytes
const FALLBACK_ENCODINGS = ['utf-8', 'windows-1254'] as const;

export interface DecodedText {
  encoding: string;
  text: string;
}

function tryDecode(bytes: Uint8Array, encoding: string): string | undefined {
  try {
    return new TextDecoder(encoding, { fatal: true }).decode(bytes);
  } catch {
    return undefined;
  }
}

/**
 * Decode file bytes with the bank's declared encoding before any string
 * handling. ISO-8859-9 is served by the windows-1254 decoder (a superset).
 * A leading byte order mark is removed.
 */
export function decodeBytes(bytes: Uint8Array, declaredEncoding: string, file?: string): DecodedText {
  const candidates = [declaredEncoding, ...FALLBACK_ENCODINGS.filter((enc) => enc !== declaredEncoding.toLowerCase())];

  for (const encoding of candidates) {
    const text = tryDecode(bytes, encoding);
    if (text !== undefined) {
      if (encoding !== declaredEncoding) {
        logger.warn({ declaredEncoding, encoding, file }, 'Declared encoding failed, decoded with fallback');
      }
      return { encoding, text: text.replace(/^\uFEFF/, '') };
    }
  }

  // windows-1254 maps nearly every byte; non-fatal decoding is the last resort
  logger.warn({ declaredEncoding, file }, 'No encoding decoded cleanly, using lossy windows-1254');
  return { encoding: 'windows-1254', text: new TextDecoder('windows-1254').decode(bytes).replace(/^\uFEFF/, '') };
}
