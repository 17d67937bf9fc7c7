import { FormatError } from '../errors/conversion-errors.js';
import { getErrorMessage } from '../utils/error-utils.js';

const FALLBACK_ENCODINGS = ['utf-8', 'latin1'] as const;

export interface DecodedText {
  text: string;
  /** Label that decoded the bytes without error. */
  encoding: string;
}

function candidateEncodings(hint: string | undefined): string[] {
  const labels = [hint?.trim().toLowerCase(), ...FALLBACK_ENCODINGS];
  return [...new Set(labels.filter((label): label is string => !!label))];
}

/**
 * Strict decode with the archive's charset label, then UTF-8, then Latin-1.
 * A label the runtime does not know counts as a failed attempt.
 */
export function decodeTextBytes(
  bytes: Uint8Array,
  hint: string | undefined
): DecodedText {
  const attempts: string[] = [];

  for (const encoding of candidateEncodings(hint)) {
    try {
      const text = new TextDecoder(encoding, { fatal: true }).decode(bytes);
      return { text, encoding };
    } catch (error) {
      attempts.push(`${encoding}: ${getErrorMessage(error)}`);
    }
  }

  throw new FormatError(
    `Document bytes are not decodable (${attempts.join('; ')})`,
    'html'
  );
}

export function isValidUtf8(bytes: Uint8Array): boolean {
  try {
    new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    return true;
  } catch {
    return false;
  }
}
