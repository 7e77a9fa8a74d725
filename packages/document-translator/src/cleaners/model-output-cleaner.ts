/**
 * Preamble phrases translation models put in front of the markup.
 * Start-anchored and case-insensitive; applied in order.
 */
const PREAMBLE_PATTERNS: RegExp[] = [
  /^Translation:\s*/i,
  /^Here's the translation:\s*/i,
  /^Translated text:\s*/i,
  /^Here is the translation:\s*/i,
  /^Here's the HTML content translated to [^:]+:\s*/i,
  /^The HTML content translated to [^:]+:\s*/i,
  /^Translated HTML content:\s*/i,
  /^Translated content:\s*/i,
  /^Here is the HTML translated [^:]*:\s*/i,
];

const CODE_FENCE_PATTERN = /```(?:html)?/gi;

const TAG_START_PATTERN = /^<[a-zA-Z!/]/;

const FIRST_TAG_PATTERN = /<[a-zA-Z!/]/;

/**
 * ModelOutputCleaner - text transformations applied to raw model output
 *
 * Kept apart from the call path so each step can be tested on its own.
 */
export class ModelOutputCleaner {
  /**
   * Remove ```html / ``` fence markers and trim
   */
  static stripCodeFences(text: string): string {
    return text.replace(CODE_FENCE_PATTERN, '').trim();
  }

  /**
   * Remove known translation preambles from the start of the text
   */
  static stripPreamble(text: string): string {
    let cleaned = text.trim();
    for (const pattern of PREAMBLE_PATTERNS) {
      cleaned = cleaned.replace(pattern, '');
    }
    return cleaned;
  }

  static startsWithTag(text: string): boolean {
    return TAG_START_PATTERN.test(text.trimStart());
  }

  /**
   * Drop everything before the first tag when the text does not start with
   * one. Text without any tag is returned trimmed.
   */
  static trimToFirstTag(text: string): string {
    const trimmed = text.trim();
    if (this.startsWithTag(trimmed)) return trimmed;

    const match = FIRST_TAG_PATTERN.exec(trimmed);
    return match ? trimmed.slice(match.index) : trimmed;
  }
}
