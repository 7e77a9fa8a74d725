import type { SplitMode } from '../types';

const SENTENCE_DELIMITER = '. ';

/** `<` opens a tag only when a name, `/` or `!` follows */
const TAG_OPEN_PATTERN = /^<[a-zA-Z!/]/;

export interface ChunkSplitterOptions {
  /** Boundary placement (default: 'sentence') */
  mode?: SplitMode;
}

/**
 * ChunkSplitter - splits page markup into size-bounded translation units
 *
 * Text is cut on ". ". Every sentence but the last keeps its period and
 * sentences are rejoined with one space, so `chunks.join(' ')` gives back the
 * input. A chunk exceeds `maxSize` only when one sentence alone does, so a
 * trailing delimiter that does not fit leaves an empty last chunk.
 */
export class ChunkSplitter {
  /**
   * @example
   * ```typescript
   * ChunkSplitter.split('One. Two. Three', 9);
   * // ['One. Two.', 'Three']
   * ```
   * @throws RangeError when maxSize is not a positive number
   */
  static split(
    text: string,
    maxSize: number,
    options?: ChunkSplitterOptions,
  ): string[] {
    if (!(maxSize > 0)) {
      throw new RangeError(`maxSize must be positive, got ${maxSize}`);
    }
    if (text.length === 0) return [];

    const sentences =
      options?.mode === 'markup'
        ? this.splitOutsideTags(text)
        : text.split(SENTENCE_DELIMITER);

    const chunks: string[] = [];
    let buffer: string | null = null;

    for (let i = 0; i < sentences.length; i++) {
      const sentence =
        i < sentences.length - 1 ? `${sentences[i]}.` : sentences[i];

      if (buffer === null) {
        buffer = sentence;
        continue;
      }

      const candidate: string = `${buffer} ${sentence}`;
      if (candidate.length > maxSize) {
        chunks.push(buffer);
        buffer = sentence;
      } else {
        buffer = candidate;
      }
    }

    if (buffer !== null) {
      chunks.push(buffer);
    }

    return chunks;
  }

  /**
   * Split on ". " occurrences that are not inside a `<...>` tag
   */
  private static splitOutsideTags(text: string): string[] {
    const parts: string[] = [];
    let start = 0;
    let insideTag = false;

    for (let i = 0; i < text.length; i++) {
      const char = text[i];
      if (char === '<' && TAG_OPEN_PATTERN.test(text.slice(i, i + 2))) {
        insideTag = true;
      } else if (char === '>') {
        insideTag = false;
      } else if (!insideTag && char === '.' && text[i + 1] === ' ') {
        parts.push(text.slice(start, i));
        start = i + SENTENCE_DELIMITER.length;
        i++;
      }
    }

    parts.push(text.slice(start));
    return parts;
  }
}

export function splitIntoChunks(
  text: string,
  maxSize: number,
  options?: ChunkSplitterOptions,
): string[] {
  return ChunkSplitter.split(text, maxSize, options);
}
