/** Document-level wrapper tags a page may carry */
const WRAPPER_TAG_PATTERN = /<!doctype[^>]*>|<\/?(?:html|head|body)\b[^>]*>/gi;

/**
 * DocumentAssembler - merges per-page markup into one document
 *
 * Each page loses its html/head/body wrapper tags and is wrapped in a
 * `page` container; all pages, in order, go into one `document` container.
 */
export class DocumentAssembler {
  static stripDocumentWrappers(markup: string): string {
    return markup.replace(WRAPPER_TAG_PATTERN, '');
  }

  /**
   * @example
   * ```typescript
   * DocumentAssembler.combine(['<p>A</p>']);
   * // "<div class='document'>\n<div class='page'>\n<p>A</p>\n</div>\n</div>"
   * ```
   */
  static combine(pageMarkups: readonly string[]): string {
    const pages = pageMarkups
      .map(
        (markup) =>
          `<div class='page'>\n${DocumentAssembler.stripDocumentWrappers(markup)}\n</div>\n`,
      )
      .join('');

    return `<div class='document'>\n${pages}</div>`;
  }
}

export function combine(pageMarkups: readonly string[]): string {
  return DocumentAssembler.combine(pageMarkups);
}
