/**
 * Instruction set sent with every page image.
 *
 * Asks for semantic HTML, borderless form rows for label/value content and
 * bordered tables only for genuinely tabular content.
 */
export const PAGE_EXTRACTION_PROMPT = `Convert the document page in the image into well-structured HTML.

## Structure detection
- Decide for each region whether it is tabular/columnar content or flowing text.
- Use a <table> ONLY for content with real rows and columns.
- Lay out form-like content (label: value pairs) as borderless rows, never as a table.
- Write ordinary paragraphs as plain <p> elements without any table structure.
- Keep the spacing and layout of the page as closely as HTML allows.

## Elements
- Use semantic elements: <article>, <section>, <header>, <p>, <table>.
- Use <h1> to <h6> for the heading hierarchy.
- Form-like rows:
  <div class="form-section">
    <div class="form-row">
      <div class="label">Name:</div>
      <div class="value">Jane Doe</div>
    </div>
  </div>
- Real tables:
  <table class="data-table">
    <tr><th>Header</th><th>Header</th></tr>
    <tr><td>Cell</td><td>Cell</td></tr>
  </table>
- Outline or section numbers (e.g. "1.2.3") go in their own <span class="index">.

## CSS classes
- "form-section" for form-like content
- "data-table" for real tables
- "text-content" for flowing text
- "no-borders" on elements that must not show borders

Return only the HTML. No explanations, no code fences.`;

/**
 * Presentational styles prepended to every extracted page that has none.
 */
export const PAGE_STYLES = `<style>
  .document { width: 100%; max-width: 1000px; margin: 0 auto; font-family: Arial, sans-serif; line-height: 1.5; }
  .text-content { margin-bottom: 1em; }
  .form-section { margin-bottom: 1em; }
  .form-row { display: flex; gap: 1em; margin-bottom: 0.5em; }
  .label { width: 200px; flex-shrink: 0; }
  .value { flex-grow: 1; }
  .data-table { width: 100%; border-collapse: collapse; margin-bottom: 1em; }
  .data-table:not(.no-borders) td, .data-table:not(.no-borders) th { border: 1px solid black; padding: 0.5em; }
  .no-borders td, .no-borders th { border: none !important; }
  .header { text-align: right; margin-bottom: 20px; }
</style>`;
