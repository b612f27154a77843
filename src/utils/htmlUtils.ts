/**
 * HTML-to-text helpers for the web tools
 */

export function decodeHtmlEntities(text: string): string {
  return text
    .replace(/&nbsp;/gi, ' ')
    .replace(/&lt;/gi, '<')
    .replace(/&gt;/gi, '>')
    .replace(/&quot;/gi, '"')
    .replace(/&#39;/gi, "'")
    .replace(/&#x27;/gi, "'")
    .replace(/&#(\d+);/g, (_match: string, code: string) => String.fromCharCode(parseInt(code, 10)))
    .replace(/&#x([0-9a-f]+);/gi, (_match: string, code: string) => String.fromCharCode(parseInt(code, 16)))
    .replace(/&amp;/gi, '&');
}

/**
 * Remove every tag and decode entities, keeping text on one line
 */
export function stripTags(html: string): string {
  return decodeHtmlEntities(html.replace(/<[^>]+>/g, '')).replace(/\s+/g, ' ').trim();
}

/**
 * Extract readable text from a page. Scripts, styles and page chrome go;
 * block elements become line breaks.
 */
export function extractTextFromHtml(html: string): string {
  let text = html;

  for (const tag of ['script', 'style', 'nav', 'header', 'footer', 'noscript']) {
    text = text.replace(new RegExp(`<${tag}\\b[^<]*(?:(?!<\\/${tag}>)<[^<]*)*<\\/${tag}>`, 'gi'), '');
  }
  text = text.replace(/<!--[\s\S]*?-->/g, '');

  const bodyMatch = text.match(/<body[^>]*>([\s\S]*)<\/body>/i);
  if (bodyMatch && bodyMatch[1]) {
    text = bodyMatch[1];
  }

  text = text.replace(/<\/(p|div|h[1-6]|li|tr|br)>/gi, '\n');
  text = text.replace(/<(br|hr)\s*\/?>/gi, '\n');
  text = text.replace(/<li[^>]*>/gi, '- ');
  text = text.replace(/<[^>]+>/g, ' ');
  text = decodeHtmlEntities(text);

  text = text.replace(/[ \t]+/g, ' ');
  text = text
    .split('\n')
    .map(line => line.trim())
    .join('\n');
  text = text.replace(/\n{3,}/g, '\n\n');

  return text.trim();
}

/**
 * Cut `text` to `maxChars`, marking the cut
 */
export function truncateText(text: string, maxChars: number): string {
  return text.length > maxChars ? `${text.slice(0, maxChars)}... (truncated)` : text;
}
