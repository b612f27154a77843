/**
 * YAML frontmatter parsing utilities
 *
 * Covers the subset used by skill manifests: scalar key-value pairs, JSON
 * arrays, "- item" block lists and booleans. Keys may contain hyphens
 * (`allowed-tools`).
 */

export type FrontmatterValue = string | boolean | string[];

function unquote(value: string): string {
  return value.trim().replace(/^["']|["']$/g, '');
}

function parseInlineList(value: string): string[] | null {
  try {
    const parsed: unknown = JSON.parse(value);
    if (Array.isArray(parsed)) {
      return parsed.map(item => String(item));
    }
  } catch {
    // Fall through to the loose "[a, b]" form
  }
  const inner = value.trim().replace(/^\[|\]$/g, '');
  return inner
    .split(',')
    .map(unquote)
    .filter(item => item.length > 0);
}

/**
 * Parse YAML-style frontmatter from markdown content
 *
 * @example
 * ```typescript
 * parseFrontmatterYAML('name: deploy\nallowed-tools: [read_file, glob_search]');
 * // { name: 'deploy', 'allowed-tools': ['read_file', 'glob_search'] }
 * ```
 */
export function parseFrontmatterYAML(frontmatter: string): Record<string, FrontmatterValue> {
  const metadata: Record<string, FrontmatterValue> = {};
  const lines = frontmatter.split('\n');
  let i = 0;

  while (i < lines.length) {
    const line = lines[i] ?? '';
    const match = line.match(/^([\w-]+):\s*(.*)$/);
    i++;

    if (!match || match[1] === undefined) {
      continue;
    }
    const key = match[1];
    const value = (match[2] ?? '').trim();

    if (value === '') {
      // Block list: following "- item" lines
      const items: string[] = [];
      while (i < lines.length) {
        const itemMatch = (lines[i] ?? '').match(/^\s*-\s+(.*)$/);
        if (!itemMatch || itemMatch[1] === undefined) {
          break;
        }
        items.push(unquote(itemMatch[1]));
        i++;
      }
      metadata[key] = items;
    } else if (value.startsWith('[')) {
      metadata[key] = parseInlineList(value) ?? [];
    } else if (value === 'true' || value === 'false') {
      metadata[key] = value === 'true';
    } else {
      metadata[key] = unquote(value);
    }
  }

  return metadata;
}

/**
 * Split markdown into frontmatter and body. Returns null without a
 * leading `---` block.
 */
export function extractFrontmatter(content: string): { frontmatter: string; body: string } | null {
  const frontmatterMatch = content.replace(/\r\n/g, '\n').match(/^---\n([\s\S]*?)\n---(?:\n([\s\S]*))?$/);
  if (!frontmatterMatch) {
    return null;
  }
  return { frontmatter: frontmatterMatch[1] ?? '', body: frontmatterMatch[2] ?? '' };
}
