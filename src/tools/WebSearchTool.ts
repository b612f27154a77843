/**
 * WebSearchTool - Web search through DuckDuckGo's HTML endpoint
 *
 * No API key is needed. Results are scraped from the HTML page; when the
 * snippet markup is missing only titles and links are returned.
 */

import { BaseTool, type ToolContext } from './BaseTool.js';
import type { ParameterSchema, ToolArguments, ToolOutcome } from '../types/index.js';
import { fetchText, type FetchFn } from '../network/fetchText.js';
import { TOOL_LIMITS } from '../config/constants.js';
import { stripTags } from '../utils/htmlUtils.js';

export const DUCKDUCKGO_HTML_URL = 'https://html.duckduckgo.com/html/?q=';

const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36';

const RESULT_PATTERN =
  /class="result__body".*?class="result__a" href="([^"]+)">(.*?)<\/a>.*?class="result__snippet"[^>]*>(.*?)<\/a>/gs;
const LINK_ONLY_PATTERN = /class="result__a" href="([^"]+)">(.*?)<\/a>/g;

function decodeLink(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
}

/**
 * Render a DuckDuckGo result page as plain text
 */
export function formatDuckDuckGoResults(html: string, maxResults: number = TOOL_LIMITS.SEARCH_MAX_RESULTS): string {
  const results: string[] = [];

  for (const match of html.matchAll(RESULT_PATTERN)) {
    if (results.length >= maxResults) break;
    const [, link = '', title = '', snippet = ''] = match;
    results.push(`Title: ${stripTags(title)}\nLink: ${decodeLink(link)}\nSnippet: ${stripTags(snippet)}\n`);
  }

  if (results.length === 0) {
    for (const match of html.matchAll(LINK_ONLY_PATTERN)) {
      if (results.length >= maxResults) break;
      const [, link = '', title = ''] = match;
      results.push(`Title: ${stripTags(title)}\nLink: ${decodeLink(link)}\n`);
    }
  }

  if (results.length === 0) {
    return 'No results found via DuckDuckGo.';
  }
  return `(Source: DuckDuckGo)\n\n${results.join('\n---\n')}`;
}

export class WebSearchTool extends BaseTool {
  readonly name = 'web_search';
  readonly description = 'Search the web. Returns up to 10 results with title, link and snippet';
  readonly parameters: Record<string, ParameterSchema> = {
    query: {
      type: 'string',
      description: 'Search query',
    },
  };
  readonly required = ['query'];

  constructor(private readonly fetchImpl?: FetchFn) {
    super();
  }

  protected async executeImpl(args: ToolArguments, context: ToolContext): Promise<ToolOutcome> {
    const query = this.stringArg(args, 'query');

    const response = await fetchText(`${DUCKDUCKGO_HTML_URL}${encodeURIComponent(query)}`, {
      timeoutMs: TOOL_LIMITS.FETCH_TIMEOUT_MS,
      signal: context.signal,
      headers: { 'User-Agent': BROWSER_USER_AGENT },
      fetchImpl: this.fetchImpl,
      label: 'DuckDuckGo search',
    });

    return this.formatSuccessResponse(formatDuckDuckGoResults(response.text));
  }
}
