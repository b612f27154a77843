/**
 * WebFetchTool - Fetch a URL and return its text
 *
 * HTML is reduced to readable text; other text types are returned as-is.
 * Output is capped at TOOL_LIMITS.FETCH_MAX_CHARS.
 */

import { BaseTool, ToolError, type ToolContext } from './BaseTool.js';
import type { ParameterSchema, ToolArguments, ToolOutcome } from '../types/index.js';
import { fetchText, type FetchFn } from '../network/fetchText.js';
import { TOOL_LIMITS } from '../config/constants.js';
import { extractTextFromHtml, truncateText } from '../utils/htmlUtils.js';

export class WebFetchTool extends BaseTool {
  readonly name = 'web_fetch';
  readonly description = 'Fetch a web page (http or https) and return its text content';
  readonly parameters: Record<string, ParameterSchema> = {
    url: {
      type: 'string',
      description: 'Full URL starting with http:// or https://',
    },
  };
  readonly required = ['url'];

  constructor(private readonly fetchImpl?: FetchFn) {
    super();
  }

  protected async executeImpl(args: ToolArguments, context: ToolContext): Promise<ToolOutcome> {
    const url = this.stringArg(args, 'url').trim();

    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw new ToolError(`Invalid URL: ${url}`, 'validation_error', 'Provide a full http or https URL');
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new ToolError(`Unsupported protocol: ${parsed.protocol}`, 'validation_error', 'Only http and https are supported');
    }

    const response = await fetchText(parsed.toString(), {
      timeoutMs: TOOL_LIMITS.FETCH_TIMEOUT_MS,
      signal: context.signal,
      headers: {
        'User-Agent': 'bastion-agent/0.1',
        Accept: 'text/html,text/plain,application/json,*/*',
      },
      fetchImpl: this.fetchImpl,
      label: `Fetch ${parsed.host}`,
    });

    const isHtml = response.contentType.toLowerCase().includes('html');
    const text = isHtml ? extractTextFromHtml(response.text) : response.text;

    return this.formatSuccessResponse(truncateText(text, TOOL_LIMITS.FETCH_MAX_CHARS));
  }
}
