/**
 * ChatCompletionsClient - Client for OpenAI-compatible /chat/completions
 * endpoints (Ollama, llama.cpp, vLLM and hosted providers)
 *
 * Non-streaming. Each `send` is a single HTTP request; failures are thrown
 * as classified NetworkErrors for the retry layer.
 */

import { NetworkPermanent } from '../errors/AgentError.js';
import { classifyHttpStatus, parseRetryAfter } from '../network/NetworkError.js';
import type { FetchFn } from '../network/fetchText.js';
import { logger } from '../services/Logger.js';
import { generateId } from '../utils/id.js';
import type { ConversationTurn, FunctionDefinition, JsonValue, ToolArguments, ToolCall } from '../types/index.js';
import { ModelClient, type ModelResponse, type TokenUsage } from './ModelClient.js';

export interface ChatCompletionsClientConfig {
  endpoint: string;
  modelName: string;
  apiKey?: string;
  temperature?: number;
  maxTokens?: number;
  systemPrompt?: string;
  fetchImpl?: FetchFn;
}

interface AssistantWireMessage {
  role: 'assistant';
  content: string | null;
  tool_calls?: Array<{ id: string; type: 'function'; function: { name: string; arguments: string } }>;
}

type WireMessage =
  | { role: 'system' | 'user'; content: string }
  | AssistantWireMessage
  | { role: 'tool'; tool_call_id: string; content: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toJsonValue(value: unknown): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toJsonValue);
  }
  if (isRecord(value)) {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = toJsonValue(item);
    }
    return result;
  }
  return null;
}

/**
 * Tool arguments arrive as a JSON string (or, from some servers, an object)
 */
export function parseToolArguments(raw: unknown): ToolArguments {
  let parsed: unknown = raw;
  if (typeof raw === 'string') {
    if (raw.trim() === '') {
      return {};
    }
    try {
      parsed = JSON.parse(raw);
    } catch {
      logger.warn('[CHAT_CLIENT] Tool call arguments are not valid JSON; passing none');
      return {};
    }
  }
  const value = toJsonValue(parsed);
  return isRecord(value) ? value : {};
}

export function toWireMessages(conversation: readonly ConversationTurn[], systemPrompt?: string): WireMessage[] {
  const messages: WireMessage[] = [];
  if (systemPrompt) {
    messages.push({ role: 'system', content: systemPrompt });
  }
  for (const turn of conversation) {
    switch (turn.role) {
      case 'user':
        messages.push({ role: 'user', content: turn.text });
        break;
      case 'assistant': {
        const message: AssistantWireMessage = { role: 'assistant', content: turn.text ?? null };
        if (turn.tool_calls.length > 0) {
          message.tool_calls = turn.tool_calls.map(call => ({
            id: call.id,
            type: 'function',
            function: { name: call.name, arguments: JSON.stringify(call.arguments) },
          }));
        }
        messages.push(message);
        break;
      }
      case 'tool':
        messages.push({ role: 'tool', tool_call_id: turn.call_id, content: turn.content });
        break;
    }
  }
  return messages;
}

function parseUsage(raw: unknown): TokenUsage | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }
  const prompt = typeof raw.prompt_tokens === 'number' ? raw.prompt_tokens : 0;
  const completion = typeof raw.completion_tokens === 'number' ? raw.completion_tokens : 0;
  const total = typeof raw.total_tokens === 'number' ? raw.total_tokens : prompt + completion;
  return { prompt_tokens: prompt, completion_tokens: completion, total_tokens: total };
}

/**
 * Parse a chat completions response body into a ModelResponse. Tool calls
 * the server sent without an id get a fresh unique one.
 *
 * @throws NetworkPermanent when the body has no usable choice
 */
export function parseChatCompletion(body: unknown): ModelResponse {
  const choices = isRecord(body) ? body.choices : undefined;
  const choice = Array.isArray(choices) ? choices[0] : undefined;
  const message = isRecord(choice) ? choice.message : undefined;
  if (!isRecord(choice) || !isRecord(message)) {
    throw new NetworkPermanent('Malformed response: no choices[0].message', 'malformed_response');
  }

  const toolCalls: ToolCall[] = [];
  const rawCalls = Array.isArray(message.tool_calls) ? message.tool_calls : [];
  rawCalls.forEach((rawCall, index) => {
    if (!isRecord(rawCall) || !isRecord(rawCall.function)) {
      logger.warn(`[CHAT_CLIENT] Skipping malformed tool call at index ${index}`);
      return;
    }
    const name = rawCall.function.name;
    toolCalls.push({
      id: typeof rawCall.id === 'string' && rawCall.id !== '' ? rawCall.id : generateId('call'),
      name: typeof name === 'string' ? name : '',
      arguments: parseToolArguments(rawCall.function.arguments),
    });
  });

  const response: ModelResponse = {
    tool_calls: toolCalls,
    finish_reason: typeof choice.finish_reason === 'string' ? choice.finish_reason : 'unknown',
  };
  if (typeof message.content === 'string' && message.content !== '') {
    response.text = message.content;
  }
  const usage = parseUsage(isRecord(body) ? body.usage : undefined);
  if (usage) {
    response.usage = usage;
  }
  return response;
}

export class ChatCompletionsClient extends ModelClient {
  private readonly config: ChatCompletionsClientConfig;

  constructor(config: ChatCompletionsClientConfig) {
    super();
    this.config = config;
  }

  get modelName(): string {
    return this.config.modelName;
  }

  get endpoint(): string {
    return this.config.endpoint;
  }

  async send(
    conversation: readonly ConversationTurn[],
    tools: readonly FunctionDefinition[],
    signal: AbortSignal
  ): Promise<ModelResponse> {
    const url = `${this.config.endpoint.replace(/\/+$/, '')}/chat/completions`;
    const payload: Record<string, unknown> = {
      model: this.config.modelName,
      messages: toWireMessages(conversation, this.config.systemPrompt),
      stream: false,
    };
    if (tools.length > 0) {
      payload.tools = tools;
    }
    if (this.config.temperature !== undefined) {
      payload.temperature = this.config.temperature;
    }
    if (this.config.maxTokens !== undefined) {
      payload.max_tokens = this.config.maxTokens;
    }

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`;
    }

    logger.debug(`[CHAT_CLIENT] POST ${url} (${conversation.length} turns, ${tools.length} tools)`);

    const fetchImpl = this.config.fetchImpl ?? fetch;
    const response = await fetchImpl(url, {
      method: 'POST',
      headers,
      body: JSON.stringify(payload),
      signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw classifyHttpStatus(
        response.status,
        `HTTP ${response.status}: ${errorText.slice(0, 500)}`,
        parseRetryAfter(response.headers.get('retry-after'))
      );
    }

    const body: unknown = await response.json();
    return parseChatCompletion(body);
  }
}
