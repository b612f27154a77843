/**
 * ModelClient - Abstract interface for LLM providers
 *
 * The agent loop only needs one operation: send the conversation and the
 * available tools, get back text and/or tool calls. Retries, rate limiting
 * and timeouts are applied around `send` by the network layer, so an
 * implementation should make exactly one request per call and throw on
 * failure.
 *
 * @example
 * ```typescript
 * const client = new ChatCompletionsClient({ endpoint: 'http://localhost:11434/v1', modelName: 'qwen2.5-coder:14b' });
 * const response = await client.send(conversation, tools, signal);
 * ```
 */

import type { ConversationTurn, FunctionDefinition, ToolCall } from '../types/index.js';

export interface TokenUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface ModelResponse {
  text?: string;
  tool_calls: ToolCall[];
  /** Advisory only; the loop stops on "no tool calls", not on this value */
  finish_reason: string;
  usage?: TokenUsage;
}

export abstract class ModelClient {
  abstract send(
    conversation: readonly ConversationTurn[],
    tools: readonly FunctionDefinition[],
    signal: AbortSignal
  ): Promise<ModelResponse>;

  abstract get modelName(): string;

  abstract get endpoint(): string;
}
