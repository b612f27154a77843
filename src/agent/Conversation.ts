/**
 * Conversation - Append-only turn history for one agent turn
 *
 * Turns can be added and read, never removed or rewritten. The read view is
 * the live array typed as readonly.
 */

import type { AssistantTurn, ConversationTurn, ToolCall, ToolResult } from '../types/index.js';
import { logger } from '../services/Logger.js';

export class Conversation {
  private readonly turns: ConversationTurn[] = [];

  /** Tool call ids issued by the model that have no result yet */
  private readonly pendingCallIds = new Set<string>();

  append(turn: ConversationTurn): void {
    if (turn.role === 'assistant') {
      for (const call of turn.tool_calls) {
        this.pendingCallIds.add(call.id);
      }
    } else if (turn.role === 'tool') {
      if (!this.pendingCallIds.delete(turn.call_id)) {
        logger.debug(`[CONVERSATION] Result for unknown or already answered call ${turn.call_id}`);
      }
    }
    this.turns.push(turn);
  }

  appendUser(text: string): void {
    this.append({ role: 'user', text });
  }

  appendAssistant(text: string | undefined, toolCalls: ToolCall[]): void {
    const turn: AssistantTurn = { role: 'assistant', tool_calls: toolCalls };
    if (text !== undefined) {
      turn.text = text;
    }
    this.append(turn);
  }

  appendToolResult(result: ToolResult): void {
    this.append({ role: 'tool', call_id: result.call_id, content: result.content, is_error: result.is_error });
  }

  getTurns(): readonly ConversationTurn[] {
    return this.turns;
  }

  get length(): number {
    return this.turns.length;
  }

  /**
   * True when every tool call so far has exactly one result
   */
  isWellFormed(): boolean {
    return this.pendingCallIds.size === 0;
  }

  /**
   * Rough token count for rate limiting: about four characters per token
   */
  estimateTokens(): number {
    let chars = 0;
    for (const turn of this.turns) {
      switch (turn.role) {
        case 'user':
          chars += turn.text.length;
          break;
        case 'assistant':
          chars += turn.text?.length ?? 0;
          for (const call of turn.tool_calls) {
            chars += call.name.length + JSON.stringify(call.arguments).length;
          }
          break;
        case 'tool':
          chars += turn.content.length;
          break;
      }
    }
    return Math.ceil(chars / 4);
  }
}
