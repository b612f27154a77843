/**
 * ToolManager - Registry and dispatcher for the closed tool set
 *
 * `dispatch` always resolves to exactly one ToolResult per ToolCall. Unknown
 * names, invalid arguments, security refusals, timeouts and cancellation all
 * come back as error results; none of them is thrown to the agent loop.
 */

import { BaseTool, type SessionContext, type ToolContext } from './BaseTool.js';
import { ToolValidator } from './ToolValidator.js';
import {
  ActivityEventType,
  isToolName,
  type ErrorType,
  type FunctionDefinition,
  type ToolArguments,
  type ToolCall,
  type ToolName,
  type ToolOutcome,
  type ToolResult,
} from '../types/index.js';
import {
  OperationCancelled,
  ToolTimeout,
  ToolUnknown,
  resultTagFor,
  type AgentErrorCategory,
} from '../errors/AgentError.js';
import { createStructuredError } from '../utils/errorUtils.js';
import { logger } from '../services/Logger.js';
import { PausableTimeout } from '../utils/abort.js';

export interface DispatchContext extends SessionContext {
  /** Turn-level signal; firing it interrupts the call in flight */
  signal?: AbortSignal;
}

/**
 * Which family an error outcome belongs to when shown to the model and user
 */
export function categoryForErrorType(errorType: ErrorType | undefined): AgentErrorCategory {
  switch (errorType) {
    case 'security_error':
    case 'threat_blocked':
      return 'security';
    case 'timeout_error':
    case 'network_error':
      return 'transient';
    default:
      return 'permanent';
  }
}

/**
 * Fold a tool outcome into the single result paired with its call
 */
export function toToolResult(callId: string, outcome: ToolOutcome): ToolResult {
  if (outcome.success) {
    return { call_id: callId, content: outcome.content, is_error: false };
  }

  const tag = resultTagFor(categoryForErrorType(outcome.error_type));
  let content = `${tag} ${outcome.error ?? 'Unknown error'}`;
  if (outcome.suggestion) {
    content += `\nSuggestion: ${outcome.suggestion}`;
  }
  return { call_id: callId, content, is_error: true };
}

/**
 * Result for a call that was never started because the turn ended first
 */
export function notExecutedResult(call: ToolCall, reason: string): ToolResult {
  return {
    call_id: call.id,
    content: `[error] ${call.name}: not executed (${reason})`,
    is_error: true,
  };
}

export class ToolManager {
  private readonly tools: Map<ToolName, BaseTool>;
  private readonly validator: ToolValidator;

  constructor(tools: BaseTool[]) {
    this.tools = new Map();
    this.validator = new ToolValidator();

    for (const tool of tools) {
      if (this.tools.has(tool.name)) {
        logger.warn(`[TOOL_MANAGER] Tool '${tool.name}' registered twice, keeping the first`);
        continue;
      }
      this.tools.set(tool.name, tool);
    }
  }

  getTool(name: string): BaseTool | undefined {
    return isToolName(name) ? this.tools.get(name) : undefined;
  }

  getAllTools(): BaseTool[] {
    return Array.from(this.tools.values());
  }

  /**
   * Function definitions for every registered tool, in registration order
   */
  getFunctionDefinitions(): FunctionDefinition[] {
    return this.getAllTools().map(tool => tool.getFunctionDefinition());
  }

  /**
   * Validate and run one tool call
   */
  async dispatch(toolCall: ToolCall, context: DispatchContext): Promise<ToolResult> {
    const startTime = Date.now();
    const { activityStream } = context;

    activityStream.record(ActivityEventType.TOOL_DISPATCH, {
      call_id: toolCall.id,
      tool: toolCall.name,
      arguments: toolCall.arguments,
    });

    const outcome = await this.runCall(toolCall, context);
    const result = toToolResult(toolCall.id, outcome);

    activityStream.record(ActivityEventType.TOOL_RESULT, {
      call_id: toolCall.id,
      tool: toolCall.name,
      is_error: result.is_error,
      error_type: outcome.error_type,
      duration_ms: Date.now() - startTime,
    });
    logger.debug(
      `[TOOL_MANAGER] ${toolCall.name} (${toolCall.id}) ${result.is_error ? 'failed' : 'succeeded'} in ${Date.now() - startTime}ms`
    );

    return result;
  }

  private async runCall(toolCall: ToolCall, context: DispatchContext): Promise<ToolOutcome> {
    const tool = this.getTool(toolCall.name);
    if (!tool) {
      const error = new ToolUnknown(toolCall.name);
      return {
        success: false,
        content: '',
        error: error.message,
        error_type: 'unknown_tool',
        suggestion: `Available tools: ${Array.from(this.tools.keys()).join(', ')}`,
      };
    }

    const validation = this.validator.validateArguments(tool, toolCall.arguments);
    if (!validation.valid) {
      return createStructuredError(
        validation.error,
        validation.error_type ?? 'validation_error',
        tool.name,
        toolCall.arguments,
        validation.suggestion
      );
    }

    return this.executeWithTimeout(tool, toolCall, context);
  }

  /**
   * Run the tool on its own AbortController. The controller fires when the
   * turn signal fires or when `tool_timeout_ms` elapses; either way the call
   * resolves at once with an error outcome. Time spent in
   * `outsideTimeout` (approval prompts) does not count toward the timeout.
   */
  private async executeWithTimeout(tool: BaseTool, toolCall: ToolCall, context: DispatchContext): Promise<ToolOutcome> {
    const controller = new AbortController();
    const parent = context.signal;
    const timeoutMs = context.config.tool_timeout_ms;

    const onParentAbort = () => controller.abort(parent?.reason ?? new OperationCancelled());
    if (parent?.aborted) {
      onParentAbort();
    } else {
      parent?.addEventListener('abort', onParentAbort, { once: true });
    }

    const deadline = new PausableTimeout(timeoutMs, () => {
      logger.warn(`[TOOL_MANAGER] ${tool.name} exceeded ${timeoutMs}ms, aborting`);
      controller.abort(new ToolTimeout(tool.name, timeoutMs));
    });
    try {
      if (controller.signal.aborted) {
        return this.abortOutcome(tool, toolCall.arguments, controller.signal.reason);
      }

      const aborted = new Promise<ToolOutcome>(resolve => {
        controller.signal.addEventListener(
          'abort',
          () => resolve(this.abortOutcome(tool, toolCall.arguments, controller.signal.reason)),
          { once: true }
        );
      });

      const outsideTimeout = async <T>(work: () => Promise<T>): Promise<T> => {
        deadline.pause();
        try {
          return await work();
        } finally {
          if (!controller.signal.aborted) {
            deadline.resume();
          }
        }
      };

      deadline.resume();

      const toolContext: ToolContext = {
        policy: context.policy,
        sessionTrust: context.sessionTrust,
        activityStream: context.activityStream,
        config: context.config,
        approvalHandler: context.approvalHandler,
        callId: toolCall.id,
        signal: controller.signal,
        outsideTimeout,
      };

      return await Promise.race([tool.execute(toolCall.arguments, toolContext), aborted]);
    } finally {
      deadline.stop();
      parent?.removeEventListener('abort', onParentAbort);
    }
  }

  private abortOutcome(tool: BaseTool, args: ToolArguments, reason: unknown): ToolOutcome {
    if (reason instanceof ToolTimeout) {
      return createStructuredError(
        reason.message,
        'timeout_error',
        tool.name,
        args,
        'Narrow the operation or raise "tool_timeout_ms" in the configuration'
      );
    }
    return createStructuredError('Tool execution interrupted', 'interrupted', tool.name, args);
  }
}
