/**
 * Agent - Bounded tool-calling loop for one user request
 *
 * States: awaiting_model -> executing_tools -> awaiting_model -> ... -> terminated.
 * A turn ends as completed (model answered without tool calls), exhausted
 * (iteration cap), failed (unrecoverable model/network error or turn time
 * budget) or cancelled (caller's signal).
 *
 * Every tool call the model issues gets exactly one result in the
 * conversation before the next model request, including calls that were
 * never started because the turn was cancelled.
 */

import type { ModelClient, ModelResponse } from '../llm/ModelClient.js';
import { notExecutedResult, type ToolManager } from '../tools/ToolManager.js';
import { ActivityStream } from '../services/ActivityStream.js';
import { SessionTrust } from '../security/SessionTrust.js';
import { createRateLimiter, type RateLimiter } from '../network/RateLimiter.js';
import { callWithRetry, retryOptionsFromConfig } from '../network/RetryPolicy.js';
import {
  IterationLimitReached,
  NetworkError,
  OperationCancelled,
  RetriesExhausted,
} from '../errors/AgentError.js';
import {
  ActivityEventType,
  type ApprovalHandler,
  type Config,
  type ConversationTurn,
  type SecurityPolicy,
  type ToolCall,
} from '../types/index.js';
import { EXIT_CODES } from '../config/constants.js';
import { logger } from '../services/Logger.js';
import { formatError } from '../utils/errorUtils.js';
import { generateId } from '../utils/id.js';
import { cancellationFrom, type SleepFn } from '../utils/sleep.js';
import { Conversation } from './Conversation.js';

export type AgentState = 'idle' | 'awaiting_model' | 'executing_tools' | 'terminated';

export type TerminationReason = 'completed' | 'exhausted' | 'failed' | 'cancelled';

export type FailureKind = 'turn_timeout' | 'network' | 'internal';

export interface TurnOutcome {
  reason: TerminationReason;
  /** Model round trips that requested tools */
  iterations: number;
  /** Final assistant text (completed turns) */
  text?: string;
  error?: Error;
  /** Set when reason is 'failed' */
  failure?: FailureKind;
  conversation: readonly ConversationTurn[];
}

export interface AgentOptions {
  modelClient: ModelClient;
  toolManager: ToolManager;
  config: Readonly<Config>;
  policy: SecurityPolicy;
  sessionTrust?: SessionTrust;
  activityStream?: ActivityStream;
  approvalHandler?: ApprovalHandler;
  /** Defaults to the limiter selected by `rate_limit_scope` */
  rateLimiter?: RateLimiter;
  /** Backoff sleep and jitter source, replaceable in tests */
  sleep?: SleepFn;
  random?: () => number;
}

/**
 * Process exit code for a terminated turn
 */
export function exitCodeFor(reason: TerminationReason): number {
  switch (reason) {
    case 'completed':
      return EXIT_CODES.COMPLETED;
    case 'exhausted':
      return EXIT_CODES.EXHAUSTED;
    case 'cancelled':
      return EXIT_CODES.CANCELLED;
    case 'failed':
      return EXIT_CODES.FAILED;
  }
}

export class Agent {
  readonly instanceId: string;

  private readonly modelClient: ModelClient;
  private readonly toolManager: ToolManager;
  private readonly config: Readonly<Config>;
  private readonly policy: SecurityPolicy;
  private readonly sessionTrust: SessionTrust;
  private readonly activityStream: ActivityStream;
  private readonly approvalHandler?: ApprovalHandler;
  private readonly rateLimiter: RateLimiter;
  private readonly sleep?: SleepFn;
  private readonly random?: () => number;

  private state: AgentState = 'idle';

  constructor(options: AgentOptions) {
    this.instanceId = generateId('agent');
    this.modelClient = options.modelClient;
    this.toolManager = options.toolManager;
    this.config = options.config;
    this.policy = options.policy;
    this.sessionTrust = options.sessionTrust ?? new SessionTrust();
    this.activityStream = options.activityStream ?? new ActivityStream();
    this.approvalHandler = options.approvalHandler;
    this.rateLimiter = options.rateLimiter ?? createRateLimiter(this.config);
    this.sleep = options.sleep;
    this.random = options.random;

    logger.debug('[AGENT]', this.instanceId, 'Created for model', this.modelClient.modelName);
  }

  getState(): AgentState {
    return this.state;
  }

  /**
   * Run one user request to termination. Never throws for loop failures;
   * the outcome carries the reason and the error.
   */
  async runTurn(userText: string, signal?: AbortSignal): Promise<TurnOutcome> {
    if (this.state === 'awaiting_model' || this.state === 'executing_tools') {
      throw new Error('Agent is already running a turn');
    }

    const controller = new AbortController();
    const onExternalAbort = () => controller.abort(new OperationCancelled('cancelled'));
    if (signal?.aborted) {
      onExternalAbort();
    } else {
      signal?.addEventListener('abort', onExternalAbort, { once: true });
    }

    const turnTimeoutMs = this.config.turn_timeout_ms;
    const turnTimer =
      turnTimeoutMs > 0
        ? setTimeout(() => {
            logger.warn(`[AGENT] Turn exceeded ${turnTimeoutMs}ms, cancelling`);
            controller.abort(new OperationCancelled('turn_timeout'));
          }, turnTimeoutMs)
        : undefined;

    const conversation = new Conversation();
    conversation.appendUser(userText);

    const progress = { iterations: 0 };
    let outcome: TurnOutcome;
    try {
      outcome = await this.loop(conversation, controller.signal, progress);
    } catch (error) {
      outcome = this.outcomeForError(error, progress.iterations, conversation);
    } finally {
      if (turnTimer) {
        clearTimeout(turnTimer);
      }
      signal?.removeEventListener('abort', onExternalAbort);
      this.state = 'terminated';
    }

    this.activityStream.record(ActivityEventType.LOOP_TERMINATED, {
      reason: outcome.reason,
      iterations: outcome.iterations,
      failure: outcome.failure,
      error: outcome.error?.message,
    });
    logger.debug('[AGENT]', this.instanceId, `Turn ${outcome.reason} after ${outcome.iterations} iterations`);

    return outcome;
  }

  private async loop(
    conversation: Conversation,
    signal: AbortSignal,
    progress: { iterations: number }
  ): Promise<TurnOutcome> {
    const tools = this.toolManager.getFunctionDefinitions();

    for (;;) {
      this.state = 'awaiting_model';
      if (signal.aborted) {
        throw cancellationFrom(signal);
      }

      const response = await this.requestModel(conversation, tools, signal);
      conversation.appendAssistant(response.text, response.tool_calls);

      if (response.tool_calls.length === 0) {
        if (response.finish_reason === 'tool_calls') {
          logger.debug('[AGENT] finish_reason was tool_calls but the response carried none');
        }
        return {
          reason: 'completed',
          iterations: progress.iterations,
          text: response.text ?? '',
          conversation: conversation.getTurns(),
        };
      }

      if (response.finish_reason !== 'tool_calls') {
        logger.debug(`[AGENT] Response has tool calls with finish_reason "${response.finish_reason}"`);
      }

      progress.iterations++;
      this.state = 'executing_tools';
      await this.executeToolCalls(response.tool_calls, conversation, signal);

      if (signal.aborted) {
        throw cancellationFrom(signal);
      }

      if (progress.iterations >= this.config.max_iterations) {
        const error = new IterationLimitReached(progress.iterations);
        logger.warn(`[AGENT] ${error.message}`);
        return {
          reason: 'exhausted',
          iterations: progress.iterations,
          error,
          conversation: conversation.getTurns(),
        };
      }
    }
  }

  private async requestModel(
    conversation: Conversation,
    tools: ReturnType<ToolManager['getFunctionDefinitions']>,
    signal: AbortSignal
  ): Promise<ModelResponse> {
    const estimatedTokens = conversation.estimateTokens() + this.config.max_tokens;

    const response = await callWithRetry(
      attemptSignal => this.modelClient.send(conversation.getTurns(), tools, attemptSignal),
      {
        ...retryOptionsFromConfig(this.config),
        rateLimiter: this.rateLimiter,
        estimatedTokens,
        usageOf: (result: ModelResponse) => result.usage?.total_tokens,
        signal,
        activityStream: this.activityStream,
        label: 'model request',
        sleep: this.sleep,
        random: this.random,
      }
    );

    this.activityStream.record(ActivityEventType.MODEL_RESPONSE, {
      agent_id: this.instanceId,
      tool_calls: response.tool_calls.map(call => ({ id: call.id, name: call.name })),
      finish_reason: response.finish_reason,
      usage: response.usage,
    });

    return response;
  }

  /**
   * Dispatch calls in the order the model gave them. Once the turn is
   * cancelled the remaining calls are answered with "not executed".
   */
  private async executeToolCalls(calls: ToolCall[], conversation: Conversation, signal: AbortSignal): Promise<void> {
    for (const call of calls) {
      if (signal.aborted) {
        const reason = cancellationFrom(signal).reason === 'turn_timeout' ? 'turn time budget exceeded' : 'turn cancelled';
        conversation.appendToolResult(notExecutedResult(call, reason));
        continue;
      }

      const result = await this.toolManager.dispatch(call, {
        policy: this.policy,
        sessionTrust: this.sessionTrust,
        activityStream: this.activityStream,
        config: this.config,
        approvalHandler: this.approvalHandler,
        signal,
      });
      conversation.appendToolResult(result);
    }
  }

  private outcomeForError(error: unknown, iterations: number, conversation: Conversation): TurnOutcome {
    const base = { iterations, conversation: conversation.getTurns() };

    if (error instanceof OperationCancelled) {
      if (error.reason === 'turn_timeout') {
        return { ...base, reason: 'failed', failure: 'turn_timeout', error };
      }
      return { ...base, reason: 'cancelled', error };
    }

    if (error instanceof NetworkError || error instanceof RetriesExhausted) {
      logger.error(`[AGENT] Model request failed: ${error.message}`);
      return { ...base, reason: 'failed', failure: 'network', error };
    }

    logger.error('[AGENT] Unexpected error in agent loop:', error);
    return {
      ...base,
      reason: 'failed',
      failure: 'internal',
      error: error instanceof Error ? error : new Error(formatError(error)),
    };
  }
}
