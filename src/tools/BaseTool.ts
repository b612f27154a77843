/**
 * BaseTool - Abstract base class for all tools
 *
 * Subclasses implement `executeImpl` and either return an outcome or throw.
 * `execute` never throws: every failure is folded into an error outcome whose
 * text names the tool and its arguments.
 */

import {
  ActivityEventType,
  type ApprovalHandler,
  type Config,
  type ErrorType,
  type FunctionDefinition,
  type ParameterSchema,
  type SecurityPolicy,
  type ToolArguments,
  type ToolName,
  type ToolOutcome,
} from '../types/index.js';
import type { ActivityStream } from '../services/ActivityStream.js';
import type { SessionTrust } from '../security/SessionTrust.js';
import { validatePath } from '../security/PathValidator.js';
import {
  NetworkError,
  OperationCancelled,
  ThreatBlocked,
  ValidationDenied,
} from '../errors/AgentError.js';
import {
  createStructuredError,
  formatError,
  isDirectoryError,
  isFileNotFoundError,
  isPermissionError,
} from '../utils/errorUtils.js';
import { logger } from '../services/Logger.js';
import { throwIfCancelled } from '../utils/sleep.js';

/**
 * State shared by every call in one session
 */
export interface SessionContext {
  policy: SecurityPolicy;
  sessionTrust: SessionTrust;
  activityStream: ActivityStream;
  config: Readonly<Config>;
  approvalHandler?: ApprovalHandler;
}

/**
 * Per-call context handed to a tool
 */
export interface ToolContext extends SessionContext {
  callId: string;
  signal: AbortSignal;
  /**
   * Run `work` with the per-call timeout stopped, e.g. while a person answers
   * a prompt. Cancellation still applies.
   */
  outsideTimeout<T>(work: () => Promise<T>): Promise<T>;
}

/**
 * Expected failure raised from inside a tool
 */
export class ToolError extends Error {
  constructor(
    message: string,
    readonly errorType: ErrorType = 'system_error',
    readonly suggestion?: string
  ) {
    super(message);
    this.name = 'ToolError';
  }
}

export abstract class BaseTool {
  abstract readonly name: ToolName;

  /**
   * LLM-facing description of what the tool does
   */
  abstract readonly description: string;

  abstract readonly parameters: Record<string, ParameterSchema>;

  abstract readonly required: readonly string[];

  getFunctionDefinition(): FunctionDefinition {
    return {
      type: 'function',
      function: {
        name: this.name,
        description: this.description,
        parameters: {
          type: 'object',
          properties: this.parameters,
          required: [...this.required],
        },
      },
    };
  }

  /**
   * Run the tool. Never throws.
   */
  async execute(args: ToolArguments, context: ToolContext): Promise<ToolOutcome> {
    try {
      if (context.signal.aborted) {
        throw new OperationCancelled();
      }
      return await this.executeImpl(args, context);
    } catch (error) {
      return this.errorOutcomeFor(error, args, context.signal);
    }
  }

  protected abstract executeImpl(args: ToolArguments, context: ToolContext): Promise<ToolOutcome>;

  /**
   * Map a thrown value to an error outcome
   */
  protected errorOutcomeFor(error: unknown, args: ToolArguments, signal?: AbortSignal): ToolOutcome {
    if (error instanceof ToolError) {
      return this.formatErrorResponse(args, error.message, error.errorType, error.suggestion);
    }
    if (error instanceof ValidationDenied) {
      return this.formatErrorResponse(args, error.message, 'security_error');
    }
    if (error instanceof ThreatBlocked) {
      return this.formatErrorResponse(args, error.message, 'threat_blocked');
    }
    if (error instanceof OperationCancelled || signal?.aborted) {
      return this.formatErrorResponse(args, 'Tool execution interrupted', 'interrupted');
    }
    if (error instanceof NetworkError) {
      return this.formatErrorResponse(args, error.message, error.transient ? 'network_error' : 'http_error');
    }
    if (isFileNotFoundError(error)) {
      return this.formatErrorResponse(args, `Not found: ${formatError(error)}`, 'file_error');
    }
    if (isPermissionError(error)) {
      return this.formatErrorResponse(args, `Permission denied: ${formatError(error)}`, 'permission_denied');
    }
    if (isDirectoryError(error)) {
      return this.formatErrorResponse(args, 'Path is a directory', 'file_error', 'Use list_directory for directories');
    }

    logger.debug(`[${this.name}] Unexpected error:`, error);
    return this.formatErrorResponse(args, formatError(error), 'system_error');
  }

  /**
   * Resolve a model-supplied path and check it against the security policy,
   * asking the approval handler when the policy requires it
   *
   * @returns The canonical path
   * @throws ValidationDenied
   */
  protected async authorizePath(requestedPath: string, context: ToolContext): Promise<string> {
    const decision = validatePath(requestedPath, context.policy, context.sessionTrust);

    switch (decision.kind) {
      case 'internal':
      case 'external_allowed':
        return decision.path;

      case 'denied':
        this.reportDenial(context, requestedPath, decision.reason, decision.path);
        throw new ValidationDenied(decision.reason, decision.path ?? requestedPath);

      case 'external_needs_approval': {
        if (!context.approvalHandler) {
          const reason = 'requires approval but no approval handler is available';
          this.reportDenial(context, requestedPath, reason, decision.path);
          throw new ValidationDenied(reason, decision.path);
        }

        context.activityStream.record(ActivityEventType.APPROVAL_REQUEST, {
          call_id: context.callId,
          tool: this.name,
          path: decision.path,
        });
        const handler = context.approvalHandler;
        const approvalPath = decision.path;
        const outcome = await context.outsideTimeout(() =>
          handler.requestApproval(approvalPath, this.name, context.signal)
        );
        // A late answer for an abandoned call must not grant anything
        throwIfCancelled(context.signal);

        if (outcome === 'deny') {
          this.reportDenial(context, requestedPath, 'denied by user', decision.path);
          throw new ValidationDenied('denied by user', decision.path);
        }
        if (outcome === 'trust_always') {
          context.sessionTrust.trust(decision.path);
        }
        return decision.path;
      }
    }
  }

  private reportDenial(context: ToolContext, requested: string, reason: string, resolved?: string): void {
    logger.verbose(`[SECURITY] ${this.name} denied ${requested}: ${reason}`);
    context.activityStream.record(ActivityEventType.ACCESS_DENIED, {
      call_id: context.callId,
      tool: this.name,
      requested_path: requested,
      path: resolved,
      reason,
    });
  }

  /**
   * Read a string argument (validated as present by the dispatcher when required)
   */
  protected stringArg(args: ToolArguments, key: string): string {
    const value = args[key];
    if (typeof value !== 'string') {
      throw new ToolError(`Parameter "${key}" must be a string`, 'validation_error');
    }
    return value;
  }

  protected optionalStringArg(args: ToolArguments, key: string): string | undefined {
    const value = args[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    return this.stringArg(args, key);
  }

  protected formatErrorResponse(
    args: ToolArguments,
    errorMessage: string,
    errorType: ErrorType,
    suggestion?: string
  ): ToolOutcome {
    return createStructuredError(errorMessage, errorType, this.name, args, suggestion);
  }

  protected formatSuccessResponse(content: string): ToolOutcome {
    return { success: true, content };
  }
}
