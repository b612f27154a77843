/**
 * ShellTool - Run a shell command after threat classification
 *
 * The command text is classified before anything runs. Dangerous commands
 * never execute; Suspicious ones only with `allow_suspicious_commands`. The
 * child gets a whitelisted environment and its own process group so an abort
 * can take down everything it started.
 */

import { spawn, type ChildProcess } from 'child_process';
import { BaseTool, ToolError, type ToolContext } from './BaseTool.js';
import {
  ActivityEventType,
  type ParameterSchema,
  type ToolArguments,
  type ToolOutcome,
} from '../types/index.js';
import { classifyThreat, enforceThreatPolicy, THREAT_LEVEL_LABELS } from '../security/ThreatClassifier.js';
import { TOOL_LIMITS } from '../config/constants.js';
import { logger } from '../services/Logger.js';

/**
 * Environment variables passed through to commands. Everything else
 * (API keys, tokens) stays in this process.
 */
export const SAFE_ENV_VARS = [
  'PATH',
  'HOME',
  'USER',
  'SHELL',
  'TERM',
  'LANG',
  'LC_ALL',
  'LC_CTYPE',
  'TMPDIR',
  'TMP',
  'TEMP',
  'NODE_ENV',
  'TZ',
  'COLORTERM',
] as const;

export function getSafeEnvironment(source: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  const safeEnv: NodeJS.ProcessEnv = {};
  for (const key of SAFE_ENV_VARS) {
    const value = source[key];
    if (value !== undefined) {
      safeEnv[key] = value;
    }
  }
  return safeEnv;
}

interface CommandResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

/**
 * Accumulates one output stream up to a character cap
 */
class OutputBuffer {
  private chunks: string[] = [];
  private length = 0;
  private truncated = false;

  constructor(private readonly maxChars: number) {}

  append(chunk: string): void {
    if (this.truncated) {
      return;
    }
    const room = this.maxChars - this.length;
    if (chunk.length > room) {
      this.chunks.push(chunk.slice(0, room));
      this.length = this.maxChars;
      this.truncated = true;
      return;
    }
    this.chunks.push(chunk);
    this.length += chunk.length;
  }

  toString(): string {
    const text = this.chunks.join('');
    return this.truncated ? `${text}\n... (output truncated)` : text;
  }
}

export class ShellTool extends BaseTool {
  readonly name = 'run_shell_command';
  readonly description =
    'Run a shell command with sh -c and return its stdout and stderr. Use non-interactive flags; stdin is closed';
  readonly parameters: Record<string, ParameterSchema> = {
    command: {
      type: 'string',
      description: 'Command line to execute',
    },
    directory: {
      type: 'string',
      description: 'Working directory for the command (default: the session working directory)',
    },
  };
  readonly required = ['command'];

  protected async executeImpl(args: ToolArguments, context: ToolContext): Promise<ToolOutcome> {
    const command = this.stringArg(args, 'command');

    const assessment = classifyThreat(command);
    const verdict = enforceThreatPolicy(assessment, 'Command', {
      allowSuspicious: context.config.allow_suspicious_commands,
    });

    if (!verdict.allowed) {
      logger.warn(`[SECURITY] ${verdict.error.message}`);
      context.activityStream.record(ActivityEventType.THREAT_BLOCKED, {
        call_id: context.callId,
        tool: this.name,
        level: THREAT_LEVEL_LABELS[verdict.level],
        reasons: assessment.reasons,
      });
      throw verdict.error;
    }

    if (verdict.warnings.length > 0) {
      context.activityStream.record(ActivityEventType.THREAT_WARNING, {
        call_id: context.callId,
        tool: this.name,
        level: THREAT_LEVEL_LABELS[verdict.level],
        reasons: verdict.warnings,
      });
    }

    const workingDir = await this.authorizePath(
      this.optionalStringArg(args, 'directory') ?? context.policy.working_directory,
      context
    );

    logger.debug(`[SHELL] Running in ${workingDir}: ${command}`);
    const result = await this.runCommand(command, workingDir, context.signal);

    if (context.signal.aborted) {
      throw new ToolError('Command interrupted', 'interrupted');
    }

    if (result.code === 0) {
      return this.formatSuccessResponse(`Stdout: ${result.stdout}\nStderr: ${result.stderr}`);
    }

    const status = result.code !== null ? `code ${result.code}` : `signal ${result.signal ?? 'unknown'}`;
    throw new ToolError(
      `Command failed with ${status}:\nStdout: ${result.stdout}\nStderr: ${result.stderr}`,
      'command_failed'
    );
  }

  private runCommand(command: string, workingDir: string, signal: AbortSignal): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const stdout = new OutputBuffer(TOOL_LIMITS.SHELL_MAX_OUTPUT_CHARS);
      const stderr = new OutputBuffer(TOOL_LIMITS.SHELL_MAX_OUTPUT_CHARS);

      const child: ChildProcess = spawn(command, {
        cwd: workingDir,
        shell: '/bin/sh',
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: process.platform !== 'win32',
        env: getSafeEnvironment(),
      });

      let killTimer: NodeJS.Timeout | undefined;
      const abortHandler = () => {
        this.killProcessGroup(child, 'SIGTERM');
        killTimer = setTimeout(() => {
          if (child.exitCode === null) {
            this.killProcessGroup(child, 'SIGKILL');
          }
        }, TOOL_LIMITS.GRACEFUL_SHUTDOWN_DELAY_MS);
      };

      if (signal.aborted) {
        abortHandler();
      } else {
        signal.addEventListener('abort', abortHandler, { once: true });
      }

      child.stdout?.on('data', (data: Buffer) => stdout.append(data.toString()));
      child.stderr?.on('data', (data: Buffer) => stderr.append(data.toString()));

      child.on('close', (code: number | null, exitSignal: NodeJS.Signals | null) => {
        signal.removeEventListener('abort', abortHandler);
        if (killTimer) {
          clearTimeout(killTimer);
        }
        resolve({ code, signal: exitSignal, stdout: stdout.toString(), stderr: stderr.toString() });
      });

      child.on('error', (error: Error) => {
        signal.removeEventListener('abort', abortHandler);
        reject(new ToolError(`Failed to execute command: ${error.message}`, 'system_error'));
      });
    });
  }

  /**
   * On Unix the negative PID reaches the whole process group
   */
  private killProcessGroup(child: ChildProcess, signal: NodeJS.Signals): void {
    if (!child.pid) return;

    try {
      if (process.platform !== 'win32') {
        process.kill(-child.pid, signal);
      } else {
        child.kill(signal);
      }
    } catch (error) {
      logger.debug('[SHELL] Error killing process:', error);
    }
  }
}
