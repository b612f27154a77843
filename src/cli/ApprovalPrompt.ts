/**
 * ApprovalPrompt - Terminal approval surface for external paths
 *
 * Asks once per access. "Trust for this session" is recorded by the caller
 * through SessionTrust. Without a terminal every request is denied. An
 * open prompt is closed when the call's signal fires.
 */

import inquirer from 'inquirer';
import chalk from 'chalk';
import type { ApprovalHandler, ApprovalOutcome } from '../types/index.js';
import { logger } from '../services/Logger.js';
import { cancellationFrom, throwIfCancelled } from '../utils/sleep.js';

export type ApprovalPromptFn = (path: string, toolName: string, signal?: AbortSignal) => Promise<ApprovalOutcome>;

export interface ApprovalPromptOptions {
  /** Defaults to whether stdin and stderr are terminals */
  interactive?: boolean;
  prompt?: ApprovalPromptFn;
}

async function promptWithInquirer(path: string, toolName: string, signal?: AbortSignal): Promise<ApprovalOutcome> {
  throwIfCancelled(signal);
  const pending = inquirer.prompt<{ decision: ApprovalOutcome }>([
    {
      type: 'list',
      name: 'decision',
      message: `${chalk.yellow(toolName)} wants to access ${chalk.bold(path)}, outside the trusted roots`,
      choices: [
        { name: 'Allow once', value: 'allow_once' },
        { name: 'Trust this path for the rest of the session', value: 'trust_always' },
        { name: 'Deny', value: 'deny' },
      ],
      default: 'deny',
    },
  ]);
  if (!signal) {
    return (await pending).decision;
  }

  // Closing the prompt releases stdin; the pending answer never settles after that
  return new Promise<ApprovalOutcome>((resolve, reject) => {
    const onAbort = () => {
      pending.ui.rl.close();
      reject(cancellationFrom(signal));
    };
    signal.addEventListener('abort', onAbort, { once: true });
    pending.then(
      answers => {
        signal.removeEventListener('abort', onAbort);
        resolve(answers.decision);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class TerminalApprovalHandler implements ApprovalHandler {
  private readonly interactive: boolean;
  private readonly prompt: ApprovalPromptFn;

  constructor(options: ApprovalPromptOptions = {}) {
    this.interactive = options.interactive ?? Boolean(process.stdin.isTTY && process.stderr.isTTY);
    this.prompt = options.prompt ?? promptWithInquirer;
  }

  async requestApproval(path: string, toolName: string, signal?: AbortSignal): Promise<ApprovalOutcome> {
    if (!this.interactive) {
      logger.warn(`[APPROVAL] No terminal to ask about ${path}; denying`);
      return 'deny';
    }
    throwIfCancelled(signal);
    const decision = await this.prompt(path, toolName, signal);
    logger.verbose(`[APPROVAL] ${toolName} ${path}: ${decision}`);
    return decision;
  }
}
