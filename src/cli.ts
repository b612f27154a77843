#!/usr/bin/env node
/**
 * Bastion CLI Entry Point
 *
 * Parses arguments, loads configuration, and either runs one agent turn or
 * scans a skill directory. The process exit code reports how the turn ended.
 */

import chalk from 'chalk';
import { CommanderError } from 'commander';
import { ArgumentParser, type CLIOptions } from './cli/ArgumentParser.js';
import { TerminalApprovalHandler } from './cli/ApprovalPrompt.js';
import { TurnReporter } from './cli/TurnReporter.js';
import { ConfigError, ConfigManager } from './services/ConfigManager.js';
import { ActivityStream } from './services/ActivityStream.js';
import { logger, Logger, LogLevel } from './services/Logger.js';
import { buildSecurityPolicy } from './security/SecurityPolicy.js';
import { SessionTrust } from './security/SessionTrust.js';
import { SkillScanner, enforceSkillPolicy, generateSecurityReport } from './security/SkillScanner.js';
import { ChatCompletionsClient } from './llm/ChatCompletionsClient.js';
import { ToolManager } from './tools/ToolManager.js';
import { createDefaultTools } from './tools/index.js';
import { Agent, exitCodeFor, type TurnOutcome } from './agent/Agent.js';
import { buildSystemMessage } from './prompts/systemMessages.js';
import { EXIT_CODES } from './config/constants.js';
import { formatError } from './utils/errorUtils.js';

const RECENT_LOG_LINES = 20;

/**
 * Show buffered log lines the current level kept off the terminal
 */
function printRecentLogs(): void {
  if (logger.getLevel() >= LogLevel.DEBUG) {
    return;
  }
  const entries = logger.getRecentLogs(RECENT_LOG_LINES, LogLevel.DEBUG);
  if (entries.length > 0) {
    process.stderr.write(chalk.dim(`Recent log:\n${entries.map(Logger.formatEntry).join('\n')}\n`));
  }
}

function printOutcome(outcome: TurnOutcome): void {
  switch (outcome.reason) {
    case 'completed':
      process.stdout.write(`${outcome.text ?? ''}\n`);
      break;
    case 'exhausted':
      process.stderr.write(chalk.yellow(`${outcome.error?.message ?? 'Iteration limit reached'}\n`));
      break;
    case 'failed': {
      const prefix = outcome.failure === 'turn_timeout' ? 'Turn timed out' : 'Request failed';
      process.stderr.write(chalk.red(`${prefix}: ${outcome.error?.message ?? 'unknown error'}\n`));
      if (outcome.failure === 'internal') {
        printRecentLogs();
      }
      break;
    }
    case 'cancelled':
      process.stderr.write(chalk.yellow('Cancelled\n'));
      break;
  }
}

async function runRequest(options: CLIOptions): Promise<number> {
  const configManager = new ConfigManager(options.config);
  const config = await configManager.initialize(ArgumentParser.toConfigOverrides(options));
  const policy = buildSecurityPolicy(config, process.cwd());

  const activityStream = new ActivityStream();
  const reporter = new TurnReporter();
  if (!options.quiet) {
    reporter.attach(activityStream);
  }

  const apiKey = config.api_key_env ? process.env[config.api_key_env] : undefined;
  const modelClient = new ChatCompletionsClient({
    endpoint: config.endpoint,
    modelName: config.model,
    apiKey,
    temperature: config.temperature,
    maxTokens: config.max_tokens,
    systemPrompt: buildSystemMessage(policy),
  });

  const agent = new Agent({
    modelClient,
    toolManager: new ToolManager(createDefaultTools()),
    config,
    policy,
    sessionTrust: new SessionTrust(),
    activityStream,
    approvalHandler: new TerminalApprovalHandler(),
  });

  // First Ctrl+C cancels the turn; a second one exits immediately
  const controller = new AbortController();
  const onSigint = () => {
    if (controller.signal.aborted) {
      process.exit(EXIT_CODES.CANCELLED);
    }
    process.stderr.write(chalk.dim('\nCancelling...\n'));
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  try {
    logger.verbose(`[CLI] Model ${config.model} at ${config.endpoint}, cwd ${policy.working_directory}`);
    const outcome = await agent.runTurn(options.request, controller.signal);
    printOutcome(outcome);
    return exitCodeFor(outcome.reason);
  } finally {
    process.off('SIGINT', onSigint);
    reporter.detach();
    activityStream.cleanup();
  }
}

async function scanSkill(options: CLIOptions): Promise<number> {
  const result = await new SkillScanner().scan(options.skillDir ?? '.');
  process.stdout.write(generateSecurityReport(result));

  const verdict = enforceSkillPolicy(result, { allowSuspicious: options.allowSuspicious });
  return verdict.allowed ? EXIT_CODES.COMPLETED : EXIT_CODES.FAILED;
}

async function main(): Promise<number> {
  const parser = new ArgumentParser();
  let options: CLIOptions;
  try {
    options = parser.parse(process.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.COMPLETED : EXIT_CODES.USAGE;
    }
    throw error;
  }

  logger.configure({ verbose: options.verbose, debug: options.debug, quiet: options.quiet });

  if (options.command === 'scan-skill') {
    return scanSkill(options);
  }

  if (!options.request) {
    process.stderr.write(parser.getUsage());
    return EXIT_CODES.USAGE;
  }

  try {
    return await runRequest(options);
  } catch (error) {
    if (error instanceof ConfigError) {
      process.stderr.write(chalk.red(`Configuration error: ${error.message}\n`));
      return EXIT_CODES.USAGE;
    }
    throw error;
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(chalk.red(`Fatal error: ${formatError(error)}\n`));
    logger.debug('[CLI] Fatal error:', error);
    printRecentLogs();
    process.exitCode = EXIT_CODES.FAILED;
  });
