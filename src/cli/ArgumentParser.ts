/**
 * ArgumentParser - CLI argument parsing
 *
 *   bastion [options] <request...>     run one agent turn
 *   bastion scan-skill <dir>           print a skill security report
 *
 * Commander is set to throw instead of exiting so callers decide the exit
 * code (and tests can assert on usage errors).
 */

import { Command, InvalidArgumentError } from 'commander';

export type CLICommand = 'run' | 'scan-skill';

export interface CLIOptions {
  command: CLICommand;
  /** Request text for 'run', words joined with spaces */
  request: string;
  /** Skill directory for 'scan-skill' */
  skillDir?: string;

  // Configuration
  config?: string;

  // Model settings
  model?: string;
  endpoint?: string;
  temperature?: number;
  maxTokens?: number;

  // Loop limits
  maxIterations?: number;
  toolTimeout?: number;
  turnTimeout?: number;

  // Security
  trust: string[];
  allowPath: string[];
  noApproval: boolean;
  allowSuspicious: boolean;

  // Logging
  verbose?: boolean;
  debug?: boolean;
  quiet?: boolean;
}

interface RawOptions {
  config?: string;
  model?: string;
  endpoint?: string;
  temperature?: number;
  maxTokens?: number;
  maxIterations?: number;
  toolTimeout?: number;
  turnTimeout?: number;
  trust: string[];
  allowPath: string[];
  approval: boolean;
  allowSuspicious?: boolean;
  verbose?: boolean;
  debug?: boolean;
  quiet?: boolean;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}".`);
  }
  return parsed;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export class ArgumentParser {
  private program: Command;
  private command: CLICommand = 'run';
  private requestWords: string[] = [];
  private skillDir?: string;

  constructor() {
    this.program = new Command();
    this.setupArguments();
  }

  private setupArguments(): void {
    this.program
      .name('bastion')
      .description('Bastion - run a tool-using AI agent inside a security boundary')
      .version('0.1.0')
      .exitOverride()
      .argument('[request...]', 'What the agent should do')
      .action((words: string[]) => {
        this.command = 'run';
        this.requestWords = words;
      });

    this.program
      .option('-c, --config <file>', 'Configuration file (default: ~/.bastion/config.json)');

    // Model Settings
    this.program
      .option('--model <name>', 'Model name sent to the endpoint')
      .option('--endpoint <url>', 'OpenAI-compatible API base URL')
      .option('--temperature <float>', 'Sampling temperature', parseFloat)
      .option('--max-tokens <int>', 'Maximum tokens per model response', parseInteger);

    // Loop limits
    this.program
      .option('--max-iterations <int>', 'Tool round trips allowed per request', parseInteger)
      .option('--tool-timeout <ms>', 'Time limit for each tool call', parseInteger)
      .option('--turn-timeout <ms>', 'Time limit for the whole request (0 = none)', parseInteger);

    // Security
    this.program
      .option('--trust <dir>', 'Add a trusted root (repeatable)', collect, [])
      .option('--allow-path <dir>', 'Allow access outside trusted roots, with approval (repeatable)', collect, [])
      .option('--no-approval', 'Do not ask before accessing allowed external paths')
      .option('--allow-suspicious', 'Run shell commands classified as Suspicious');

    // Logging
    this.program
      .option('-v, --verbose', 'Enable verbose logging')
      .option('--debug', 'Enable debug logging')
      .option('-q, --quiet', 'Only log errors');

    this.program
      .command('scan-skill')
      .description('Scan a skill directory and print its security report')
      .argument('<dir>', 'Skill directory containing SKILL.md')
      .action((dir: string) => {
        this.command = 'scan-skill';
        this.skillDir = dir;
      });
  }

  /**
   * Parse command-line arguments
   *
   * @param argv - Process arguments (defaults to process.argv)
   * @throws CommanderError on usage errors, --help and --version
   */
  parse(argv: string[] = process.argv): CLIOptions {
    this.program.parse(argv);
    const opts = this.program.opts<RawOptions>();

    return {
      command: this.command,
      request: this.requestWords.join(' ').trim(),
      skillDir: this.skillDir,

      config: opts.config,

      model: opts.model,
      endpoint: opts.endpoint,
      temperature: opts.temperature,
      maxTokens: opts.maxTokens,

      maxIterations: opts.maxIterations,
      toolTimeout: opts.toolTimeout,
      turnTimeout: opts.turnTimeout,

      trust: opts.trust,
      allowPath: opts.allowPath,
      noApproval: opts.approval === false,
      allowSuspicious: opts.allowSuspicious === true,

      verbose: opts.verbose,
      debug: opts.debug,
      quiet: opts.quiet,
    };
  }

  /**
   * Configuration keys set on the command line
   */
  static toConfigOverrides(options: CLIOptions): Record<string, unknown> {
    const overrides: Record<string, unknown> = {
      model: options.model,
      endpoint: options.endpoint,
      temperature: options.temperature,
      max_tokens: options.maxTokens,
      max_iterations: options.maxIterations,
      tool_timeout_ms: options.toolTimeout,
      turn_timeout_ms: options.turnTimeout,
    };
    if (options.trust.length > 0) {
      overrides.trusted_roots = options.trust;
    }
    if (options.allowPath.length > 0) {
      overrides.external_allowed_roots = options.allowPath;
    }
    if (options.noApproval) {
      overrides.require_approval = false;
    }
    if (options.allowSuspicious) {
      overrides.allow_suspicious_commands = true;
    }
    return overrides;
  }

  getUsage(): string {
    return this.program.helpInformation();
  }
}
