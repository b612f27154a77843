/**
 * Tests for ArgumentParser
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { CommanderError } from 'commander';
import { ArgumentParser, type CLIOptions } from '../ArgumentParser.js';

function parseError(parser: ArgumentParser, argv: string[]): unknown {
  try {
    parser.parse(argv);
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('ArgumentParser', () => {
  let parser: ArgumentParser;

  beforeEach(() => {
    parser = new ArgumentParser();
  });

  describe('Request', () => {
    it('should join the request words', () => {
      const options = parser.parse(['node', 'bastion', 'list', 'the', 'files']);
      expect(options.command).toBe('run');
      expect(options.request).toBe('list the files');
    });

    it('should leave the request empty when none is given', () => {
      const options = parser.parse(['node', 'bastion']);
      expect(options.command).toBe('run');
      expect(options.request).toBe('');
    });

    it('should accept options after the request', () => {
      const options = parser.parse(['node', 'bastion', 'summarize', 'README.md', '--model', 'llama3']);
      expect(options.request).toBe('summarize README.md');
      expect(options.model).toBe('llama3');
    });
  });

  describe('Model Settings', () => {
    it('should parse model flags', () => {
      const options = parser.parse([
        'node',
        'bastion',
        '--model',
        'qwen2.5:7b',
        '--endpoint',
        'http://localhost:8080/v1',
        '--temperature',
        '0.7',
        '--max-tokens',
        '1024',
        'hi',
      ]);
      expect(options.model).toBe('qwen2.5:7b');
      expect(options.endpoint).toBe('http://localhost:8080/v1');
      expect(options.temperature).toBe(0.7);
      expect(options.maxTokens).toBe(1024);
    });
  });

  describe('Loop limits', () => {
    it('should parse integer limits', () => {
      const options = parser.parse([
        'node',
        'bastion',
        '--max-iterations',
        '5',
        '--tool-timeout',
        '30000',
        '--turn-timeout',
        '0',
        'hi',
      ]);
      expect(options.maxIterations).toBe(5);
      expect(options.toolTimeout).toBe(30000);
      expect(options.turnTimeout).toBe(0);
    });

    it('should reject a non-integer limit', () => {
      const error = parseError(parser, ['node', 'bastion', '--max-iterations', 'many', 'hi']);
      expect(error).toBeInstanceOf(CommanderError);
      if (error instanceof CommanderError) {
        expect(error.code).toBe('commander.invalidArgument');
        expect(error.exitCode).toBe(1);
      }
    });
  });

  describe('Security', () => {
    it('should default to approval on and no extra roots', () => {
      const options = parser.parse(['node', 'bastion', 'hi']);
      expect(options.trust).toEqual([]);
      expect(options.allowPath).toEqual([]);
      expect(options.noApproval).toBe(false);
      expect(options.allowSuspicious).toBe(false);
    });

    it('should collect repeated roots and flags', () => {
      const options = parser.parse([
        'node',
        'bastion',
        '--trust',
        '/srv/app',
        '--trust',
        '/srv/lib',
        '--allow-path',
        '/data',
        '--no-approval',
        '--allow-suspicious',
        'hi',
      ]);
      expect(options.trust).toEqual(['/srv/app', '/srv/lib']);
      expect(options.allowPath).toEqual(['/data']);
      expect(options.noApproval).toBe(true);
      expect(options.allowSuspicious).toBe(true);
    });
  });

  describe('Logging', () => {
    it('should parse logging flags', () => {
      const options = parser.parse(['node', 'bastion', '-v', '--debug', '-q', 'hi']);
      expect(options.verbose).toBe(true);
      expect(options.debug).toBe(true);
      expect(options.quiet).toBe(true);
    });
  });

  describe('scan-skill', () => {
    it('should parse the skill directory', () => {
      const options = parser.parse(['node', 'bastion', 'scan-skill', './skills/report']);
      expect(options.command).toBe('scan-skill');
      expect(options.skillDir).toBe('./skills/report');
      expect(options.request).toBe('');
    });

    it('should require the directory', () => {
      const error = parseError(parser, ['node', 'bastion', 'scan-skill']);
      expect(error).toBeInstanceOf(CommanderError);
      if (error instanceof CommanderError) {
        expect(error.code).toBe('commander.missingArgument');
      }
    });
  });

  describe('Errors', () => {
    it('should throw on unknown options', () => {
      const error = parseError(parser, ['node', 'bastion', '--colour', 'blue', 'hi']);
      expect(error).toBeInstanceOf(CommanderError);
      if (error instanceof CommanderError) {
        expect(error.code).toBe('commander.unknownOption');
      }
    });
  });

  describe('toConfigOverrides', () => {
    it('should map options to configuration keys', () => {
      const options = parser.parse([
        'node',
        'bastion',
        '--model',
        'llama3',
        '--max-iterations',
        '4',
        '--trust',
        '/srv/app',
        '--no-approval',
        'hi',
      ]);

      expect(ArgumentParser.toConfigOverrides(options)).toEqual({
        model: 'llama3',
        endpoint: undefined,
        temperature: undefined,
        max_tokens: undefined,
        max_iterations: 4,
        tool_timeout_ms: undefined,
        turn_timeout_ms: undefined,
        trusted_roots: ['/srv/app'],
        require_approval: false,
      });
    });

    it('should leave out empty lists and unset flags', () => {
      const options: CLIOptions = {
        command: 'run',
        request: 'hi',
        trust: [],
        allowPath: [],
        noApproval: false,
        allowSuspicious: true,
      };
      const overrides = ArgumentParser.toConfigOverrides(options);

      expect(overrides).not.toHaveProperty('trusted_roots');
      expect(overrides).not.toHaveProperty('external_allowed_roots');
      expect(overrides).not.toHaveProperty('require_approval');
      expect(overrides.allow_suspicious_commands).toBe(true);
    });
  });

  it('should describe usage', () => {
    expect(parser.getUsage()).toContain('Usage: bastion');
  });
});
