/**
 * ToolValidator - Validates tool arguments against schemas
 *
 * Runs before a tool is executed: required parameters, declared types, and a
 * few tool-specific rules that are cheaper to reject here than mid-execution.
 */

import type { ErrorType, JsonValue, ParameterSchema, ToolArguments } from '../types/index.js';
import type { BaseTool } from './BaseTool.js';

export interface ValidationResult {
  valid: boolean;
  error?: string;
  error_type?: ErrorType;
  suggestion?: string;
}

type ToolValidationRule = (args: ToolArguments) => ValidationResult;

const MAX_COMMAND_LENGTH = 10_000;

export class ToolValidator {
  private static readonly VALIDATION_RULES: ReadonlyMap<string, ToolValidationRule> = new Map([
    ['run_shell_command', ToolValidator.validateShellArgs],
    ['search_file_content', ToolValidator.validateSearchArgs],
    ['replace', ToolValidator.validateReplaceArgs],
    ['web_fetch', ToolValidator.validateFetchArgs],
  ]);

  validateArguments(tool: BaseTool, args: ToolArguments): ValidationResult {
    for (const requiredParam of tool.required) {
      const value = args[requiredParam];
      if (value === undefined || value === null) {
        return {
          valid: false,
          error: `Missing required parameter '${requiredParam}' for ${tool.name}`,
          error_type: 'validation_error',
          suggestion: `Example: ${this.generateExample(tool)}`,
        };
      }
    }

    for (const [paramName, paramValue] of Object.entries(args)) {
      const paramSchema = tool.parameters[paramName];
      // Unknown parameters are ignored; null stands for "not given"
      if (!paramSchema || paramValue === null) {
        continue;
      }

      const typeError = this.validateType(paramValue, paramSchema);
      if (typeError) {
        return {
          valid: false,
          error: `Invalid type for parameter '${paramName}' in ${tool.name}: ${typeError}`,
          error_type: 'validation_error',
        };
      }
    }

    const toolRule = ToolValidator.VALIDATION_RULES.get(tool.name);
    return toolRule ? toolRule(args) : { valid: true };
  }

  private validateType(value: JsonValue, schema: ParameterSchema): string | undefined {
    switch (schema.type) {
      case 'string':
        return typeof value === 'string' ? undefined : `Expected string, got ${describe(value)}`;

      case 'number':
      case 'integer':
        if (typeof value !== 'number') {
          return `Expected number, got ${describe(value)}`;
        }
        if (schema.type === 'integer' && !Number.isInteger(value)) {
          return 'Expected integer, got float';
        }
        return undefined;

      case 'boolean':
        return typeof value === 'boolean' ? undefined : `Expected boolean, got ${describe(value)}`;

      case 'array': {
        if (!Array.isArray(value)) {
          return `Expected array, got ${describe(value)}`;
        }
        if (schema.items) {
          const items = schema.items;
          for (let i = 0; i < value.length; i++) {
            const item = value[i];
            const itemError = item === undefined ? undefined : this.validateType(item, items);
            if (itemError) {
              return `Array item ${i}: ${itemError}`;
            }
          }
        }
        return undefined;
      }

      case 'object':
        return typeof value === 'object' && value !== null && !Array.isArray(value)
          ? undefined
          : `Expected object, got ${describe(value)}`;
    }
  }

  private generateExample(tool: BaseTool): string {
    const params = tool.required.map(name => {
      const schema = tool.parameters[name];
      const placeholder = schema?.type === 'string' ? `"<${name}>"` : `<${name}>`;
      return `${name}=${placeholder}`;
    });
    return `${tool.name}(${params.join(', ')})`;
  }

  private static validateShellArgs(args: ToolArguments): ValidationResult {
    const command = args.command;
    if (typeof command === 'string') {
      if (command.trim().length === 0) {
        return {
          valid: false,
          error: 'command cannot be empty',
          error_type: 'validation_error',
          suggestion: 'Example: command="ls -la"',
        };
      }
      if (command.length > MAX_COMMAND_LENGTH) {
        return {
          valid: false,
          error: `command is too long (max ${MAX_COMMAND_LENGTH} characters)`,
          error_type: 'validation_error',
          suggestion: 'Write a script file and run it instead',
        };
      }
    }
    return { valid: true };
  }

  private static validateSearchArgs(args: ToolArguments): ValidationResult {
    const pattern = args.pattern;
    if (typeof pattern === 'string') {
      try {
        new RegExp(pattern);
      } catch (error) {
        return {
          valid: false,
          error: `Invalid regex pattern: ${error instanceof Error ? error.message : String(error)}`,
          error_type: 'validation_error',
          suggestion: 'Escape special characters like . * + ? [ ] ( ) { } | \\',
        };
      }
    }
    return { valid: true };
  }

  private static validateReplaceArgs(args: ToolArguments): ValidationResult {
    if (args.old_string === '') {
      return {
        valid: false,
        error: 'old_string cannot be empty',
        error_type: 'validation_error',
        suggestion: 'Use write_file to create or overwrite a whole file',
      };
    }
    const expected = args.expected_replacements;
    if (typeof expected === 'number' && expected < 1) {
      return {
        valid: false,
        error: 'expected_replacements must be at least 1',
        error_type: 'validation_error',
      };
    }
    return { valid: true };
  }

  private static validateFetchArgs(args: ToolArguments): ValidationResult {
    const url = args.url;
    if (typeof url === 'string' && !/^https?:\/\//i.test(url.trim())) {
      return {
        valid: false,
        error: 'url must start with http:// or https://',
        error_type: 'validation_error',
        suggestion: 'Example: url="https://example.com/docs"',
      };
    }
    return { valid: true };
  }
}

function describe(value: JsonValue): string {
  if (value === null) {
    return 'null';
  }
  return Array.isArray(value) ? 'array' : typeof value;
}
