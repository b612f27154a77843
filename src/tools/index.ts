/**
 * Tool System Exports
 *
 * Central export point for all tool-related classes and utilities.
 */

import { BaseTool } from './BaseTool.js';
import { ReadFileTool } from './ReadFileTool.js';
import { WriteFileTool } from './WriteFileTool.js';
import { ReplaceTool } from './ReplaceTool.js';
import { ListDirectoryTool } from './ListDirectoryTool.js';
import { GlobSearchTool } from './GlobSearchTool.js';
import { SearchFileContentTool } from './SearchFileContentTool.js';
import { ShellTool } from './ShellTool.js';
import { WebSearchTool } from './WebSearchTool.js';
import { WebFetchTool } from './WebFetchTool.js';
import { SaveMemoryTool } from './SaveMemoryTool.js';
import type { FetchFn } from '../network/fetchText.js';

export { BaseTool, ToolError, type SessionContext, type ToolContext } from './BaseTool.js';
export { ToolManager, toToolResult, notExecutedResult, type DispatchContext } from './ToolManager.js';
export { ToolValidator, type ValidationResult } from './ToolValidator.js';
export {
  ReadFileTool,
  WriteFileTool,
  ReplaceTool,
  ListDirectoryTool,
  GlobSearchTool,
  SearchFileContentTool,
  ShellTool,
  WebSearchTool,
  WebFetchTool,
  SaveMemoryTool,
};

export interface DefaultToolOptions {
  memoryFile?: string;
  fetchImpl?: FetchFn;
}

/**
 * One instance of every built-in tool
 */
export function createDefaultTools(options: DefaultToolOptions = {}): BaseTool[] {
  return [
    new ReadFileTool(),
    new WriteFileTool(),
    new ReplaceTool(),
    new ListDirectoryTool(),
    new GlobSearchTool(),
    new SearchFileContentTool(),
    new ShellTool(),
    new WebSearchTool(options.fetchImpl),
    new WebFetchTool(options.fetchImpl),
    new SaveMemoryTool(options.memoryFile),
  ];
}
