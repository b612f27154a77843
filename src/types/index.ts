/**
 * Core type definitions for Bastion
 */

// ===========================
// Tool Types
// ===========================

/**
 * The closed set of tools the model may call.
 * Anything else arriving from the model is dispatched as an unknown tool.
 */
export const TOOL_NAMES = [
  'read_file',
  'write_file',
  'replace',
  'list_directory',
  'glob_search',
  'search_file_content',
  'run_shell_command',
  'web_search',
  'web_fetch',
  'save_memory',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(name: string): name is ToolName {
  return (TOOL_NAMES as readonly string[]).includes(name);
}

/**
 * JSON value accepted as a tool argument
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type ToolArguments = Record<string, JsonValue>;

/**
 * A tool invocation requested by the model.
 * The id is opaque and is echoed back unchanged in the paired ToolResult.
 */
export interface ToolCall {
  id: string;
  name: string;
  arguments: ToolArguments;
}

/**
 * The single result paired with a ToolCall
 */
export interface ToolResult {
  call_id: string;
  content: string;
  is_error: boolean;
}

export interface FunctionDefinition {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: {
      type: 'object';
      properties: Record<string, ParameterSchema>;
      required?: string[];
    };
  };
}

export interface ParameterSchema {
  type: 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';
  description?: string;
  items?: ParameterSchema;
}

export type ErrorType =
  | 'validation_error'
  | 'security_error'
  | 'permission_denied'
  | 'threat_blocked'
  | 'timeout_error'
  | 'unknown_tool'
  | 'command_failed'
  | 'network_error'
  | 'http_error'
  | 'file_error'
  | 'interrupted'
  | 'system_error';

/**
 * What a tool handler produces before the dispatcher folds it into a ToolResult
 */
export interface ToolOutcome {
  success: boolean;
  content: string;
  error?: string;
  error_type?: ErrorType;
  suggestion?: string;
}

// ===========================
// Conversation Types
// ===========================

export interface UserTurn {
  role: 'user';
  text: string;
}

export interface AssistantTurn {
  role: 'assistant';
  text?: string;
  tool_calls: ToolCall[];
}

export interface ToolTurn {
  role: 'tool';
  call_id: string;
  content: string;
  is_error: boolean;
}

export type ConversationTurn = UserTurn | AssistantTurn | ToolTurn;

// ===========================
// Activity Stream Types
// ===========================

export enum ActivityEventType {
  TOOL_DISPATCH = 'tool_dispatch',
  TOOL_RESULT = 'tool_result',
  ACCESS_DENIED = 'access_denied',
  APPROVAL_REQUEST = 'approval_request',
  THREAT_BLOCKED = 'threat_blocked',
  THREAT_WARNING = 'threat_warning',
  NETWORK_RETRY = 'network_retry',
  RATE_LIMITED = 'rate_limited',
  MODEL_RESPONSE = 'model_response',
  LOOP_TERMINATED = 'loop_terminated',
}

export interface ActivityEvent {
  id: string;
  type: ActivityEventType;
  timestamp: number;
  data: Record<string, unknown>;
}

export type ActivityCallback = (event: ActivityEvent) => void;

// ===========================
// Configuration Types
// ===========================

export type RateLimitScope = 'process' | 'session';

export interface Config {
  // Model
  endpoint: string;
  model: string;
  api_key_env: string;
  temperature: number;
  max_tokens: number;

  // Agent loop
  max_iterations: number;
  tool_timeout_ms: number;
  turn_timeout_ms: number; // 0 disables the turn budget

  // Network resilience
  max_retries: number;
  base_retry_delay_ms: number;
  max_retry_delay_ms: number;
  request_timeout_ms: number;
  max_requests_per_minute: number;
  max_tokens_per_minute: number;
  rate_limit_scope: RateLimitScope;

  // Security
  trusted_roots: string[];
  external_allowed_roots: string[];
  excluded_glob_patterns: string[];
  require_approval: boolean;
  allow_suspicious_commands: boolean;
}

// ===========================
// Security Types
// ===========================

/**
 * Frozen per session. Roots are canonical absolute paths.
 */
export interface SecurityPolicy {
  readonly working_directory: string;
  readonly trusted_roots: readonly string[];
  readonly external_allowed_roots: readonly string[];
  readonly excluded_glob_patterns: readonly string[];
  readonly require_approval: boolean;
}

export type AccessDecision =
  | { kind: 'internal'; path: string }
  | { kind: 'external_allowed'; path: string }
  | { kind: 'external_needs_approval'; path: string }
  | { kind: 'denied'; reason: string; path?: string };

export type ApprovalOutcome = 'allow_once' | 'trust_always' | 'deny';

export interface ApprovalHandler {
  /**
   * Ask whether `toolName` may touch `path`. Must stop asking and reject
   * with OperationCancelled once `signal` fires.
   */
  requestApproval(path: string, toolName: string, signal?: AbortSignal): Promise<ApprovalOutcome>;
}

/**
 * Ordered: comparisons between levels use plain numeric operators
 */
export enum ThreatLevel {
  SAFE = 0,
  WARNING = 1,
  SUSPICIOUS = 2,
  DANGEROUS = 3,
}

export type ThreatCategory =
  | 'command_injection'
  | 'credential_access'
  | 'exfiltration'
  | 'destructive'
  | 'prompt_injection'
  | 'encoded_content'
  | 'shell_tooling'
  | 'network_access'
  | 'path_traversal'
  | 'environment_access'
  | 'executable_script'
  | 'large_file'
  | 'tool_permission'
  | 'unreadable_content';

export interface ThreatReason {
  pattern_id: string;
  category: ThreatCategory;
  severity: ThreatLevel;
  matched_text: string;
}

export interface ThreatAssessment {
  level: ThreatLevel;
  reasons: ThreatReason[];
}

// ===========================
// Network Types
// ===========================

export type NetworkErrorKind =
  | 'timeout'
  | 'connection'
  | 'dns'
  | 'rate_limited'
  | 'server_error'
  | 'client_error'
  | 'malformed_response'
  | 'unknown';
