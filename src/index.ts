/**
 * Bastion - public API
 *
 * Embedders build a frozen Config and SecurityPolicy, register tools with a
 * ToolManager, and run turns through an Agent.
 */

// Agent loop
export { Agent, exitCodeFor, type AgentOptions, type AgentState, type TerminationReason, type TurnOutcome } from './agent/Agent.js';
export { Conversation } from './agent/Conversation.js';

// Model clients
export { ModelClient, type ModelResponse, type TokenUsage } from './llm/ModelClient.js';
export { ChatCompletionsClient, type ChatCompletionsClientConfig } from './llm/ChatCompletionsClient.js';

// Tools
export * from './tools/index.js';

// Security
export { validatePath, isAllowed, findExcludedPattern } from './security/PathValidator.js';
export { buildSecurityPolicy } from './security/SecurityPolicy.js';
export { SessionTrust } from './security/SessionTrust.js';
export { classifyThreat, enforceThreatPolicy, type ThreatVerdict } from './security/ThreatClassifier.js';
export { THREAT_PATTERNS, type ThreatPattern } from './security/threatPatterns.js';
export { SkillScanner, enforceSkillPolicy, generateSecurityReport, type SkillScanResult } from './security/SkillScanner.js';

// Network resilience
export { callWithRetry, computeBackoffDelay, type RetryOptions } from './network/RetryPolicy.js';
export { RateLimiter, RateReservation, createRateLimiter } from './network/RateLimiter.js';
export { classifyNetworkError, classifyHttpStatus } from './network/NetworkError.js';

// Configuration and services
export { ConfigManager, ConfigError } from './services/ConfigManager.js';
export { DEFAULT_CONFIG } from './config/defaults.js';
export { ActivityStream } from './services/ActivityStream.js';
export { logger, Logger, LogLevel } from './services/Logger.js';

// Errors and shared types
export * from './errors/AgentError.js';
export * from './types/index.js';
