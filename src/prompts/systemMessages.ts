/**
 * System message for the agent
 */

import os from 'os';
import type { SecurityPolicy } from '../types/index.js';

const IDENTITY = `You are Bastion, a command-line assistant. Use tools to complete the user's request, then answer in plain text.`;

const DIRECTIVES = `Core behavior:
- Use tools directly; never ask the user to run commands for you
- Read before you edit. Prefer replace over rewriting whole files
- A tool result starting with [security] is a policy decision: do not retry the same access with another path or tool
- A tool result starting with [transient] may succeed if retried once
- When the task is done, reply without tool calls`;

export function buildSystemMessage(policy: SecurityPolicy): string {
  const lines = [
    IDENTITY,
    '',
    DIRECTIVES,
    '',
    `Working directory: ${policy.working_directory}`,
    `Platform: ${os.platform()}`,
    `Trusted roots: ${policy.trusted_roots.join(', ')}`,
  ];
  if (policy.external_allowed_roots.length > 0) {
    lines.push(`Other readable roots (may need approval): ${policy.external_allowed_roots.join(', ')}`);
  }
  return lines.join('\n');
}
