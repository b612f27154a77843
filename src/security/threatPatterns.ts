/**
 * Threat pattern table
 *
 * Each entry is independent; the classifier reports every entry that matches
 * and takes the most severe level. Patterns are non-global so `exec` never
 * carries state between calls.
 */

import { ThreatLevel, type ThreatCategory } from '../types/index.js';

export interface ThreatPattern {
  id: string;
  category: ThreatCategory;
  severity: ThreatLevel;
  regex: RegExp;
}

const { DANGEROUS, SUSPICIOUS, WARNING } = ThreatLevel;

export const THREAT_PATTERNS: readonly ThreatPattern[] = [
  // Command injection and shell escapes
  { id: 'eval_call', category: 'command_injection', severity: DANGEROUS, regex: /\beval\s*\(/i },
  { id: 'exec_call', category: 'command_injection', severity: DANGEROUS, regex: /\bexec\s*\(/i },
  { id: 'command_substitution', category: 'command_injection', severity: DANGEROUS, regex: /\$\([^)]*\)/ },
  { id: 'backtick_execution', category: 'command_injection', severity: DANGEROUS, regex: /`[^`]*`/ },

  // Exfiltration
  {
    id: 'pipe_to_shell',
    category: 'exfiltration',
    severity: DANGEROUS,
    regex: /\b(?:curl|wget)\b[^|\n]*\|\s*(?:sudo\s+)?(?:ba|z|da)?sh\b/i,
  },
  { id: 'ssh_remote', category: 'exfiltration', severity: DANGEROUS, regex: /\bssh\s+[^\n]*@/i },
  { id: 'scp_transfer', category: 'exfiltration', severity: DANGEROUS, regex: /\bscp\s+/i },
  { id: 'netcat', category: 'exfiltration', severity: DANGEROUS, regex: /\bnetcat\b|\bnc\s+-/i },
  { id: 'dev_tcp', category: 'exfiltration', severity: DANGEROUS, regex: /\/dev\/(?:tcp|udp)\//i },

  // Credentials and keys
  { id: 'ssh_private_key', category: 'credential_access', severity: DANGEROUS, regex: /\.ssh\/id_(?:rsa|dsa|ecdsa|ed25519)/i },
  { id: 'aws_credentials', category: 'credential_access', severity: DANGEROUS, regex: /\.aws\/credentials/i },
  { id: 'dotenv_file', category: 'credential_access', severity: DANGEROUS, regex: /(?:^|[\s/'"=<>])\.env\b/i },
  { id: 'password_assignment', category: 'credential_access', severity: DANGEROUS, regex: /\bpassword\s*=/i },
  { id: 'api_key_assignment', category: 'credential_access', severity: DANGEROUS, regex: /\bapi[_-]?key\s*=/i },
  { id: 'secret_assignment', category: 'credential_access', severity: DANGEROUS, regex: /\bsecret\s*=/i },

  // Destructive filesystem and system operations
  { id: 'recursive_root_delete', category: 'destructive', severity: DANGEROUS, regex: /\brm\s+-(?:rf|fr)\s+[/~]/i },
  { id: 'sudo', category: 'destructive', severity: DANGEROUS, regex: /\bsudo\s+/i },
  { id: 'chmod_777', category: 'destructive', severity: DANGEROUS, regex: /\bchmod\s+(?:-R\s+)?777\b/i },
  { id: 'disk_format', category: 'destructive', severity: DANGEROUS, regex: /\bmkfs(?:\.\w+)?\b|\bdd\s+[^\n]*\bof=\/dev\//i },
  { id: 'fork_bomb', category: 'destructive', severity: DANGEROUS, regex: /:\(\)\s*\{\s*:\s*\|\s*:\s*&\s*\}\s*;\s*:/ },

  // Prompt injection phrasing
  { id: 'ignore_instructions', category: 'prompt_injection', severity: DANGEROUS, regex: /ignore (?:all )?previous instructions/i },
  { id: 'disregard_prior', category: 'prompt_injection', severity: DANGEROUS, regex: /disregard all prior/i },
  { id: 'forget_everything', category: 'prompt_injection', severity: DANGEROUS, regex: /forget everything/i },
  { id: 'new_instructions', category: 'prompt_injection', severity: DANGEROUS, regex: /new instructions:/i },
  { id: 'fake_system_role', category: 'prompt_injection', severity: DANGEROUS, regex: /(?:^|\n)\s*(?:system|admin): /i },
  { id: 'role_override', category: 'prompt_injection', severity: DANGEROUS, regex: /\byou are now\b|\bpretend you are\b|\bact as if\b/i },
  { id: 'jailbreak_mode', category: 'prompt_injection', severity: DANGEROUS, regex: /\b(?:DAN|developer|god) mode\b/i },

  // Weaker indicators
  { id: 'file_tool_reference', category: 'shell_tooling', severity: SUSPICIOUS, regex: /\b(?:read_file|write_file)\b/i },
  { id: 'shell_tool_reference', category: 'shell_tooling', severity: SUSPICIOUS, regex: /\brun_shell_command\b/i },
  { id: 'process_spawn', category: 'shell_tooling', severity: SUSPICIOUS, regex: /\b(?:execute|spawn|system)\b/i },
  { id: 'path_traversal', category: 'path_traversal', severity: SUSPICIOUS, regex: /\.\.[/\\]/ },
  {
    id: 'transfer_tool_url',
    category: 'network_access',
    severity: SUSPICIOUS,
    regex: /\b(?:curl|wget)\b[^\n]*?\b(?:https?|ftp):\/\//i,
  },
  { id: 'environment_access', category: 'environment_access', severity: SUSPICIOUS, regex: /\benv\[|\benvironment\b/i },
  { id: 'home_user_variable', category: 'environment_access', severity: SUSPICIOUS, regex: /\$\{?(?:HOME|USER)\b/ },

  // Minor indicators
  { id: 'plain_url', category: 'network_access', severity: WARNING, regex: /\bhttps?:\/\/[^\s'"<>]+/i },
  { id: 'base64_blob', category: 'encoded_content', severity: WARNING, regex: /[A-Za-z0-9+/]{40,}={0,2}/ },
  { id: 'hex_blob', category: 'encoded_content', severity: WARNING, regex: /(?:0x)?[0-9a-fA-F]{40,}/ },
];
