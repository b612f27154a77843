/**
 * SkillScanner - Security scan of a skill directory before it is loaded
 *
 * Layout:
 *   SKILL.md       instructions with frontmatter (name, description, allowed-tools)
 *   scripts/       executable helpers; any script is Suspicious on its own
 *   references/    supporting documents; oversized files are flagged
 *
 * The verdict goes through the same enforceThreatPolicy as shell commands.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { ThreatLevel, type ThreatAssessment, type ThreatReason } from '../types/index.js';
import { SKILL_LIMITS } from '../config/constants.js';
import { formatError, isFileNotFoundError } from '../utils/errorUtils.js';
import { extractFrontmatter, parseFrontmatterYAML } from '../utils/yamlUtils.js';
import { logger } from '../services/Logger.js';
import {
  THREAT_LEVEL_LABELS,
  assessmentFrom,
  classifyThreat,
  describeThreatReason,
  enforceThreatPolicy,
  type ThreatVerdict,
} from './ThreatClassifier.js';

/**
 * Tools a skill may request without comment
 */
export const SAFE_SKILL_TOOLS: readonly string[] = ['read_file', 'list_directory', 'glob_search', 'search_file_content'];

/**
 * Tools that reach outside the read-only surface
 */
export const DANGEROUS_SKILL_TOOLS: readonly string[] = ['write_file', 'replace', 'run_shell_command', 'web_search', 'web_fetch', 'save_memory'];

export interface SkillFinding extends ThreatReason {
  /** File the finding came from, relative to the skill directory */
  source: string;
}

export interface SkillScanResult {
  skillDir: string;
  name?: string;
  allowedTools: string[];
  findings: SkillFinding[];
  assessment: ThreatAssessment;
}

function finding(source: string, reason: ThreatReason): SkillFinding {
  return { source, ...reason };
}

/**
 * Warnings for each requested tool that is not known to be read-only
 */
export function validateAllowedTools(tools: readonly string[]): string[] {
  const warnings: string[] = [];
  for (const tool of tools) {
    if (DANGEROUS_SKILL_TOOLS.includes(tool)) {
      warnings.push(`Skill requests dangerous tool: ${tool}`);
    } else if (!SAFE_SKILL_TOOLS.includes(tool)) {
      warnings.push(`Skill requests unknown tool: ${tool}`);
    }
  }
  return warnings;
}

export class SkillScanner {
  async scan(skillDir: string): Promise<SkillScanResult> {
    const stats = await fs.stat(skillDir);
    if (!stats.isDirectory()) {
      throw new Error(`Not a skill directory: ${skillDir}`);
    }

    const findings: SkillFinding[] = [];
    const manifest = await this.scanManifest(skillDir, findings);
    await this.scanScripts(path.join(skillDir, 'scripts'), findings);
    await this.scanReferences(path.join(skillDir, 'references'), findings);

    const result: SkillScanResult = {
      skillDir,
      allowedTools: manifest.allowedTools,
      findings,
      assessment: assessmentFrom(findings),
    };
    if (manifest.name) {
      result.name = manifest.name;
    }

    logger.debug(
      `[SKILLS] Scanned ${skillDir}: ${THREAT_LEVEL_LABELS[result.assessment.level]} (${findings.length} findings)`
    );
    return result;
  }

  private async scanManifest(
    skillDir: string,
    findings: SkillFinding[]
  ): Promise<{ name?: string; allowedTools: string[] }> {
    let content: string;
    try {
      content = await fs.readFile(path.join(skillDir, 'SKILL.md'), 'utf-8');
    } catch (error) {
      if (isFileNotFoundError(error)) {
        return { allowedTools: [] };
      }
      findings.push(
        finding('SKILL.md', {
          pattern_id: 'unreadable_manifest',
          category: 'unreadable_content',
          severity: ThreatLevel.DANGEROUS,
          matched_text: `Cannot read SKILL.md: ${formatError(error)}`,
        })
      );
      return { allowedTools: [] };
    }

    for (const reason of classifyThreat(content).reasons) {
      findings.push(finding('SKILL.md', reason));
    }

    const parsed = extractFrontmatter(content);
    if (!parsed) {
      return { allowedTools: [] };
    }

    const metadata = parseFrontmatterYAML(parsed.frontmatter);
    const rawTools = metadata['allowed-tools'];
    const allowedTools =
      typeof rawTools === 'string'
        ? rawTools.split(',').map(tool => tool.trim()).filter(tool => tool.length > 0)
        : Array.isArray(rawTools)
          ? rawTools
          : [];

    for (const warning of validateAllowedTools(allowedTools)) {
      findings.push(
        finding('SKILL.md', {
          pattern_id: 'allowed_tools',
          category: 'tool_permission',
          severity: ThreatLevel.WARNING,
          matched_text: warning,
        })
      );
    }

    const name = metadata['name'];
    return typeof name === 'string' ? { name, allowedTools } : { allowedTools };
  }

  private async scanScripts(scriptsDir: string, findings: SkillFinding[]): Promise<void> {
    const entries = await this.readDirectory(scriptsDir, 'scripts', findings);
    for (const entry of entries) {
      if (!entry.isFile()) {
        continue;
      }
      const extension = path.extname(entry.name).toLowerCase();
      if (!SKILL_LIMITS.SCRIPT_EXTENSIONS.some(ext => ext === extension)) {
        continue;
      }

      const source = `scripts/${entry.name}`;
      findings.push(
        finding(source, {
          pattern_id: 'executable_script',
          category: 'executable_script',
          severity: ThreatLevel.SUSPICIOUS,
          matched_text: entry.name,
        })
      );

      try {
        const content = await fs.readFile(path.join(scriptsDir, entry.name), 'utf-8');
        for (const reason of classifyThreat(content).reasons) {
          if (reason.severity === ThreatLevel.DANGEROUS) {
            findings.push(finding(source, reason));
          }
        }
      } catch (error) {
        logger.warn(`[SKILLS] Cannot read ${source}: ${formatError(error)}`);
      }
    }
  }

  private async scanReferences(referencesDir: string, findings: SkillFinding[]): Promise<void> {
    const entries = await this.readDirectory(referencesDir, 'references', findings);
    for (const entry of entries) {
      if (!entry.isFile()) {
        continue;
      }
      const stats = await fs.stat(path.join(referencesDir, entry.name));
      if (stats.size > SKILL_LIMITS.MAX_REFERENCE_FILE_BYTES) {
        findings.push(
          finding(`references/${entry.name}`, {
            pattern_id: 'large_reference_file',
            category: 'large_file',
            severity: ThreatLevel.WARNING,
            matched_text: `${entry.name} (${stats.size} bytes)`,
          })
        );
      }
    }
  }

  /**
   * A missing directory is fine; an unreadable one is a Warning
   */
  private async readDirectory(dir: string, label: string, findings: SkillFinding[]) {
    try {
      return await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (!isFileNotFoundError(error)) {
        findings.push(
          finding(label, {
            pattern_id: 'unreadable_directory',
            category: 'unreadable_content',
            severity: ThreatLevel.WARNING,
            matched_text: `Cannot read ${label} directory: ${formatError(error)}`,
          })
        );
      }
      return [];
    }
  }
}

/**
 * Apply the shared blocking semantics to a scan result
 */
export function enforceSkillPolicy(
  result: SkillScanResult,
  options: { allowSuspicious?: boolean } = {}
): ThreatVerdict {
  return enforceThreatPolicy(result.assessment, `Skill ${result.name ?? result.skillDir}`, options);
}

/**
 * Render a Markdown security report for a scan result
 */
export function generateSecurityReport(result: SkillScanResult): string {
  const lines: string[] = ['# Skill Security Report', '', `Skill: ${result.skillDir}`, ''];
  const level = result.assessment.level;
  lines.push(`**Status: ${THREAT_LEVEL_LABELS[level].toUpperCase()}**`, '');

  if (level === ThreatLevel.SAFE) {
    lines.push('No security issues detected.');
    return lines.join('\n') + '\n';
  }

  const heading: Record<Exclude<ThreatLevel, ThreatLevel.SAFE>, string> = {
    [ThreatLevel.WARNING]: 'Minor issues detected:',
    [ThreatLevel.SUSPICIOUS]: 'Potentially dangerous patterns detected:',
    [ThreatLevel.DANGEROUS]: 'BLOCKED - Malicious patterns detected:',
  };
  lines.push(heading[level], '');

  const ordered = [...result.findings].sort((a, b) => b.severity - a.severity);
  for (const item of ordered) {
    lines.push(`- ${THREAT_LEVEL_LABELS[item.severity]} [${item.source}] ${describeThreatReason(item)}`);
  }

  if (level === ThreatLevel.SUSPICIOUS) {
    lines.push('', 'Review carefully before activating.');
  } else if (level === ThreatLevel.DANGEROUS) {
    lines.push('', 'DO NOT USE THIS SKILL.');
  }

  return lines.join('\n') + '\n';
}
