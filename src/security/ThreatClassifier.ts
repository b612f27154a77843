/**
 * ThreatClassifier - Content threat classification shared by shell
 * execution and skill loading
 */

import { ThreatLevel, type ThreatAssessment, type ThreatReason } from '../types/index.js';
import { ThreatBlocked } from '../errors/AgentError.js';
import { TEXT_LIMITS } from '../config/constants.js';
import { THREAT_PATTERNS, type ThreatPattern } from './threatPatterns.js';

export const THREAT_LEVEL_LABELS: Record<ThreatLevel, string> = {
  [ThreatLevel.SAFE]: 'Safe',
  [ThreatLevel.WARNING]: 'Warning',
  [ThreatLevel.SUSPICIOUS]: 'Suspicious',
  [ThreatLevel.DANGEROUS]: 'Dangerous',
};

export function maxThreatLevel(levels: Iterable<ThreatLevel>): ThreatLevel {
  let max = ThreatLevel.SAFE;
  for (const level of levels) {
    if (level > max) {
      max = level;
    }
  }
  return max;
}

function clip(text: string): string {
  const singleLine = text.replace(/\s+/g, ' ').trim();
  if (singleLine.length <= TEXT_LIMITS.THREAT_MATCH_MAX) {
    return singleLine;
  }
  return singleLine.slice(0, TEXT_LIMITS.THREAT_MATCH_MAX - TEXT_LIMITS.ELLIPSIS_LENGTH) + '...';
}

/**
 * Build an assessment from reasons. The level is the most severe reason.
 */
export function assessmentFrom(reasons: ThreatReason[]): ThreatAssessment {
  return { level: maxThreatLevel(reasons.map(reason => reason.severity)), reasons };
}

export function classifyThreat(
  text: string,
  patterns: readonly ThreatPattern[] = THREAT_PATTERNS
): ThreatAssessment {
  const reasons: ThreatReason[] = [];
  for (const pattern of patterns) {
    const match = pattern.regex.exec(text);
    if (match) {
      reasons.push({
        pattern_id: pattern.id,
        category: pattern.category,
        severity: pattern.severity,
        matched_text: clip(match[0]),
      });
    }
  }
  return assessmentFrom(reasons);
}

export function describeThreatReason(reason: ThreatReason): string {
  return `${reason.pattern_id} (${reason.category}): "${reason.matched_text}"`;
}

export type ThreatVerdict =
  | { allowed: true; level: ThreatLevel; warnings: ThreatReason[] }
  | { allowed: false; level: ThreatLevel; error: ThreatBlocked };

/**
 * Binding semantics:
 * Dangerous blocks. Suspicious blocks unless overridden. Warning proceeds and
 * surfaces its reasons. Safe proceeds silently.
 */
export function enforceThreatPolicy(
  assessment: ThreatAssessment,
  subject: string,
  options: { allowSuspicious?: boolean } = {}
): ThreatVerdict {
  const { level, reasons } = assessment;
  const blocked =
    level === ThreatLevel.DANGEROUS || (level === ThreatLevel.SUSPICIOUS && !options.allowSuspicious);

  if (blocked) {
    const blocking = reasons.filter(reason => reason.severity === level);
    const message =
      `${subject} blocked as ${THREAT_LEVEL_LABELS[level]}: ` +
      blocking.map(describeThreatReason).join('; ');
    return { allowed: false, level, error: new ThreatBlocked(level, reasons, message) };
  }

  return {
    allowed: true,
    level,
    warnings: reasons.filter(reason => reason.severity >= ThreatLevel.WARNING),
  };
}
