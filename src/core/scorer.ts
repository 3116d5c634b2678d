import type { ModuleRegistry } from './registry.js';
import { SEVERITIES, type Finding, type RiskLevel, type ScoreReport, type Severity } from '../types/session.js';

const FAILING_SEVERITIES: ReadonlySet<Severity> = new Set(['P0', 'P1', 'P2']);

function emptyCounts(): Record<Severity, number> {
  return { P0: 0, P1: 0, P2: 0, P3: 0 };
}

/** P0 fix now, P1 fix this week, P2 fix within 30 days, P3 backlog. */
export function riskLevelFor(counts: Record<Severity, number>): RiskLevel {
  if (counts.P0 > 0) return 'Critical';
  if (counts.P1 > 0) return 'High';
  if (counts.P2 > 0) return 'Medium';
  return 'Low';
}

function checklistScore(
  findings: readonly Finding[],
  registry: ModuleRegistry,
): { percentage: number; total: number; failing: number } | undefined {
  const scored = new Map<string, number>();
  for (const finding of findings) {
    const module = registry.get(finding.moduleId);
    if (module?.category === 'checklist' && module.checklistItems !== undefined) {
      scored.set(module.id, module.checklistItems);
    }
  }
  if (scored.size === 0) return undefined;

  let total = 0;
  for (const items of scored.values()) total += items;

  const failing = findings.filter(
    (f) => scored.has(f.moduleId) && FAILING_SEVERITIES.has(f.severity),
  ).length;

  const raw = Math.max(0, ((total - failing) / total) * 100);
  return { percentage: Math.round(raw * 10) / 10, total, failing };
}

export function computeScore(findings: readonly Finding[], registry: ModuleRegistry): ScoreReport {
  const counts = emptyCounts();
  for (const finding of findings) counts[finding.severity] += 1;

  const report: ScoreReport = {
    countsBySeverity: counts,
    totalFindings: findings.length,
    riskLevel: riskLevelFor(counts),
  };

  const checklist = checklistScore(findings, registry);
  if (checklist) {
    report.checklistPercentage = checklist.percentage;
    report.checklistItems = { total: checklist.total, failing: checklist.failing };
  }
  return report;
}

export function formatReport(report: ScoreReport): string {
  const lines = [
    `Risk level: ${report.riskLevel}`,
    `Findings: ${report.totalFindings}`,
    ...SEVERITIES.map((s) => `  ${s}: ${report.countsBySeverity[s]}`),
  ];
  if (report.checklistPercentage !== undefined && report.checklistItems) {
    const { total, failing } = report.checklistItems;
    lines.push(`Checklist: ${report.checklistPercentage}% (${total - Math.min(failing, total)}/${total} items passing)`);
  }
  return lines.join('\n');
}
