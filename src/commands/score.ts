import { openWorkspace } from '../core/workspace.js';
import { readSession, updateSession } from '../core/session-store.js';
import { finalize } from '../core/session.js';
import { computeScore, formatReport } from '../core/scorer.js';
import { formatRisk, output } from '../lib/output.js';
import type { ScoreReport } from '../types/session.js';

export interface ScoreOptions {
  session: string;
  finalize?: boolean;
  json?: boolean;
}

export function printReport(report: ScoreReport, json: boolean): void {
  if (json) {
    output(report, true);
    return;
  }
  const text = formatReport(report).replace(
    `Risk level: ${report.riskLevel}`,
    `Risk level: ${formatRisk(report.riskLevel)}`,
  );
  console.log(text);
}

/**
 * Scores a session file. Without --finalize the file is left untouched and a
 * finalized session reports its stored score.
 */
export async function scoreCommand(options: ScoreOptions): Promise<void> {
  const { registry } = await openWorkspace();

  const session = options.finalize
    ? await updateSession(options.session, (current) => {
      finalize(current, registry);
      return current;
    })
    : await readSession(options.session);
  const report = session.report ?? computeScore(session.findings, registry);

  printReport(report, options.json ?? false);
}
