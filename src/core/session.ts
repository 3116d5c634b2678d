import { InvalidFindingError, SessionClosedError, UnknownModuleError } from '../lib/errors.js';
import { sessionId } from '../lib/id.js';
import { computeScore } from './scorer.js';
import type { ModuleRegistry } from './registry.js';
import {
  SEVERITIES,
  type Finding,
  type FindingLocation,
  type ReviewSession,
  type ScoreReport,
  type Severity,
} from '../types/session.js';

export function isSeverity(value: unknown): value is Severity {
  return SEVERITIES.some((s) => s === value);
}

export function createSession(id: string = sessionId(), now: Date = new Date()): ReviewSession {
  const timestamp = now.toISOString();
  return {
    id,
    status: 'Created',
    findings: [],
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

/**
 * Parse `path/to/file.ts:42` into a location. A trailing segment that is not a
 * positive integer is kept as part of the file name.
 */
export function parseLocation(value: string): FindingLocation {
  const match = /^(.+):(\d+)$/.exec(value);
  if (match && Number(match[2]) > 0) {
    return { file: match[1], line: Number(match[2]) };
  }
  return { file: value };
}

function validateFinding(finding: Finding): void {
  if (!isSeverity(finding.severity)) {
    throw new InvalidFindingError(
      `severity must be one of ${SEVERITIES.join(', ')}, got ${String(finding.severity)}`,
    );
  }
  if (typeof finding.category !== 'string' || finding.category.trim() === '') {
    throw new InvalidFindingError('category must be a non-empty string');
  }
  if (typeof finding.description !== 'string' || finding.description.trim() === '') {
    throw new InvalidFindingError('description must be a non-empty string');
  }
  const line = finding.location?.line;
  if (line !== undefined && (!Number.isInteger(line) || line < 1)) {
    throw new InvalidFindingError(`location line must be a positive integer, got ${line}`);
  }
}

/**
 * Appends a finding to the session. The first finding moves a Created session
 * to InProgress. Callers sharing one session across writers must serialize
 * these calls themselves.
 */
export function recordFinding(
  session: ReviewSession,
  finding: Finding,
  registry: ModuleRegistry,
  now: Date = new Date(),
): void {
  if (session.status === 'Finalized') throw new SessionClosedError(session.id);
  if (!registry.has(finding.moduleId)) throw new UnknownModuleError([finding.moduleId]);
  validateFinding(finding);

  session.findings.push({
    ...finding,
    ...(finding.location ? { location: { ...finding.location } } : {}),
  });
  session.status = 'InProgress';
  session.updatedAt = now.toISOString();
}

export function finalize(
  session: ReviewSession,
  registry: ModuleRegistry,
  now: Date = new Date(),
): ScoreReport {
  if (session.status === 'Finalized') throw new SessionClosedError(session.id);

  const report = computeScore(session.findings, registry);
  const timestamp = now.toISOString();
  session.status = 'Finalized';
  session.report = report;
  session.finalizedAt = timestamp;
  session.updatedAt = timestamp;
  Object.freeze(session.findings);
  Object.freeze(session);
  return report;
}
