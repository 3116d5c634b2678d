import fs from 'node:fs/promises';
import { openWorkspace } from '../core/workspace.js';
import { createSession, finalize, isSeverity, parseLocation, recordFinding } from '../core/session.js';
import { updateSession, writeSession } from '../core/session-store.js';
import { sessionPath } from '../lib/paths.js';
import { RcompError } from '../lib/errors.js';
import { formatSeverity, output, success } from '../lib/output.js';
import { printReport } from './score.js';
import { SEVERITIES, type Finding } from '../types/session.js';

export interface SessionStartOptions {
  id?: string;
  json?: boolean;
}

export interface SessionRecordOptions {
  module: string;
  severity: string;
  category: string;
  description: string;
  location?: string;
  json?: boolean;
}

export interface SessionFinalizeOptions {
  json?: boolean;
}

const SAFE_ID = /^[\w-]+$/;

export async function sessionStartCommand(options: SessionStartOptions): Promise<void> {
  const { projectRoot, config } = await openWorkspace();

  if (options.id !== undefined && !SAFE_ID.test(options.id)) {
    throw new RcompError(
      `Invalid session id: "${options.id}" — must be alphanumeric, hyphens, or underscores`,
      'INVALID_ARGS',
    );
  }
  const session = createSession(options.id);
  const filePath = sessionPath(projectRoot, config.sessionsDir, session.id);

  const exists = await fs.access(filePath).then(() => true, () => false);
  if (exists) {
    throw new RcompError(`Review session already exists: ${filePath}`, 'INVALID_ARGS');
  }
  await writeSession(filePath, session);

  if (options.json) {
    output({ id: session.id, path: filePath, status: session.status }, true);
  } else {
    success(`Started review session ${session.id} at ${filePath}`);
  }
}

export async function sessionRecordCommand(
  sessionFile: string,
  options: SessionRecordOptions,
): Promise<void> {
  const { registry } = await openWorkspace();

  if (!isSeverity(options.severity)) {
    throw new RcompError(
      `Invalid severity: ${options.severity}. Must be one of: ${SEVERITIES.join(', ')}`,
      'INVALID_ARGS',
    );
  }
  const finding: Finding = {
    moduleId: options.module,
    severity: options.severity,
    category: options.category,
    description: options.description,
    ...(options.location ? { location: parseLocation(options.location) } : {}),
  };

  const session = await updateSession(sessionFile, (current) => {
    recordFinding(current, finding, registry);
    return current;
  });

  if (options.json) {
    output({ id: session.id, status: session.status, findings: session.findings.length }, true);
  } else {
    success(
      `Recorded ${formatSeverity(finding.severity)} finding against ${finding.moduleId} (${session.findings.length} total)`,
    );
  }
}

export async function sessionFinalizeCommand(
  sessionFile: string,
  options: SessionFinalizeOptions,
): Promise<void> {
  const { registry } = await openWorkspace();

  const session = await updateSession(sessionFile, (current) => {
    finalize(current, registry);
    return current;
  });

  if (!options.json) {
    success(`Finalized review session ${session.id}`);
  }
  if (session.report) {
    printReport(session.report, options.json ?? false);
  }
}
