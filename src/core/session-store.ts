import fs from 'node:fs/promises';
import path from 'node:path';
import lockfile from 'proper-lockfile';
import writeFileAtomic from 'write-file-atomic';
import { RcompError, SessionLockError, SessionNotFoundError } from '../lib/errors.js';
import { isSeverity } from './session.js';
import type { Finding, ReviewSession, SessionStatus } from '../types/session.js';

const STATUSES: readonly SessionStatus[] = ['Created', 'InProgress', 'Finalized'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFinding(value: unknown): value is Finding {
  if (!isRecord(value)) return false;
  const { moduleId, severity, category, description, location } = value;
  return (
    typeof moduleId === 'string' &&
    isSeverity(severity) &&
    typeof category === 'string' &&
    typeof description === 'string' &&
    (location === undefined || (isRecord(location) && typeof location.file === 'string'))
  );
}

function isSession(value: unknown): value is ReviewSession {
  if (!isRecord(value)) return false;
  const { id, status, findings, createdAt, updatedAt } = value;
  return (
    typeof id === 'string' &&
    typeof status === 'string' &&
    STATUSES.some((s) => s === status) &&
    Array.isArray(findings) &&
    findings.every(isFinding) &&
    typeof createdAt === 'string' &&
    typeof updatedAt === 'string'
  );
}

export function parseSession(data: unknown, source: string): ReviewSession {
  if (!isSession(data)) {
    throw new RcompError(`Invalid review session file: ${source}`, 'INVALID_SESSION');
  }
  return data;
}

export async function readSession(filePath: string): Promise<ReviewSession> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new SessionNotFoundError(filePath);
    }
    throw err;
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    throw new RcompError(`Review session file is not valid JSON: ${filePath}`, 'INVALID_SESSION');
  }
  return parseSession(data, filePath);
}

export async function writeSession(filePath: string, session: ReviewSession): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await writeFileAtomic(filePath, JSON.stringify(session, null, 2) + '\n');
}

/**
 * Read-modify-write of one session file under an exclusive lock, so concurrent
 * `session record` processes append in some serial order.
 */
export async function updateSession(
  filePath: string,
  updater: (session: ReviewSession) => ReviewSession | Promise<ReviewSession>,
): Promise<ReviewSession> {
  try {
    await fs.access(filePath);
  } catch {
    throw new SessionNotFoundError(filePath);
  }

  let release: (() => Promise<void>) | undefined;
  try {
    release = await lockfile.lock(filePath, {
      stale: 10_000,
      retries: {
        retries: 5,
        minTimeout: 100,
        maxTimeout: 1000,
      },
    });
  } catch {
    throw new SessionLockError(filePath);
  }

  try {
    const session = await readSession(filePath);
    const updated = await updater(session);
    await writeSession(filePath, updated);
    return updated;
  } finally {
    if (release) {
      await release();
    }
  }
}
