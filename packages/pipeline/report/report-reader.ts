// Consumer read interface — the stored report for (user, year, month), or
// null when it has not been generated.

import { promises as nodeFs } from 'node:fs';
import type { ReportDocument } from '../types/report.js';
import { DataError, PersistenceError, errorMessage } from '../types/errors.js';
import { assertPeriod } from '../utils/calendar.js';
import { isSafeUserId, parseReport, reportPath } from './report-document.js';

export interface ReportReadFileSystem {
  readFile(path: string, encoding: 'utf8'): Promise<string>;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export async function readReport(
  outputRoot: string,
  userId: string,
  year: number,
  month: number,
  fs: ReportReadFileSystem = nodeFs,
): Promise<ReportDocument | null> {
  assertPeriod(year, month);
  if (!isSafeUserId(userId)) {
    throw new DataError(`Invalid user id "${userId}"`);
  }

  const path = reportPath(outputRoot, userId, year, month);
  let content: string;
  try {
    content = await fs.readFile(path, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw new PersistenceError(`Failed to read report ${path}: ${errorMessage(err)}`, path, err);
  }

  const doc = parseReport(content);
  if (!doc) {
    throw new PersistenceError(`Report ${path} is not a valid report document`, path);
  }
  return doc;
}
