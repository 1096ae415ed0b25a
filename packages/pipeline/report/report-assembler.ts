// ReportAssembler — builds the ReportDocument once every required section is
// present and the gate allows it, then persists it atomically:
// write `<final>.<pid>-<n>.tmp` in the target directory, then rename over the
// canonical path. Re-running overwrites (last writer wins).

import { promises as nodeFs } from 'node:fs';
import { dirname } from 'node:path';
import type { ReportDocument, ReportGateResult, ReportMetadata, ReportSchema, SectionEvaluation } from '../types/report.js';
import { AssemblyError, EthicalBlock, PersistenceError, errorMessage } from '../types/errors.js';
import { assertPeriod, monthName } from '../utils/calendar.js';
import { createLogger } from '../utils/logger.js';
import { isSafeUserId, reportPath, serializeReport } from './report-document.js';

const log = createLogger('ReportAssembler');

/** File operations the assembler needs; node:fs/promises by default */
export interface ReportFileSystem {
  mkdir(path: string, options: { recursive: true }): Promise<unknown>;
  writeFile(path: string, data: string, encoding: 'utf8'): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  rm(path: string, options: { force: true }): Promise<void>;
}

export interface AssembleInput {
  userId: string;
  year: number;
  month: number;
  schema: ReportSchema;
  /** section name → accepted text */
  sections: Readonly<Record<string, string>>;
  /** section name → generation attempts */
  attempts?: Readonly<Record<string, number>>;
  gate: ReportGateResult;
  generatedAt: Date;
  metadata?: ReportMetadata;
}

let tempCounter = 0;

export class ReportAssembler {
  constructor(private readonly fs: ReportFileSystem = nodeFs) {}

  /** Validate preconditions and build the document without touching disk. */
  assemble(input: AssembleInput): ReportDocument {
    const { userId, year, month, schema, gate } = input;
    assertPeriod(year, month);

    if (!isSafeUserId(userId)) {
      throw new AssemblyError(`User id "${userId}" cannot be used as a report file name`);
    }
    if (schema.sections.length === 0) {
      throw new AssemblyError('Report schema has no sections');
    }

    const sections: Record<string, string> = {};
    const evaluation: Record<string, SectionEvaluation> = {};
    for (const spec of schema.sections) {
      const text = input.sections[spec.name];
      if (text === undefined || text.trim() === '') {
        throw new AssemblyError(`Required section "${spec.name}" is missing for user ${userId}`);
      }
      const screened = gate.sections[spec.name];
      if (!screened) {
        throw new AssemblyError(`Section "${spec.name}" was not screened by the ethical gate for user ${userId}`);
      }
      sections[spec.name] = text;
      evaluation[spec.name] = {
        flag: screened.flag,
        confidence: screened.confidence,
        attempts: input.attempts?.[spec.name] ?? 1,
      };
    }

    if (gate.flag === 'Blocked') {
      throw new EthicalBlock(gate.flag, gate.confidence, gate.section);
    }

    return {
      userId,
      year,
      month,
      monthName: monthName(month),
      generatedAt: input.generatedAt.toISOString(),
      sections,
      ethicalFlag: gate.flag,
      confidence: gate.confidence,
      evaluation,
      ...(input.metadata ? { metadata: input.metadata } : {}),
    };
  }

  /** Assemble and write the document; returns the canonical path. */
  async assembleAndSave(input: AssembleInput, outputRoot: string): Promise<string> {
    return this.save(this.assemble(input), outputRoot);
  }

  async save(doc: ReportDocument, outputRoot: string): Promise<string> {
    if (!isSafeUserId(doc.userId)) {
      throw new AssemblyError(`User id "${doc.userId}" cannot be used as a report file name`);
    }
    const path = reportPath(outputRoot, doc.userId, doc.year, doc.month);
    await this.writeAtomic(path, serializeReport(doc));
    log.info('report saved', { userId: doc.userId, path, flag: doc.ethicalFlag });
    return path;
  }

  private async writeAtomic(path: string, content: string): Promise<void> {
    const temp = `${path}.${process.pid}-${++tempCounter}.tmp`;
    try {
      await this.fs.mkdir(dirname(path), { recursive: true });
      await this.fs.writeFile(temp, content, 'utf8');
      await this.fs.rename(temp, path);
    } catch (err) {
      await this.fs.rm(temp, { force: true }).catch((cleanupErr: unknown) => {
        log.warn('could not remove temporary report file', { temp, error: errorMessage(cleanupErr) });
      });
      throw new PersistenceError(`Failed to write report to ${path}: ${errorMessage(err)}`, path, err);
    }
  }
}
