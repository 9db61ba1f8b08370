import * as fs from 'fs/promises';
import * as path from 'path';
import { writeFileAtomic } from '../utils/atomicWrite';
import type { BatchReport } from './types';

export const REPORT_FILE_NAME = 'batch-report.json';

export interface ReportCounts {
  total: number;
  succeeded: number;
  failed: number;
}

export function summarizeReport(report: BatchReport): ReportCounts {
  const succeeded = report.outcomes.filter((o) => o.status === 'success').length;
  return {
    total: report.outcomes.length,
    succeeded,
    failed: report.outcomes.length - succeeded,
  };
}

export async function writeReport(
  report: BatchReport,
  filePath: string = path.join(report.outputDir, REPORT_FILE_NAME)
): Promise<string> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const payload = JSON.stringify({ ...report, counts: summarizeReport(report) }, null, 2);
  await writeFileAtomic(filePath, Buffer.from(`${payload}\n`, 'utf8'));
  return filePath;
}
