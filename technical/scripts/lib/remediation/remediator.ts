import fs from 'fs-extra';

import { toPosixRelative, writeJsonFile, writeRawTextFile, type RunOptions, type WriteResult } from '../io.js';
import {
  convertEscapedStrings,
  ensureStartMarker,
  quoteAmbiguousScalars,
  stripNbsp,
  type Fixer
} from './fixers.js';

export interface RemediationCounts {
  doc_markers_added: number;
  escapes_fixed: number;
  values_quoted: number;
  nbsp_removed: number;
}

export interface RemediationReport extends RemediationCounts {
  files_processed: number;
  files_fixed: number;
  errors: string[];
}

export interface RemediationResult {
  text: string;
  changed: boolean;
  counts: RemediationCounts;
}

// NBSP goes first: a stray U+00A0 defeats the line patterns the later fixers use.
const PIPELINE: ReadonlyArray<readonly [keyof RemediationCounts, Fixer]> = [
  ['nbsp_removed', stripNbsp],
  ['doc_markers_added', ensureStartMarker],
  ['escapes_fixed', convertEscapedStrings],
  ['values_quoted', quoteAmbiguousScalars]
];

function emptyCounts(): RemediationCounts {
  return { doc_markers_added: 0, escapes_fixed: 0, values_quoted: 0, nbsp_removed: 0 };
}

export function createRemediationReport(): RemediationReport {
  return { files_processed: 0, files_fixed: 0, ...emptyCounts(), errors: [] };
}

export function remediateText(text: string): RemediationResult {
  const counts = emptyCounts();
  let current = text;

  for (const [counter, fixer] of PIPELINE) {
    const result = fixer(current);
    counts[counter] += result.count;
    current = result.text;
  }

  return { text: current, changed: current !== text, counts };
}

export function successRate(report: RemediationReport): number {
  const processed = report.files_processed;
  return ((processed - report.errors.length) / Math.max(processed, 1)) * 100;
}

/**
 * Applies the compliance pipeline file by file. A failing file is recorded in
 * `report.errors` and the run moves on.
 */
export class YamlRemediator {
  private readonly report: RemediationReport = createRemediationReport();

  constructor(private readonly options: RunOptions) {}

  private log(message: string): void {
    if (!this.options.quiet) {
      console.log(message);
    }
  }

  async fixFile(filePath: string): Promise<boolean> {
    const rel = toPosixRelative(filePath);
    this.log(`Processing ${rel}`);

    try {
      const raw = await fs.readFile(filePath, 'utf8');
      const result = remediateText(raw);

      for (const [counter] of PIPELINE) {
        this.report[counter] += result.counts[counter];
      }

      if (!result.changed) {
        this.log('  No changes needed');
        return false;
      }

      await writeRawTextFile(filePath, result.text, this.options);
      this.report.files_fixed += 1;
      this.log(`  ${this.options.check ? 'Would fix' : 'Fixed'} ${rel}`);
      return true;
    } catch (error) {
      const message = `Error processing ${rel}: ${error instanceof Error ? error.message : String(error)}`;
      this.report.errors.push(message);
      console.error(`  ${message}`);
      return false;
    } finally {
      this.report.files_processed += 1;
    }
  }

  async processFiles(files: string[]): Promise<RemediationReport> {
    this.log(`Found ${files.length} YAML file(s) to process`);
    for (const filePath of files) {
      await this.fixFile(filePath);
    }
    return this.snapshot();
  }

  snapshot(): RemediationReport {
    return { ...this.report, errors: [...this.report.errors] };
  }

  printSummary(): void {
    const report = this.report;
    console.log('\nRemediation summary');
    console.log(`  Files processed: ${report.files_processed}`);
    console.log(`  Files fixed: ${report.files_fixed}`);
    console.log(`  Document markers added: ${report.doc_markers_added}`);
    console.log(`  Escaped strings converted: ${report.escapes_fixed}`);
    console.log(`  Values quoted: ${report.values_quoted}`);
    console.log(`  Files with NBSP removed: ${report.nbsp_removed}`);

    if (report.errors.length > 0) {
      console.log(`\n${report.errors.length} error(s):`);
      for (const error of report.errors) {
        console.log(`  - ${error}`);
      }
    }

    console.log(`\nSuccess rate: ${successRate(report).toFixed(1)}%`);
  }

  async writeReport(reportPath: string): Promise<WriteResult> {
    return writeJsonFile(reportPath, this.snapshot(), this.options);
  }
}
