import fs from 'fs-extra';

import { parseFrameworkYaml, summarizeFramework, type FrameworkSummary } from './framework_document.js';
import { listYamlFiles, toPosixRelative } from './io.js';

export const REFERENCE_FILE = 'FRAMEWORK_REFERENCE.md';
export const COMPARISON_FILE = 'FRAMEWORK_COMPARISON.md';

const LAST_UPDATED_PATTERN = /^_Last Updated: .*_$/m;

/** Capitalizes every letter that follows a non-letter: `purpose-built` becomes `Purpose-Built`. */
export function headingCase(value: string): string {
  return value.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_, before: string, letter: string) => {
    return `${before}${letter.toUpperCase()}`;
  });
}

function anchorFor(category: string): string {
  return category.toLowerCase().replace(/\s+/g, '-');
}

function byName(a: FrameworkSummary, b: FrameworkSummary): number {
  return a.name.localeCompare(b.name);
}

export async function loadFrameworkSummaries(rootDir: string): Promise<FrameworkSummary[]> {
  const summaries: FrameworkSummary[] = [];

  for (const filePath of await listYamlFiles(rootDir)) {
    const rel = toPosixRelative(filePath);
    let data: unknown;
    try {
      data = parseFrameworkYaml(await fs.readFile(filePath, 'utf8'), filePath);
    } catch (error) {
      console.log(`Warning: could not read ${rel}: ${error instanceof Error ? error.message : String(error)}`);
      continue;
    }

    if (data === undefined || data === null || data === '') {
      console.log(`Warning: skipping empty document ${rel}`);
      continue;
    }

    summaries.push(summarizeFramework(filePath, data));
  }

  return summaries;
}

export function groupByCategory(summaries: FrameworkSummary[]): Map<string, FrameworkSummary[]> {
  const groups = new Map<string, FrameworkSummary[]>();
  const categories = [...new Set(summaries.map((summary) => summary.category))].sort((a, b) =>
    a.localeCompare(b)
  );

  for (const category of categories) {
    groups.set(
      category,
      summaries.filter((summary) => summary.category === category).sort(byName)
    );
  }

  return groups;
}

export function renderFrameworkReference(summaries: FrameworkSummary[], generatedAt: Date): string {
  const groups = groupByCategory(summaries);
  const lines: string[] = [
    '# Framework Quick Reference',
    '',
    `_Last Updated: ${generatedAt.toISOString()}_`,
    '',
    '## Table of Contents',
    ''
  ];

  if (groups.size === 0) {
    lines.push('_No frameworks found._', '');
    return lines.join('\n');
  }

  for (const category of groups.keys()) {
    lines.push(`- [${headingCase(category)}](#${anchorFor(category)})`);
  }
  lines.push('');

  for (const [category, entries] of groups) {
    lines.push('---', '', `## ${headingCase(category)}`, '');

    for (const entry of entries) {
      lines.push(
        `### ${entry.name}`,
        '',
        `**File**: \`${entry.file}\` | **Version**: \`${entry.version}\` | **Size**: ~${entry.character_count} chars`,
        '',
        `**Purpose**: ${entry.purpose}`,
        '',
        `**Use Cases**: ${entry.use_case}`,
        ''
      );
    }
  }

  return lines.join('\n');
}

export function renderComparisonTable(summaries: FrameworkSummary[]): string {
  const rows = [...summaries].sort(
    (a, b) => a.category.localeCompare(b.category) || a.name.localeCompare(b.name)
  );

  const lines: string[] = [
    '# Framework Comparison Table',
    '',
    '| Framework | Category | Version | Size (chars) |',
    '|:----------|:---------|:--------|:-------------|'
  ];

  for (const row of rows) {
    lines.push(`| ${row.name} | ${headingCase(row.category)} | \`${row.version}\` | ${row.character_count} |`);
  }
  lines.push('');

  return lines.join('\n');
}

/** Equal when two rendered references differ at most in their timestamp line. */
export function sameReferenceContent(a: string, b: string): boolean {
  return a.replace(LAST_UPDATED_PATTERN, '') === b.replace(LAST_UPDATED_PATTERN, '');
}
