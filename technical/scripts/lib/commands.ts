import fs from 'fs-extra';
import path from 'node:path';

import { convertCorpus } from './conversion.js';
import {
  COMPARISON_FILE,
  REFERENCE_FILE,
  loadFrameworkSummaries,
  renderComparisonTable,
  renderFrameworkReference,
  sameReferenceContent
} from './framework_docs.js';
import { validateCorpus } from './framework_validation.js';
import {
  corpusPath,
  corpusRoot,
  frameworksDir,
  getRunOptions,
  listYamlFiles,
  positionalArgs,
  toPosixRelative,
  writeTextFile,
  type WriteResult
} from './io.js';
import { DEFAULT_METADATA_TEMPLATES, addMetadataToCorpus } from './metadata.js';
import { YamlRemediator } from './remediation/remediator.js';

export const REMEDIATION_REPORT_FILE = 'yaml-remediation-report.json';

// Exit status of a command: 0 on success, 1 on errors or pending changes under --check.
export type CommandResult = 0 | 1;

async function resolveTargetDir(argv: string[]): Promise<string> {
  const [target] = positionalArgs(argv);
  const targetDir = target ? path.resolve(corpusRoot(), target) : frameworksDir();
  if (!(await fs.pathExists(targetDir))) {
    throw new Error(`Directory not found: ${toPosixRelative(targetDir)}`);
  }
  return targetDir;
}

export async function runConvertFrameworks(argv: string[]): Promise<CommandResult> {
  const options = getRunOptions(argv);
  const files = await listYamlFiles(await resolveTargetDir(argv));
  const summary = await convertCorpus(files, options);

  const verb = options.check ? 'would convert' : 'converted';
  console.log(
    `convert_frameworks.ts: ${verb} ${summary.converted.length}, skipped ${summary.skipped.length}, ${summary.errors.length} error(s)`
  );

  if (summary.errors.length > 0) {
    return 1;
  }
  if (options.check) {
    if (summary.converted.length > 0) {
      return 1;
    }
    console.log('convert_frameworks.ts check passed.');
  }
  return 0;
}

export async function runFixYamlCompliance(argv: string[]): Promise<CommandResult> {
  const options = getRunOptions(argv);
  const files = await listYamlFiles(await resolveTargetDir(argv));
  const remediator = new YamlRemediator(options);
  const report = await remediator.processFiles(files);
  remediator.printSummary();

  const reportPath = corpusPath('docs', REMEDIATION_REPORT_FILE);
  const written = await remediator.writeReport(reportPath);
  if (written.wrote) {
    console.log(`\nReport saved to ${toPosixRelative(reportPath)}`);
  }

  if (report.errors.length > 0) {
    return 1;
  }
  if (options.check) {
    if (report.files_fixed > 0) {
      console.error(`fix_yaml_compliance.ts: ${report.files_fixed} file(s) would be fixed`);
      return 1;
    }
    console.log('fix_yaml_compliance.ts check passed.');
  }
  return 0;
}

export async function runAddFrameworkMetadata(argv: string[]): Promise<CommandResult> {
  const options = getRunOptions(argv);
  const files = await listYamlFiles(await resolveTargetDir(argv));
  const summary = await addMetadataToCorpus(files, DEFAULT_METADATA_TEMPLATES, options);

  const verb = options.check ? 'would update' : 'updated';
  console.log(
    `add_framework_metadata.ts: ${verb} ${summary.updated.length}, skipped ${summary.skipped.length}, ${summary.errors.length} error(s)`
  );

  if (summary.errors.length > 0) {
    return 1;
  }
  if (options.check) {
    if (summary.updated.length > 0) {
      return 1;
    }
    console.log('add_framework_metadata.ts check passed.');
  }
  return 0;
}

async function writeReference(filePath: string, markdown: string, check: boolean): Promise<WriteResult> {
  if (await fs.pathExists(filePath)) {
    const current = await fs.readFile(filePath, 'utf8');
    if (sameReferenceContent(current, markdown)) {
      return { changed: false, wrote: false };
    }
  }
  return writeTextFile(filePath, markdown, { check });
}

export async function runGenerateFrameworkDocs(
  argv: string[],
  generatedAt: Date = new Date()
): Promise<CommandResult> {
  const options = getRunOptions(argv);
  const summaries = await loadFrameworkSummaries(await resolveTargetDir(argv));

  const referencePath = corpusPath('docs', REFERENCE_FILE);
  const comparisonPath = corpusPath('docs', COMPARISON_FILE);
  const outputs: Array<[string, () => Promise<WriteResult>]> = [
    [
      referencePath,
      () => writeReference(referencePath, renderFrameworkReference(summaries, generatedAt), options.check)
    ],
    [comparisonPath, () => writeTextFile(comparisonPath, renderComparisonTable(summaries), options)]
  ];

  let pending = 0;
  for (const [filePath, write] of outputs) {
    const result = await write();
    const rel = toPosixRelative(filePath);
    if (options.check) {
      if (result.changed) {
        console.error(`Would update ${rel}`);
        pending += 1;
      }
      continue;
    }
    console.log(`${result.changed ? 'Updated' : 'No changes'} ${rel}`);
  }

  console.log(`generate_framework_docs.ts: ${summaries.length} framework(s) documented`);
  if (options.check) {
    if (pending > 0) {
      return 1;
    }
    console.log('generate_framework_docs.ts check passed.');
  }
  return 0;
}

export async function runValidateFrameworks(argv: string[]): Promise<CommandResult> {
  console.log('Validating framework documents...');
  const ctx = await validateCorpus(await resolveTargetDir(argv));

  for (const warning of ctx.warnings) {
    console.log(`  ${warning}`);
  }
  for (const error of ctx.errors) {
    console.log(`  ${error}`);
  }

  console.log(`\n${ctx.errors.length} error(s), ${ctx.warnings.length} warning(s)`);

  if (ctx.errors.length > 0) {
    return 1;
  }

  console.log('Validation passed.');
  return 0;
}
