import fs from 'fs-extra';
import path from 'node:path';

import {
  documentationSection,
  frameworkSection,
  isRecord,
  parseFrameworkYaml,
  parseFrameworkYamlTyped
} from './framework_document.js';
import { listYamlFiles, toPosixRelative } from './io.js';
import { remediateText } from './remediation/remediator.js';

export const EXPECTED_CATEGORIES = ['core', 'purpose-built', 'personas'] as const;
export const REQUIRED_KEYS = ['name', 'category', 'documentation', 'framework'] as const;
export const PURPOSE_WORD_LIMIT = 30;
export const USE_CASE_WORD_LIMIT = 40;

const REMEDIATION_HINT = 'run fix_yaml_compliance.ts';

export class ValidationContext {
  errors: string[] = [];
  warnings: string[] = [];

  addError(filePath: string, message: string): void {
    this.errors.push(`ERROR [${toPosixRelative(filePath)}]: ${message}`);
  }

  addWarning(filePath: string, message: string): void {
    this.warnings.push(`WARNING [${toPosixRelative(filePath)}]: ${message}`);
  }
}

export function countWords(value: string): number {
  return value.split(/\s+/).filter(Boolean).length;
}

function validateRequiredKeys(ctx: ValidationContext, filePath: string, data: Record<string, unknown>): void {
  const missing = REQUIRED_KEYS.filter((key) => !(key in data));
  if (missing.length > 0) {
    ctx.addError(filePath, `Missing required key(s): ${missing.join(', ')}`);
  }
}

function validateFieldTypes(ctx: ValidationContext, filePath: string, data: Record<string, unknown>): void {
  for (const key of ['name', 'category'] as const) {
    if (key in data && typeof data[key] !== 'string') {
      ctx.addError(filePath, `'${key}' must be a string`);
    }
  }

  if (data.version === undefined || data.version === null) {
    ctx.addWarning(filePath, "Missing 'version' field");
  } else if (typeof data.version !== 'string') {
    ctx.addError(filePath, `'version' must be a string, found ${typeof data.version} (quote it)`);
  }

  for (const key of ['documentation', 'framework'] as const) {
    if (key in data && !isRecord(data[key])) {
      ctx.addError(filePath, `'${key}' must be a mapping`);
    }
  }
}

function validateMetadataQuality(ctx: ValidationContext, filePath: string, data: unknown): void {
  const documentation = documentationSection(data);

  const purpose = documentation.purpose?.trim() ?? '';
  if (!purpose) {
    ctx.addWarning(filePath, "'documentation.purpose' is missing");
  } else if (countWords(purpose) > PURPOSE_WORD_LIMIT) {
    ctx.addWarning(filePath, `'documentation.purpose' is longer than ${PURPOSE_WORD_LIMIT} words`);
  }

  const useCase = documentation.use_case?.trim() ?? '';
  if (!useCase) {
    ctx.addWarning(filePath, "'documentation.use_case' is missing");
  } else if (countWords(useCase) > USE_CASE_WORD_LIMIT) {
    ctx.addWarning(filePath, `'documentation.use_case' is longer than ${USE_CASE_WORD_LIMIT} words`);
  }
}

function validateCompliance(ctx: ValidationContext, filePath: string, raw: string): void {
  const { counts } = remediateText(raw);

  if (counts.doc_markers_added > 0) {
    ctx.addError(filePath, `Missing '---' document start marker (${REMEDIATION_HINT})`);
  }
  if (counts.escapes_fixed > 0) {
    ctx.addError(
      filePath,
      `${counts.escapes_fixed} escaped string(s) should be block literals (${REMEDIATION_HINT})`
    );
  }
  if (counts.values_quoted > 0) {
    ctx.addError(filePath, `${counts.values_quoted} ambiguous scalar(s) left unquoted (${REMEDIATION_HINT})`);
  }
  if (counts.nbsp_removed > 0) {
    ctx.addWarning(filePath, 'Contains non-breaking spaces');
  }
}

/**
 * Purpose plus the sorted top-level keys of the structure (or of the framework
 * section when nothing has been converted yet). Null when there is no purpose.
 */
export function frameworkSignature(data: unknown): string | null {
  const purpose = documentationSection(data).purpose?.trim();
  if (!purpose) {
    return null;
  }

  const framework = frameworkSection(data);
  const shape = framework && isRecord(framework.structure) ? framework.structure : framework;
  const keys = shape ? Object.keys(shape).sort() : [];
  return `purpose: ${purpose} | keys: ${keys.join(',')}`;
}

/** Checks one document; returns its string-typed tree for corpus checks, or null when it does not parse. */
export function validateFrameworkText(ctx: ValidationContext, filePath: string, raw: string): unknown {
  let typed: unknown;
  let data: unknown;
  try {
    typed = parseFrameworkYamlTyped(raw, filePath);
    data = parseFrameworkYaml(raw, filePath);
  } catch (error) {
    ctx.addError(filePath, error instanceof Error ? error.message : String(error));
    return null;
  }

  if (!isRecord(typed)) {
    ctx.addError(filePath, 'Document must be a mapping');
    return null;
  }

  validateRequiredKeys(ctx, filePath, typed);
  validateFieldTypes(ctx, filePath, typed);
  validateMetadataQuality(ctx, filePath, data);
  validateCompliance(ctx, filePath, raw);
  return data;
}

async function validateCategories(ctx: ValidationContext, frameworksRoot: string): Promise<void> {
  for (const category of EXPECTED_CATEGORIES) {
    const categoryDir = path.join(frameworksRoot, category);
    const files = await listYamlFiles(categoryDir);
    if (files.length === 0) {
      ctx.addWarning(categoryDir, `Category '${category}' has no frameworks`);
    }
  }
}

export async function validateCorpus(frameworksRoot: string): Promise<ValidationContext> {
  const ctx = new ValidationContext();
  const files = await listYamlFiles(frameworksRoot);

  if (files.length === 0) {
    ctx.addError(frameworksRoot, 'No framework documents found');
    return ctx;
  }

  await validateCategories(ctx, frameworksRoot);

  const seen = new Map<string, string>();
  for (const filePath of files) {
    const data = validateFrameworkText(ctx, filePath, await fs.readFile(filePath, 'utf8'));
    const signature = frameworkSignature(data);
    if (!signature) {
      continue;
    }

    const original = seen.get(signature);
    if (original) {
      ctx.addError(filePath, `Appears to be a functional duplicate of ${toPosixRelative(original)}`);
    } else {
      seen.set(signature, filePath);
    }
  }

  return ctx;
}
