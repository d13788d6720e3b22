import fs from 'fs-extra';
import * as yaml from 'js-yaml';
import path from 'node:path';

import { categoryFromPath, documentIdFromPath } from './io.js';

export const DOCUMENT_START_MARKER = '---';

export interface FrameworkDocumentation {
  purpose?: string;
  use_case?: string;
  character_count?: string | number;
}

export interface FrameworkSummary {
  name: string;
  version: string;
  file: string;
  category: string;
  purpose: string;
  use_case: string;
  character_count: string;
}

export interface LoadedFramework {
  filePath: string;
  raw: string;
  data: unknown;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function describeYamlError(error: unknown): string {
  if (error instanceof yaml.YAMLException) {
    const reason = error.reason || error.message;
    return error.mark ? `invalid YAML at line ${error.mark.line + 1}: ${reason}` : `invalid YAML: ${reason}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parses corpus YAML keeping every scalar a string, so a tree round trip can never
 * turn `version: 1.0` into a number or `enabled: no` into a boolean.
 */
export function parseFrameworkYaml(raw: string, filePath: string): unknown {
  try {
    return yaml.load(raw, { filename: filePath, schema: yaml.FAILSAFE_SCHEMA });
  } catch (error) {
    throw new Error(describeYamlError(error));
  }
}

/** Lenient load with implicit typing, the way downstream consumers read the corpus. */
export function parseFrameworkYamlTyped(raw: string, filePath: string): unknown {
  try {
    return yaml.load(raw, { filename: filePath });
  } catch (error) {
    throw new Error(describeYamlError(error));
  }
}

/**
 * Tree for a load-modify-dump rewrite. Booleans, numbers and nulls keep their
 * types (core schema, so dates stay text); a numeric `version` is taken back as
 * written, so `1.0` does not come out as `1`.
 */
export function parseFrameworkYamlForRewrite(raw: string, filePath: string): unknown {
  let typed: unknown;
  try {
    typed = yaml.load(raw, { filename: filePath, schema: yaml.CORE_SCHEMA });
  } catch (error) {
    throw new Error(describeYamlError(error));
  }

  if (!isRecord(typed) || typeof typed.version !== 'number') {
    return typed;
  }

  const text = parseFrameworkYaml(raw, filePath);
  if (isRecord(text) && typeof text.version === 'string') {
    return { ...typed, version: text.version };
  }
  return typed;
}

/**
 * Whole-document serialization. Multi-line strings come out as block literals and
 * any string a YAML 1.1 reader would coerce (`yes`, `1.0`, `null`, ...) is quoted.
 */
export function serializeFrameworkYaml(data: unknown): string {
  const body = yaml.dump(data, {
    indent: 2,
    lineWidth: 120,
    noRefs: true,
    quotingType: '"'
  });
  return `${DOCUMENT_START_MARKER}\n${body}`;
}

export async function loadFrameworkFile(filePath: string): Promise<LoadedFramework> {
  const raw = await fs.readFile(filePath, 'utf8');
  return { filePath, raw, data: parseFrameworkYamlForRewrite(raw, filePath) };
}

export function frameworkSection(data: unknown): Record<string, unknown> | null {
  if (!isRecord(data) || !isRecord(data.framework)) {
    return null;
  }
  return data.framework;
}

export function documentationSection(data: unknown): FrameworkDocumentation {
  if (!isRecord(data) || !isRecord(data.documentation)) {
    return {};
  }

  const doc = data.documentation;
  const out: FrameworkDocumentation = {};
  if (typeof doc.purpose === 'string') {
    out.purpose = doc.purpose;
  }
  if (typeof doc.use_case === 'string') {
    out.use_case = doc.use_case;
  }
  if (typeof doc.character_count === 'string' || typeof doc.character_count === 'number') {
    out.character_count = doc.character_count;
  }
  return out;
}

function stringField(data: Record<string, unknown>, key: string): string | undefined {
  const value = data[key];
  if (typeof value === 'string' && value.trim()) {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return undefined;
}

export function summarizeFramework(filePath: string, data: unknown): FrameworkSummary {
  const record: Record<string, unknown> = isRecord(data) ? data : {};
  const documentation = documentationSection(data);

  return {
    name: stringField(record, 'name') ?? documentIdFromPath(filePath),
    version: stringField(record, 'version') ?? 'N/A',
    file: path.basename(filePath),
    category: categoryFromPath(filePath),
    purpose: documentation.purpose?.trim() || 'No description available.',
    use_case: documentation.use_case?.trim() || 'No use case specified.',
    character_count:
      documentation.character_count === undefined ? 'Unknown' : String(documentation.character_count)
  };
}
