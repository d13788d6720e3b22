import defaultTemplates from '../data/metadata_templates.json' with { type: 'json' };

import {
  isRecord,
  loadFrameworkFile,
  serializeFrameworkYaml,
  type LoadedFramework
} from './framework_document.js';
import {
  categoryFromPath,
  documentIdFromPath,
  toPosixRelative,
  writeRawTextFile,
  type RunOptions
} from './io.js';

export interface MetadataTemplate {
  purpose: string;
  use_case: string;
  version: string;
}

export type MetadataTemplateTable = Readonly<Record<string, MetadataTemplate>>;

export const DEFAULT_METADATA_TEMPLATES: MetadataTemplateTable = Object.freeze({ ...defaultTemplates });

export type MetadataResult =
  | { changed: true; document: Record<string, unknown>; fields: string[] }
  | { changed: false };

export type MetadataOutcome =
  | { filePath: string; status: 'updated'; fields: string[] }
  | { filePath: string; status: 'skipped' }
  | { filePath: string; status: 'errored'; error: string };

export interface MetadataSummary {
  updated: string[];
  skipped: string[];
  errors: string[];
}

export function titleCase(value: string): string {
  return value
    .replace(/[-_]+/g, ' ')
    .split(' ')
    .map((word) => (word ? `${word[0].toUpperCase()}${word.slice(1).toLowerCase()}` : word))
    .join(' ');
}

/**
 * First template whose key occurs in the document id, in table order; otherwise a
 * generic template built from the id and its category.
 */
export function selectMetadataTemplate(
  documentId: string,
  category: string,
  templates: MetadataTemplateTable
): MetadataTemplate {
  for (const [key, template] of Object.entries(templates)) {
    if (documentId.includes(key)) {
      return template;
    }
  }

  return {
    purpose: `${titleCase(documentId)} framework for specialized AI reasoning`,
    use_case: `${titleCase(category)} tasks requiring structured cognitive approach`,
    version: '1.0'
  };
}

function isBlank(value: unknown): boolean {
  if (value === undefined || value === null) {
    return true;
  }
  return String(value).trim().length === 0;
}

/** Fills missing purpose, use case, version and category; never overwrites a value. */
export function applyMetadata(
  data: unknown,
  template: MetadataTemplate,
  category: string
): MetadataResult {
  if (!isRecord(data) && !isBlank(data)) {
    return { changed: false };
  }

  const record: Record<string, unknown> = isRecord(data) ? data : {};
  const documentation: Record<string, unknown> = isRecord(record.documentation)
    ? { ...record.documentation }
    : {};
  const next: Record<string, unknown> = { ...record };
  const fields: string[] = [];

  if (isBlank(documentation.purpose)) {
    documentation.purpose = template.purpose;
    fields.push('documentation.purpose');
  }

  if (isBlank(documentation.use_case)) {
    documentation.use_case = template.use_case;
    fields.push('documentation.use_case');
  }

  if (isBlank(record.version)) {
    next.version = template.version;
    fields.push('version');
  }

  if (isBlank(record.category) && category) {
    next.category = category;
    fields.push('category');
  }

  if (fields.length === 0) {
    return { changed: false };
  }

  next.documentation = documentation;
  return { changed: true, document: next, fields };
}

export async function addMetadataToFile(
  filePath: string,
  templates: MetadataTemplateTable,
  options: Pick<RunOptions, 'check'>
): Promise<MetadataOutcome> {
  let loaded: LoadedFramework;
  try {
    loaded = await loadFrameworkFile(filePath);
  } catch (error) {
    return { filePath, status: 'errored', error: error instanceof Error ? error.message : String(error) };
  }

  const category = categoryFromPath(filePath);
  const template = selectMetadataTemplate(documentIdFromPath(filePath), category, templates);
  const result = applyMetadata(loaded.data, template, category);
  if (!result.changed) {
    return { filePath, status: 'skipped' };
  }

  try {
    await writeRawTextFile(filePath, serializeFrameworkYaml(result.document), options);
  } catch (error) {
    return { filePath, status: 'errored', error: error instanceof Error ? error.message : String(error) };
  }

  return { filePath, status: 'updated', fields: result.fields };
}

export async function addMetadataToCorpus(
  files: string[],
  templates: MetadataTemplateTable,
  options: RunOptions
): Promise<MetadataSummary> {
  const summary: MetadataSummary = { updated: [], skipped: [], errors: [] };

  for (const filePath of files) {
    const outcome = await addMetadataToFile(filePath, templates, options);
    const rel = toPosixRelative(filePath);

    if (outcome.status === 'updated') {
      summary.updated.push(rel);
      if (!options.quiet) {
        const verb = options.check ? 'Would update' : 'Updated';
        console.log(`${verb} ${rel} (${outcome.fields.join(', ')})`);
      }
    } else if (outcome.status === 'skipped') {
      summary.skipped.push(rel);
      if (!options.quiet) {
        console.log(`Skipped ${rel} (already complete)`);
      }
    } else {
      const message = `Error processing ${rel}: ${outcome.error}`;
      summary.errors.push(message);
      console.error(message);
    }
  }

  return summary;
}
