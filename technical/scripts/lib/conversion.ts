import {
  frameworkSection,
  isRecord,
  loadFrameworkFile,
  serializeFrameworkYaml,
  type LoadedFramework
} from './framework_document.js';
import { toPosixRelative, writeRawTextFile, type RunOptions } from './io.js';
import { looksLikeLegacyMarkup, parseMarkup } from './markup_parser.js';

export type SkipReason = 'not-applicable' | 'already-converted' | 'plain-content';

export type ConversionResult =
  | { converted: true; document: Record<string, unknown> }
  | { converted: false; reason: SkipReason };

export type ConversionOutcome =
  | { filePath: string; status: 'converted' }
  | { filePath: string; status: 'skipped'; reason: SkipReason }
  | { filePath: string; status: 'errored'; error: string };

export interface ConversionSummary {
  converted: string[];
  skipped: string[];
  errors: string[];
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Moves a legacy `framework.content` payload into `framework.structure`, keeping
 * the original string verbatim as `framework.legacy_content`. Returns a new
 * document; the input is never mutated.
 */
export function convertFrameworkDocument(document: unknown): ConversionResult {
  const framework = frameworkSection(document);
  if (!isRecord(document) || !framework) {
    return { converted: false, reason: 'not-applicable' };
  }

  // A legacy_content from an earlier run stays the record of the original markup.
  if ('structure' in framework || 'legacy_content' in framework) {
    return { converted: false, reason: 'already-converted' };
  }

  const content = framework.content;
  if (typeof content !== 'string') {
    return { converted: false, reason: 'not-applicable' };
  }

  if (!looksLikeLegacyMarkup(content)) {
    return { converted: false, reason: 'plain-content' };
  }

  const nextFramework: Record<string, unknown> = {
    ...Object.fromEntries(Object.entries(framework).filter(([key]) => key !== 'content')),
    structure: parseMarkup(content),
    legacy_content: content
  };

  return {
    converted: true,
    document: { ...document, framework: nextFramework }
  };
}

export async function convertFrameworkFile(
  filePath: string,
  options: Pick<RunOptions, 'check'>
): Promise<ConversionOutcome> {
  let loaded: LoadedFramework;
  try {
    loaded = await loadFrameworkFile(filePath);
  } catch (error) {
    return { filePath, status: 'errored', error: errorMessage(error) };
  }

  const result = convertFrameworkDocument(loaded.data);
  if (!result.converted) {
    return { filePath, status: 'skipped', reason: result.reason };
  }

  try {
    await writeRawTextFile(filePath, serializeFrameworkYaml(result.document), options);
  } catch (error) {
    return { filePath, status: 'errored', error: errorMessage(error) };
  }

  return { filePath, status: 'converted' };
}

export async function convertCorpus(
  files: string[],
  options: RunOptions
): Promise<ConversionSummary> {
  const summary: ConversionSummary = { converted: [], skipped: [], errors: [] };

  for (const filePath of files) {
    const outcome = await convertFrameworkFile(filePath, options);
    const rel = toPosixRelative(filePath);

    if (outcome.status === 'converted') {
      summary.converted.push(rel);
      if (!options.quiet) {
        console.log(`${options.check ? 'Would convert' : 'Converted'} ${rel}`);
      }
      continue;
    }

    if (outcome.status === 'skipped') {
      summary.skipped.push(rel);
      if (!options.quiet) {
        console.log(`Skipped ${rel} (${outcome.reason})`);
      }
      continue;
    }

    const message = `Error converting ${rel}: ${outcome.error}`;
    summary.errors.push(message);
    console.error(message);
  }

  return summary;
}
