import * as yaml from 'js-yaml';

import { DOCUMENT_START_MARKER } from '../framework_document.js';
import { joinYamlLines, scanYamlLines, splitMappingLine } from './yaml_lines.js';

export interface FixResult {
  text: string;
  count: number;
}

export type Fixer = (text: string) => FixResult;

// Tokens a YAML 1.1 reader turns into booleans or null.
export const AMBIGUOUS_SCALARS: ReadonlySet<string> = new Set([
  'YES', 'Yes', 'yes', 'NO', 'No', 'no',
  'ON', 'On', 'on', 'OFF', 'Off', 'off',
  'TRUE', 'True', 'true', 'FALSE', 'False', 'false',
  'Y', 'y', 'N', 'n', '~', 'null', 'NULL', 'Null'
]);

const NBSP_PATTERN = /\u00a0/g;
const NUMERIC_LOOKING = /^[-+]?(?:\d[\d_]*(?:\.[\d_]*)*|\.\d+)(?:[eE][-+]?\d+)?$/;
const QUOTED_ASSIGNMENT =
  /^([ ]*(?:-[ ]+)*)([A-Za-z0-9_][A-Za-z0-9_.-]*):[ ]*"((?:[^"\\]|\\.)*)"([ \t]*(?:#.*)?)(\r?)$/;
// Control characters other than tab and newline cannot live in a literal block.
const UNSAFE_IN_BLOCK_LITERAL = /[\x00-\x08\x0b-\x1f\x7f\u0085\u2028\u2029]/;
const BLOCK_INDENT_STEP = 2;

export const stripNbsp: Fixer = (text) => {
  if (!text.includes('\u00a0')) {
    return { text, count: 0 };
  }
  return { text: text.replace(NBSP_PATTERN, ' '), count: 1 };
};

export function hasStartMarker(text: string): boolean {
  return text.trim().startsWith(DOCUMENT_START_MARKER);
}

export const ensureStartMarker: Fixer = (text) => {
  if (hasStartMarker(text)) {
    return { text, count: 0 };
  }
  return { text: `${DOCUMENT_START_MARKER}\n${text}`, count: 1 };
};

export function hasControlEscape(escaped: string): boolean {
  for (const match of escaped.matchAll(/\\(.)/g)) {
    if (match[1] === 'n' || match[1] === 't') {
      return true;
    }
  }
  return false;
}

function unescapeCommonEscapes(escaped: string): string {
  return escaped.replace(/\\([nt"\\])/g, (_, char: string) => {
    if (char === 'n') {
      return '\n';
    }
    if (char === 't') {
      return '\t';
    }
    return char;
  });
}

/** Decodes the body of a double-quoted scalar by YAML rules, or by the common escapes when it is malformed. */
export function unescapeDoubleQuoted(escaped: string): string {
  let value: unknown;
  try {
    value = yaml.load(`"${escaped}"`, { schema: yaml.FAILSAFE_SCHEMA });
  } catch {
    return unescapeCommonEscapes(escaped);
  }
  return typeof value === 'string' ? value : unescapeCommonEscapes(escaped);
}

function chompingIndicator(value: string): string {
  const trailing = value.length - value.replace(/\n+$/, '').length;
  if (trailing === 0) {
    return '-';
  }
  if (trailing === 1 && value.length > 1) {
    return '';
  }
  return '+';
}

/**
 * Renders `key: |` plus the value one level deeper than the key. Chomping and
 * indentation indicators are chosen so the block reads back as exactly `value`.
 */
export function renderBlockLiteral(
  prefix: string,
  keyColumn: number,
  value: string,
  comment: string
): string[] {
  const contentIndent = ' '.repeat(keyColumn + BLOCK_INDENT_STEP);
  const chomping = chompingIndicator(value);
  const lines = value.split('\n');
  if (chomping !== '-') {
    lines.pop();
  }

  const firstContent = lines.find((line) => line.length > 0) ?? '';
  const indentIndicator = firstContent.startsWith(' ') ? String(BLOCK_INDENT_STEP) : '';
  const header = `${prefix}|${indentIndicator}${chomping}${comment}`;

  return [header, ...lines.map((line) => (line.length > 0 ? `${contentIndent}${line}` : ''))];
}

export const convertEscapedStrings: Fixer = (text) => {
  const out: string[] = [];
  let count = 0;

  for (const line of scanYamlLines(text)) {
    if (line.inBlockScalar) {
      out.push(line.text);
      continue;
    }

    const match = line.text.match(QUOTED_ASSIGNMENT);
    if (!match || !hasControlEscape(match[3])) {
      out.push(line.text);
      continue;
    }

    const value = unescapeDoubleQuoted(match[3]);
    if (UNSAFE_IN_BLOCK_LITERAL.test(value)) {
      out.push(line.text);
      continue;
    }

    const [, dashes, key, , trailing, eol] = match;
    const comment = trailing.trim() ? ` ${trailing.trim()}` : '';
    const rendered = renderBlockLiteral(`${dashes}${key}: `, dashes.length, value, comment);
    out.push(...rendered.map((renderedLine) => `${renderedLine}${eol}`));
    count += 1;
  }

  return { text: joinYamlLines(out), count };
};

export function needsQuoting(key: string, value: string): boolean {
  if (AMBIGUOUS_SCALARS.has(value)) {
    return true;
  }
  return key === 'version' && NUMERIC_LOOKING.test(value);
}

export const quoteAmbiguousScalars: Fixer = (text) => {
  const out: string[] = [];
  let count = 0;

  for (const line of scanYamlLines(text)) {
    const mapping = line.inBlockScalar ? null : splitMappingLine(line.text);
    if (!mapping || !needsQuoting(mapping.key, mapping.value)) {
      out.push(line.text);
      continue;
    }

    out.push(`${mapping.prefix}"${mapping.value}"${mapping.suffix}`);
    count += 1;
  }

  return { text: joinYamlLines(out), count };
};
