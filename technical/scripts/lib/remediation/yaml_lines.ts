// Line-level view of a YAML file for text fixers. Fixers must leave block scalar
// bodies alone: they are free text (often the preserved legacy payload) and may
// contain anything that looks like a `key: value` pair.

export interface YamlLine {
  text: string;
  indent: number;
  inBlockScalar: boolean;
}

export interface MappingLine {
  prefix: string;
  keyColumn: number;
  key: string;
  value: string;
  suffix: string;
}

const BLOCK_SCALAR_HEADER = /(?::[ \t]+|^[ ]*(?:-[ \t]+)+)[|>][-+1-9]{0,2}[ \t]*(?:#.*)?$/;
const MAPPING_KEY_PREFIX = /^([ ]*(?:-[ ]+)*)([A-Za-z0-9_][A-Za-z0-9_.-]*):[ ]+/;

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

function isBlank(line: string): boolean {
  return line.trim().length === 0;
}

export function startsBlockScalar(line: string): boolean {
  const trimmed = line.trimEnd();
  if (trimmed.trimStart().startsWith('#')) {
    return false;
  }
  return BLOCK_SCALAR_HEADER.test(trimmed);
}

/**
 * Splits on `\n` (a `\r` stays on its line) and marks every line that belongs to a
 * block scalar body: blank lines and lines indented deeper than the header line.
 */
export function scanYamlLines(text: string): YamlLine[] {
  const lines = text.split('\n');
  const out: YamlLine[] = [];
  let blockParentIndent: number | null = null;

  for (const line of lines) {
    const indent = indentOf(line);

    if (blockParentIndent !== null) {
      if (isBlank(line) || indent > blockParentIndent) {
        out.push({ text: line, indent, inBlockScalar: true });
        continue;
      }
      blockParentIndent = null;
    }

    out.push({ text: line, indent, inBlockScalar: false });
    if (startsBlockScalar(line)) {
      // `- key: |` nests the body under the key, not under the dash
      const keyed = line.match(MAPPING_KEY_PREFIX);
      blockParentIndent = keyed ? keyed[1].length : indent;
    }
  }

  return out;
}

export function joinYamlLines(lines: string[]): string {
  return lines.join('\n');
}

/**
 * Splits a single-line `key: value` (optionally a `- key: value` sequence entry) into
 * the part before the value, the value itself, and whitespace/comment/`\r` after it.
 */
export function splitMappingLine(line: string): MappingLine | null {
  const eol = line.endsWith('\r') ? '\r' : '';
  const body = eol ? line.slice(0, -1) : line;

  const match = body.match(MAPPING_KEY_PREFIX);
  if (!match) {
    return null;
  }

  const prefix = match[0];
  const rest = body.slice(prefix.length);
  const commentAt = rest.search(/[ \t]#/);
  const valuePart = commentAt === -1 ? rest : rest.slice(0, commentAt);
  const comment = commentAt === -1 ? '' : rest.slice(commentAt);
  const value = valuePart.trimEnd();

  if (!value) {
    return null;
  }

  return {
    prefix,
    keyColumn: match[1].length,
    key: match[2],
    value,
    suffix: `${valuePart.slice(value.length)}${comment}${eol}`
  };
}
