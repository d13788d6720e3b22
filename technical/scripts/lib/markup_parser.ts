import { extractSections, hasBracketLabel } from './bracket_sections.js';
import { cleanText } from './text_cleaner.js';

export interface MarkupLeaf {
  content: string;
}

export interface BracketSectionNode {
  sections: string[];
  raw_format: string;
}

export interface BracketTemplateNode {
  format: 'bracketed_sections';
  sections: string[];
  usage?: string;
  template: string;
}

export interface MarkupTree {
  [tag: string]: MarkupValue;
}

export type MarkupNode = MarkupTree | BracketSectionNode | MarkupLeaf;
export type MarkupValue = string | MarkupNode | BracketTemplateNode;

export interface TagSpan {
  name: string;
  start: number;
  bodyStart: number;
  bodyEnd: number;
  end: number;
}

/** Key under which prose found outside every tag at one level is kept. */
export const INSTRUCTIONS_KEY = 'instructions';

const TAG_NAME_PATTERN = /^[^<>/\n]+$/;
const HORIZONTAL_RULE_PATTERN = /-{3,}/g;
const CODE_FENCE = '```';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function normalizeTagName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, '_');
}

function findClosingTag(
  text: string,
  name: string,
  from: number
): { start: number; end: number } | null {
  const pattern = new RegExp(`</${escapeRegExp(name)}>`, 'gi');
  pattern.lastIndex = from;
  const match = pattern.exec(text);
  if (!match) {
    return null;
  }
  return { start: match.index, end: match.index + match[0].length };
}

/**
 * Top-level `<name>...</name>` spans, left to right. Each opener pairs with the
 * nearest closer of the same name; scanning resumes after that closer, so spans
 * never overlap and a body never includes its own delimiters.
 */
export function findTagSpans(text: string): TagSpan[] {
  const spans: TagSpan[] = [];
  let cursor = 0;

  while (cursor < text.length) {
    const open = text.indexOf('<', cursor);
    if (open === -1) {
      break;
    }

    const openEnd = text.indexOf('>', open + 1);
    if (openEnd === -1) {
      break;
    }

    const name = text.slice(open + 1, openEnd);
    if (!TAG_NAME_PATTERN.test(name) || !name.trim()) {
      cursor = open + 1;
      continue;
    }

    const closing = findClosingTag(text, name, openEnd + 1);
    if (!closing) {
      cursor = open + 1;
      continue;
    }

    spans.push({
      name,
      start: open,
      bodyStart: openEnd + 1,
      bodyEnd: closing.start,
      end: closing.end
    });
    cursor = closing.end;
  }

  return spans;
}

function textOutsideSpans(text: string, spans: TagSpan[]): string {
  let remaining = '';
  let cursor = 0;
  for (const span of spans) {
    remaining += text.slice(cursor, span.start);
    cursor = span.end;
  }
  return remaining + text.slice(cursor);
}

function isBracketTemplate(body: string, sections: string[]): boolean {
  if (sections.length === 0) {
    return false;
  }
  return body.includes('\n') || sections.length > 1;
}

function buildBracketTemplate(body: string, sections: string[]): BracketTemplateNode {
  const fence = body.indexOf(CODE_FENCE);
  const usage = fence > 0 ? cleanText(body.slice(0, fence)) : '';

  return {
    format: 'bracketed_sections',
    sections,
    ...(usage ? { usage } : {}),
    template: cleanText(body)
  };
}

function parseTagBody(body: string): MarkupValue {
  if (findTagSpans(body).length > 0) {
    return parseMarkup(body);
  }

  const sections = extractSections(body);
  if (isBracketTemplate(body, sections)) {
    return buildBracketTemplate(body, sections);
  }

  return cleanText(body);
}

/**
 * Converts a legacy markup blob into a nested tree. Total: every string yields a
 * node. Duplicate tag names at one level keep the value of the last occurrence.
 */
export function parseMarkup(text: string): MarkupNode {
  const spans = findTagSpans(text);

  if (spans.length === 0) {
    if (text.includes('[') && text.includes(']')) {
      const sections = extractSections(text);
      if (sections.length > 0) {
        return { sections, raw_format: cleanText(text) };
      }
    }
    return { content: cleanText(text) };
  }

  const entries = new Map<string, MarkupValue>();
  for (const span of spans) {
    const body = text.slice(span.bodyStart, span.bodyEnd).trim();
    entries.set(normalizeTagName(span.name), parseTagBody(body));
  }

  const remaining = cleanText(textOutsideSpans(text, spans).replace(HORIZONTAL_RULE_PATTERN, ''));
  if (remaining) {
    entries.set(INSTRUCTIONS_KEY, remaining);
  }

  return Object.fromEntries(entries);
}

/** True when a framework payload is written in the legacy tag/bracket dialect. */
export function looksLikeLegacyMarkup(text: string): boolean {
  if (findTagSpans(text).length > 0) {
    return true;
  }
  return (text.includes('[') && text.includes(']:')) || hasBracketLabel(text);
}
