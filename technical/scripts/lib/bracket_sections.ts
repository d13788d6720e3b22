// `[Label: content]` sub-dialect. Labels are single-line; content may span lines
// but never contains a bracket.
const BRACKET_SECTION_PATTERN = /\[([^[\]:\n]+):[^[\]]*\]/g;
const BRACKET_LABEL_PATTERN = /\[[^[\]:\n]+:/;

export function extractSections(text: string): string[] {
  const sections: string[] = [];
  const seen = new Set<string>();

  for (const match of text.matchAll(BRACKET_SECTION_PATTERN)) {
    const label = match[1].trim();
    if (!label || seen.has(label)) {
      continue;
    }
    seen.add(label);
    sections.push(label);
  }

  return sections;
}

export function hasBracketLabel(text: string): boolean {
  return BRACKET_LABEL_PATTERN.test(text);
}
