interface CleaningRule {
  pattern: RegExp;
  replacement: string;
}

const WHITESPACE_RULES: CleaningRule[] = [
  { pattern: /\r\n?/g, replacement: '\n' },
  { pattern: /\u0000/g, replacement: '' },
  { pattern: /[ \t\f\v]+/g, replacement: ' ' },
  { pattern: /^ | $/gm, replacement: '' }
];

// Running headers and page numbers left behind by PDF extraction
const PAGE_FURNITURE_RULES: CleaningRule[] = [
  { pattern: /^Page\s+\d+\s+of\s+\d+$/gim, replacement: '' },
  { pattern: /^-\s*\d+\s*-$/gm, replacement: '' }
];

/**
 * Normalizes extracted document text before chunking. Content is never
 * rewritten, only layout noise: line endings, runs of blanks, page markers.
 */
export class TextCleaningService {
  constructor(private readonly options: { stripPageFurniture?: boolean } = {}) {}

  cleanText(text: string): string {
    const rules =
      this.options.stripPageFurniture === false ? WHITESPACE_RULES : [...WHITESPACE_RULES, ...PAGE_FURNITURE_RULES];

    const cleaned = rules.reduce((current, rule) => current.replace(rule.pattern, rule.replacement), text);
    return cleaned.replace(/\n{3,}/g, '\n\n').trim();
  }
}
