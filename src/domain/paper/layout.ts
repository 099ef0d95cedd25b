/**
 * Paper Layout Formatter
 *
 * Turns pasted or generated paper text into the printable exam layout:
 * cleaned question lines, grouped into parts A to C and renumbered, with the
 * exam header on top.
 */

import { isUnitHeading } from '@/domain/syllabus';

const SYMBOL_REPLACEMENTS: Record<string, string> = {
  'Δ': 'Delta',
  'Σ': 'Sigma',
  'Ω': 'Omega',
  'Θ': 'Theta',
  'π': 'pi',
  'α': 'alpha',
  'β': 'beta',
  'γ': 'gamma',
  'λ': 'lambda',
  'μ': 'mu',
  '—': '-',
  '–': '-',
  '’': "'",
  '‘': "'",
  '“': '"',
  '”': '"',
  '…': '...',
  '±': '+/-',
  '×': 'x',
  '÷': '/',
  '≈': '~',
  '≠': '!=',
  '≤': '<=',
  '≥': '>=',
};

const PAGE_LINE_PATTERN = /^page\b|\bpage\s+\d+/i;
const TOTAL_HOURS_PATTERN = /total\s+hours/i;
const QUESTION_MARKER_PATTERN = /^[Qq]\d+[.\s]*/;
const MARKS_ANNOTATION_PATTERN = /\s*[([]\s*\d+\s*(?:marks?\s*)?[)\]]/gi;
const COMMENTARY_PATTERN = /(This question requires|Note:|Expected).*$/i;
const OPTION_PATTERN = /^(?:[a-dA-D1-4][.)]|\([a-dA-D1-4]\))/;

export interface CleanOptions {
  /** Course code printed in page headers, e.g. "CS3501" */
  subjectCode?: string;
}

export interface LayoutQuestion {
  kind: 'question';
  number: number;
  text: string;
  /** Option lines, part A only */
  options: string[];
}

export type LayoutEntry = LayoutQuestion | { kind: 'separator' };

export interface PaperLayout {
  partA: LayoutQuestion[];
  partB: LayoutQuestion[];
  /** Questions with "(OR)" separators between alternatives */
  partC: LayoutEntry[];
}

export interface LayoutHeader {
  subjectCode?: string;
  subjectName?: string;
  /** Exam session, e.g. "NOV/DEC-2025" */
  session?: string;
}

type PartId = 'A' | 'B' | 'C';

const PART_HEADINGS: Record<PartId, { title: string; instruction: string }> = {
  A: { title: 'PART - A (10 x 1 = 10 Marks)', instruction: 'Answer ALL Questions' },
  B: { title: 'PART - B (5 x 6 = 30 Marks)', instruction: 'Answer ANY FIVE Questions' },
  C: { title: 'PART - C (5 x 12 = 60 Marks)', instruction: 'Answer ALL Questions' },
};

const PART_START: Record<PartId, number> = { A: 1, B: 11, C: 19 };

const RULE_WIDTH = 72;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Replace symbols the printable layout cannot show
 */
export function replaceSymbols(text: string): string {
  let result = text;
  for (const [symbol, replacement] of Object.entries(SYMBOL_REPLACEMENTS)) {
    result = result.split(symbol).join(replacement);
  }
  return result;
}

/**
 * Clean paper text into printable lines: symbols replaced, unit headings,
 * page furniture and blank lines dropped, question markers, mark
 * annotations and trailing commentary stripped.
 */
export function cleanPaperLines(text: string, options: CleanOptions = {}): string[] {
  const code = options.subjectCode?.trim();
  const pageHeader = code ? new RegExp(`^\\d+\\s+${escapeRegExp(code)}\\s*`) : null;
  const lines: string[] = [];

  for (const rawLine of replaceSymbols(text).split('\n')) {
    let line = rawLine.trim();
    if (!line) continue;

    if (partOf(line) === null) {
      if (isUnitHeading(line) || PAGE_LINE_PATTERN.test(line) || TOTAL_HOURS_PATTERN.test(line)) {
        continue;
      }
    }

    if (pageHeader) {
      line = line.replace(pageHeader, '');
    }
    line = line
      .replace(QUESTION_MARKER_PATTERN, '')
      .replace(MARKS_ANNOTATION_PATTERN, '')
      .replace(COMMENTARY_PATTERN, '')
      .replace(/\s+/g, ' ')
      .trim();

    if (line) {
      lines.push(line);
    }
  }

  return lines;
}

/**
 * Part announced by a heading line, if any
 */
function partOf(line: string): PartId | null {
  const upper = line.toUpperCase();
  for (const part of ['A', 'B', 'C'] as const) {
    if (upper.includes(`PART - ${part}`) || upper.includes(`PART ${part}`)) {
      return part;
    }
  }
  return null;
}

/**
 * Group cleaned lines into parts and renumber each part from 1, 11 and 19.
 * Lines before the first part heading are ignored.
 */
export function layoutPaper(lines: string[]): PaperLayout {
  const layout: PaperLayout = { partA: [], partB: [], partC: [] };
  const next: Record<PartId, number> = { ...PART_START };
  let current: PartId | null = null;

  for (const line of lines) {
    const part = partOf(line);
    if (part) {
      current = part;
      continue;
    }
    if (current === null) continue;

    if (current === 'A') {
      const previous = layout.partA[layout.partA.length - 1];
      if (OPTION_PATTERN.test(line) && previous) {
        previous.options.push(line);
        continue;
      }
    }

    if (current === 'C' && line.toUpperCase().includes('(OR)')) {
      layout.partC.push({ kind: 'separator' });
      continue;
    }

    const question: LayoutQuestion = { kind: 'question', number: next[current], text: line, options: [] };
    next[current] += 1;

    if (current === 'A') layout.partA.push(question);
    else if (current === 'B') layout.partB.push(question);
    else layout.partC.push(question);
  }

  return layout;
}

/**
 * Render a layout with the exam header as plain text
 */
export function renderLayout(layout: PaperLayout, header: LayoutHeader = {}): string {
  const out: string[] = [];

  if (header.session) out.push(`DEGREE EXAMINATIONS, ${header.session}`);
  if (header.subjectCode) out.push(header.subjectCode);
  if (header.subjectName) out.push(header.subjectName.toUpperCase());
  const maxMarks = 'Maximum Marks: 100';
  out.push(`${'Time: Three Hours'.padEnd(RULE_WIDTH - maxMarks.length)}${maxMarks}`);
  out.push('-'.repeat(RULE_WIDTH));

  const renderPart = (part: PartId, entries: LayoutEntry[]) => {
    out.push('', PART_HEADINGS[part].title, PART_HEADINGS[part].instruction, '');
    for (const entry of entries) {
      if (entry.kind === 'separator') {
        out.push('(OR)');
        continue;
      }
      out.push(`Q${entry.number}. ${entry.text}`);
      for (const option of entry.options) {
        out.push(`    ${option}`);
      }
    }
  };

  renderPart('A', layout.partA);
  renderPart('B', layout.partB);
  renderPart('C', layout.partC);

  return `${out.join('\n')}\n`;
}

/**
 * Clean, lay out and render paper text in one step
 */
export function formatPaperLayout(text: string, header: LayoutHeader = {}): string {
  return renderLayout(layoutPaper(cleanPaperLines(text, header)), header);
}
