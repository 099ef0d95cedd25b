/**
 * Plain-text rendering of a generated paper
 */

import { renderRecords } from '@/domain/tiers';
import type { QuestionRecord } from '@/domain/question';
import { getUnitShortName } from '@/domain/syllabus';
import type { DistributionRow, DistributionSummary, GeneratedPaper } from './types';

const MARKS = { oneMark: 1, sixMark: 6, twelveMark: 12 } as const;

/**
 * Render the paper as text: part A grouped under unit headers, then parts
 * B and C
 */
export function renderPaperText(paper: GeneratedPaper): string {
  const oneMarkCount = paper.oneMark.records.length;
  let text = `**PART A - One Mark Questions (${oneMarkCount} x 1 = ${oneMarkCount} Marks)**\n\n`;

  for (const section of paper.oneMark.sections) {
    text += `**${section.unitName}**\n${renderRecords(section.records)}\n\n`;
  }

  text += '\n**PART B - Six Mark Questions (8 x 6 = 48 Marks)**\n\n';
  text += `${paper.sixMark.text}\n\n`;
  text += '\n**PART C - Twelve Mark Questions (10 x 12 = 120 Marks)**\n\n';
  text += `${paper.twelveMark.text}\n`;

  return text;
}

/**
 * Per-unit question counts and marks. Questions not tied to a unit count
 * towards the totals only.
 */
export function summarizeDistribution(paper: GeneratedPaper): DistributionSummary {
  const rows = new Map<string, DistributionRow>();
  for (const unit of paper.units) {
    const unitName = getUnitShortName(unit);
    rows.set(unitName, { unitName, oneMark: 0, sixMark: 0, twelveMark: 0, marks: 0 });
  }

  const totals = { oneMark: 0, sixMark: 0, twelveMark: 0, marks: 0 };
  const tally = (records: QuestionRecord[], tier: keyof typeof MARKS) => {
    for (const record of records) {
      totals[tier] += 1;
      totals.marks += MARKS[tier];
      const row = rows.get(record.unitName);
      if (row) {
        row[tier] += 1;
        row.marks += MARKS[tier];
      }
    }
  };

  tally(paper.oneMark.records, 'oneMark');
  tally(paper.sixMark.records, 'sixMark');
  tally(paper.twelveMark.records, 'twelveMark');

  return { rows: Array.from(rows.values()), totals };
}

/**
 * Render a distribution summary as an aligned text table
 */
export function formatDistribution(summary: DistributionSummary): string {
  const header = ['Unit', '1-mark', '6-mark', '12-mark', 'Marks'];
  const body = summary.rows.map((row) => [
    row.unitName,
    String(row.oneMark),
    String(row.sixMark),
    String(row.twelveMark),
    String(row.marks),
  ]);
  const { totals } = summary;
  body.push([
    'Total',
    String(totals.oneMark),
    String(totals.sixMark),
    String(totals.twelveMark),
    String(totals.marks),
  ]);

  const widths = header.map((cell, i) => Math.max(cell.length, ...body.map((r) => r[i].length)));
  const formatRow = (cells: string[]) =>
    cells
      .map((cell, i) => (i === 0 ? cell.padEnd(widths[i]) : cell.padStart(widths[i])))
      .join('  ');

  return [formatRow(header), ...body.map(formatRow)].join('\n');
}
