import { describe, expect, it } from 'vitest';
import { cleanPaperLines, formatPaperLayout, layoutPaper, renderLayout, replaceSymbols } from '../layout';

describe('replaceSymbols', () => {
  it('spells out symbols', () => {
    expect(replaceSymbols('Σ x ≤ π – “ok”')).toBe('Sigma x <= pi - "ok"');
  });
});

describe('cleanPaperLines', () => {
  it('drops unit headings, page furniture and blank lines', () => {
    const text = ['**UNIT I**', '', 'Page 2 of 3', 'Total Hours: 45', 'Q1. What is a token?'].join('\n');

    expect(cleanPaperLines(text)).toEqual(['What is a token?']);
  });

  it('keeps part headings', () => {
    expect(cleanPaperLines('**PART A - One Mark Questions (10 x 1 = 10 Marks)**')).toEqual([
      '**PART A - One Mark Questions (10 x 1 = 10 Marks)**',
    ]);
  });

  it('strips mark annotations and commentary', () => {
    expect(
      cleanPaperLines('Q12.  Explain   LR parsing (6 marks) Note: use an example\nQ13 Describe SLR [12]'),
    ).toEqual(['Explain LR parsing', 'Describe SLR']);
  });

  it('strips page headers carrying the subject code', () => {
    expect(cleanPaperLines('3 CS3501 Define a DFA.\n4 CS3501', { subjectCode: 'CS3501' })).toEqual([
      'Define a DFA.',
    ]);
  });
});

describe('layoutPaper', () => {
  it('groups lines into parts and renumbers them', () => {
    const layout = layoutPaper([
      'preamble',
      'PART A',
      'What is a token?',
      'A. one',
      '(b) two',
      'What is a lexeme?',
      'PART - B',
      'Explain parsing.',
      'PART C',
      'Discuss code generation.',
      '(OR)',
      'Discuss register allocation.',
    ]);

    expect(layout.partA).toEqual([
      { kind: 'question', number: 1, text: 'What is a token?', options: ['A. one', '(b) two'] },
      { kind: 'question', number: 2, text: 'What is a lexeme?', options: [] },
    ]);
    expect(layout.partB).toEqual([
      { kind: 'question', number: 11, text: 'Explain parsing.', options: [] },
    ]);
    expect(layout.partC).toEqual([
      { kind: 'question', number: 19, text: 'Discuss code generation.', options: [] },
      { kind: 'separator' },
      { kind: 'question', number: 20, text: 'Discuss register allocation.', options: [] },
    ]);
  });

  it('keeps a question that starts with a single letter word', () => {
    const layout = layoutPaper(
      cleanPaperLines(
        [
          'PART A',
          'Q1. What is a token?',
          'A. Lexeme class',
          'B. Parser',
          'C. Grammar',
          'D. Symbol',
          '',
          'Q2. A lexer produces what?',
          'A. Tokens',
          'B. Trees',
          'C. Code',
          'D. Errors',
        ].join('\n'),
      ),
    );

    expect(layout.partA).toEqual([
      {
        kind: 'question',
        number: 1,
        text: 'What is a token?',
        options: ['A. Lexeme class', 'B. Parser', 'C. Grammar', 'D. Symbol'],
      },
      {
        kind: 'question',
        number: 2,
        text: 'A lexer produces what?',
        options: ['A. Tokens', 'B. Trees', 'C. Code', 'D. Errors'],
      },
    ]);
  });
});

describe('renderLayout', () => {
  it('renders the header and part headings', () => {
    const text = renderLayout(
      {
        partA: [{ kind: 'question', number: 1, text: 'What is a token?', options: ['A. one'] }],
        partB: [],
        partC: [{ kind: 'separator' }],
      },
      { subjectCode: 'CS3501', subjectName: 'Compiler Design', session: 'NOV/DEC-2025' },
    );

    expect(text.split('\n')).toEqual([
      'DEGREE EXAMINATIONS, NOV/DEC-2025',
      'CS3501',
      'COMPILER DESIGN',
      `Time: Three Hours${' '.repeat(37)}Maximum Marks: 100`,
      '-'.repeat(72),
      '',
      'PART - A (10 x 1 = 10 Marks)',
      'Answer ALL Questions',
      '',
      'Q1. What is a token?',
      '    A. one',
      '',
      'PART - B (5 x 6 = 30 Marks)',
      'Answer ANY FIVE Questions',
      '',
      '',
      'PART - C (5 x 12 = 60 Marks)',
      'Answer ALL Questions',
      '',
      '(OR)',
      '',
    ]);
  });
});

describe('formatPaperLayout', () => {
  it('formats generated paper text', () => {
    const paper = [
      '**PART A - One Mark Questions (1 x 1 = 1 Marks)**',
      '',
      '**UNIT I**',
      'Q1. What is a token?',
      'A. one',
      '',
      '**PART B - Six Mark Questions (8 x 6 = 48 Marks)**',
      '',
      'Q11. Explain lexing.',
    ].join('\n');

    const lines = formatPaperLayout(paper).split('\n');

    expect(lines.slice(lines.indexOf('PART - A (10 x 1 = 10 Marks)'))).toEqual([
      'PART - A (10 x 1 = 10 Marks)',
      'Answer ALL Questions',
      '',
      'Q1. What is a token?',
      '    A. one',
      '',
      'PART - B (5 x 6 = 30 Marks)',
      'Answer ANY FIVE Questions',
      '',
      'Q11. Explain lexing.',
      '',
      'PART - C (5 x 12 = 60 Marks)',
      'Answer ALL Questions',
      '',
      '',
    ]);
  });
});
