import { describe, expect, it } from 'vitest';
import {
  parseQuestionMarker,
  renderQuestion,
  renumberQuestion,
  splitDescriptiveCandidates,
  splitMcqCandidates,
} from '../parseQuestions';

describe('splitMcqCandidates', () => {
  it('splits on blank lines and keeps chunks with an early Q', () => {
    const raw = [
      'Here are your questions:',
      '',
      'Q1. What is a token?',
      'A. One',
      'B. Two',
      '',
      '   ',
      'Q2. What is a lexeme?',
      'A. Three',
    ].join('\n');

    expect(splitMcqCandidates(raw)).toEqual([
      'Q1. What is a token?\nA. One\nB. Two',
      'Q2. What is a lexeme?\nA. Three',
    ]);
  });

  it('ignores a chunk whose Q appears after the first 10 characters', () => {
    expect(splitMcqCandidates('Some preamble Q here')).toEqual([]);
  });

  it('returns nothing for empty text', () => {
    expect(splitMcqCandidates('  \n\n ')).toEqual([]);
  });
});

describe('splitDescriptiveCandidates', () => {
  it('joins continuation lines and drops leading text', () => {
    const raw = [
      'Sure, here they are:',
      'Q1. Explain parsing',
      'with an example.',
      '',
      'Q2. Describe lexical analysis.',
    ].join('\n');

    expect(splitDescriptiveCandidates(raw)).toEqual([
      'Q1. Explain parsing with an example.',
      'Q2. Describe lexical analysis.',
    ]);
  });

  it('trims indented question lines', () => {
    expect(splitDescriptiveCandidates('   Q1. First\n  Q2. Second  ')).toEqual([
      'Q1. First',
      'Q2. Second',
    ]);
  });
});

describe('parseQuestionMarker', () => {
  it('keeps everything after the first dot verbatim', () => {
    expect(parseQuestionMarker('Q3. What is a DFA?\nA. x\nB. y')).toEqual({
      marker: 'Q3',
      body: ' What is a DFA?\nA. x\nB. y',
    });
  });

  it('returns only following lines when the marker has no dot', () => {
    expect(parseQuestionMarker('Q3 What\nA. x')).toEqual({ marker: 'Q3 What', body: '\nA. x' });
  });

  it('skips text before the marker', () => {
    expect(parseQuestionMarker('1) Q4. Define grammar.').body).toBe(' Define grammar.');
  });

  it('drops stray digits from a decimal marker when asked', () => {
    expect(
      parseQuestionMarker('Q17.5017 Explain clustering.', { stripDecimalMarker: true }),
    ).toEqual({ marker: 'Q17.5017', body: ' Explain clustering.' });
  });

  it('treats a decimal marker normally without the option', () => {
    expect(parseQuestionMarker('Q17.5017 Explain clustering.').body).toBe(
      '5017 Explain clustering.',
    );
  });

  it('gives an empty body for a bare decimal marker', () => {
    expect(parseQuestionMarker('Q12.34', { stripDecimalMarker: true }).body).toBe('');
  });
});

describe('renumberQuestion', () => {
  it('renders the malformed six-mark marker with the new number', () => {
    expect(renumberQuestion('Q17.5017 Explain clustering.', 14, { stripDecimalMarker: true })).toBe(
      'Q14. Explain clustering.',
    );
  });

  it('preserves the body byte for byte', () => {
    const candidate = 'Q9.  Compare  LL(1)\tand LR(1).\nA. yes\nB. no';
    expect(renumberQuestion(candidate, 2)).toBe('Q2.  Compare  LL(1)\tand LR(1).\nA. yes\nB. no');
  });
});

describe('renderQuestion', () => {
  it('concatenates marker and body', () => {
    expect(renderQuestion(5, ' Body')).toBe('Q5. Body');
  });
});
