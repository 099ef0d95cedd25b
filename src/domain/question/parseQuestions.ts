/**
 * Question Parsing and Renumbering
 *
 * Splits raw generated text into candidate questions and separates each
 * candidate's "Q<n>." marker from its body.
 */

/**
 * Malformed marker such as "Q17.5017 Explain clustering."
 */
const DECIMAL_MARKER_PATTERN = /^Q\d+\.\d+/;

/**
 * Split an MCQ response into candidates: blank-line separated chunks with a
 * "Q" in their first 10 characters
 */
export function splitMcqCandidates(raw: string): string[] {
  return raw
    .trim()
    .split(/\n\s*\n/)
    .map((chunk) => chunk.trim())
    .filter((chunk) => chunk.length > 0 && chunk.slice(0, 10).includes('Q'));
}

/**
 * Split a descriptive response into candidates: each line starting with "Q"
 * opens a question; following non-empty lines are joined onto it with spaces.
 * Lines before the first question are dropped.
 */
export function splitDescriptiveCandidates(raw: string): string[] {
  const questions: string[] = [];
  let current = '';

  for (const rawLine of raw.trim().split('\n')) {
    const line = rawLine.trim();
    if (line.startsWith('Q')) {
      if (current) {
        questions.push(current.trim());
      }
      current = line;
    } else if (current && line) {
      current += ` ${line}`;
    }
  }

  if (current) {
    questions.push(current.trim());
  }

  return questions;
}

/**
 * A candidate split at its question marker
 */
export interface ParsedQuestion {
  /** The marker as written by the model, e.g. "Q3" or "Q17.5017" */
  marker: string;
  /** Everything after the marker, rendered after the new number */
  body: string;
}

/**
 * Split a candidate into marker and body. The body is everything after the
 * first "." of the marker line, verbatim, followed by any further lines; a
 * marker line without "." leaves only the further lines.
 *
 * With `stripDecimalMarker`, a "Q<n>.<digits>" marker swallows the digits and
 * the body becomes " <rest>", so it renders as "Q<new>. <rest>".
 */
export function parseQuestionMarker(
  candidate: string,
  options: { stripDecimalMarker?: boolean } = {},
): ParsedQuestion {
  const text = candidate.trim();
  const markerIndex = text.indexOf('Q');
  const fromMarker = markerIndex === -1 ? text : text.slice(markerIndex);

  const newlineIndex = fromMarker.indexOf('\n');
  const markerLine = newlineIndex === -1 ? fromMarker : fromMarker.slice(0, newlineIndex);
  const rest = newlineIndex === -1 ? '' : fromMarker.slice(newlineIndex);

  if (options.stripDecimalMarker) {
    const match = DECIMAL_MARKER_PATTERN.exec(markerLine);
    if (match) {
      const remainder = markerLine.slice(match[0].length).trim();
      return { marker: match[0], body: (remainder ? ` ${remainder}` : '') + rest };
    }
  }

  const dotIndex = markerLine.indexOf('.');
  if (dotIndex === -1) {
    return { marker: markerLine, body: rest };
  }
  return { marker: markerLine.slice(0, dotIndex), body: markerLine.slice(dotIndex + 1) + rest };
}

/**
 * Render a numbered question
 */
export function renderQuestion(number: number, body: string): string {
  return `Q${number}.${body}`;
}

/**
 * Replace a candidate's marker number, keeping its body verbatim
 */
export function renumberQuestion(
  candidate: string,
  number: number,
  options: { stripDecimalMarker?: boolean } = {},
): string {
  return renderQuestion(number, parseQuestionMarker(candidate, options).body);
}
