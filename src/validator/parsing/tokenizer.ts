/**
 * Quote-aware scanning of a single line.
 *
 * `"` and `'` both open a quoted span. A quote preceded by a backslash is
 * literal. Inside a span only the quote that opened it can close it.
 */

type QuoteChar = '"' | "'";

interface ScanState {
  inQuotes: boolean;
  quoteChar: QuoteChar | null;
}

const OUTSIDE: ScanState = { inQuotes: false, quoteChar: null };

function isQuote(ch: string): ch is QuoteChar {
  return ch === '"' || ch === "'";
}

function isEscaped(line: string, i: number): boolean {
  return i > 0 && line[i - 1] === "\\";
}

export function countDelimitersOutsideQuotes(
  line: string,
  delimiter: string
): number {
  let count = 0;
  let state = OUTSIDE;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (isQuote(ch) && !isEscaped(line, i)) {
      if (!state.inQuotes) state = { inQuotes: true, quoteChar: ch };
      else if (ch === state.quoteChar) state = OUTSIDE;
    } else if (ch === delimiter && !state.inQuotes) {
      count++;
    }
  }

  return count;
}

/**
 * Splits at unquoted delimiters. Span-delimiting quotes are dropped; a doubled
 * closing quote (`""` inside `"..."`) stays in the field as one quote.
 */
export function splitQuotedLine(line: string, delimiter: string): string[] {
  const fields: string[] = [];
  let current = "";
  let state = OUTSIDE;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];

    if (isQuote(ch) && !isEscaped(line, i)) {
      if (!state.inQuotes) {
        state = { inQuotes: true, quoteChar: ch };
      } else if (ch === state.quoteChar) {
        if (line[i + 1] === ch) {
          current += ch;
          i++;
        } else {
          state = OUTSIDE;
        }
      } else {
        current += ch;
      }
    } else if (ch === delimiter && !state.inQuotes) {
      fields.push(current);
      current = "";
    } else {
      current += ch;
    }
  }

  fields.push(current);
  return fields;
}

/** Quote count minus escaped (`\"`) occurrences of that quote. */
export function quoteBalance(line: string, quote: QuoteChar): number {
  let total = 0;
  let escaped = 0;
  for (let i = 0; i < line.length; i++) {
    if (line[i] !== quote) continue;
    total++;
    if (isEscaped(line, i)) escaped++;
  }
  return total - escaped;
}
