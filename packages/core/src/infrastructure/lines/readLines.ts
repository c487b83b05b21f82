import { StringDecoder } from 'node:string_decoder';

/** One physical line of input with its 1-based position. */
export interface NumberedLine {
  readonly lineNumber: number;
  readonly text: string;
}

const LINE_BREAK = /\r\n|\r|\n/g;

/**
 * Reassemble arbitrary text chunks into numbered lines.
 *
 * `\n`, `\r\n` and a bare `\r` all end a line. A trailing line without a line
 * break is still yielded; the empty string after a final break is not. Only the
 * current partial line is buffered.
 */
export async function* readLines(chunks: AsyncIterable<string | Buffer>): AsyncGenerator<NumberedLine, void, undefined> {
  const decoder = new StringDecoder('utf-8');
  let pending = '';
  let lineNumber = 0;

  for await (const chunk of chunks) {
    // Buffer chunks may split a multi-byte character; the decoder holds the tail back.
    pending += typeof chunk === 'string' ? chunk : decoder.write(chunk);

    const { lines, rest } = takeCompleteLines(pending, false);
    for (const text of lines) {
      lineNumber++;
      yield { lineNumber, text };
    }
    pending = rest;
  }

  const { lines, rest } = takeCompleteLines(pending + decoder.end(), true);
  if (rest.length > 0) lines.push(rest);
  for (const text of lines) {
    lineNumber++;
    yield { lineNumber, text };
  }
}

/** Split text that is already in memory on any line break; a final break adds no empty line. */
export function splitLines(text: string): string[] {
  const { lines, rest } = takeCompleteLines(text, true);
  if (rest.length > 0) lines.push(rest);
  return lines;
}

/** Synchronous counterpart of {@link readLines} for lines already split. */
export function* numberLines(lines: Iterable<string>): Generator<NumberedLine, void, undefined> {
  let lineNumber = 0;
  for (const line of lines) {
    lineNumber++;
    yield { lineNumber, text: line.endsWith('\r') ? line.slice(0, -1) : line };
  }
}

/**
 * A `\r` at the very end of unfinished input may be the first half of `\r\n`,
 * so it stays in `rest` until more text arrives.
 */
function takeCompleteLines(text: string, final: boolean): { lines: string[]; rest: string } {
  const lines: string[] = [];
  let start = 0;

  for (const match of text.matchAll(LINE_BREAK)) {
    const index = match.index ?? 0;
    if (!final && match[0] === '\r' && index === text.length - 1) break;
    lines.push(text.slice(start, index));
    start = index + match[0].length;
  }

  return { lines, rest: text.slice(start) };
}
