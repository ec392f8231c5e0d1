import { ValidationError } from '../errors/appErrors';

export interface ChunkOptions {
  chunkSize: number;
  overlap: number;
}

export interface ChunkSpan {
  content: string;
  start: number;
  end: number;
  /** Characters of content shared with the end of the previous span's content. */
  overlap: number;
}

export const DEFAULT_CHUNK_OPTIONS: ChunkOptions = {
  chunkSize: 1000,
  overlap: 200,
};

/**
 * Boundaries in order of preference. A chunk is cut after the last
 * occurrence of the first separator found in its window.
 */
const SEPARATORS = [
  '\n\n', // paragraphs
  '\n', // lines
  '. ', // sentences
  '! ',
  '? ',
  '; ', // clauses
  ', ',
  ' ', // words
];

function assertOptions({ chunkSize, overlap }: ChunkOptions): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ValidationError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ValidationError(`overlap must be a non-negative integer, got ${overlap}`);
  }
  if (overlap >= chunkSize) {
    throw new ValidationError(`overlap (${overlap}) must be smaller than chunkSize (${chunkSize})`);
  }
}

/**
 * Finds where the window [start, limit) should end. The cut must land past
 * start + overlap so the next window always moves forward.
 */
function findCut(text: string, start: number, limit: number, overlap: number): number {
  const window = text.slice(start, limit);
  for (const separator of SEPARATORS) {
    const idx = window.lastIndexOf(separator);
    if (idx >= 0 && idx + separator.length > overlap) {
      return start + idx + separator.length;
    }
  }
  return limit;
}

// Moves a position forward to the start of the next word, without passing end
function alignToWord(text: string, pos: number, end: number): number {
  if (pos === 0 || /\s/.test(text[pos - 1])) {
    return pos;
  }
  for (let i = pos; i < end; i++) {
    if (/\s/.test(text[i])) {
      return i + 1;
    }
  }
  return pos;
}

/**
 * Splits text into overlapping windows of at most chunkSize characters,
 * cutting at the most natural boundary available and falling back to a hard
 * character cut. Spans that are only whitespace are dropped.
 */
export function splitText(text: string, options: ChunkOptions = DEFAULT_CHUNK_OPTIONS): ChunkSpan[] {
  assertOptions(options);
  const { chunkSize, overlap } = options;
  const spans: ChunkSpan[] = [];

  let start = 0;
  // where the previous span's trimmed content ends
  let previousEnd = 0;
  while (start < text.length) {
    const limit = Math.min(start + chunkSize, text.length);
    const end = limit === text.length ? limit : findCut(text, start, limit, overlap);

    const raw = text.slice(start, end);
    const content = raw.trim();
    if (content) {
      const contentStart = start + (raw.length - raw.trimStart().length);
      spans.push({ content, start, end, overlap: Math.max(0, previousEnd - contentStart) });
      previousEnd = contentStart + content.length;
    }
    if (end === text.length) {
      break;
    }

    start = alignToWord(text, end - overlap, end);
  }

  return spans;
}
