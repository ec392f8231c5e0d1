import { ValidationError } from '../../errors/appErrors';
import { DEFAULT_CHUNK_OPTIONS, splitText } from '../chunker';

describe('splitText', () => {
  it('defaults to 1000 characters with 200 overlap', () => {
    expect(DEFAULT_CHUNK_OPTIONS).toEqual({ chunkSize: 1000, overlap: 200 });
  });

  it('returns a single chunk for short text', () => {
    expect(splitText('A short note.')).toEqual([{ content: 'A short note.', start: 0, end: 13, overlap: 0 }]);
  });

  it('cuts at word boundaries and carries the overlap forward', () => {
    const spans = splitText('alpha beta gamma delta', { chunkSize: 12, overlap: 6 });
    expect(spans.map((span) => span.content)).toEqual(['alpha beta', 'beta gamma', 'gamma delta']);
    expect(spans.map((span) => span.overlap)).toEqual([0, 4, 5]);
    expect(spans.map((span) => [span.start, span.end])).toEqual([
      [0, 11],
      [6, 17],
      [11, 22],
    ]);
  });

  it('measures overlap on the trimmed contents', () => {
    const spans = splitText('alpha beta gamma delta', { chunkSize: 12, overlap: 6 });
    for (let i = 1; i < spans.length; i++) {
      const shared = spans[i].content.slice(0, spans[i].overlap);
      expect(spans[i - 1].content.endsWith(shared)).toBe(true);
    }
    expect(spans[1].content.slice(0, spans[1].overlap)).toBe('beta');
    expect(spans[2].content.slice(0, spans[2].overlap)).toBe('gamma');
  });

  it('reports no overlap when the carried text is only whitespace', () => {
    const spans = splitText('aaaa     bbbbbbbb', { chunkSize: 12, overlap: 3 });
    expect(spans.map((span) => span.content)).toEqual(['aaaa', 'bbbbbbbb']);
    expect(spans.map((span) => span.overlap)).toEqual([0, 0]);
  });

  it('moves the overlap start forward to the next word', () => {
    const spans = splitText('alpha beta gamma delta', { chunkSize: 12, overlap: 4 });
    expect(spans.map((span) => span.content)).toEqual(['alpha beta', 'gamma delta']);
  });

  it('prefers a paragraph break over a later word break', () => {
    const spans = splitText('First para.\n\nSecond para here', { chunkSize: 20, overlap: 0 });
    expect(spans.map((span) => span.content)).toEqual(['First para.', 'Second para here']);
  });

  it('falls back to a hard cut when there is no boundary', () => {
    const spans = splitText('abcdefghijklmnopqrst', { chunkSize: 8, overlap: 2 });
    expect(spans.map((span) => span.content)).toEqual(['abcdefgh', 'ghijklmn', 'mnopqrst']);
    expect(spans.map((span) => span.overlap)).toEqual([0, 2, 2]);
  });

  it('keeps every chunk within the size limit and leaves no gaps', () => {
    const text = Array.from({ length: 120 }, (_, i) => `Sentence number ${i} talks about cells.`).join(' ');
    const spans = splitText(text, { chunkSize: 150, overlap: 30 });
    expect(spans.length).toBeGreaterThan(1);
    for (const span of spans) {
      expect(span.end - span.start).toBeLessThanOrEqual(150);
    }
    for (let i = 1; i < spans.length; i++) {
      expect(spans[i].start).toBeLessThanOrEqual(spans[i - 1].end);
      expect(spans[i].start).toBeGreaterThan(spans[i - 1].start);
    }
    expect(spans[spans.length - 1].end).toBe(text.length);
  });

  it('is deterministic', () => {
    const text = 'One. Two! Three? Four; five, six\nseven\n\neight nine ten '.repeat(20);
    expect(splitText(text, { chunkSize: 64, overlap: 16 })).toEqual(splitText(text, { chunkSize: 64, overlap: 16 }));
  });

  it('drops whitespace-only input', () => {
    expect(splitText('')).toEqual([]);
    expect(splitText(' \n\n \t ')).toEqual([]);
  });

  it.each([
    [{ chunkSize: 100, overlap: 100 }],
    [{ chunkSize: 100, overlap: 150 }],
    [{ chunkSize: 0, overlap: 0 }],
    [{ chunkSize: 100, overlap: -1 }],
  ])('rejects invalid options %p', (options) => {
    expect(() => splitText('text', options)).toThrow(ValidationError);
  });
});
