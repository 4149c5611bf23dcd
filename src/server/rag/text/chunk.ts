export interface ChunkOptions {
  size: number;
  overlap: number;
}

export interface TextChunk {
  chunkIndex: number;
  text: string;
  charStart: number;
  charEnd: number;
}

export function assertChunkOptions(opts: ChunkOptions): ChunkOptions {
  const { size, overlap } = opts;
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`chunk size must be a positive integer (got ${size})`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= size) {
    throw new RangeError(`chunk overlap must satisfy 0 <= overlap < size (got ${overlap}, size ${size})`);
  }
  return { size, overlap };
}

/**
 * Fixed-size character windows. Each window starts `size - overlap` characters
 * after the previous one; the last window may be shorter and always reaches the
 * end of the input.
 */
export function chunkText(input: string, opts: ChunkOptions): TextChunk[] {
  const { size, overlap } = assertChunkOptions(opts);
  const text = String(input ?? "");
  if (!text) { return []; }

  const out: TextChunk[] = [];
  const stride = size - overlap;
  let start = 0;

  while (start < text.length) {
    const end = Math.min(text.length, start + size);
    out.push({ chunkIndex: out.length, text: text.slice(start, end), charStart: start, charEnd: end });
    if (end >= text.length) { break; }
    start += stride;
  }

  return out;
}

export function chunk(text: string, size: number, overlap: number): string[] {
  return chunkText(text, { size, overlap }).map((c) => c.text);
}

/** Inverse of chunkText for spans produced with the same overlap. */
export function reassemble(spans: string[], overlap: number): string {
  let out = "";
  spans.forEach((span, i) => {
    out += i === 0 ? span : span.slice(overlap);
  });
  return out;
}
