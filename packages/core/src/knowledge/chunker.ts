export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 100;

function validateWindow(size: number, overlap: number): void {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= size) {
    throw new RangeError(`Chunk overlap must be in [0, ${size}), got ${overlap}`);
  }
}

/**
 * Split `content` into fixed character windows of at most `size` characters.
 * Window i+1 starts `size - overlap` characters after window i; the last
 * window may be shorter.
 */
export function splitText(content: string, size: number, overlap: number): string[] {
  validateWindow(size, overlap);

  const chunks: string[] = [];
  const step = size - overlap;
  for (let start = 0; start < content.length; start += step) {
    chunks.push(content.slice(start, start + size));
    if (start + size >= content.length) {
      break;
    }
  }
  return chunks;
}

export class Chunker {
  constructor(
    readonly size: number = DEFAULT_CHUNK_SIZE,
    readonly overlap: number = DEFAULT_CHUNK_OVERLAP
  ) {
    validateWindow(size, overlap);
  }

  split(content: string): string[] {
    return splitText(content, this.size, this.overlap);
  }
}
