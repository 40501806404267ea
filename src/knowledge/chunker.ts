import crypto from 'crypto';

export interface ChunkOptions {
  size: number;
  overlap: number;
}

export interface TextWindow {
  index: number;
  start: number;
  text: string;
}

/**
 * Split text into fixed-size windows that overlap by `overlap` characters.
 * The last window ends at the end of the text; whitespace-only windows are
 * dropped.
 */
export function splitIntoWindows(text: string, options: ChunkOptions): TextWindow[] {
  const { size, overlap } = options;
  if (size <= 0) throw new RangeError('chunk size must be positive');
  if (overlap < 0 || overlap >= size) {
    throw new RangeError('chunk overlap must be in [0, size)');
  }

  const windows: TextWindow[] = [];
  const step = size - overlap;
  for (let start = 0; start < text.length; start += step) {
    const slice = text.slice(start, start + size);
    if (slice.trim()) {
      windows.push({ index: windows.length, start, text: slice });
    }
    if (start + size >= text.length) break;
  }
  return windows;
}

export function contentHash(text: string): string {
  return crypto.createHash('sha256').update(text).digest('hex');
}

export function chunkId(sourcePath: string, hash: string, index: number): string {
  return crypto
    .createHash('sha256')
    .update(`${sourcePath}\u0000${hash}\u0000${index}`)
    .digest('hex')
    .slice(0, 24);
}
