import { InputError } from '../utils/errors';

export interface Chunk {
  index: number;
  text: string;
  start: number; // offset of the first character in the source text
  end: number; // exclusive
}

export interface ChunkingOptions {
  chunkSize: number;
  overlap: number;
  /** Pull window ends back to paragraph/sentence/line breaks. Default true. */
  respectBoundaries?: boolean;
}

export class ChunkingService {
  constructor(private readonly defaults: ChunkingOptions) {
    ChunkingService.validate(defaults);
  }

  /**
   * Splits `text` into windows of at most `chunkSize` characters. Consecutive
   * chunks share exactly `overlap` characters, so dropping the first `overlap`
   * characters of every chunk after the first and concatenating gives back the
   * input unchanged.
   *
   * The result is lazy and restartable: each iteration walks the text again.
   */
  chunkText(text: string, options: Partial<ChunkingOptions> = {}): Iterable<Chunk> {
    const resolved: ChunkingOptions = { ...this.defaults, ...options };
    ChunkingService.validate(resolved);
    const findEnd = (start: number) => this.windowEnd(text, start, resolved);

    return {
      *[Symbol.iterator](): Iterator<Chunk> {
        let start = 0;
        let index = 0;

        while (start < text.length) {
          const end = findEnd(start);
          yield { index, text: text.substring(start, end), start, end };
          if (end >= text.length) {
            return;
          }
          index++;
          start = end - resolved.overlap;
        }
      }
    };
  }

  /** Reassembles chunk texts produced with the given overlap. */
  static reconstruct(chunks: Iterable<Chunk>, overlap: number): string {
    let text = '';
    let first = true;
    for (const chunk of chunks) {
      text += first ? chunk.text : chunk.text.slice(overlap);
      first = false;
    }
    return text;
  }

  private windowEnd(text: string, start: number, options: ChunkingOptions): number {
    const { chunkSize, overlap } = options;
    const hardEnd = Math.min(start + chunkSize, text.length);
    if (hardEnd === text.length || options.respectBoundaries === false) {
      return hardEnd;
    }

    // A break only counts if the chunk stays longer than the overlap,
    // otherwise the next window would not move forward.
    const minEnd = start + Math.max(Math.floor(chunkSize * 0.5), overlap + 1);

    const paragraphBreak = text.lastIndexOf('\n\n', hardEnd - 2);
    if (paragraphBreak >= 0 && paragraphBreak + 2 > minEnd) {
      return paragraphBreak + 2;
    }
    const sentenceBreak = text.lastIndexOf('. ', hardEnd - 2);
    if (sentenceBreak >= 0 && sentenceBreak + 2 > minEnd) {
      return sentenceBreak + 2;
    }
    const lineBreak = text.lastIndexOf('\n', hardEnd - 1);
    if (lineBreak >= 0 && lineBreak + 1 > minEnd) {
      return lineBreak + 1;
    }
    return hardEnd;
  }

  private static validate(options: ChunkingOptions): void {
    const { chunkSize, overlap } = options;
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new InputError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }
    if (!Number.isInteger(overlap) || overlap < 0 || overlap >= chunkSize) {
      throw new InputError(`overlap must be an integer in [0, ${chunkSize}), got ${overlap}`);
    }
  }
}
