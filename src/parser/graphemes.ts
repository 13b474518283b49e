const segmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

/** Split into user-perceived characters (extended grapheme clusters). */
export function splitGraphemes(text: string): string[] {
  return Array.from(segmenter.segment(text), (s) => s.segment);
}

/**
 * One-pass cursor over pre-split graphemes. No backtracking: the position only
 * moves forward.
 */
export class GraphemeCursor {
  private readonly graphemes: string[];
  private index = 0;

  constructor(input: string | string[]) {
    this.graphemes = typeof input === 'string' ? splitGraphemes(input) : [...input];
  }

  get done(): boolean {
    return this.index >= this.graphemes.length;
  }

  get position(): number {
    return this.index;
  }

  peek(): string | undefined {
    return this.graphemes[this.index];
  }

  advance(): string | undefined {
    const g = this.graphemes[this.index];
    if (g !== undefined) this.index++;
    return g;
  }

  /** Consume up to `n` graphemes; fewer when the input runs out. */
  take(n: number): string[] {
    const out = this.graphemes.slice(this.index, this.index + n);
    this.index += out.length;
    return out;
  }

  rest(): string[] {
    return this.take(this.graphemes.length - this.index);
  }
}
