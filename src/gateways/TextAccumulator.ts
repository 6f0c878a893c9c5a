/**
 * Accumulation buffer for incrementally delivered text.
 * Chunks are kept in arrival order; the text can only be read once the
 * producer has signalled that the stream is complete.
 */

export class TextAccumulator {
  private chunks: string[] = [];
  private completed = false;

  append(chunk: string): void {
    if (this.completed) {
      throw new Error('Cannot append to a completed stream');
    }
    this.chunks.push(chunk);
  }

  complete(): void {
    this.completed = true;
  }

  get isComplete(): boolean {
    return this.completed;
  }

  text(): string {
    if (!this.completed) {
      throw new Error('Stream has not completed');
    }
    return this.chunks.join('');
  }
}
