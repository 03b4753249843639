/**
 * Response Buffer
 * Append-only output of one lookup, read by the consumer while the lookup is still running.
 *
 * Every mutation and read is a single synchronous call on the event loop, so a reader
 * sees either none or all of an append. Snapshots are copies.
 */

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8');

export class ResponseBuffer {
  private chunks: Uint8Array[] = [];
  private byteLength = 0;
  private errorText: string | undefined;

  append(data: Uint8Array | string): void {
    const bytes = typeof data === 'string' ? encoder.encode(data) : Uint8Array.from(data);
    if (bytes.length === 0) {
      return;
    }
    this.chunks.push(bytes);
    this.byteLength += bytes.length;
  }

  hasAnyData(): boolean {
    return this.byteLength > 0;
  }

  size(): number {
    return this.byteLength;
  }

  setError(message: string): void {
    this.errorText = message;
  }

  getError(): string | undefined {
    return this.errorText;
  }

  /** Copy of everything appended so far. */
  snapshot(): Uint8Array {
    if (this.chunks.length > 1) {
      // Collapse so repeated reads stay linear
      const merged = new Uint8Array(this.byteLength);
      let offset = 0;
      for (const chunk of this.chunks) {
        merged.set(chunk, offset);
        offset += chunk.length;
      }
      this.chunks = [merged];
    }
    return this.chunks.length === 0 ? new Uint8Array(0) : this.chunks[0].slice();
  }

  text(): string {
    return decoder.decode(this.snapshot());
  }
}
