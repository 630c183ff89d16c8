import type { JsonSink } from "@jsonstream/core/contract";

/**
 * Buffers everything written in memory.
 */
export class StringSink implements JsonSink {
  private chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  /**
   * Get the accumulated output.
   */
  toString(): string {
    if (this.chunks.length > 1) {
      this.chunks = [this.chunks.join("")];
    }
    return this.chunks[0] ?? "";
  }
}
