/**
 * Line buffer for text arriving in arbitrary chunks from a child process pipe.
 *
 * Chunks may split a line, or a UTF-8 multi-byte character, anywhere. The
 * buffer accumulates partial data and yields complete, trimmed, non-empty
 * lines. ffmpeg terminates its stderr status lines with `\r`, so both `\r`
 * and `\n` end a line.
 */
export class LineBuffer {
  private buffer = "";
  private decoder = new TextDecoder("utf-8", { fatal: false });

  /** Feed raw bytes or a string; returns the lines completed by this chunk. */
  feed(chunk: string | Uint8Array): string[] {
    const text = typeof chunk === "string" ? chunk : this.decoder.decode(chunk, { stream: true });
    this.buffer += text;

    const lines: string[] = [];
    let breakIdx = this.buffer.search(/[\r\n]/);
    while (breakIdx !== -1) {
      const line = this.buffer.slice(0, breakIdx).trim();
      this.buffer = this.buffer.slice(breakIdx + 1);
      if (line) lines.push(line);
      breakIdx = this.buffer.search(/[\r\n]/);
    }

    return lines;
  }

  /** Return whatever is left without a terminator (e.g. on process exit). */
  flush(): string | null {
    const remaining = this.buffer.trim();
    this.buffer = "";
    return remaining || null;
  }

  reset(): void {
    this.buffer = "";
  }

  /** Current buffer size in characters. */
  get size(): number {
    return this.buffer.length;
  }
}
