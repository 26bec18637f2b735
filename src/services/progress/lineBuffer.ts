const LINE_BREAK = /\r\n|\n|\r/;

/**
 * Accumulates decoded output and hands back only complete lines.
 * yt-dlp redraws progress with a bare carriage return, so `\r` ends a line too.
 */
export class LineBuffer {
  private pending = '';

  push(chunk: string): string[] {
    this.pending += chunk;
    const parts = this.pending.split(LINE_BREAK);
    this.pending = parts.pop() ?? '';
    // A "\r\n" pair split across two chunks leaves an empty part behind
    return parts.filter((line) => line.length > 0);
  }

  // End of stream terminates whatever is left
  flush(): string[] {
    const rest = this.pending;
    this.pending = '';
    return rest.length > 0 ? [rest] : [];
  }
}
