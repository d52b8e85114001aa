/**
 * Reassembles arbitrarily split text fragments into complete lines. Whatever
 * follows the last newline stays buffered until more text arrives or the stream
 * is flushed.
 */
export class SseLineBuffer {
  private buffer = '';

  push(fragment: string): string[] {
    this.buffer += fragment;
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';
    return lines.map(stripCarriageReturn);
  }

  flush(): string[] {
    const rest = this.buffer;
    this.buffer = '';
    return rest ? [stripCarriageReturn(rest)] : [];
  }

  get pending(): string {
    return this.buffer;
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}
