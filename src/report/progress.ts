import type { ProgressEvent } from '../pipeline/dispatcher.js';

export interface ProgressStream {
  isTTY?: boolean;
  write(chunk: string): boolean;
}

const CLEAR_LINE = '\r\u001b[K';

/**
 * `Processing domains: <done>/<total>` on stderr. Redraws in place on a
 * terminal, one line per update otherwise. Call clear() before printing to
 * stdout so a half-drawn line never prefixes a report.
 */
export class ProgressLine {
  private pending = false;

  constructor(
    private readonly stream: ProgressStream = process.stderr,
    private readonly label = 'Processing domains'
  ) {}

  render(event: Pick<ProgressEvent, 'completed' | 'total'>): string {
    return `${this.label}: ${event.completed}/${event.total}`;
  }

  update(event: ProgressEvent): void {
    const line = this.render(event);
    if (this.stream.isTTY) {
      const done = event.completed >= event.total;
      this.stream.write(`${CLEAR_LINE}${line}${done ? '\n' : ''}`);
      this.pending = !done;
    } else {
      this.stream.write(`${line}\n`);
    }
  }

  clear(): void {
    if (this.pending) {
      this.stream.write(CLEAR_LINE);
      this.pending = false;
    }
  }
}
