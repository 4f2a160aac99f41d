import type { IProgressReporter } from '../../interfaces/progress-reporter.interface.js';
import type { CompletionEvent, ProgressEvent } from '../../types/index.js';

export interface LineSink {
  write(chunk: string): unknown;
}

export function formatProgressLine(event: ProgressEvent): string {
  return `progress:${JSON.stringify({ batch: event.batch, total: event.total, points: event.points })}`;
}

export function formatDoneLine(event: CompletionEvent): string {
  return `done:${JSON.stringify({ total_points: event.totalPoints })}`;
}

/**
 * Writes the machine-readable run stream: one `progress:` line per batch
 * and a final `done:` line. Callers parse these lines, so nothing else goes
 * to this sink.
 */
export class StdoutProgressReporter implements IProgressReporter {
  constructor(private readonly sink: LineSink = process.stdout) {}

  progress(event: ProgressEvent): void {
    this.sink.write(`${formatProgressLine(event)}\n`);
  }

  done(event: CompletionEvent): void {
    this.sink.write(`${formatDoneLine(event)}\n`);
  }
}
