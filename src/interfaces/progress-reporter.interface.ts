import type { CompletionEvent, ProgressEvent } from '../types/index.js';

/**
 * Receiver of the structured run outcome.
 * `progress` fires once per completed batch, `done` once after the last one.
 */
export interface IProgressReporter {
  progress(event: ProgressEvent): void;
  done(event: CompletionEvent): void;
}
