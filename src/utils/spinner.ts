/**
 * Ora-backed spinner used by the plain (non-clack) output adapter.
 *
 * Wraps the `ora` package behind .start / .update / .stop so the output
 * ports never touch ora directly.
 */

import ora, { type Ora } from 'ora';

export class Spinner {
  private spinner: Ora;

  constructor(message: string = 'Loading...') {
    // '-\|/' cycle at 100ms
    this.spinner = ora({ text: message, spinner: 'line' });
  }

  start(): void {
    this.spinner.start();
  }

  update(message: string): void {
    this.spinner.text = message;
  }

  /** Stop the spinner and clear its line */
  stop(): void {
    this.spinner.stop();
  }
}
