/**
 * Progress Port Interface
 * 
 * Streams structured progress events from the setup pipeline to whatever
 * renders them. The task runner emits events; it never draws a spinner
 * itself, so the wait on a background task is independent of presentation.
 * 
 * Implementations:
 *   - spinnerProgress (CLI): drives an OutputPort spinner per task
 *   - silentProgress (tests/CI): records nothing
 */

import type { OutputPort, UnifiedSpinner } from './output.js';

/** Base event shape -- all events carry a type discriminant and timestamp. */
export interface ProgressEventBase {
  /** ISO 8601 timestamp of when the event was emitted. */
  timestamp: string;
}

/** Background task events emitted by the task runner. */
export type TaskProgressEvent =
  | { type: 'task:start'; label: string; critical: boolean }
  | { type: 'task:complete'; label: string; success: boolean; message: string };

/** Setup phase lifecycle events. */
export type PhaseProgressEvent =
  | { type: 'phase:start'; phase: string }
  | { type: 'phase:complete'; phase: string };

/** Union of all progress event types. */
export type ProgressEvent = ProgressEventBase & (TaskProgressEvent | PhaseProgressEvent);

/** Event payload as passed to emit(); the timestamp is added by the emitter. */
export type ProgressEventInput = TaskProgressEvent | PhaseProgressEvent;

export interface ProgressPort {
  emit(event: ProgressEvent): void;
}

export function createProgressEvent(event: ProgressEventInput): ProgressEvent {
  return { ...event, timestamp: new Date().toISOString() };
}

export const silentProgress: ProgressPort = {
  emit(): void {
    // Intentionally quiet
  },
};

/**
 * ProgressPort that shows a spinner for every running task. Exactly one
 * background task runs at a time, so a single active spinner suffices.
 */
export function createSpinnerProgress(output: OutputPort): ProgressPort {
  let active: UnifiedSpinner | null = null;

  return {
    emit(event: ProgressEvent): void {
      switch (event.type) {
        case 'task:start':
          active?.stop();
          active = output.spinner();
          active.start(event.label);
          break;
        case 'task:complete':
          if (active) {
            active.stop();
            active = null;
          }
          break;
        case 'phase:start':
          output.step(`=== ${event.phase} ===`);
          break;
        case 'phase:complete':
          break;
      }
    },
  };
}
