import {getLogEvents} from './prefs';

/**
 * All the kinds of events we log.
 */
export enum EventType {
  // The person did something.
  ACTION = 'sudoku_action',

  // The computer did something.
  SYSTEM = 'sudoku_system',

  // Something bad happened.
  ERROR = 'sudoku_error',
}

/**
 * Extra information we might include with an event.
 */
export declare interface EventParams {
  category?: string;
  detail?: string;
  elapsedMs?: number;
}

/** Receives every logged event. */
export type EventSink = (event: EventType, params: EventParams) => void;

/**
 * Writes events to stderr as JSON lines, when the prefs ask for it.  Stdout
 * belongs to the terminal view.
 */
function stderrSink(event: EventType, params: EventParams) {
  if (!getLogEvents()) return;
  process.stderr.write(`${JSON.stringify({event, ...params})}\n`);
}

let sink: EventSink = stderrSink;

/**
 * Replaces the event sink, and returns the previous one so it can be put back.
 */
export function setEventSink(newSink: EventSink): EventSink {
  const prev = sink;
  sink = newSink;
  return prev;
}

/**
 * Logs something that happened.
 * @param event What happened.
 */
export function logEvent(event: EventType, params: EventParams = {}) {
  sink(event, params);
}
