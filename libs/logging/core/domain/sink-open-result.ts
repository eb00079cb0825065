import { SinkError } from './sink.error';

/**
 * Outcome of acquiring a sink that holds an external resource.
 * The caller decides what a failure means (the CLI terminates on it).
 */
export type SinkOpenResult<T> =
  | { ok: true; sink: T }
  | { ok: false; error: SinkError };
