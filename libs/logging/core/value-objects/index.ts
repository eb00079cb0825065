export enum SinkKind {
  MEMORY = 'MEMORY',
  FILE = 'FILE',
}

/**
 * Error codes raised by the sink library.
 * Open failures are reported through SinkOpenResult; every other code is thrown.
 */
export enum SinkErrorCode {
  SINK_OPEN_FAILED = 'SINK_OPEN_FAILED',
  SINK_READ_FAILED = 'SINK_READ_FAILED',
  SINK_CLOSED = 'SINK_CLOSED',
  REGISTRY_CLOSED = 'REGISTRY_CLOSED',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

/** Line terminator written after every message by line-oriented sinks. */
export const LINE_TERMINATOR = '\n';
