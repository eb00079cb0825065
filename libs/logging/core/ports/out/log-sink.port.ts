import { LogMessage } from '@logging/domain';
import { SinkKind } from '@logging/value-objects';

/**
 * LogSinkPort - the capability every sink backend implements.
 * This contract must not change when a new storage backend is added.
 *
 * Sinks are synchronous and assume a single caller.
 */
export abstract class LogSinkPort {
  abstract readonly kind: SinkKind;

  /** Label used in diagnostics. */
  abstract readonly name: string;

  /** Record a message after every message recorded so far. */
  abstract append(message: LogMessage): void;

  /** Every message recorded so far, in append order. */
  abstract readAll(): LogMessage[];

  /**
   * Release what the sink holds. Sinks without an external resource keep
   * this no-op; overrides must tolerate repeated calls.
   */
  close(): void {}
}

export function appendTo(sink: LogSinkPort, message: LogMessage): void {
  sink.append(message);
}

export function messagesOf(sink: LogSinkPort): LogMessage[] {
  return sink.readAll();
}
