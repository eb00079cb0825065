import { LogMessage, ReadbackMismatch } from "@logging/domain";
import { SinkKind } from "@logging/value-objects";

export interface SinkMismatch extends ReadbackMismatch {
  sink: string;
  kind: SinkKind;
}

export interface VerificationReport {
  passed: boolean;
  /** Number of sinks whose read-back was compared. */
  checked: number;
  mismatches: SinkMismatch[];
}

/**
 * ConsistencyCheckUseCase - Inbound port for driving identical input through
 * every registered sink and verifying each one reproduces it.
 */
export abstract class ConsistencyCheckUseCase {
  /**
   * Append every message to every sink. Messages are the outer loop, so
   * message 1 reaches all sinks before message 2 reaches any.
   */
  abstract broadcast(messages: readonly LogMessage[]): void;

  /**
   * Read each sink back and compare it element-for-element with `expected`.
   */
  abstract verify(expected: readonly LogMessage[]): VerificationReport;

  /**
   * broadcast followed by verify.
   */
  abstract run(messages: readonly LogMessage[]): VerificationReport;
}
