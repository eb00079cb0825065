import { Injectable } from "@nestjs/common";
import { LogMessage, ReadbackVerifier } from "@logging/domain";
import {
  ConsistencyCheckUseCase,
  SinkMismatch,
  VerificationReport,
} from "@logging/in-ports";
import { appendTo, messagesOf } from "@logging/out-ports";
import { SinkRegistry } from "./sink-registry.service";

/**
 * ConsistencyHarnessService - drives identical input through every sink in
 * the registry and checks each sink reads back exactly that input.
 *
 * Implements ConsistencyCheckUseCase to follow Hexagonal Architecture pattern.
 */
@Injectable()
export class ConsistencyHarnessService extends ConsistencyCheckUseCase {
  constructor(private readonly registry: SinkRegistry) {
    super();
  }

  override broadcast(messages: readonly LogMessage[]): void {
    for (const message of messages) {
      for (const sink of this.registry.sinks()) {
        appendTo(sink, message);
      }
    }
  }

  override verify(expected: readonly LogMessage[]): VerificationReport {
    const mismatches: SinkMismatch[] = [];
    const sinks = this.registry.sinks();

    for (const sink of sinks) {
      const mismatch = ReadbackVerifier.compare(expected, messagesOf(sink));
      if (mismatch) {
        mismatches.push({ sink: sink.name, kind: sink.kind, ...mismatch });
      }
    }

    return {
      passed: mismatches.length === 0,
      checked: sinks.length,
      mismatches,
    };
  }

  override run(messages: readonly LogMessage[]): VerificationReport {
    this.broadcast(messages);
    return this.verify(messages);
  }
}
