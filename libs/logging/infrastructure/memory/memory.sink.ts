import { Logger } from '@nestjs/common';
import { LogMessage } from '@logging/domain';
import { LogSinkPort } from '@logging/out-ports';
import { SinkKind } from '@logging/value-objects';

/**
 * MemorySink - keeps messages in process memory for the lifetime of the sink.
 */
export class MemorySink extends LogSinkPort {
  private static readonly logger = new Logger(MemorySink.name);

  readonly kind = SinkKind.MEMORY;
  readonly name: string;
  private readonly messages: LogMessage[] = [];

  constructor(name = 'memory') {
    super();
    this.name = name;
  }

  append(message: LogMessage): void {
    this.messages.push(message);
  }

  readAll(): LogMessage[] {
    return [...this.messages];
  }

  override close(): void {
    MemorySink.logger.debug(
      `Released ${this.name} (${this.messages.length} messages)`,
    );
  }
}
