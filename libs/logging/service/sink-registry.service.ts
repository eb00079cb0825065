import { Injectable, Logger, OnModuleDestroy } from "@nestjs/common";
import { SinkError } from "@logging/domain";
import { LogSinkPort } from "@logging/out-ports";

/**
 * SinkRegistry - exclusively owns the sinks of a run.
 *
 * Sinks are kept in registration order and released together when the
 * Nest application context shuts down, whichever way that happens.
 */
@Injectable()
export class SinkRegistry implements OnModuleDestroy {
  private readonly logger = new Logger(SinkRegistry.name);
  private readonly registered: LogSinkPort[] = [];
  private closed = false;

  register<T extends LogSinkPort>(sink: T): T {
    if (this.closed) {
      throw SinkError.registryClosed();
    }
    this.registered.push(sink);
    this.logger.debug(`Registered ${sink.name}`);
    return sink;
  }

  sinks(): readonly LogSinkPort[] {
    return this.registered;
  }

  get size(): number {
    return this.registered.length;
  }

  /**
   * Close every sink in reverse registration order. A failing close does not
   * stop the others; the first failure is rethrown once all were tried.
   */
  closeAll(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    let firstError: unknown;
    for (const sink of [...this.registered].reverse()) {
      try {
        sink.close();
      } catch (error) {
        this.logger.error(
          `Failed to close ${sink.name}: ${error instanceof Error ? error.message : String(error)}`,
        );
        firstError ??= error;
      }
    }
    if (firstError !== undefined) {
      throw firstError;
    }
  }

  onModuleDestroy(): void {
    this.closeAll();
  }
}
