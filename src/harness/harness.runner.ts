import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { ReadbackVerifier } from "@logging/domain";
import { ConsistencyCheckUseCase } from "@logging/in-ports";
import { FileSink, MemorySink } from "@logging/infrastructure";
import { SinkRegistry } from "@logging/service";
import { HARNESS_CONFIG, HarnessConfig } from "@config";
import { ExitCode } from "./exit-code.vo";

/**
 * HarnessRunner - top-level procedure of the CLI.
 *
 * Builds one sink per backend, sends the configured messages through all of
 * them and turns the outcome into a process exit code. Sinks are owned by the
 * SinkRegistry, which closes them when the application context shuts down.
 */
@Injectable()
export class HarnessRunner {
  private readonly logger = new Logger(HarnessRunner.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly registry: SinkRegistry,
    private readonly consistencyCheck: ConsistencyCheckUseCase,
  ) {}

  run(): ExitCode {
    const { filePath, messages } =
      this.configService.getOrThrow<HarnessConfig>(HARNESS_CONFIG);

    this.registry.register(new MemorySink());

    const opened = FileSink.open(filePath);
    if (!opened.ok) {
      this.logger.error(opened.error.message);
      return ExitCode.FAILURE;
    }
    this.registry.register(opened.sink);

    const report = this.consistencyCheck.run(messages);
    for (const mismatch of report.mismatches) {
      this.logger.error(
        `${mismatch.sink}: ${ReadbackVerifier.describe(mismatch)}`,
      );
    }

    return report.passed ? ExitCode.SUCCESS : ExitCode.FAILURE;
  }
}
