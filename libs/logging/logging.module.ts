import { Module, Global } from "@nestjs/common";
import { ConsistencyHarnessService, SinkRegistry } from "@logging/service";
import { ConsistencyCheckUseCase } from "@logging/in-ports";

/**
 * LoggingModule - NestJS module for the sink library.
 *
 * Marked @Global() so it is imported once in AppModule. The SinkRegistry it
 * provides closes every registered sink when the module is destroyed.
 */
@Global()
@Module({
  providers: [
    SinkRegistry,
    {
      provide: ConsistencyCheckUseCase,
      useClass: ConsistencyHarnessService,
    },
  ],
  exports: [SinkRegistry, ConsistencyCheckUseCase],
})
export class LoggingModule {}
