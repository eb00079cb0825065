/**
 * Public API exports for the sink library.
 * This allows clean imports: import { LoggingModule, FileSink } from '@logging'
 */

// Module
export { LoggingModule } from './logging.module';

// Ports
export { LogSinkPort, appendTo, messagesOf } from './core/ports/out';
export { ConsistencyCheckUseCase } from './core/ports/in';
export type { SinkMismatch, VerificationReport } from './core/ports/in';

// Domain
export * from './core/domain';
export * from './core/value-objects';

// Sinks
export { MemorySink, FileSink } from './infrastructure';

// Services
export { SinkRegistry, ConsistencyHarnessService } from './service';
