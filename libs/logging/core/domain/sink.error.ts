import { SinkErrorCode } from '../value-objects';

export class SinkError extends Error {
  constructor(
    public readonly code: SinkErrorCode,
    message: string,
    public readonly path?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = SinkError.name;
  }

  static openFailed(path: string, cause: unknown): SinkError {
    return new SinkError(
      SinkErrorCode.SINK_OPEN_FAILED,
      `Failed to open file: ${path}`,
      path,
      { cause },
    );
  }

  static readFailed(path: string, cause: unknown): SinkError {
    return new SinkError(
      SinkErrorCode.SINK_READ_FAILED,
      `Failed to read file: ${path}`,
      path,
      { cause },
    );
  }

  static closed(name: string): SinkError {
    return new SinkError(
      SinkErrorCode.SINK_CLOSED,
      `Sink ${name} is closed`,
    );
  }

  static registryClosed(): SinkError {
    return new SinkError(
      SinkErrorCode.REGISTRY_CLOSED,
      'Cannot register a sink after the registry was closed',
    );
  }

  static invalidConfig(constraints: string[]): SinkError {
    return new SinkError(
      SinkErrorCode.INVALID_CONFIG,
      `Invalid harness configuration: ${constraints.join('; ')}`,
    );
  }
}
