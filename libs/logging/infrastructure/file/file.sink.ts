import { Logger } from '@nestjs/common';
import {
  closeSync,
  fsyncSync,
  openSync,
  readFileSync,
  writeSync,
} from 'fs';
import { LogMessage, SinkError, SinkOpenResult } from '@logging/domain';
import { LogSinkPort } from '@logging/out-ports';
import { LINE_TERMINATOR, SinkKind } from '@logging/value-objects';

/**
 * FileSink - Infrastructure implementation of LogSinkPort.
 * Appends one message per line to a local file and reads the file back on demand.
 *
 * The write handle stays open for the lifetime of the sink. Every readAll()
 * opens its own read-only handle, so reads never disturb the writer.
 */
export class FileSink extends LogSinkPort {
  private static readonly logger = new Logger(FileSink.name);

  readonly kind = SinkKind.FILE;
  readonly name: string;
  private writeFd: number | null;

  private constructor(
    private readonly filePath: string,
    writeFd: number,
  ) {
    super();
    this.name = `file:${filePath}`;
    this.writeFd = writeFd;
  }

  /**
   * Create or truncate the backing file and keep it open for writing.
   * Fails fast: no retry and no fallback path.
   */
  static open(filePath: string): SinkOpenResult<FileSink> {
    try {
      const fd = openSync(filePath, 'w');
      FileSink.logger.debug(`Opened ${filePath} for writing`);
      return { ok: true, sink: new FileSink(filePath, fd) };
    } catch (error) {
      return { ok: false, error: SinkError.openFailed(filePath, error) };
    }
  }

  get path(): string {
    return this.filePath;
  }

  get isClosed(): boolean {
    return this.writeFd === null;
  }

  /**
   * Write the message and its terminator, then flush to disk before returning.
   */
  append(message: LogMessage): void {
    if (this.writeFd === null) {
      throw SinkError.closed(this.name);
    }
    writeSync(this.writeFd, message + LINE_TERMINATOR);
    fsyncSync(this.writeFd);
  }

  readAll(): LogMessage[] {
    let content: string;
    try {
      const readFd = openSync(this.filePath, 'r');
      try {
        content = readFileSync(readFd, 'utf8');
      } finally {
        closeSync(readFd);
      }
    } catch (error) {
      throw SinkError.readFailed(this.filePath, error);
    }
    return FileSink.splitLines(content);
  }

  override close(): void {
    if (this.writeFd === null) {
      return;
    }
    const fd = this.writeFd;
    this.writeFd = null;
    closeSync(fd);
    FileSink.logger.debug(`Closed ${this.filePath}`);
  }

  /**
   * Split file content into messages. The piece after the final terminator
   * is not a message.
   */
  static splitLines(content: string): LogMessage[] {
    if (content.length === 0) {
      return [];
    }
    const lines = content.split(LINE_TERMINATOR);
    if (lines[lines.length - 1] === '') {
      lines.pop();
    }
    return lines;
  }
}
