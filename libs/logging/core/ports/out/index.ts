export * from './log-sink.port';
