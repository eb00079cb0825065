export * from './log-message';
export * from './sink.error';
export * from './sink-open-result';
export * from './readback';
