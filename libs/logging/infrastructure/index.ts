export { MemorySink } from './memory/memory.sink';
export { FileSink } from './file/file.sink';
