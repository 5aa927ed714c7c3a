export { createMemoryCliIo, type MemoryCliIo, type MemoryCliIoOptions } from './memory-cli-io.js';
