export * from './types.js';
export { FileHistoryStore } from './file.js';
export { MemoryHistoryStore } from './memory.js';
