export type { TaskResultStore } from './types.js';
export { RETURN_VALUE_KEY } from './types.js';
export { MemoryTaskResultStore } from './memory-store.js';
export { FileTaskResultStore } from './file-store.js';
