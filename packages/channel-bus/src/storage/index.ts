export type { ChannelTransport } from './adapter.js';
export { MemoryTransport } from './memory.js';
export { FileTransport } from './file.js';
