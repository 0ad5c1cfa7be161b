export { MemoryDocumentStore } from './memory-store.js'
