export type { RecordStore } from './record-store.js';
