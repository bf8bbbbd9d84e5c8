// packages/core/src/memory/index.ts -- barrel re-export

export { SessionStore } from './session-store.js';
export type { TranscriptStore } from './session-store.js';
