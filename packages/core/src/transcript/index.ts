// packages/core/src/transcript/index.ts -- barrel re-export

export { appendUserTurn, appendAssistantTurn } from './builder.js';
