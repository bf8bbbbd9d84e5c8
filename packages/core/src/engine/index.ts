// packages/core/src/engine -- Interaction loop and its concurrency helpers

export { EventBus } from './event-bus.js';
export { CancellationToken } from './cancellation.js';
export { DotsIndicator } from './progress-indicator.js';
export type {
  DotsIndicatorOptions,
  ProgressHandle,
  ProgressIndicator,
  TextSink,
} from './progress-indicator.js';
export { createLineSource, collectTurn, collectAll } from './line-source.js';
export type { LineSource } from './line-source.js';
export { ChatLoop } from './chat-loop.js';
export type { ChatLoopDeps, ChatLoopOptions, ChatRunResult, LoopState } from './chat-loop.js';
