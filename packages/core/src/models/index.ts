// packages/core/src/models -- Completion endpoint client

export { CompletionClient, parseCompletion, describeFailure } from './completion-client.js';
export type { Completer, CompletionClientOptions, FetchLike } from './completion-client.js';
