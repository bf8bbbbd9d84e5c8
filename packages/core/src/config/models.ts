// packages/core/src/config/models.ts -- Bots served by the completions endpoint

export const MODELS = [
  'Assistant',
  'Web-Search',
  'Claude-Opus-4.1',
  'Claude-Sonnet-4',
  'GPT-5',
  'GPT-5-Chat',
  'GPT-5-mini',
  'Gemini-2.5-Pro',
  'Grok-4',
] as const;

export type ModelName = (typeof MODELS)[number];

export const DEFAULT_MODEL: ModelName = MODELS[0];

export function isModelName(value: string): value is ModelName {
  return MODELS.some((model) => model === value);
}
