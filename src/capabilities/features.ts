/**
 * Closed set of request features, in evaluation order. Diagnostics follow
 * this order.
 */
export const FEATURES = [
  'chat_completion',
  'streaming_chat_completion',
  'images',
  'tools',
  'json_output',
  'reasoning_tokens',
  'top_k',
  'frequency_penalty',
  'presence_penalty',
  'seed',
  'messages'
] as const;

export type Feature = (typeof FEATURES)[number];
