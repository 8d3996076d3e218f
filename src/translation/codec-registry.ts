import type { RequestStyle } from '../capabilities/request-styles.js';
import { AnthropicMessagesCodec } from './codecs/anthropic-messages-codec.js';
import { GeminiGenerateCodec } from './codecs/gemini-generate-codec.js';
import { OpenAIChatCodec } from './codecs/openai-chat-codec.js';
import type { RequestCodec } from './types.js';

/**
 * Codecs are stateless, so one immutable table serves every call.
 */
const CODECS: Readonly<Record<RequestStyle, RequestCodec>> = Object.freeze({
  openai: new OpenAIChatCodec(),
  anthropic: new AnthropicMessagesCodec(),
  gemini: new GeminiGenerateCodec()
});

export function resolveCodec(style: RequestStyle): RequestCodec {
  return CODECS[style];
}

export function listCodecs(): RequestCodec[] {
  return [CODECS.openai, CODECS.anthropic, CODECS.gemini];
}
