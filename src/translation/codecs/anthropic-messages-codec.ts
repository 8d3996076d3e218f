/**
 * Anthropic Messages codec
 *
 * system 消息提升为顶层 system 字段; max_tokens 为必填项
 */

import { ENGINE_DEFAULTS } from '../../constants/index.js';
import type { ContentPart, JsonObject, JsonValue, PromptSpec, ToolChoice } from '../../spec/types.js';
import { isPlainObject, readArray } from '../../utils/json-guards.js';
import type { CodecContext, FinishReason, NormalizedResponse, RequestCodec } from '../types.js';
import { readStringOrNull, readUsage, setIfDefined, splitSystem, toJsonArray } from './codec-utils.js';

export class AnthropicMessagesCodec implements RequestCodec {
  readonly id = 'anthropic' as const;

  encodeRequest(prompt: PromptSpec, context: CodecContext): JsonObject {
    const { system, rest } = splitSystem(prompt.messages);
    const body: JsonObject = { model: context.modelId };
    setIfDefined(body, 'system', system);
    body.messages = rest.map((message) => ({
      role: message.role,
      content: encodeContent(message.content)
    }));

    const { sampling, limits } = prompt;
    body.max_tokens = limits.maxOutputTokens ?? ENGINE_DEFAULTS.ANTHROPIC_MAX_TOKENS;
    setIfDefined(body, 'temperature', sampling.temperature);
    setIfDefined(body, 'top_p', sampling.topP);
    setIfDefined(body, 'top_k', sampling.topK);
    setIfDefined(body, 'stop_sequences', toJsonArray(sampling.stop));

    if (prompt.tools.length > 0) {
      body.tools = prompt.tools.map((tool) => {
        const entry: JsonObject = { name: tool.name };
        setIfDefined(entry, 'description', tool.description);
        entry.input_schema = tool.jsonSchema;
        return entry;
      });
      setIfDefined(body, 'tool_choice', encodeToolChoice(prompt.toolChoice));
    }
    if (limits.reasoningTokens !== undefined) {
      body.thinking = { type: 'enabled', budget_tokens: limits.reasoningTokens };
    }
    if (context.stream) {
      body.stream = true;
    }
    return body;
  }

  normalizeResponse(payload: unknown): NormalizedResponse | undefined {
    if (!isPlainObject(payload)) {
      return undefined;
    }
    const blocks = readArray(payload, 'content');
    if (!blocks || (payload.type !== 'message' && payload.role !== 'assistant')) {
      return undefined;
    }
    const texts = blocks
      .filter(isPlainObject)
      .filter((block) => block.type === 'text' && typeof block.text === 'string')
      .map((block) => String(block.text));
    return {
      content: texts.length > 0 ? texts.join('') : null,
      role: 'assistant',
      finishReason: mapStopReason(payload.stop_reason),
      usage: readUsage(payload.usage, { input: 'input_tokens', output: 'output_tokens' }),
      model: readStringOrNull(payload, 'model'),
      id: readStringOrNull(payload, 'id')
    };
  }
}

function encodeContent(parts: ContentPart[]): JsonValue {
  const [only] = parts;
  if (parts.length === 1 && only.type === 'text') {
    return only.text;
  }
  return parts.map((part): JsonObject => {
    if (part.type === 'text') {
      return { type: 'text', text: part.text };
    }
    const source: JsonObject = part.url
      ? { type: 'url', url: part.url }
      : { type: 'base64', media_type: part.mediaType, data: part.data ?? '' };
    return { type: 'image', source };
  });
}

function encodeToolChoice(choice: ToolChoice | undefined): JsonValue | undefined {
  switch (choice) {
    case undefined:
      return undefined;
    case 'auto':
      return { type: 'auto' };
    case 'required':
      return { type: 'any' };
    case 'none':
      return { type: 'none' };
    default:
      return { type: 'tool', name: choice.name };
  }
}

function mapStopReason(reason: unknown): FinishReason | null {
  switch (reason) {
    case undefined:
    case null:
      return null;
    case 'end_turn':
    case 'stop_sequence':
      return 'stop';
    case 'max_tokens':
      return 'length';
    case 'tool_use':
      return 'tool_call';
    default:
      return 'other';
  }
}
