/**
 * OpenAI Chat Completions codec
 *
 * prompt spec -> /chat/completions 请求体, 以及 chat.completion 响应的归一化
 */

import type { ContentPart, JsonObject, JsonValue, PromptSpec, ResponseFormat, ToolChoice } from '../../spec/types.js';
import { isPlainObject, readArray, readObject } from '../../utils/json-guards.js';
import type { CodecContext, FinishReason, NormalizedResponse, RequestCodec } from '../types.js';
import { imageDataUrl, readStringOrNull, readUsage, setIfDefined, toJsonArray } from './codec-utils.js';

export class OpenAIChatCodec implements RequestCodec {
  readonly id = 'openai' as const;

  encodeRequest(prompt: PromptSpec, context: CodecContext): JsonObject {
    const body: JsonObject = {
      model: context.modelId,
      messages: prompt.messages.map((message) => ({
        role: message.role,
        content: encodeContent(message.content)
      }))
    };
    const { sampling, limits } = prompt;
    setIfDefined(body, 'temperature', sampling.temperature);
    setIfDefined(body, 'top_p', sampling.topP);
    setIfDefined(body, 'max_tokens', limits.maxOutputTokens);
    setIfDefined(body, 'stop', toJsonArray(sampling.stop));
    setIfDefined(body, 'frequency_penalty', sampling.frequencyPenalty);
    setIfDefined(body, 'presence_penalty', sampling.presencePenalty);
    setIfDefined(body, 'seed', sampling.seed);

    if (prompt.tools.length > 0) {
      body.tools = prompt.tools.map((tool) => {
        const fn: JsonObject = { name: tool.name };
        setIfDefined(fn, 'description', tool.description);
        fn.parameters = tool.jsonSchema;
        return { type: 'function', function: fn };
      });
      setIfDefined(body, 'tool_choice', encodeToolChoice(prompt.toolChoice));
    }
    setIfDefined(body, 'response_format', encodeResponseFormat(prompt.responseFormat));
    if (context.stream) {
      body.stream = true;
    }
    return body;
  }

  normalizeResponse(payload: unknown): NormalizedResponse | undefined {
    if (!isPlainObject(payload)) {
      return undefined;
    }
    const choices = readArray(payload, 'choices');
    if (!choices) {
      return undefined;
    }
    const [first] = choices;
    const choice: Record<string, unknown> = isPlainObject(first) ? first : {};
    const message: Record<string, unknown> = readObject(choice, 'message') ?? {};
    return {
      content: readStringOrNull(message, 'content'),
      role: 'assistant',
      finishReason: mapFinishReason(choice.finish_reason),
      usage: readUsage(payload.usage, { input: 'prompt_tokens', output: 'completion_tokens', total: 'total_tokens' }),
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
  return parts.map((part): JsonObject =>
    part.type === 'text'
      ? { type: 'text', text: part.text }
      : { type: 'image_url', image_url: { url: imageDataUrl(part) } }
  );
}

function encodeToolChoice(choice: ToolChoice | undefined): JsonValue | undefined {
  if (choice === undefined || typeof choice === 'string') {
    return choice;
  }
  return { type: 'function', function: { name: choice.name } };
}

function encodeResponseFormat(format: ResponseFormat | undefined): JsonValue | undefined {
  if (!format) {
    return undefined;
  }
  if (format.type !== 'json_schema') {
    return { type: format.type };
  }
  const jsonSchema: JsonObject = { name: format.name ?? 'response', schema: format.jsonSchema };
  setIfDefined(jsonSchema, 'strict', format.strict);
  return { type: 'json_schema', json_schema: jsonSchema };
}

function mapFinishReason(reason: unknown): FinishReason | null {
  switch (reason) {
    case undefined:
    case null:
      return null;
    case 'stop':
      return 'stop';
    case 'length':
      return 'length';
    case 'tool_calls':
    case 'function_call':
      return 'tool_call';
    default:
      return 'other';
  }
}
