/**
 * Gemini generateContent codec
 *
 * The model is addressed by the endpoint path (`{model}`), so the body carries
 * no model field and no stream flag.
 */

import { CONTENT_TYPES } from '../../constants/index.js';
import type { ContentPart, JsonObject, JsonValue, PromptSpec, ToolChoice } from '../../spec/types.js';
import { isPlainObject, readArray, readObject } from '../../utils/json-guards.js';
import type { CodecContext, FinishReason, NormalizedResponse, RequestCodec } from '../types.js';
import { readStringOrNull, readUsage, setIfDefined, splitSystem, toJsonArray } from './codec-utils.js';

export class GeminiGenerateCodec implements RequestCodec {
  readonly id = 'gemini' as const;

  encodeRequest(prompt: PromptSpec, _context: CodecContext): JsonObject {
    const { system, rest } = splitSystem(prompt.messages);
    const body: JsonObject = {
      contents: rest.map((message) => ({
        role: message.role === 'assistant' ? 'model' : 'user',
        parts: message.content.map(encodePart)
      }))
    };
    if (system !== undefined) {
      body.systemInstruction = { parts: [{ text: system }] };
    }

    const generationConfig = encodeGenerationConfig(prompt);
    if (Object.keys(generationConfig).length > 0) {
      body.generationConfig = generationConfig;
    }

    if (prompt.tools.length > 0) {
      body.tools = [
        {
          functionDeclarations: prompt.tools.map((tool) => {
            const declaration: JsonObject = { name: tool.name };
            setIfDefined(declaration, 'description', tool.description);
            declaration.parameters = tool.jsonSchema;
            return declaration;
          })
        }
      ];
      setIfDefined(body, 'toolConfig', encodeToolConfig(prompt.toolChoice));
    }
    return body;
  }

  normalizeResponse(payload: unknown): NormalizedResponse | undefined {
    if (!isPlainObject(payload)) {
      return undefined;
    }
    const candidates = readArray(payload, 'candidates');
    if (!candidates) {
      return undefined;
    }
    const [first] = candidates;
    const candidate: Record<string, unknown> = isPlainObject(first) ? first : {};
    const content = readObject(candidate, 'content');
    const parts = (content ? readArray(content, 'parts') : undefined) ?? [];
    const objects = parts.filter(isPlainObject);
    const texts = objects.filter((part) => typeof part.text === 'string').map((part) => String(part.text));
    const hasFunctionCall = objects.some((part) => part.functionCall !== undefined);
    return {
      content: texts.length > 0 ? texts.join('') : null,
      role: 'assistant',
      finishReason: hasFunctionCall ? 'tool_call' : mapFinishReason(candidate.finishReason),
      usage: readUsage(payload.usageMetadata, {
        input: 'promptTokenCount',
        output: 'candidatesTokenCount',
        total: 'totalTokenCount'
      }),
      model: readStringOrNull(payload, 'modelVersion'),
      id: readStringOrNull(payload, 'responseId')
    };
  }
}

function encodePart(part: ContentPart): JsonObject {
  if (part.type === 'text') {
    return { text: part.text };
  }
  if (part.url) {
    return { fileData: { mimeType: part.mediaType, fileUri: part.url } };
  }
  return { inlineData: { mimeType: part.mediaType, data: part.data ?? '' } };
}

function encodeGenerationConfig(prompt: PromptSpec): JsonObject {
  const { sampling, limits, responseFormat } = prompt;
  const config: JsonObject = {};
  setIfDefined(config, 'temperature', sampling.temperature);
  setIfDefined(config, 'topP', sampling.topP);
  setIfDefined(config, 'topK', sampling.topK);
  setIfDefined(config, 'maxOutputTokens', limits.maxOutputTokens);
  setIfDefined(config, 'stopSequences', toJsonArray(sampling.stop));
  setIfDefined(config, 'frequencyPenalty', sampling.frequencyPenalty);
  setIfDefined(config, 'presencePenalty', sampling.presencePenalty);
  setIfDefined(config, 'seed', sampling.seed);
  if (responseFormat && responseFormat.type !== 'text') {
    config.responseMimeType = CONTENT_TYPES.JSON;
    if (responseFormat.type === 'json_schema') {
      config.responseSchema = responseFormat.jsonSchema;
    }
  }
  if (limits.reasoningTokens !== undefined) {
    config.thinkingConfig = { thinkingBudget: limits.reasoningTokens };
  }
  return config;
}

function encodeToolConfig(choice: ToolChoice | undefined): JsonValue | undefined {
  switch (choice) {
    case undefined:
      return undefined;
    case 'auto':
      return { functionCallingConfig: { mode: 'AUTO' } };
    case 'required':
      return { functionCallingConfig: { mode: 'ANY' } };
    case 'none':
      return { functionCallingConfig: { mode: 'NONE' } };
    default:
      return { functionCallingConfig: { mode: 'ANY', allowedFunctionNames: [choice.name] } };
  }
}

function mapFinishReason(reason: unknown): FinishReason | null {
  switch (reason) {
    case undefined:
    case null:
      return null;
    case 'STOP':
      return 'stop';
    case 'MAX_TOKENS':
      return 'length';
    default:
      return 'other';
  }
}
