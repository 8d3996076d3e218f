/**
 * Degradation policies for standard mode.
 *
 * One entry per feature: when it is required, how it degrades and how the
 * degradation is reported. Policies only rewrite the prompt draft; codecs
 * never see unsupported features.
 */

import { FEATURES } from '../capabilities/features.js';
import type { Feature } from '../capabilities/features.js';
import type { ContentPart, EndpointCapability, ImagePart, Message, PromptSpec } from '../spec/types.js';
import { textOf } from './codecs/codec-utils.js';
import type { DiagnosticAction } from './types.js';

export interface TranslationDraft {
  prompt: PromptSpec;
  endpoint: EndpointCapability;
  /** the model takes one text input instead of a message list */
  singleText: boolean;
}

export interface FeaturePolicy {
  action: DiagnosticAction;
  /** location in the prompt spec the degradation touches */
  path: string;
  isRequired(prompt: PromptSpec): boolean;
  apply(draft: TranslationDraft): TranslationDraft;
  describe(draft: TranslationDraft, modelId: string): string;
}

export const JSON_OUTPUT_INSTRUCTION = 'Respond only with a single valid JSON object and no surrounding text.';

type SamplingParameter = 'topK' | 'frequencyPenalty' | 'presencePenalty' | 'seed';

function dropSamplingParameter(feature: Feature, field: SamplingParameter, wireName: string): FeaturePolicy {
  return {
    action: 'drop',
    path: `$.sampling.${wireName}`,
    isRequired: (prompt) => prompt.sampling[field] !== undefined,
    apply: (draft) => ({
      ...draft,
      prompt: { ...draft.prompt, sampling: { ...draft.prompt.sampling, [field]: undefined } }
    }),
    describe: (_draft, modelId) => `Model '${modelId}' does not support ${feature}; removed it from the request`
  };
}

export const FEATURE_POLICIES: Readonly<Record<Feature, FeaturePolicy>> = {
  chat_completion: {
    action: 'fallback',
    path: '$.stream',
    isRequired: (prompt) => !prompt.stream,
    apply: (draft) => ({ ...draft, endpoint: 'streaming_chat_completion', prompt: { ...draft.prompt, stream: true } }),
    describe: (_draft, modelId) =>
      `Model '${modelId}' has no chat_completion endpoint; using streaming_chat_completion with streaming enabled`
  },
  streaming_chat_completion: {
    action: 'fallback',
    path: '$.stream',
    isRequired: (prompt) => prompt.stream,
    apply: (draft) => ({ ...draft, endpoint: 'chat_completion', prompt: { ...draft.prompt, stream: false } }),
    describe: (_draft, modelId) =>
      `Model '${modelId}' has no streaming endpoint; sending a non-streaming request to chat_completion`
  },
  images: {
    action: 'drop',
    path: '$.messages',
    isRequired: (prompt) => countImages(prompt.messages) > 0,
    apply: (draft) => ({ ...draft, prompt: { ...draft.prompt, messages: removeImages(draft.prompt.messages) } }),
    describe: (draft, modelId) =>
      `Model '${modelId}' does not accept image input; removed ${countImages(draft.prompt.messages)} image part(s)`
  },
  tools: {
    action: 'drop',
    path: '$.tools',
    isRequired: (prompt) => prompt.tools.length > 0,
    apply: (draft) => ({ ...draft, prompt: { ...draft.prompt, tools: [], toolChoice: undefined } }),
    describe: (draft, modelId) => {
      const choice = draft.prompt.toolChoice !== undefined ? ' and tool_choice' : '';
      return `Model '${modelId}' does not support tools; removed ${draft.prompt.tools.length} tool definition(s)${choice}`;
    }
  },
  json_output: {
    action: 'emulate',
    path: '$.response_format',
    isRequired: (prompt) => prompt.responseFormat !== undefined && prompt.responseFormat.type !== 'text',
    apply: (draft) => ({
      ...draft,
      prompt: {
        ...draft.prompt,
        responseFormat: undefined,
        messages: draft.singleText
          ? withTrailingInstruction(draft.prompt.messages, jsonInstruction(draft.prompt))
          : withSystemInstruction(draft.prompt.messages, jsonInstruction(draft.prompt))
      }
    }),
    describe: (draft, modelId) =>
      `Model '${modelId}' has no native JSON output; replaced response_format with ${
        draft.singleText ? 'an instruction appended to the prompt text' : 'a system prompt instruction'
      }`
  },
  reasoning_tokens: {
    action: 'drop',
    path: '$.limits.reasoning_tokens',
    isRequired: (prompt) => prompt.limits.reasoningTokens !== undefined,
    apply: (draft) => ({
      ...draft,
      prompt: { ...draft.prompt, limits: { ...draft.prompt.limits, reasoningTokens: undefined } }
    }),
    describe: (_draft, modelId) => `Model '${modelId}' does not support reasoning_tokens; removed it from the request`
  },
  top_k: dropSamplingParameter('top_k', 'topK', 'top_k'),
  frequency_penalty: dropSamplingParameter('frequency_penalty', 'frequencyPenalty', 'frequency_penalty'),
  presence_penalty: dropSamplingParameter('presence_penalty', 'presencePenalty', 'presence_penalty'),
  seed: dropSamplingParameter('seed', 'seed', 'seed'),
  messages: {
    action: 'emulate',
    path: '$.messages',
    isRequired: (prompt) => prompt.messages.length > 1,
    apply: (draft) => ({ ...draft, prompt: { ...draft.prompt, messages: flattenMessages(draft.prompt.messages) } }),
    describe: (draft, modelId) =>
      `Model '${modelId}' accepts only single-text input; flattened ${draft.prompt.messages.length} messages into one user message`
  }
};

export function requiredFeatures(prompt: PromptSpec): Feature[] {
  return FEATURES.filter((feature) => FEATURE_POLICIES[feature].isRequired(prompt));
}

function countImages(messages: readonly Message[]): number {
  return messages.reduce((total, message) => total + message.content.filter((part) => part.type === 'image').length, 0);
}

function removeImages(messages: readonly Message[]): Message[] {
  const kept = messages
    .map((message) => ({ ...message, content: message.content.filter((part) => part.type === 'text') }))
    .filter((message) => message.content.length > 0);
  return kept.length > 0 ? kept : [{ role: 'user', content: [{ type: 'text', text: '' }] }];
}

function jsonInstruction(prompt: PromptSpec): string {
  const format = prompt.responseFormat;
  if (format?.type === 'json_schema') {
    return `${JSON_OUTPUT_INSTRUCTION}\nThe JSON object must conform to this JSON Schema:\n${JSON.stringify(format.jsonSchema)}`;
  }
  return JSON_OUTPUT_INSTRUCTION;
}

function withSystemInstruction(messages: readonly Message[], instruction: string): Message[] {
  const [first, ...rest] = messages;
  if (first && first.role === 'system') {
    const text = [textOf(first.content), instruction].filter((entry) => entry.length > 0).join('\n\n');
    return [{ role: 'system', content: [{ type: 'text', text }, ...imagesOf(first.content)] }, ...rest];
  }
  return [{ role: 'system', content: [{ type: 'text', text: instruction }] }, ...messages];
}

/** Single-text models get the instruction in the last message, so no extra message is added. */
function withTrailingInstruction(messages: readonly Message[], instruction: string): Message[] {
  const last = messages.at(-1);
  if (!last) {
    return [{ role: 'user', content: [{ type: 'text', text: instruction }] }];
  }
  const text = [textOf(last.content), instruction].filter((entry) => entry.length > 0).join('\n\n');
  return [...messages.slice(0, -1), { role: last.role, content: [{ type: 'text', text }, ...imagesOf(last.content)] }];
}

function flattenMessages(messages: readonly Message[]): Message[] {
  const text = messages.map((message) => `${message.role}: ${textOf(message.content)}`).join('\n\n');
  const images = messages.flatMap((message) => imagesOf(message.content));
  return [{ role: 'user', content: [{ type: 'text', text }, ...images] }];
}

function imagesOf(parts: readonly ContentPart[]): ImagePart[] {
  return parts.filter((part): part is ImagePart => part.type === 'image');
}
