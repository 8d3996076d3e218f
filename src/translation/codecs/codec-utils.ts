import type { ContentPart, ImagePart, JsonObject, JsonValue, Message } from '../../spec/types.js';
import type { TokenUsage } from '../types.js';
import { isPlainObject, readNumber } from '../../utils/json-guards.js';

export function setIfDefined(target: JsonObject, key: string, value: JsonValue | undefined): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

export function textOf(parts: readonly ContentPart[]): string {
  return parts
    .map((part) => (part.type === 'text' ? part.text : ''))
    .filter((text) => text.length > 0)
    .join('\n');
}

export function splitSystem(messages: readonly Message[]): { system: string | undefined; rest: Message[] } {
  const systemTexts = messages.filter((message) => message.role === 'system').map((message) => textOf(message.content));
  return {
    system: systemTexts.length > 0 ? systemTexts.join('\n\n') : undefined,
    rest: messages.filter((message) => message.role !== 'system')
  };
}

export function imageDataUrl(part: ImagePart): string {
  return part.url ?? `data:${part.mediaType};base64,${part.data ?? ''}`;
}

export function toJsonArray(values: readonly string[] | undefined): JsonValue[] | undefined {
  return values && values.length > 0 ? [...values] : undefined;
}

export function readStringOrNull(record: Record<string, unknown>, key: string): string | null {
  const value = record[key];
  return typeof value === 'string' ? value : null;
}

export function readUsage(
  usage: unknown,
  keys: { input: string; output: string; total?: string }
): TokenUsage | null {
  if (!isPlainObject(usage)) {
    return null;
  }
  const inputTokens = readNumber(usage, keys.input) ?? null;
  const outputTokens = readNumber(usage, keys.output) ?? null;
  const declaredTotal = keys.total ? readNumber(usage, keys.total) : undefined;
  const totalTokens =
    declaredTotal ?? (inputTokens !== null && outputTokens !== null ? inputTokens + outputTokens : null);
  return { inputTokens, outputTokens, totalTokens };
}
