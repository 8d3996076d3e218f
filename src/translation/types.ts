import type { Feature } from '../capabilities/features.js';
import type { RequestStyle } from '../capabilities/request-styles.js';
import type { EndpointCapability, JsonObject, PromptSpec, RangedParameter } from '../spec/types.js';

export const TRANSLATION_MODES = ['standard', 'strict'] as const;
export type TranslationMode = (typeof TRANSLATION_MODES)[number];

export type DiagnosticAction = 'fallback' | 'drop' | 'emulate' | 'clamp';

export interface TranslationDiagnostic {
  /** the degraded feature, or the clamped parameter */
  feature: Feature | RangedParameter;
  action: DiagnosticAction;
  /** location in the prompt spec that was affected */
  path: string;
  message: string;
  /** clamp only: the value before and after clamping */
  original?: number;
  clamped?: number;
}

export interface ResolvedEndpoint {
  capability: EndpointCapability;
  method: string;
  path: string;
  protocol: string;
  url: string;
}

export interface AuthTemplate {
  header: string;
  scheme?: string;
  /** `${ENV:NAME}` placeholders, resolved when the request is sent */
  valueTemplate: string;
}

export interface ProviderRequest {
  provider: string;
  model: string;
  endpoint: ResolvedEndpoint;
  headers: Record<string, string>;
  auth?: AuthTemplate;
  body: JsonObject;
}

export interface TranslationResult {
  mode: TranslationMode;
  request: ProviderRequest;
  diagnostics: TranslationDiagnostic[];
}

export type FinishReason = 'stop' | 'length' | 'tool_call' | 'other';

export interface TokenUsage {
  inputTokens: number | null;
  outputTokens: number | null;
  totalTokens: number | null;
}

/** Provider-neutral view of a chat response. */
export interface NormalizedResponse {
  content: string | null;
  role: 'assistant';
  finishReason: FinishReason | null;
  usage: TokenUsage | null;
  model: string | null;
  id: string | null;
}

export interface CodecContext {
  modelId: string;
  /** true when the request targets the streaming endpoint */
  stream: boolean;
}

export interface RequestCodec {
  readonly id: RequestStyle;
  encodeRequest(prompt: PromptSpec, context: CodecContext): JsonObject;
  /** Returns undefined when the payload is not in this codec's response shape. */
  normalizeResponse(payload: unknown): NormalizedResponse | undefined;
}

export function parseTranslationMode(value: string): TranslationMode | undefined {
  return TRANSLATION_MODES.find((mode) => mode === value);
}
