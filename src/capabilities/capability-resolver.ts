/**
 * Capability Resolver - 根据 provider spec 和 model id 解析模型能力
 */

import { ErrorKind, fail, ok } from '../error-handling/error-kinds.js';
import type { Outcome } from '../error-handling/error-kinds.js';
import { INPUT_MODES } from '../spec/types.js';
import type {
  EndpointCapability,
  EndpointSpec,
  FieldMappings,
  InputMode,
  ModelSpec,
  ParameterRange,
  ProviderInfo,
  ProviderSpec,
  RangedParameter
} from '../spec/types.js';
import { FEATURES } from './features.js';
import type { Feature } from './features.js';
import { STYLE_SUPPORT, requestStyleForFamily } from './request-styles.js';
import type { RequestStyle } from './request-styles.js';

export interface ModelCapabilities {
  provider: ProviderInfo;
  /** canonical model id, even when resolved through an alias */
  modelId: string;
  family: string;
  requestStyle: RequestStyle;
  endpoints: Partial<Record<EndpointCapability, EndpointSpec>>;
  inputModes: ReadonlySet<InputMode>;
  supported: ReadonlySet<Feature>;
  /** supported ranges of numeric sampling parameters */
  parameterRanges: Partial<Record<RangedParameter, ParameterRange>>;
  mappings: FieldMappings;
}

export function resolveModel(spec: ProviderSpec, modelId: string): Outcome<ModelCapabilities> {
  if (spec.models.length === 0) {
    return fail(ErrorKind.ProviderNotFound, `Provider '${spec.provider.name}' declares no models`);
  }
  const model = findModel(spec.models, modelId);
  if (!model) {
    const known = spec.models.map((entry) => entry.id).join(', ');
    return fail(
      ErrorKind.ModelNotFound,
      `Model '${modelId}' not found in provider '${spec.provider.name}' (available: ${known})`
    );
  }
  if (!model.endpoints.chat_completion && !model.endpoints.streaming_chat_completion) {
    return fail(ErrorKind.ModelNotFound, `Model '${model.id}' declares no usable endpoint`);
  }

  const requestStyle = requestStyleForFamily(model.family);
  return ok({
    provider: spec.provider,
    modelId: model.id,
    family: model.family,
    requestStyle,
    endpoints: model.endpoints,
    inputModes: new Set(INPUT_MODES.filter((mode) => model.inputModes[mode])),
    supported: new Set(FEATURES.filter((feature) => isFeatureSupported(feature, model, requestStyle))),
    parameterRanges: model.parameterRanges,
    mappings: model.mappings
  });
}

/** Exact id match wins over aliases; both are case-sensitive. */
export function findModel(models: readonly ModelSpec[], modelId: string): ModelSpec | undefined {
  return models.find((model) => model.id === modelId) ?? models.find((model) => model.aliases.includes(modelId));
}

function isFeatureSupported(feature: Feature, model: ModelSpec, style: RequestStyle): boolean {
  const styleSupport = STYLE_SUPPORT[style];
  switch (feature) {
    case 'chat_completion':
      return model.endpoints.chat_completion !== undefined;
    case 'streaming_chat_completion':
      return model.endpoints.streaming_chat_completion !== undefined;
    case 'images':
      return model.inputModes.images;
    case 'messages':
      return model.inputModes.messages;
    case 'tools':
      return styleSupport.tools && model.toolsSupported !== false;
    case 'json_output':
      return styleSupport.json_output && model.nativeJsonOutput !== false;
    case 'reasoning_tokens':
    case 'top_k':
    case 'frequency_penalty':
    case 'presence_penalty':
    case 'seed':
      return styleSupport[feature] && model.parameters[feature] !== false;
  }
}
