import type { ParameterName } from '../spec/types.js';

/** Provider request dialects the translator can emit. */
export type RequestStyle = 'openai' | 'anthropic' | 'gemini';

export type StyleFeature = 'tools' | 'json_output' | ParameterName;

/**
 * What each dialect can express at all. Declared provider flags may narrow
 * these, never widen them.
 */
export const STYLE_SUPPORT: Readonly<Record<RequestStyle, Readonly<Record<StyleFeature, boolean>>>> = {
  openai: {
    tools: true,
    json_output: true,
    top_k: false,
    frequency_penalty: true,
    presence_penalty: true,
    seed: true,
    reasoning_tokens: false
  },
  anthropic: {
    tools: true,
    json_output: false,
    top_k: true,
    frequency_penalty: false,
    presence_penalty: false,
    seed: false,
    reasoning_tokens: true
  },
  gemini: {
    tools: true,
    json_output: true,
    top_k: true,
    frequency_penalty: true,
    presence_penalty: true,
    seed: true,
    reasoning_tokens: true
  }
};

export function requestStyleForFamily(family: string): RequestStyle {
  const normalized = family.trim().toLowerCase();
  if (normalized.includes('anthropic') || normalized.includes('claude')) {
    return 'anthropic';
  }
  if (normalized.includes('gemini') || normalized.includes('google')) {
    return 'gemini';
  }
  return 'openai';
}
