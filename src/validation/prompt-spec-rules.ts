import { isPlainObject, readArray, readObject, readString } from '../utils/json-guards.js';
import { errorFinding, warningFinding } from './types.js';
import type { ValidationFinding } from './types.js';

export function checkPromptSpecRules(spec: unknown): ValidationFinding[] {
  if (!isPlainObject(spec)) {
    return [];
  }
  return [...checkTools(spec), ...checkReasoning(spec), ...checkMessages(spec)];
}

function checkTools(spec: Record<string, unknown>): ValidationFinding[] {
  const findings: ValidationFinding[] = [];
  const tools = readArray(spec, 'tools') ?? [];
  const names = new Map<string, number>();
  tools.forEach((tool, index) => {
    const name = isPlainObject(tool) ? readString(tool, 'name') : undefined;
    if (name === undefined) {
      return;
    }
    const first = names.get(name);
    if (first !== undefined) {
      findings.push(
        errorFinding(`$.tools[${index}].name`, `Duplicate tool name '${name}' (first declared at $.tools[${first}])`)
      );
      return;
    }
    names.set(name, index);
  });

  const toolChoice = spec.tool_choice;
  if (toolChoice !== undefined) {
    if (tools.length === 0) {
      findings.push(errorFinding('$.tool_choice', 'tool_choice requires at least one tool in tools'));
    } else if (isPlainObject(toolChoice)) {
      const chosen = readString(toolChoice, 'name');
      if (chosen !== undefined && !names.has(chosen)) {
        findings.push(errorFinding('$.tool_choice.name', `tool_choice names unknown tool '${chosen}'`));
      }
    }
  }
  return findings;
}

function checkReasoning(spec: Record<string, unknown>): ValidationFinding[] {
  const limits = readObject(spec, 'limits');
  if (!limits || limits.reasoning_tokens === undefined) {
    return [];
  }
  const modelClass = readString(spec, 'model_class') ?? 'Chat';
  if (modelClass === 'ReasoningChat') {
    return [];
  }
  return [
    errorFinding(
      '$.limits.reasoning_tokens',
      `reasoning_tokens requires model_class 'ReasoningChat', got '${modelClass}'`
    )
  ];
}

function checkMessages(spec: Record<string, unknown>): ValidationFinding[] {
  const findings: ValidationFinding[] = [];
  const messages = readArray(spec, 'messages') ?? [];
  messages.forEach((message, index) => {
    if (!isPlainObject(message)) {
      return;
    }
    if (message.role === 'system' && index > 0) {
      findings.push(
        warningFinding(`$.messages[${index}].role`, 'System message should appear once, as the first message')
      );
    }
  });
  return findings;
}
