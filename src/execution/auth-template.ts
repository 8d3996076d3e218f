import { ENV_TEMPLATE_PATTERN } from '../constants/index.js';
import { ErrorKind, fail, ok } from '../error-handling/error-kinds.js';
import type { Outcome } from '../error-handling/error-kinds.js';
import type { AuthTemplate } from '../translation/types.js';

/**
 * Expands `${ENV:NAME}` placeholders. Credentials are only read here, at
 * send time, and never written back into a request document.
 */
export function expandEnvTemplate(template: string, env: NodeJS.ProcessEnv): Outcome<string> {
  const missing: string[] = [];
  const expanded = template.replace(ENV_TEMPLATE_PATTERN, (_match, name: string) => {
    const value = env[name];
    if (value === undefined || value === '') {
      missing.push(name);
      return '';
    }
    return value;
  });
  if (missing.length > 0) {
    return fail(
      ErrorKind.InvalidInput,
      `Environment variable(s) ${missing.join(', ')} referenced by the auth template are not set`
    );
  }
  return ok(expanded);
}

export function resolveAuthHeader(
  auth: AuthTemplate | undefined,
  env: NodeJS.ProcessEnv
): Outcome<{ header: string; value: string } | undefined> {
  if (!auth) {
    return ok(undefined);
  }
  const expanded = expandEnvTemplate(auth.valueTemplate, env);
  if (!expanded.ok) {
    return expanded;
  }
  const value = auth.scheme ? `${auth.scheme} ${expanded.value}` : expanded.value;
  return ok({ header: auth.header.toLowerCase(), value });
}
