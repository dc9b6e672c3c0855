const VARIABLE_PATTERN =
  /\$(?:\$|\{([A-Za-z_][A-Za-z0-9_]*)(?:(:?-)([^}]*))?\}|([A-Za-z_][A-Za-z0-9_]*))/g;

/**
 * Substitute `$VAR`, `${VAR}`, `${VAR-default}` and `${VAR:-default}`.
 * `$$` is a literal dollar. Unset variables become empty strings and are
 * reported through `onMissing`.
 */
export function interpolateVariables(
  value: string,
  env: Record<string, string | undefined>,
  onMissing?: (name: string) => void,
): string {
  return value.replace(
    VARIABLE_PATTERN,
    (
      match: string,
      braced: string | undefined,
      operator: string | undefined,
      fallback: string | undefined,
      bare: string | undefined,
    ) => {
      if (match === '$$') return '$';
      const name = braced ?? bare ?? '';
      const current = env[name];

      if (operator === ':-') return current ? current : (fallback ?? '');
      if (operator === '-') return current ?? fallback ?? '';

      if (current === undefined) {
        onMissing?.(name);
        return '';
      }
      return current;
    },
  );
}

/**
 * Deep-interpolate all string values in a parsed document.
 */
export function interpolateAll(
  obj: unknown,
  env: Record<string, string | undefined>,
  onMissing?: (name: string) => void,
): unknown {
  if (typeof obj === 'string') {
    return interpolateVariables(obj, env, onMissing);
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => interpolateAll(item, env, onMissing));
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(obj)) {
      result[key] = interpolateAll(val, env, onMissing);
    }
    return result;
  }
  return obj;
}
