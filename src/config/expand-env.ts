export type EnvLookup = Record<string, string | undefined>;

const ENV_REF_RE = /\$\{(\w+)(?::-([^}]*))?\}/g;

/**
 * Replace `${NAME}` and `${NAME:-fallback}` in every string of a parsed
 * YAML tree. Unset variables without a fallback become "".
 */
export function expandEnvVarsDeep(value: unknown, env: EnvLookup): unknown {
  if (typeof value === "string") {
    return value.replace(ENV_REF_RE, (_, key: string, fallback: string | undefined) => {
      const v = env[key];
      return v !== undefined && v !== "" ? v : (fallback ?? "");
    });
  }
  if (Array.isArray(value)) return value.map((v) => expandEnvVarsDeep(v, env));
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = expandEnvVarsDeep(v, env);
    return out;
  }
  return value;
}
