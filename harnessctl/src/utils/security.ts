/** Host variables every phase gets; anything else must be declared. */
export const BASE_ENV_KEYS = ["PATH", "HOME", "USER", "LANG", "LC_ALL", "TERM", "TMPDIR"] as const;

const SECRET_KEY = /(TOKEN|PASSWORD|SECRET|API_?KEY)/i;

/**
 * Sanitize path component to prevent path traversal.
 * @throws Error if path component is invalid
 */
export function sanitizePathComponent(component: string): string {
  if (!component || component.trim().length === 0) {
    throw new Error("Path component cannot be empty");
  }
  if (component.includes("..") || component.includes("/") || component.includes("\\") || component.includes("\0")) {
    throw new Error(`Invalid path component: ${component}`);
  }
  return component.trim();
}

/** Minimal host environment: the BASE_ENV_KEYS that are set. */
export function sanitizeEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const safe: Record<string, string> = {};
  for (const key of BASE_ENV_KEYS) {
    const value = env[key];
    if (value !== undefined) safe[key] = value;
  }
  return safe;
}

/** Values of secret-looking variables, for masking in logs. */
export function secretValues(env: Readonly<Record<string, string>>): string[] {
  return Object.entries(env)
    .filter(([key, value]) => SECRET_KEY.test(key) && value.length >= 4)
    .map(([, value]) => value);
}

/**
 * Redact sensitive information from command lines and captured output.
 * Known secret values are masked verbatim, common key=value shapes by pattern.
 */
export function redactSensitiveInfo(s: string, secrets: readonly string[] = []): string {
  if (!s) return "";

  let result = s;
  for (const secret of secrets) {
    result = result.split(secret).join("***");
  }
  result = result.replace(/password[=:]\s*\S+/gi, "password=***");
  result = result.replace(/token[=:]\s*\S+/gi, "token=***");
  result = result.replace(/api[_-]?key[=:]\s*\S+/gi, "api_key=***");
  result = result.replace(/secret[=:]\s*\S+/gi, "secret=***");

  return result;
}
