/**
 * Environment utilities for runtime/stage detection and safe env var access.
 */

export function getNodeEnv(): string {
  return process.env.NODE_ENV || "development";
}

export function getStage(): string {
  // Explicit STAGE wins; derive from NODE_ENV otherwise
  const stage = process.env.STAGE;
  if (stage && stage.length > 0) return stage;
  return getNodeEnv() === "production" ? "prod" : "dev";
}

export function isProduction(): boolean {
  const stage = getStage();
  return stage === "prod" || getNodeEnv() === "production";
}

export function isTest(): boolean {
  return getNodeEnv() === "test";
}

export function isLocal(): boolean {
  // Container hosts set one of these; anything else is a developer machine
  const hosted = Boolean(
    process.env.RENDER || process.env.KUBERNETES_SERVICE_HOST
  );
  return process.env.IS_LOCAL === "true" || !hosted;
}

export interface GetEnvVarOptions<T> {
  defaultValue?: T;
  required?: boolean;
  parse?: (raw: string) => T;
  stageAware?: boolean; // if true, prefer NAME__<stage> before NAME
}

/**
 * Reads the raw value of an environment variable.
 * - If `stageAware` is not false, checks NAME__<stage> first (e.g., TELEGRAM_BOT_TOKEN__prod), then NAME.
 * - Empty strings count as unset.
 */
export function readEnvVar(
  name: string,
  stageAware = true
): string | undefined {
  const stageKey = `${name}__${getStage()}`;
  const candidate = stageAware
    ? process.env[stageKey] ?? process.env[name]
    : process.env[name];
  return candidate != null && candidate !== "" ? candidate : undefined;
}

/**
 * Reads an environment variable with sensible fallbacks and optional parsing.
 * Returns `defaultValue` when unset; throws when `required` is true and no default exists.
 */
export function getEnvVar<T>(
  name: string,
  options: GetEnvVarOptions<T> & { parse: (raw: string) => T }
): T | undefined;
export function getEnvVar(
  name: string,
  options?: GetEnvVarOptions<string>
): string | undefined;
export function getEnvVar<T>(
  name: string,
  options: GetEnvVarOptions<T> = {}
): T | string | undefined {
  const stageAware = options.stageAware !== false;
  const candidate = readEnvVar(name, stageAware);

  if (candidate !== undefined) {
    return options.parse ? options.parse(candidate) : candidate;
  }

  if (options.defaultValue !== undefined) {
    return options.defaultValue;
  }

  if (options.required) {
    const tried = stageAware ? `${name}__${getStage()} or ${name}` : name;
    throw new Error(`Missing required env var: ${tried}`);
  }

  return undefined;
}

export function getString(
  name: string,
  defaultValue?: string
): string | undefined {
  return getEnvVar(name, { defaultValue });
}

export function getNumber(
  name: string,
  defaultValue?: number
): number | undefined {
  return getEnvVar<number>(name, {
    defaultValue,
    parse: raw => {
      const n = Number(raw);
      if (Number.isNaN(n))
        throw new Error(`Env var ${name} is not a number: ${raw}`);
      return n;
    },
  });
}

export function getBoolean(
  name: string,
  defaultValue?: boolean
): boolean | undefined {
  return getEnvVar<boolean>(name, {
    defaultValue,
    parse: raw => {
      const lowered = raw.toLowerCase();
      if (["1", "true", "yes", "y"].includes(lowered)) return true;
      if (["0", "false", "no", "n"].includes(lowered)) return false;
      throw new Error(`Env var ${name} is not a boolean: ${raw}`);
    },
  });
}
