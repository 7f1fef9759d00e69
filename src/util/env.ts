/**
 * Environment utilities for runtime/stage detection and safe env var access.
 *
 * Every reader takes an optional `env` source so configuration can be built
 * from an explicit snapshot of the environment (tests, local runners) instead
 * of always reaching for `process.env`.
 */

export type EnvSource = Readonly<Record<string, string | undefined>>;

export function getNodeEnv(env: EnvSource = process.env): string {
  return env.NODE_ENV || "development";
}

export function getStage(env: EnvSource = process.env): string {
  // Prefer SST stage when available; fall back to explicit STAGE; derive from NODE_ENV otherwise
  const sstStage = env.SST_STAGE || env.STAGE;
  if (sstStage && sstStage.length > 0) return sstStage;
  return getNodeEnv(env) === "production" ? "prod" : "dev";
}

export function isProduction(env: EnvSource = process.env): boolean {
  return getStage(env) === "prod" || getNodeEnv(env) === "production";
}

export function isTest(env: EnvSource = process.env): boolean {
  return getNodeEnv(env) === "test";
}

export function isLocal(env: EnvSource = process.env): boolean {
  // SST dev flags or absence of Lambda execution env implies local
  const sstDev = env.SST_DEV === "true" || env.IS_LOCAL === "true";
  const isLambda = Boolean(env.AWS_LAMBDA_FUNCTION_NAME || env.AWS_EXECUTION_ENV);
  return sstDev || !isLambda;
}

export interface GetEnvVarOptions {
  stageAware?: boolean; // if true, prefer NAME__<stage> before NAME
  env?: EnvSource;
}

/**
 * Reads a raw environment variable.
 * - If `stageAware` is true (default), checks NAME__<stage> first (e.g. SNAPSHOT_BUCKET__prod), then NAME.
 * - Empty strings count as missing.
 */
export function getEnvVar(
  name: string,
  options: GetEnvVarOptions = {}
): string | undefined {
  const env = options.env ?? process.env;
  const stageKey = `${name}__${getStage(env)}`;
  const stageAware = options.stageAware !== false;

  const candidate = stageAware ? env[stageKey] ?? env[name] : env[name];
  if (candidate != null && candidate !== "") return candidate;
  return undefined;
}

export function getString(
  name: string,
  defaultValue: string,
  env?: EnvSource
): string {
  return getEnvVar(name, { env }) ?? defaultValue;
}
