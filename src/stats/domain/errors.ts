/**
 * Error taxonomy of the stats pipeline. Every kind but QueryError aborts the run.
 */

export type PipelineStage =
  | "config"
  | "acquire"
  | "open"
  | "query"
  | "assemble"
  | "dispatch";

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return "Unknown error";
}

export class StatsJobError extends Error {
  readonly stage: PipelineStage;

  constructor(stage: PipelineStage, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "StatsJobError";
    this.stage = stage;
  }
}

export class ConfigResolutionError extends StatsJobError {
  readonly parameterName: string;

  constructor(parameterName: string, cause: unknown) {
    super(
      "config",
      `Unable to resolve parameter ${parameterName}: ${describeError(cause)}`,
      cause
    );
    this.name = "ConfigResolutionError";
    this.parameterName = parameterName;
  }
}

export type AcquisitionFailure =
  | "not-found"
  | "access-denied"
  | "scratch-unavailable"
  | "fetch-failed";

export class AcquisitionError extends StatsJobError {
  readonly location: string;
  readonly reason: AcquisitionFailure;

  constructor(location: string, reason: AcquisitionFailure, cause: unknown) {
    super(
      "acquire",
      `Snapshot ${location} could not be acquired (${reason}): ${describeError(cause)}`,
      cause
    );
    this.name = "AcquisitionError";
    this.location = location;
    this.reason = reason;
  }
}

export class OpenError extends StatsJobError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super("open", `Snapshot ${path} could not be opened: ${describeError(cause)}`, cause);
    this.name = "OpenError";
    this.path = path;
  }
}

export class QueryError extends StatsJobError {
  readonly queryName: string;
  readonly query: string;

  constructor(queryName: string, query: string, cause: unknown) {
    super("query", `Query ${queryName} failed: ${describeError(cause)}`, cause);
    this.name = "QueryError";
    this.queryName = queryName;
    this.query = query;
  }
}

export class AssemblyError extends StatsJobError {
  readonly operation: "create" | "append" | "finalize";
  readonly path: string;

  constructor(
    operation: "create" | "append" | "finalize",
    path: string,
    cause: unknown
  ) {
    super(
      "assemble",
      `Report ${operation} failed for ${path}: ${describeError(cause)}`,
      cause
    );
    this.name = "AssemblyError";
    this.operation = operation;
    this.path = path;
  }
}

export class DispatchError extends StatsJobError {
  readonly target: string;

  constructor(target: string, cause: unknown) {
    super("dispatch", `Dispatch to ${target} failed: ${describeError(cause)}`, cause);
    this.name = "DispatchError";
    this.target = target;
  }
}

export function isFatal(error: unknown): boolean {
  return !(error instanceof QueryError);
}
