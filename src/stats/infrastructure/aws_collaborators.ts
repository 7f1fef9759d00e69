import type { StatsConfig } from "../config";
import type { PipelineDependencies } from "../application/run_pipeline";
import { LambdaInvokeTarget } from "./lambda_invoke_target";
import { S3SnapshotStore } from "./s3_snapshot_store";
import { SqliteQueryEngine } from "./sqlite_query_engine";
import { SsmParameterStore } from "./ssm_parameter_store";

export type Collaborators = Pick<
  PipelineDependencies,
  "parameters" | "snapshots" | "engine" | "invoker"
>;

/**
 * Production collaborators, all bound to the configured region.
 */
export function createAwsCollaborators(config: StatsConfig): Collaborators {
  const { region } = config;
  return {
    parameters: new SsmParameterStore({ region }),
    snapshots: new S3SnapshotStore({ region }),
    engine: new SqliteQueryEngine(),
    invoker: new LambdaInvokeTarget({ region }),
  };
}
