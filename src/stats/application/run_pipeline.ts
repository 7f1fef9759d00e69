import type { Logger } from "@src/util/logger";
import { getLogger } from "@src/util/logger";
import { rm } from "node:fs/promises";
import type { StatsConfig } from "../config";
import type { Envelope } from "../domain/envelope";
import { AcquisitionError, ConfigResolutionError } from "../domain/errors";
import { DEFAULT_RENDER_OPTIONS, STATS_QUERIES } from "../domain/queries";
import type {
  PipelineState,
  QueryDefinition,
  RenderOptions,
  Snapshot,
} from "../domain/types";
import type {
  InvokeTarget,
  ParameterStore,
  QueryEngine,
  SnapshotStore,
} from "../types/contracts";
import { dispatchReport } from "./dispatcher";
import { PipelineStateMachine } from "./pipeline_state";
import { executeQueries } from "./query_executor";
import { ReportAssembler } from "./report_assembler";
import { createScratchArea, type ScratchArea } from "./scratch_area";
import { acquireSnapshot } from "./snapshot_acquirer";

export interface PipelineDependencies {
  parameters: ParameterStore;
  snapshots: SnapshotStore;
  engine: QueryEngine;
  invoker: InvokeTarget;
  queries?: readonly QueryDefinition[];
  renderOptions?: RenderOptions;
  logger?: Logger;
}

export interface RunStatsPipelineInput {
  correlationId: string;
  config: StatsConfig;
}

export type PipelineOutcome =
  | {
      status: "done";
      correlationId: string;
      history: PipelineState[];
      envelope: Envelope;
      failedQueries: string[];
    }
  | {
      status: "failed";
      correlationId: string;
      history: PipelineState[];
      error: Error;
    };

interface ScopedResources {
  scratch?: ScratchArea;
  snapshot?: Snapshot;
  report?: ReportAssembler;
}

type StagesResult =
  | { ok: true; envelope: Envelope; failedQueries: string[] }
  | { ok: false; error: Error };

/**
 * Runs one invocation of the stats job: resolve the dispatch target, fetch
 * the snapshot, run the queries into the report, dispatch it, clean up.
 *
 * Never throws. Scoped resources are released on every exit path once the
 * target has been resolved; cleanup failures are logged only.
 */
export async function runStatsPipeline(
  input: RunStatsPipelineInput,
  deps: PipelineDependencies
): Promise<PipelineOutcome> {
  const { correlationId, config } = input;
  // A supplied logger is expected to carry the request context already
  const logger =
    deps.logger ?? getLogger("stats/run_pipeline").child({ correlationId });
  const machine = new PipelineStateMachine(state =>
    logger.info({ state }, "pipeline state")
  );

  let target: string;
  try {
    target = await deps.parameters.get(config.dispatchTargetParam, true);
  } catch (err) {
    const error =
      err instanceof ConfigResolutionError
        ? err
        : new ConfigResolutionError(config.dispatchTargetParam, err);
    logger.error({ err: error }, "dispatch target could not be resolved");
    machine.transition("Failed");
    return { status: "failed", correlationId, history: machine.history, error };
  }

  const resources: ScopedResources = {};
  const result = await runStages(machine, resources, {
    config,
    correlationId,
    target,
    deps,
    logger,
  });

  machine.transition("Cleanup");
  await releaseResources(resources, logger);

  if (!result.ok) {
    logger.error({ err: result.error }, "stats run failed");
    machine.transition("Failed");
    return {
      status: "failed",
      correlationId,
      history: machine.history,
      error: result.error,
    };
  }

  machine.transition("Done");
  logger.info({ failedQueries: result.failedQueries }, "stats run completed");
  return {
    status: "done",
    correlationId,
    history: machine.history,
    envelope: result.envelope,
    failedQueries: result.failedQueries,
  };
}

async function runStages(
  machine: PipelineStateMachine,
  resources: ScopedResources,
  ctx: {
    config: StatsConfig;
    correlationId: string;
    target: string;
    deps: PipelineDependencies;
    logger: Logger;
  }
): Promise<StagesResult> {
  const { config, correlationId, target, deps, logger } = ctx;
  const location = `s3://${config.snapshotBucket}/${config.snapshotKey}`;

  try {
    machine.transition("Acquiring");
    let scratch: ScratchArea;
    try {
      scratch = await createScratchArea(config.scratchDir, correlationId);
    } catch (err) {
      throw new AcquisitionError(location, "scratch-unavailable", err);
    }
    resources.scratch = scratch;

    const snapshot = await acquireSnapshot({
      store: deps.snapshots,
      bucket: config.snapshotBucket,
      key: config.snapshotKey,
      destinationDir: scratch.dir,
    });
    resources.snapshot = snapshot;

    machine.transition("Querying");
    const report = await ReportAssembler.create(
      scratch.resolve(config.reportFileName)
    );
    resources.report = report;

    const summary = await executeQueries({
      snapshot,
      engine: deps.engine,
      definitions: deps.queries ?? STATS_QUERIES,
      sink: report,
      renderOptions: deps.renderOptions ?? DEFAULT_RENDER_OPTIONS,
      logger,
    });

    machine.transition("Assembling");
    const document = await report.finalize();

    machine.transition("Dispatching");
    const envelope = await dispatchReport({
      target,
      title: config.reportTitle,
      source: config.eventSource,
      report: document,
      invoker: deps.invoker,
    });

    return {
      ok: true,
      envelope,
      failedQueries: summary.failed.map(failure => failure.queryName),
    };
  } catch (err) {
    return {
      ok: false,
      error: err instanceof Error ? err : new Error(String(err)),
    };
  }
}

async function releaseResources(
  resources: ScopedResources,
  logger: Logger
): Promise<void> {
  const { report, snapshot, scratch } = resources;
  const steps: Array<[string, () => Promise<void>]> = [];
  if (report) steps.push(["report", () => report.release()]);
  if (snapshot) {
    steps.push(["snapshot", () => rm(snapshot.localPath, { force: true })]);
  }
  if (scratch) steps.push(["scratch", () => scratch.release()]);

  for (const [resource, release] of steps) {
    try {
      await release();
    } catch (err) {
      logger.error({ err, resource }, "releasing scoped resource failed");
    }
  }
}
