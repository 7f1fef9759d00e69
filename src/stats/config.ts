import { tmpdir } from "node:os";
import { z } from "zod";
import { getString, type EnvSource } from "@src/util/env";

/**
 * Runtime configuration of the stats job. Built once per cold start and
 * handed to the pipeline; nothing below reads the environment again.
 *
 * | Env var                 | Default                    |
 * |-------------------------|----------------------------|
 * | STATS_REGION/AWS_REGION | us-west-2                  |
 * | SNAPSHOT_BUCKET         | activity-stats-snapshots   |
 * | SNAPSHOT_KEY            | activity.db                |
 * | SCRATCH_DIR             | os.tmpdir()                |
 * | DISPATCH_TARGET_PARAM   | /stats/dispatch-target     |
 * | REPORT_TITLE            | Weekly activity stats      |
 * | EVENT_SOURCE            | aws:lambda                 |
 */
const StatsConfigSchema = z.object({
  region: z.string().min(1),
  snapshotBucket: z.string().min(1),
  snapshotKey: z.string().min(1),
  scratchDir: z.string().min(1),
  reportFileName: z.string().min(1),
  dispatchTargetParam: z.string().min(1),
  reportTitle: z.string().min(1),
  eventSource: z.string().min(1),
});

export type StatsConfig = Readonly<z.infer<typeof StatsConfigSchema>>;

export const DEFAULT_REGION = "us-west-2";
export const DEFAULT_SNAPSHOT_BUCKET = "activity-stats-snapshots";
export const DEFAULT_SNAPSHOT_KEY = "activity.db";
export const DEFAULT_DISPATCH_TARGET_PARAM = "/stats/dispatch-target";
export const DEFAULT_REPORT_TITLE = "Weekly activity stats";
export const DEFAULT_EVENT_SOURCE = "aws:lambda";
const REPORT_FILE_NAME = "report.txt";

export function loadStatsConfig(env: EnvSource = process.env): StatsConfig {
  const region = getString(
    "STATS_REGION",
    getString("AWS_REGION", DEFAULT_REGION, env),
    env
  );

  return Object.freeze(
    StatsConfigSchema.parse({
      region,
      snapshotBucket: getString("SNAPSHOT_BUCKET", DEFAULT_SNAPSHOT_BUCKET, env),
      snapshotKey: getString("SNAPSHOT_KEY", DEFAULT_SNAPSHOT_KEY, env),
      scratchDir: getString("SCRATCH_DIR", tmpdir(), env),
      reportFileName: REPORT_FILE_NAME,
      dispatchTargetParam: getString(
        "DISPATCH_TARGET_PARAM",
        DEFAULT_DISPATCH_TARGET_PARAM,
        env
      ),
      reportTitle: getString("REPORT_TITLE", DEFAULT_REPORT_TITLE, env),
      eventSource: getString("EVENT_SOURCE", DEFAULT_EVENT_SOURCE, env),
    })
  );
}
