import {
  DEFAULT_DISPATCH_TARGET_PARAM,
  DEFAULT_REPORT_TITLE,
  loadStatsConfig,
} from "@src/stats/config";
import { tmpdir } from "node:os";

describe("loadStatsConfig", () => {
  test("applies documented defaults", () => {
    const config = loadStatsConfig({});
    expect(config).toEqual({
      region: "us-west-2",
      snapshotBucket: "activity-stats-snapshots",
      snapshotKey: "activity.db",
      scratchDir: tmpdir(),
      reportFileName: "report.txt",
      dispatchTargetParam: DEFAULT_DISPATCH_TARGET_PARAM,
      reportTitle: DEFAULT_REPORT_TITLE,
      eventSource: "aws:lambda",
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  test("reads overrides, preferring STATS_REGION over AWS_REGION", () => {
    const config = loadStatsConfig({
      AWS_REGION: "eu-west-1",
      STATS_REGION: "eu-central-1",
      SNAPSHOT_BUCKET: "my-bucket",
      SCRATCH_DIR: "/var/scratch",
      REPORT_TITLE: "Stats",
    });
    expect(config.region).toBe("eu-central-1");
    expect(config.snapshotBucket).toBe("my-bucket");
    expect(config.scratchDir).toBe("/var/scratch");
    expect(config.reportTitle).toBe("Stats");
  });

  test("falls back to AWS_REGION", () => {
    expect(loadStatsConfig({ AWS_REGION: "eu-west-1" }).region).toBe("eu-west-1");
  });

  test("stage-specific values win", () => {
    const config = loadStatsConfig({
      STAGE: "prod",
      SNAPSHOT_BUCKET: "dev-bucket",
      SNAPSHOT_BUCKET__prod: "prod-bucket",
    });
    expect(config.snapshotBucket).toBe("prod-bucket");
  });
});
