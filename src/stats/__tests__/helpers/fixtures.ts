import Database from "better-sqlite3";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { StatsConfig } from "@src/stats/config";

export interface TempDir {
  dir: string;
  cleanup(): void;
}

export function createTempDir(prefix = "stats-test-"): TempDir {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

/** Writes an activity database with one `acts` row per entry. */
export function writeActivityDb(
  path: string,
  acts: Array<{ type: string; author: string }>
): void {
  const db = new Database(path);
  try {
    db.exec("CREATE TABLE acts (type TEXT NOT NULL, author TEXT NOT NULL)");
    const insert = db.prepare("INSERT INTO acts (type, author) VALUES (?, ?)");
    for (const act of acts) insert.run(act.type, act.author);
  } finally {
    db.close();
  }
}

export function testConfig(overrides: Partial<StatsConfig> = {}): StatsConfig {
  return {
    region: "us-west-2",
    snapshotBucket: "test-bucket",
    snapshotKey: "snapshots/activity.db",
    scratchDir: tmpdir(),
    reportFileName: "report.txt",
    dispatchTargetParam: "/stats/dispatch-target",
    reportTitle: "Weekly activity stats",
    eventSource: "aws:lambda",
    ...overrides,
  };
}
