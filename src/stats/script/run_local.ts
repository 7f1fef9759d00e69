// Load envs from .env
// npx tsx src/stats/script/run_local.ts <snapshot-dir>
import "dotenv/config";
import { randomUUID } from "node:crypto";
import { resolve } from "node:path";
import { getLogger } from "@src/util/logger";
import { runStatsPipeline } from "../application/run_pipeline";
import { loadStatsConfig } from "../config";
import {
  DirectorySnapshotStore,
  DryRunInvokeTarget,
  StaticParameterStore,
} from "../infrastructure/local_collaborators";
import { SqliteQueryEngine } from "../infrastructure/sqlite_query_engine";

async function main() {
  const sourceDir = resolve(process.argv[2] ?? ".");
  const config = loadStatsConfig();
  const logger = getLogger("stats/run_local");
  const invoker = new DryRunInvokeTarget(logger);

  const outcome = await runStatsPipeline(
    { correlationId: `local-${randomUUID()}`, config },
    {
      parameters: new StaticParameterStore({
        [config.dispatchTargetParam]: "dry-run",
      }),
      snapshots: new DirectorySnapshotStore(sourceDir),
      engine: new SqliteQueryEngine(),
      invoker,
    }
  );

  if (outcome.status === "failed") throw outcome.error;
  // eslint-disable-next-line no-console
  console.log(outcome.envelope.Event.Description);
}

main().catch(err => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
