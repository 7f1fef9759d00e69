import type { Logger } from "@src/util/logger";
import { getLogger } from "@src/util/logger";
import { isFatal, OpenError, QueryError, StatsJobError } from "../domain/errors";
import { DEFAULT_RENDER_OPTIONS } from "../domain/queries";
import type {
  QueryDefinition,
  RenderedBlock,
  RenderOptions,
  Snapshot,
} from "../domain/types";
import type {
  QueryableResource,
  QueryEngine,
  ReportSink,
} from "../types/contracts";
import { formatBlock, formatLabel } from "./report_assembler";
import { renderResultSet } from "./table_renderer";

export interface ExecuteQueriesParams {
  snapshot: Snapshot;
  engine: QueryEngine;
  definitions: readonly QueryDefinition[];
  sink: ReportSink;
  renderOptions?: RenderOptions;
  logger?: Logger;
}

export interface QueryRunSummary {
  attempted: number;
  rendered: string[];
  failed: QueryError[];
}

/**
 * Runs every definition in order against the opened snapshot and writes the
 * label plus rendered table of each into the sink.
 *
 * A failing query is logged and skipped; its label stays in the report and
 * later queries still run. Failing to open the snapshot or to write to the
 * sink aborts.
 */
export async function executeQueries(
  params: ExecuteQueriesParams
): Promise<QueryRunSummary> {
  const { snapshot, engine, definitions, sink } = params;
  const renderOptions = params.renderOptions ?? DEFAULT_RENDER_OPTIONS;
  const logger = params.logger ?? getLogger("stats/query_executor");

  let resource: QueryableResource;
  try {
    resource = await engine.open(snapshot.localPath);
  } catch (err) {
    throw err instanceof OpenError ? err : new OpenError(snapshot.localPath, err);
  }

  const summary: QueryRunSummary = { attempted: 0, rendered: [], failed: [] };
  try {
    for (const definition of definitions) {
      summary.attempted += 1;
      await sink.append(formatLabel(definition.label));

      const block = await runDefinition(resource, definition, renderOptions);
      if (block instanceof QueryError) {
        logger.warn(
          { queryName: definition.name, query: definition.query, err: block.cause },
          "query failed; continuing with the next one"
        );
        summary.failed.push(block);
        continue;
      }

      await sink.append(formatBlock(block));
      summary.rendered.push(definition.name);
    }
  } finally {
    await resource.close().catch((err: unknown) => {
      logger.error({ err, path: snapshot.localPath }, "closing snapshot failed");
    });
  }

  return summary;
}

async function runDefinition(
  resource: QueryableResource,
  definition: QueryDefinition,
  renderOptions: RenderOptions
): Promise<RenderedBlock | QueryError> {
  try {
    const result = await resource.query(definition.query);
    return {
      queryName: definition.name,
      text: renderResultSet(result, renderOptions),
    };
  } catch (err) {
    // An engine may still signal a condition that ends the whole run
    if (err instanceof StatsJobError && isFatal(err)) throw err;
    return new QueryError(definition.name, definition.query, err);
  }
}
