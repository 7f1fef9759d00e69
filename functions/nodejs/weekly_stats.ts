// Lambda handler for the scheduled activity stats report (Node.js)
// This is a thin wrapper that delegates to the stats application layer.

import { runStatsPipeline } from "@src/stats/application/run_pipeline";
import { loadStatsConfig } from "@src/stats/config";
import { parseTriggerEvent } from "@src/stats/domain/trigger_event";
import { createAwsCollaborators } from "@src/stats/infrastructure/aws_collaborators";
import { withRequestContext } from "@src/util/logger";

// Built once per cold start and reused by warm invocations
const config = loadStatsConfig();
const collaborators = createAwsCollaborators(config);

interface LambdaContextLike {
  awsRequestId?: string;
  functionName?: string;
  functionVersion?: string;
}

/**
 * AWS Lambda entrypoint, triggered by the weekly schedule.
 * A failed run is rethrown so the invocation is recorded as failed.
 */
export const handler = async (event: unknown, context: LambdaContextLike = {}) => {
  const trigger = parseTriggerEvent(event);
  const logger = withRequestContext("functions/weekly_stats", {
    correlationId: trigger.id,
    awsRequestId: context.awsRequestId,
    functionName: context.functionName,
    functionVersion: context.functionVersion,
  });
  logger.info("processing scheduled stats request");

  const outcome = await runStatsPipeline(
    { correlationId: trigger.id, config },
    { ...collaborators, logger }
  );
  if (outcome.status === "failed") {
    throw outcome.error;
  }

  return {
    statusCode: 200,
    body: JSON.stringify({
      status: "ok",
      result: {
        correlationId: outcome.correlationId,
        title: outcome.envelope.Event.Title,
        failedQueries: outcome.failedQueries,
      },
    }),
  };
};
