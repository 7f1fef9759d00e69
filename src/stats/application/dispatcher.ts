import { DispatchError } from "../domain/errors";
import {
  buildEnvelope,
  serializeEnvelope,
  type Envelope,
} from "../domain/envelope";
import type { ReportDocument } from "../domain/types";
import type { InvokeTarget } from "../types/contracts";

/** Synchronous Lambda invocations reject request payloads above 6 MB. */
export const MAX_INVOKE_PAYLOAD_BYTES = 6 * 1024 * 1024;

export interface DispatchReportParams {
  target: string;
  title: string;
  source: string;
  report: ReportDocument;
  invoker: InvokeTarget;
  maxPayloadBytes?: number;
}

/**
 * Wraps the finished report in an envelope and hands it to the downstream
 * target, waiting for the call to complete. The report is never truncated:
 * an oversized envelope fails the dispatch.
 */
export async function dispatchReport(
  params: DispatchReportParams
): Promise<Envelope> {
  const { target, title, source, report, invoker } = params;
  const limit = params.maxPayloadBytes ?? MAX_INVOKE_PAYLOAD_BYTES;

  const envelope = buildEnvelope({ title, source, description: report.text });
  const payload = serializeEnvelope(envelope);
  if (payload.byteLength > limit) {
    throw new DispatchError(
      target,
      new Error(`payload of ${payload.byteLength} bytes exceeds the ${limit} byte limit`)
    );
  }

  try {
    await invoker.invoke(target, payload);
  } catch (err) {
    throw new DispatchError(target, err);
  }
  return envelope;
}
