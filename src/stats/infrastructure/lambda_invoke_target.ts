import { InvokeCommand, LambdaClient } from "@aws-sdk/client-lambda";
import type { InvokeTarget } from "../types/contracts";

export interface LambdaInvokeTargetOptions {
  region?: string;
  client?: LambdaClient;
}

/**
 * Invokes the downstream function synchronously and waits for its result.
 * An unhandled error inside the downstream function counts as a failure.
 */
export class LambdaInvokeTarget implements InvokeTarget {
  private readonly client: LambdaClient;

  constructor(options: LambdaInvokeTargetOptions = {}) {
    this.client = options.client ?? new LambdaClient({ region: options.region });
  }

  async invoke(target: string, payload: Uint8Array): Promise<void> {
    const out = await this.client.send(
      new InvokeCommand({
        FunctionName: target,
        InvocationType: "RequestResponse",
        Payload: payload,
      })
    );
    if (out.FunctionError) {
      const detail = out.Payload ? Buffer.from(out.Payload).toString("utf8") : "";
      throw new Error(
        `Function ${target} reported ${out.FunctionError}${detail ? `: ${detail}` : ""}`
      );
    }
  }
}
