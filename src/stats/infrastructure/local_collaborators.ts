import { copyFile } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "@src/util/logger";
import { parseEnvelope, type Envelope } from "../domain/envelope";
import type {
  InvokeTarget,
  ParameterStore,
  SnapshotStore,
} from "../types/contracts";

/**
 * Serves snapshots from a local directory; the bucket name is ignored.
 */
export class DirectorySnapshotStore implements SnapshotStore {
  constructor(private readonly sourceDir: string) {}

  async fetch(params: {
    bucket: string;
    key: string;
    destinationPath: string;
  }): Promise<void> {
    await copyFile(join(this.sourceDir, params.key), params.destinationPath);
  }
}

export class StaticParameterStore implements ParameterStore {
  constructor(private readonly values: Readonly<Record<string, string>>) {}

  async get(name: string): Promise<string> {
    const value = this.values[name];
    if (value === undefined) {
      throw new Error(`Parameter ${name} is not defined`);
    }
    return value;
  }
}

/**
 * Decodes envelopes instead of sending them anywhere.
 */
export class DryRunInvokeTarget implements InvokeTarget {
  readonly sent: Array<{ target: string; envelope: Envelope }> = [];

  constructor(private readonly logger?: Logger) {}

  async invoke(target: string, payload: Uint8Array): Promise<void> {
    const envelope = parseEnvelope(payload);
    this.sent.push({ target, envelope });
    this.logger?.info(
      { target, bytes: payload.byteLength, title: envelope.Event.Title },
      "dry run: envelope not sent"
    );
  }
}
