import { GetObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { createWriteStream } from "node:fs";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { SnapshotStore } from "../types/contracts";

export interface S3SnapshotStoreOptions {
  region?: string;
  client?: S3Client;
}

/**
 * Streams snapshot objects from S3 to disk; the object is never held in
 * memory whole. The Lambda role needs s3:GetObject on the snapshot bucket.
 */
export class S3SnapshotStore implements SnapshotStore {
  private readonly client: S3Client;

  constructor(options: S3SnapshotStoreOptions = {}) {
    this.client = options.client ?? new S3Client({ region: options.region });
  }

  async fetch(params: {
    bucket: string;
    key: string;
    destinationPath: string;
  }): Promise<void> {
    const { bucket, key, destinationPath } = params;
    const out = await this.client.send(
      new GetObjectCommand({ Bucket: bucket, Key: key })
    );
    if (!out.Body) {
      throw new Error(`Object s3://${bucket}/${key} has no body`);
    }
    if (!(out.Body instanceof Readable)) {
      throw new Error(`Object s3://${bucket}/${key} did not return a Node.js stream`);
    }
    await pipeline(out.Body, createWriteStream(destinationPath));
  }
}
