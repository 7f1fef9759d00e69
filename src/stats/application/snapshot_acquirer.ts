import { basename, join } from "node:path";
import { AcquisitionError, type AcquisitionFailure } from "../domain/errors";
import type { Snapshot } from "../domain/types";
import type { SnapshotStore } from "../types/contracts";

function classify(error: unknown): AcquisitionFailure {
  const name = error instanceof Error ? error.name : "";
  const code =
    typeof error === "object" && error !== null && "code" in error
      ? error.code
      : undefined;
  if (name === "NoSuchKey" || name === "NotFound" || code === "ENOENT") {
    return "not-found";
  }
  if (name === "AccessDenied" || name === "Forbidden") return "access-denied";
  return "fetch-failed";
}

/**
 * Fetches the snapshot object into `destinationDir`, overwriting any file of
 * the same name. No retries: a failure here ends the run.
 */
export async function acquireSnapshot(params: {
  store: SnapshotStore;
  bucket: string;
  key: string;
  destinationDir: string;
}): Promise<Snapshot> {
  const { store, bucket, key, destinationDir } = params;
  const localPath = join(destinationDir, basename(key));

  try {
    await store.fetch({ bucket, key, destinationPath: localPath });
  } catch (err) {
    throw new AcquisitionError(`s3://${bucket}/${key}`, classify(err), err);
  }
  return { bucket, key, localPath };
}
