import { acquireSnapshot } from "@src/stats/application/snapshot_acquirer";
import { AcquisitionError } from "@src/stats/domain/errors";
import type { SnapshotStore } from "@src/stats/types/contracts";

function failingStore(error: unknown): SnapshotStore {
  return {
    fetch: async () => {
      throw error;
    },
  };
}

describe("acquireSnapshot", () => {
  test("resolves the local path from the object key", async () => {
    const calls: unknown[] = [];
    const store: SnapshotStore = {
      fetch: async params => {
        calls.push(params);
      },
    };
    const snapshot = await acquireSnapshot({
      store,
      bucket: "test-bucket",
      key: "nightly/activity.db",
      destinationDir: "/scratch/run",
    });

    expect(snapshot).toEqual({
      bucket: "test-bucket",
      key: "nightly/activity.db",
      localPath: "/scratch/run/activity.db",
    });
    expect(calls).toEqual([
      {
        bucket: "test-bucket",
        key: "nightly/activity.db",
        destinationPath: "/scratch/run/activity.db",
      },
    ]);
  });

  test.each([
    [Object.assign(new Error("missing"), { name: "NoSuchKey" }), "not-found"],
    [Object.assign(new Error("ENOENT: no such file"), { code: "ENOENT" }), "not-found"],
    [Object.assign(new Error("denied"), { name: "AccessDenied" }), "access-denied"],
    [new Error("socket hang up"), "fetch-failed"],
    ["plain string", "fetch-failed"],
  ])("classifies %p as %s", async (error, reason) => {
    const promise = acquireSnapshot({
      store: failingStore(error),
      bucket: "b",
      key: "k.db",
      destinationDir: "/scratch",
    });
    await expect(promise).rejects.toBeInstanceOf(AcquisitionError);
    await expect(promise).rejects.toMatchObject({ reason, location: "s3://b/k.db" });
  });
});
