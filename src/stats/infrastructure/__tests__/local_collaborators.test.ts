import { readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { buildEnvelope, serializeEnvelope } from "@src/stats/domain/envelope";
import {
  DirectorySnapshotStore,
  DryRunInvokeTarget,
  StaticParameterStore,
} from "@src/stats/infrastructure/local_collaborators";
import { createTempDir } from "../../__tests__/helpers/fixtures";

describe("local collaborators", () => {
  test("DirectorySnapshotStore copies the keyed file", async () => {
    const source = createTempDir();
    const dest = createTempDir();
    try {
      writeFileSync(join(source.dir, "activity.db"), "snapshot-bytes");
      const store = new DirectorySnapshotStore(source.dir);
      await store.fetch({
        bucket: "ignored",
        key: "activity.db",
        destinationPath: join(dest.dir, "activity.db"),
      });
      expect(readFileSync(join(dest.dir, "activity.db"), "utf8")).toBe("snapshot-bytes");
    } finally {
      source.cleanup();
      dest.cleanup();
    }
  });

  test("StaticParameterStore resolves known names only", async () => {
    const store = new StaticParameterStore({ "/stats/dispatch-target": "dry-run" });
    await expect(store.get("/stats/dispatch-target")).resolves.toBe("dry-run");
    await expect(store.get("/other")).rejects.toThrow("Parameter /other is not defined");
  });

  test("DryRunInvokeTarget records decoded envelopes", async () => {
    const invoker = new DryRunInvokeTarget();
    const envelope = buildEnvelope({ title: "T", source: "aws:lambda", description: "d\n" });
    await invoker.invoke("dry-run", serializeEnvelope(envelope));
    expect(invoker.sent).toEqual([{ target: "dry-run", envelope }]);
  });
});
