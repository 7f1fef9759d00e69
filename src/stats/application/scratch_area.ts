import { mkdir, mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";

/** Directory owned by a single pipeline run. */
export interface ScratchArea {
  readonly dir: string;
  resolve(name: string): string;
  release(): Promise<void>;
}

export async function createScratchArea(
  parentDir: string,
  runId: string
): Promise<ScratchArea> {
  await mkdir(parentDir, { recursive: true });
  const safeId = runId.replace(/[^A-Za-z0-9-]/g, "_").slice(0, 64);
  const dir = await mkdtemp(join(parentDir, `stats-${safeId}-`));

  return {
    dir,
    resolve: (name: string) => join(dir, name),
    release: () => rm(dir, { recursive: true, force: true }),
  };
}
