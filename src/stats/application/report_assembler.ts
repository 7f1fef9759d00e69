import { open, readFile, rm, type FileHandle } from "node:fs/promises";
import { AssemblyError } from "../domain/errors";
import type { RenderedBlock, ReportDocument } from "../domain/types";
import type { ReportSink } from "../types/contracts";

const FENCE = "```";

export function formatLabel(label: string): string {
  return `${label}\n`;
}

export function formatBlock(block: RenderedBlock): string {
  const body = block.text.endsWith("\n") ? block.text : `${block.text}\n`;
  return `${FENCE}\n${body}${FENCE}\n\n`;
}

/**
 * Writes the report to a file in the run's scratch area as sections arrive,
 * then reads it back once on finalize.
 */
export class ReportAssembler implements ReportSink {
  readonly path: string;
  private handle: FileHandle | null;

  private constructor(path: string, handle: FileHandle) {
    this.path = path;
    this.handle = handle;
  }

  static async create(path: string): Promise<ReportAssembler> {
    try {
      const handle = await open(path, "w", 0o600);
      return new ReportAssembler(path, handle);
    } catch (err) {
      throw new AssemblyError("create", path, err);
    }
  }

  async append(text: string): Promise<void> {
    if (!this.handle) {
      throw new AssemblyError("append", this.path, new Error("report is already finalized"));
    }
    try {
      await this.handle.write(text);
    } catch (err) {
      throw new AssemblyError("append", this.path, err);
    }
  }

  async finalize(): Promise<ReportDocument> {
    try {
      if (this.handle) {
        const handle = this.handle;
        this.handle = null;
        await handle.close();
      }
      const text = await readFile(this.path, "utf8");
      return { path: this.path, text };
    } catch (err) {
      throw new AssemblyError("finalize", this.path, err);
    }
  }

  /** Closes the file if still open and deletes it. */
  async release(): Promise<void> {
    if (this.handle) {
      const handle = this.handle;
      this.handle = null;
      await handle.close();
    }
    await rm(this.path, { force: true });
  }
}
