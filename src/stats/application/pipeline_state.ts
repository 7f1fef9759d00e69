import type { PipelineState } from "../domain/types";

const TRANSITIONS: Readonly<Record<PipelineState, readonly PipelineState[]>> = {
  Idle: ["Acquiring", "Failed"],
  Acquiring: ["Querying", "Cleanup"],
  Querying: ["Assembling", "Cleanup"],
  Assembling: ["Dispatching", "Cleanup"],
  Dispatching: ["Cleanup"],
  Cleanup: ["Done", "Failed"],
  Done: [],
  Failed: [],
};

/**
 * Tracks the run through its states and rejects transitions the pipeline
 * never makes.
 */
export class PipelineStateMachine {
  private readonly visited: PipelineState[] = ["Idle"];

  constructor(private readonly onTransition?: (state: PipelineState) => void) {}

  get current(): PipelineState {
    return this.visited[this.visited.length - 1];
  }

  get history(): PipelineState[] {
    return [...this.visited];
  }

  transition(next: PipelineState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal pipeline transition ${this.current} -> ${next}`);
    }
    this.visited.push(next);
    this.onTransition?.(next);
  }
}
