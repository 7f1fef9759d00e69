/**
 * Domain types for the activity stats report.
 */

/** One entry of the fixed, ordered query list. */
export interface QueryDefinition {
  name: string;
  /** Narrative text shown before the query's result. */
  label: string;
  query: string;
}

export interface RenderOptions {
  mergeCells: boolean;
  rowSeparatorLine: boolean;
  renderAsTable: boolean;
}

export type CellValue = string | number | bigint | Uint8Array | null;

export interface ResultSet {
  columns: string[];
  rows: CellValue[][];
}

export interface RenderedBlock {
  queryName: string;
  text: string;
}

/** A snapshot fetched into the run's scratch area. */
export interface Snapshot {
  bucket: string;
  key: string;
  localPath: string;
}

export interface ReportDocument {
  path: string;
  text: string;
}

export type PipelineState =
  | "Idle"
  | "Acquiring"
  | "Querying"
  | "Assembling"
  | "Dispatching"
  | "Cleanup"
  | "Done"
  | "Failed";
