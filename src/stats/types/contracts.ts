import type { ResultSet } from "../domain/types";

/**
 * Key-value parameter lookup (deployment configuration and secrets).
 */
export interface ParameterStore {
  get(name: string, isSecret: boolean): Promise<string>;
}

/**
 * Blob store holding the published snapshots.
 */
export interface SnapshotStore {
  fetch(params: {
    bucket: string;
    key: string;
    destinationPath: string;
  }): Promise<void>;
}

/**
 * A snapshot opened for read-only querying.
 */
export interface QueryableResource {
  query(sql: string): Promise<ResultSet>;
  close(): Promise<void>;
}

export interface QueryEngine {
  open(path: string): Promise<QueryableResource>;
}

/**
 * Downstream consumer addressed by name.
 */
export interface InvokeTarget {
  invoke(target: string, payload: Uint8Array): Promise<void>;
}

/**
 * Append-only text sink the report is written through.
 */
export interface ReportSink {
  append(text: string): Promise<void>;
}
