export type StorageReadResult =
  | { kind: 'ok'; data: unknown }
  | { kind: 'missing' }
  | { kind: 'invalid'; reason: string };

export interface StoragePort {
  readJson(path: string): Promise<StorageReadResult>;
  /** Replaces the whole document at `path`. */
  writeJson(path: string, data: unknown): Promise<void>;
}
