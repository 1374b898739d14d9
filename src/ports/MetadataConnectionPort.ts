/**
 * One open streaming connection to a now-playing server.
 */
export interface MetadataConnection {
  send(message: string): void;
  /**
   * Next text frame. Resolves null once the connection is closed or
   * `signal` aborts.
   */
  next(signal: AbortSignal): Promise<string | null>;
  close(): void;
}

/**
 * Opens a connection; rejects when the server cannot be reached or
 * `signal` aborts first.
 */
export type MetadataConnector = (url: string, signal: AbortSignal) => Promise<MetadataConnection>;
