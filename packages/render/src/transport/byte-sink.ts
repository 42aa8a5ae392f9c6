/**
 * Destination for encoded terminal output. Writes are fire-and-forget and must
 * arrive in order; chunks are UTF-8 text and the sink does the encoding.
 */
export interface ByteSink {
  write(chunk: string): void;
}
