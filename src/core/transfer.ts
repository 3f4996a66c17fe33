/**
 * Contracts between the protocol clients and the engines that move bytes.
 *
 * A client builds a request, hands it to an engine together with a sink,
 * and reads the finished response off the sink once `perform` settles.
 * Engines call the sink synchronously from their socket handlers.
 */

export interface TransferSink {
  /**
   * One raw header or server reply line, terminator included
   * @returns bytes consumed
   */
  onHeaderLine(line: string): number;

  /**
   * One chunk of inbound payload
   * @returns bytes consumed
   */
  onBodyChunk(chunk: Buffer): number;

  /**
   * Supply at most `size` bytes of outbound payload. An empty buffer
   * means the payload is complete.
   */
  onReadRequest(size: number): Buffer | Promise<Buffer>;
}

export interface TransferResult {
  ok: boolean;
  /** Final protocol status: HTTP status or last server reply code, 0 when none */
  status: number;
  /** Short reason when `ok` is false */
  error?: string;
}

export interface TransferEngine<R> {
  perform(request: R, sink: TransferSink): Promise<TransferResult>;
}

/**
 * Sink that accepts everything and supplies nothing. Builders extend it
 * and override the callbacks they care about.
 */
export class BaseSink implements TransferSink {
  onHeaderLine(line: string): number {
    return Buffer.byteLength(line);
  }

  onBodyChunk(chunk: Buffer): number {
    return chunk.length;
  }

  onReadRequest(_size: number): Buffer | Promise<Buffer> {
    return Buffer.alloc(0);
  }
}

export function failedResult(error: string, status = 0): TransferResult {
  return { ok: false, status, error };
}
