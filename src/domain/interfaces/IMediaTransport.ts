/**
 * An opened download: the status has already been checked
 */
export interface MediaStream {
  readonly body: NodeJS.ReadableStream;
  /** From Content-Length, when the server sent one */
  readonly contentLength?: number;
  readonly contentType?: string;
}

/**
 * Opens byte streams for media URLs
 */
export interface IMediaTransport {
  /**
   * Rejects on transport failure or a non-2xx status
   */
  open(url: string): Promise<MediaStream>;
}
