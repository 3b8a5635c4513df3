/**
 * Low-level file handles (`file_open`, `file_write`, `file_close`).
 * see https://docs.pcloud.com/methods/fileops/file_open.html
 */

import { ConfigurationError } from '../errors';
import type { QueryParams, UploadPayload } from '../transport';
import { FileCloseSchema, FileOpenSchema, FileWriteSchema } from '../types';
import { CallOptions, RequestBuilder, RequestExecutor } from './base';

/**
 * `file_open` flags; combined by bitwise or
 */
export const FileOpenFlag = {
  /** check write access and quota on open instead of on the first write */
  Write: 0x0002,
  /** create the file; needs a full path or a folder id plus name */
  Create: 0x0040,
  /** with Create, fail if the file exists */
  Exclusive: 0x0080,
  Truncate: 0x0200,
  /** every write goes to the end of the file */
  Append: 0x0400,
} as const;

export type FileOpenFlag = (typeof FileOpenFlag)[keyof typeof FileOpenFlag];

/**
 * An open file descriptor on the server
 */
export class OpenFile {
  private closed = false;

  constructor(
    private readonly executor: RequestExecutor,
    readonly fd: number,
    readonly fileId: number
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Write at the current offset. Returns the number of bytes written.
   */
  async write(payload: UploadPayload, options?: CallOptions): Promise<number> {
    if (this.closed) {
      throw new ConfigurationError(`File descriptor ${this.fd} is closed`);
    }
    const { bytes } = await this.executor.upload(
      'file_write',
      { fd: this.fd },
      [{ field: 'files', filename: String(this.fileId), payload }],
      FileWriteSchema,
      options
    );
    return bytes;
  }

  /**
   * Close the descriptor. Closing twice is a no-op.
   */
  async close(options?: CallOptions): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.executor.get('file_close', { fd: this.fd }, FileCloseSchema, options);
    this.executor.logger.debug('Closed file', { fileid: this.fileId });
  }
}

/**
 * Opens or creates a file for low-level access
 */
export class OpenFileRequestBuilder extends RequestBuilder {
  private readonly flags = new Set<FileOpenFlag>();

  constructor(
    executor: RequestExecutor,
    private readonly target: QueryParams
  ) {
    super(executor, 'Open file');
  }

  withFlag(flag: FileOpenFlag): this {
    this.assertOpen();
    this.flags.add(flag);
    return this;
  }

  async open(options?: CallOptions): Promise<OpenFile> {
    this.consume();
    let flags = 0;
    for (const flag of this.flags) {
      flags |= flag;
    }
    const { fd, fileid } = await this.executor.get('file_open', { flags, ...this.target }, FileOpenSchema, options);
    this.executor.logger.debug('Opened file', { fd, fileid });
    return new OpenFile(this.executor, fd, fileid);
  }
}
