/**
 * Multi-file upload into a folder.
 */

import { ConfigurationError, describeResultCode, PCloudResultCode } from '../errors';
import { describeIdentifier, Identifier, identifierParam } from '../identifier';
import type { MultipartFilePart, UploadPayload } from '../transport';
import { Metadata, toUnixSeconds, UploadedFiles, UploadedFilesSchema } from '../types';
import { CallOptions, flag, param, RequestBuilder, RequestExecutor } from './base';

/**
 * Outcome of one file in an upload batch
 */
export type UploadOutcome =
  | { status: 'uploaded'; name: string; fileId: number; metadata: Metadata }
  /** stored under a server-assigned name */
  | { status: 'renamed'; name: string; fileId: number; metadata: Metadata }
  /** a file of that name exists and renaming was disabled */
  | { status: 'conflict'; name: string; resultCode: number; message: string }
  | { status: 'failed'; name: string; resultCode?: number; message: string };

export interface UploadResult {
  /** one outcome per file, in the order the files were added */
  outcomes: UploadOutcome[];
  fileIds: number[];
}

export function isStored(
  outcome: UploadOutcome
): outcome is Extract<UploadOutcome, { status: 'uploaded' | 'renamed' }> {
  return outcome.status === 'uploaded' || outcome.status === 'renamed';
}

interface PendingFile {
  name: string;
  payload: UploadPayload;
}

function splitName(name: string): [base: string, extension: string] {
  const dot = name.lastIndexOf('.');
  return dot > 0 ? [name.slice(0, dot), name.slice(dot)] : [name, ''];
}

// a rename keeps the base name (`a (1).txt`) or at least the extension
function isRenameOf(requested: string, stored: string): boolean {
  const [base, extension] = splitName(requested);
  return stored.startsWith(base) || (extension !== '' && stored.endsWith(extension));
}

/**
 * Correlate the server's per-file entries with the requested files by position.
 * The server answers in request order; an entry whose name is unrelated to the
 * requested one is reported as failed rather than credited to the wrong file.
 */
export function decodeUploadOutcomes(names: string[], response: UploadedFiles): UploadOutcome[] {
  return names.map((name, index): UploadOutcome => {
    const entry = response.metadata[index];
    if (entry === undefined) {
      return { status: 'failed', name, message: 'No result returned for file' };
    }
    if ('result' in entry) {
      const message = entry.error ?? describeResultCode(entry.result);
      return entry.result === PCloudResultCode.FileOrFolderAlreadyExists
        ? { status: 'conflict', name, resultCode: entry.result, message }
        : { status: 'failed', name, resultCode: entry.result, message };
    }
    const fileId = entry.fileid ?? response.fileids[index];
    if (fileId === undefined) {
      return { status: 'failed', name, message: 'No file id returned for file' };
    }
    if (entry.name === name) {
      return { status: 'uploaded', name, fileId, metadata: entry };
    }
    if (!isRenameOf(name, entry.name)) {
      return { status: 'failed', name, message: `Server returned "${entry.name}" for file` };
    }
    return { status: 'renamed', name, fileId, metadata: entry };
  });
}

/**
 * Accumulates files and flags, then sends them as one multipart request
 */
export class UploadRequestBuilder extends RequestBuilder {
  private readonly files: PendingFile[] = [];
  private renameOnConflict = true;
  private partialForbidden = true;
  private modified?: Date;
  private created?: Date;

  constructor(
    executor: RequestExecutor,
    private readonly folder: Identifier
  ) {
    super(executor, 'Upload');
  }

  /**
   * Add a file. Names may repeat; every added file is sent.
   */
  withFile(name: string, payload: UploadPayload): this {
    this.assertOpen();
    if (name.length === 0) {
      throw new ConfigurationError('File name must not be empty');
    }
    this.files.push({ name, payload });
    return this;
  }

  /**
   * Let the server rename on a name collision (default) instead of reporting a conflict
   */
  renameIfExists(value: boolean): this {
    this.assertOpen();
    this.renameOnConflict = value;
    return this;
  }

  /**
   * Refuse to keep partially uploaded files (default)
   */
  noPartial(value: boolean): this {
    this.assertOpen();
    this.partialForbidden = value;
    return this;
  }

  mtime(value: Date): this {
    this.assertOpen();
    this.modified = value;
    return this;
  }

  /**
   * Creation time; only taken together with mtime
   */
  ctime(value: Date): this {
    this.assertOpen();
    this.created = value;
    return this;
  }

  async upload(options?: CallOptions): Promise<UploadResult> {
    this.consume();

    if (this.created && !this.modified) {
      throw new ConfigurationError('ctime requires mtime');
    }

    if (this.files.length === 0) {
      return { outcomes: [], fileIds: [] };
    }

    const parts: MultipartFilePart[] = this.files.map((file) => ({
      field: 'part',
      filename: file.name,
      payload: file.payload,
    }));

    this.executor.logger.debug('Uploading files', {
      folder: describeIdentifier(this.folder),
      count: parts.length,
    });

    const response = await this.executor.upload(
      'uploadfile',
      {
        ...param(identifierParam(this.folder, 'folder')),
        renameifexists: flag(this.renameOnConflict),
        nopartial: flag(this.partialForbidden),
        mtime: this.modified ? toUnixSeconds(this.modified) : undefined,
        ctime: this.created ? toUnixSeconds(this.created) : undefined,
      },
      parts,
      UploadedFilesSchema,
      options
    );

    return {
      outcomes: decodeUploadOutcomes(
        this.files.map((file) => file.name),
        response
      ),
      fileIds: response.fileids,
    };
  }
}
