/**
 * File operations.
 */

import type { ChecksumSet } from '../checksum';
import { Identifier, identifierParam, targetParam } from '../identifier';
import {
  FileChecksumsSchema,
  FileOrFolderStatSchema,
  Metadata,
  Revisions,
  RevisionsSchema,
  toUnixSeconds,
} from '../types';
import { CallOptions, flag, param, RequestBuilder, RequestExecutor } from './base';

/**
 * Copies a file into a folder or onto a full target path
 */
export class CopyFileRequestBuilder extends RequestBuilder {
  private overwriteExisting = true;
  private newName?: string;
  private revision?: number;
  private modified?: Date;
  private created?: Date;

  constructor(
    executor: RequestExecutor,
    private readonly source: Identifier,
    private readonly target: Identifier
  ) {
    super(executor, 'Copy file');
  }

  /** replace a file of the same name (default) */
  overwrite(value: boolean): this {
    this.assertOpen();
    this.overwriteExisting = value;
    return this;
  }

  withNewName(name: string): this {
    this.assertOpen();
    this.newName = name;
    return this;
  }

  /** copy an older revision instead of the current content */
  withRevision(revisionId: number): this {
    this.assertOpen();
    this.revision = revisionId;
    return this;
  }

  mtime(value: Date): this {
    this.assertOpen();
    this.modified = value;
    return this;
  }

  ctime(value: Date): this {
    this.assertOpen();
    this.created = value;
    return this;
  }

  async execute(options?: CallOptions): Promise<Metadata> {
    this.consume();
    const { metadata } = await this.executor.post(
      'copyfile',
      {
        ...param(identifierParam(this.source, 'file')),
        ...param(targetParam(this.target)),
        toname: this.newName,
        revisionid: this.revision,
        mtime: this.modified ? toUnixSeconds(this.modified) : undefined,
        ctime: this.created ? toUnixSeconds(this.created) : undefined,
        noover: flag(!this.overwriteExisting),
      },
      FileOrFolderStatSchema,
      options
    );
    return metadata;
  }
}

/**
 * Moves or renames a file
 */
export class MoveFileRequestBuilder extends RequestBuilder {
  private newName?: string;

  constructor(
    executor: RequestExecutor,
    private readonly source: Identifier,
    private readonly target: Identifier
  ) {
    super(executor, 'Move file');
  }

  withNewName(name: string): this {
    this.assertOpen();
    this.newName = name;
    return this;
  }

  async execute(options?: CallOptions): Promise<Metadata> {
    this.consume();
    const { metadata } = await this.executor.post(
      'renamefile',
      {
        ...param(identifierParam(this.source, 'file')),
        ...param(targetParam(this.target)),
        toname: this.newName,
      },
      FileOrFolderStatSchema,
      options
    );
    return metadata;
  }
}

/**
 * Server-side digests of a file
 */
export interface FileChecksums {
  /** only the region's algorithms are present */
  checksums: ChecksumSet;
  metadata?: Metadata;
}

/**
 * Fetches the checksums of a file
 */
export class ChecksumFileRequestBuilder extends RequestBuilder {
  private revision?: number;

  constructor(
    executor: RequestExecutor,
    private readonly file: Identifier
  ) {
    super(executor, 'Checksum file');
  }

  withRevision(revisionId: number): this {
    this.assertOpen();
    this.revision = revisionId;
    return this;
  }

  async get(options?: CallOptions): Promise<FileChecksums> {
    this.consume();
    const { metadata, md5, sha1, sha256 } = await this.executor.get(
      'checksumfile',
      { ...param(identifierParam(this.file, 'file')), revisionid: this.revision },
      FileChecksumsSchema,
      options
    );
    const checksums: ChecksumSet = {};
    if (md5 !== undefined) checksums.md5 = md5;
    if (sha1 !== undefined) checksums.sha1 = sha1;
    if (sha256 !== undefined) checksums.sha256 = sha256;
    return { checksums, metadata };
  }
}

export async function getFileMetadata(
  executor: RequestExecutor,
  file: Identifier,
  options?: CallOptions
): Promise<Metadata> {
  const { metadata } = await executor.get('stat', param(identifierParam(file, 'file')), FileOrFolderStatSchema, options);
  return metadata;
}

export async function deleteFile(
  executor: RequestExecutor,
  file: Identifier,
  options?: CallOptions
): Promise<Metadata> {
  const { metadata } = await executor.get(
    'deletefile',
    param(identifierParam(file, 'file')),
    FileOrFolderStatSchema,
    options
  );
  return metadata;
}

export async function listFileRevisions(
  executor: RequestExecutor,
  file: Identifier,
  options?: CallOptions
): Promise<Revisions> {
  return executor.get('listrevisions', param(identifierParam(file, 'file')), RevisionsSchema, options);
}
