/**
 * Zip archives written into the account (`savezip`).
 * see https://docs.pcloud.com/methods/archiving/savezip.html
 */

import { randomUUID } from 'crypto';
import { ConfigurationError } from '../errors';
import { childPath, describeIdentifier, EntityKind, IdentifierLike, pathOf, toIdentifier } from '../identifier';
import type { QueryParams } from '../transport';
import { FileOrFolderStatSchema, Metadata, SaveZipProgress, SaveZipProgressSchema } from '../types';
import { CallOptions, pause, RequestBuilder, RequestExecutor } from './base';

export const DEFAULT_PROGRESS_INTERVAL_MS = 1000;

export interface SaveZipOptions extends CallOptions {
  /** receives progress reports while the archive is being written */
  onProgress?: (progress: SaveZipProgress) => void;
  /** ms between progress requests */
  progressInterval?: number;
}

function idList(ids: number[]): string | undefined {
  return ids.length > 0 ? ids.join(',') : undefined;
}

/**
 * Packs files and folders, given by id, into a zip archive stored in the account
 */
export class SaveZipRequestBuilder extends RequestBuilder {
  private readonly folderIds: number[] = [];
  private readonly fileIds: number[] = [];
  private readonly excludedFolderIds: number[] = [];
  private readonly excludedFileIds: number[] = [];
  private target?: QueryParams;

  constructor(executor: RequestExecutor) {
    super(executor, 'Save zip');
  }

  /** a folder with everything below it */
  addFolder(folder: IdentifierLike): this {
    this.assertOpen();
    this.folderIds.push(this.idOf(folder, 'folder'));
    return this;
  }

  addFile(file: IdentifierLike): this {
    this.assertOpen();
    this.fileIds.push(this.idOf(file, 'file'));
    return this;
  }

  /** leave out a folder below one of the added folders */
  excludeFolder(folder: IdentifierLike): this {
    this.assertOpen();
    this.excludedFolderIds.push(this.idOf(folder, 'folder'));
    return this;
  }

  excludeFile(file: IdentifierLike): this {
    this.assertOpen();
    this.excludedFileIds.push(this.idOf(file, 'file'));
    return this;
  }

  /** full path of the archive */
  toPath(path: string): this {
    this.assertOpen();
    this.target = { topath: pathOf(path).path };
    return this;
  }

  /** archive `name` inside a folder */
  toFolder(folder: IdentifierLike, name: string): this {
    this.assertOpen();
    const parent = toIdentifier(folder, 'folder');
    this.target =
      parent.kind === 'path' ? { topath: childPath(parent.path, name) } : { tofolderid: parent.id, toname: name };
    return this;
  }

  /**
   * Write the archive. With `onProgress`, progress is polled until the archive
   * is complete or the request has returned.
   */
  async execute(options: SaveZipOptions = {}): Promise<Metadata> {
    this.consume();
    if (this.target === undefined) {
      throw new ConfigurationError('Zip archive needs a target');
    }
    if (this.folderIds.length === 0 && this.fileIds.length === 0) {
      throw new ConfigurationError('Zip archive needs at least one file or folder');
    }

    const { onProgress, progressInterval = DEFAULT_PROGRESS_INTERVAL_MS, ...callOptions } = options;
    const progressHash = onProgress ? randomUUID() : undefined;
    this.executor.logger.info('Saving zip archive', {
      folders: this.folderIds.length,
      files: this.fileIds.length,
    });

    const saving = this.executor.get(
      'savezip',
      {
        folderids: idList(this.folderIds),
        fileids: idList(this.fileIds),
        excludefolderids: idList(this.excludedFolderIds),
        excludefileids: idList(this.excludedFileIds),
        ...this.target,
        progresshash: progressHash,
      },
      FileOrFolderStatSchema,
      callOptions
    );
    if (!onProgress || !progressHash) {
      return (await saving).metadata;
    }

    const done = new AbortController();
    const polling = this.pollProgress(progressHash, onProgress, progressInterval, done.signal);
    try {
      return (await saving).metadata;
    } finally {
      done.abort();
      await polling;
    }
  }

  private async pollProgress(
    progressHash: string,
    onProgress: (progress: SaveZipProgress) => void,
    interval: number,
    signal: AbortSignal
  ): Promise<void> {
    while (!signal.aborted) {
      try {
        const progress = await this.executor.get(
          'savezipprogress',
          { progresshash: progressHash },
          SaveZipProgressSchema,
          { signal }
        );
        onProgress(progress);
        if (progress.totalfiles > 0 && progress.files >= progress.totalfiles) return;
      } catch (error) {
        if (signal.aborted) return;
        this.executor.logger.warn('Failed to read zip progress', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
      await pause(interval, signal);
    }
  }

  private idOf(value: IdentifierLike, kind: EntityKind): number {
    const identifier = toIdentifier(value, kind);
    if (identifier.kind === 'path') {
      throw new ConfigurationError(`Zip contents are addressed by id, not ${describeIdentifier(identifier)}`);
    }
    return identifier.id;
  }
}
