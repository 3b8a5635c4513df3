/**
 * Folder operations.
 */

import { childPath, describeIdentifier, Identifier, identifierParam, targetParam } from '../identifier';
import {
  FileOrFolderStatSchema,
  FolderDeletedRecursively,
  FolderDeletedRecursivelySchema,
  Metadata,
} from '../types';
import { CallOptions, flag, param, RequestBuilder, RequestExecutor } from './base';

/**
 * Lists the contents of a folder
 */
export class ListFolderRequestBuilder extends RequestBuilder {
  private isRecursive = false;
  private withDeleted = false;
  private withoutFiles = false;
  private withoutShares = false;

  constructor(
    executor: RequestExecutor,
    private readonly folder: Identifier
  ) {
    super(executor, 'List folder');
  }

  /** include the full tree below the folder */
  recursive(value = true): this {
    this.assertOpen();
    this.isRecursive = value;
    return this;
  }

  /** include deleted files and folders that can be undeleted */
  showDeleted(value = true): this {
    this.assertOpen();
    this.withDeleted = value;
    return this;
  }

  /** list folders only */
  noFiles(value = true): this {
    this.assertOpen();
    this.withoutFiles = value;
    return this;
  }

  /** list only the user's own content */
  noShares(value = true): this {
    this.assertOpen();
    this.withoutShares = value;
    return this;
  }

  async get(options?: CallOptions): Promise<Metadata> {
    this.consume();
    const { metadata } = await this.executor.get(
      'listfolder',
      {
        ...param(identifierParam(this.folder, 'folder')),
        recursive: flag(this.isRecursive),
        showdeleted: flag(this.withDeleted),
        nofiles: flag(this.withoutFiles),
        noshares: flag(this.withoutShares),
      },
      FileOrFolderStatSchema,
      options
    );
    return metadata;
  }
}

/**
 * Creates a folder inside a parent folder
 */
export class CreateFolderRequestBuilder extends RequestBuilder {
  private onlyIfMissing = true;

  constructor(
    executor: RequestExecutor,
    private readonly parent: Identifier,
    private readonly name: string
  ) {
    super(executor, 'Create folder');
  }

  /** succeed with the existing folder instead of failing (default) */
  ifNotExists(value: boolean): this {
    this.assertOpen();
    this.onlyIfMissing = value;
    return this;
  }

  async execute(options?: CallOptions): Promise<Metadata> {
    this.consume();
    const method = this.onlyIfMissing ? 'createfolderifnotexists' : 'createfolder';
    // a path addresses the new folder itself; an id addresses its parent
    const target =
      this.parent.kind === 'path'
        ? { path: childPath(this.parent.path, this.name) }
        : { folderid: this.parent.id, name: this.name };
    const { metadata } = await this.executor.get(method, target, FileOrFolderStatSchema, options);
    return metadata;
  }
}

/**
 * Deletes a folder, either only when empty or with all its content
 */
export class DeleteFolderRequestBuilder extends RequestBuilder {
  constructor(
    executor: RequestExecutor,
    private readonly folder: Identifier
  ) {
    super(executor, 'Delete folder');
  }

  async deleteIfEmpty(options?: CallOptions): Promise<Metadata> {
    this.consume();
    const { metadata } = await this.executor.get(
      'deletefolder',
      param(identifierParam(this.folder, 'folder')),
      FileOrFolderStatSchema,
      options
    );
    return metadata;
  }

  async deleteRecursive(options?: CallOptions): Promise<FolderDeletedRecursively> {
    this.consume();
    this.executor.logger.info('Deleting folder recursively', { folder: describeIdentifier(this.folder) });
    const result = await this.executor.get(
      'deletefolderrecursive',
      param(identifierParam(this.folder, 'folder')),
      FolderDeletedRecursivelySchema,
      options
    );
    return { deletedFiles: result.deletedfiles, deletedFolders: result.deletedfolders };
  }
}

/**
 * Copies a folder into a target folder
 */
export class CopyFolderRequestBuilder extends RequestBuilder {
  private overwriteExisting = true;
  private skipExistingFiles = false;
  private contentOnly = false;
  private newName?: string;

  constructor(
    executor: RequestExecutor,
    private readonly source: Identifier,
    private readonly target: Identifier
  ) {
    super(executor, 'Copy folder');
  }

  /** overwrite files of the same name (default); when false the copy fails on the first collision */
  overwrite(value: boolean): this {
    this.assertOpen();
    this.overwriteExisting = value;
    return this;
  }

  /** leave existing files in place and carry on */
  skipExisting(value = true): this {
    this.assertOpen();
    this.skipExistingFiles = value;
    return this;
  }

  /** copy only the contents, not the folder itself */
  copyContentOnly(value = true): this {
    this.assertOpen();
    this.contentOnly = value;
    return this;
  }

  withNewName(name: string): this {
    this.assertOpen();
    this.newName = name;
    return this;
  }

  async execute(options?: CallOptions): Promise<Metadata> {
    this.consume();
    const { metadata } = await this.executor.post(
      'copyfolder',
      {
        ...param(identifierParam(this.source, 'folder')),
        ...param(targetParam(this.target)),
        toname: this.newName,
        noover: flag(!this.overwriteExisting),
        skipexisting: flag(this.skipExistingFiles),
        copycontentonly: flag(this.contentOnly),
      },
      FileOrFolderStatSchema,
      options
    );
    return metadata;
  }
}

/**
 * Moves or renames a folder
 */
export class MoveFolderRequestBuilder extends RequestBuilder {
  private newName?: string;

  constructor(
    executor: RequestExecutor,
    private readonly source: Identifier,
    private readonly target: Identifier
  ) {
    super(executor, 'Move folder');
  }

  withNewName(name: string): this {
    this.assertOpen();
    this.newName = name;
    return this;
  }

  async execute(options?: CallOptions): Promise<Metadata> {
    this.consume();
    const { metadata } = await this.executor.post(
      'renamefolder',
      {
        ...param(identifierParam(this.source, 'folder')),
        ...param(targetParam(this.target)),
        toname: this.newName,
      },
      FileOrFolderStatSchema,
      options
    );
    return metadata;
  }
}
