/**
 * Service facades grouping the pCloud operations by area.
 */

import { childPath, identifierParam, IdentifierLike, toIdentifier } from '../identifier';
import type { DownloadResponse } from '../transport';
import type { DownloadLink, Metadata, Revisions, UserInfo } from '../types';
import { getBestApiServer, getUserInfo } from './account';
import { CallOptions, param, RequestExecutor } from './base';
import { DiffRequestBuilder } from './events';
import {
  ChecksumFileRequestBuilder,
  CopyFileRequestBuilder,
  deleteFile,
  getFileMetadata,
  listFileRevisions,
  MoveFileRequestBuilder,
} from './files';
import {
  CopyFolderRequestBuilder,
  CreateFolderRequestBuilder,
  DeleteFolderRequestBuilder,
  ListFolderRequestBuilder,
  MoveFolderRequestBuilder,
} from './folders';
import { downloadLink, FileLinkRequestBuilder, getPublicDownloadLink, PublicLinkRequestBuilder } from './links';
import { OpenFileRequestBuilder } from './handles';
import { UploadRequestBuilder } from './upload';
import { SaveZipRequestBuilder } from './zip';

export * from './base';
export * from './upload';
export * from './folders';
export * from './files';
export * from './links';
export * from './events';
export * from './account';
export * from './zip';
export * from './handles';

/**
 * Folders service
 */
export class FoldersService {
  constructor(private readonly executor: RequestExecutor) {}

  list(folder: IdentifierLike): ListFolderRequestBuilder {
    return new ListFolderRequestBuilder(this.executor, toIdentifier(folder, 'folder'));
  }

  create(parent: IdentifierLike, name: string): CreateFolderRequestBuilder {
    return new CreateFolderRequestBuilder(this.executor, toIdentifier(parent, 'folder'), name);
  }

  delete(folder: IdentifierLike): DeleteFolderRequestBuilder {
    return new DeleteFolderRequestBuilder(this.executor, toIdentifier(folder, 'folder'));
  }

  copy(folder: IdentifierLike, target: IdentifierLike): CopyFolderRequestBuilder {
    return new CopyFolderRequestBuilder(this.executor, toIdentifier(folder, 'folder'), toIdentifier(target, 'folder'));
  }

  move(folder: IdentifierLike, target: IdentifierLike): MoveFolderRequestBuilder {
    return new MoveFolderRequestBuilder(this.executor, toIdentifier(folder, 'folder'), toIdentifier(target, 'folder'));
  }
}

/**
 * Files service
 */
export class FilesService {
  constructor(private readonly executor: RequestExecutor) {}

  upload(folder: IdentifierLike): UploadRequestBuilder {
    return new UploadRequestBuilder(this.executor, toIdentifier(folder, 'folder'));
  }

  metadata(file: IdentifierLike, options?: CallOptions): Promise<Metadata> {
    return getFileMetadata(this.executor, toIdentifier(file, 'file'), options);
  }

  delete(file: IdentifierLike, options?: CallOptions): Promise<Metadata> {
    return deleteFile(this.executor, toIdentifier(file, 'file'), options);
  }

  copy(file: IdentifierLike, target: IdentifierLike): CopyFileRequestBuilder {
    return new CopyFileRequestBuilder(this.executor, toIdentifier(file, 'file'), toIdentifier(target, 'folder'));
  }

  move(file: IdentifierLike, target: IdentifierLike): MoveFileRequestBuilder {
    return new MoveFileRequestBuilder(this.executor, toIdentifier(file, 'file'), toIdentifier(target, 'folder'));
  }

  revisions(file: IdentifierLike, options?: CallOptions): Promise<Revisions> {
    return listFileRevisions(this.executor, toIdentifier(file, 'file'), options);
  }

  checksum(file: IdentifierLike): ChecksumFileRequestBuilder {
    return new ChecksumFileRequestBuilder(this.executor, toIdentifier(file, 'file'));
  }

  /** zip archive of files and folders, written into the account */
  saveZip(): SaveZipRequestBuilder {
    return new SaveZipRequestBuilder(this.executor);
  }

  /** low-level handle on an existing file */
  open(file: IdentifierLike): OpenFileRequestBuilder {
    return new OpenFileRequestBuilder(this.executor, param(identifierParam(toIdentifier(file, 'file'), 'file')));
  }

  /** low-level handle on `name` inside a folder; add FileOpenFlag.Create to create it */
  openInFolder(folder: IdentifierLike, name: string): OpenFileRequestBuilder {
    const parent = toIdentifier(folder, 'folder');
    const target = parent.kind === 'path' ? { path: childPath(parent.path, name) } : { folderid: parent.id, name };
    return new OpenFileRequestBuilder(this.executor, target);
  }
}

/**
 * Links service
 */
export class LinksService {
  constructor(private readonly executor: RequestExecutor) {}

  downloadLinkFor(file: IdentifierLike): FileLinkRequestBuilder {
    return new FileLinkRequestBuilder(this.executor, toIdentifier(file, 'file'));
  }

  download(link: DownloadLink, options?: CallOptions): Promise<DownloadResponse> {
    return downloadLink(this.executor, link, options);
  }

  publicLinkFor(file: IdentifierLike): PublicLinkRequestBuilder {
    return new PublicLinkRequestBuilder(this.executor, toIdentifier(file, 'file'));
  }

  publicDownloadLink(code: string, fileId?: number, options?: CallOptions): Promise<DownloadLink> {
    return getPublicDownloadLink(this.executor, code, fileId, options);
  }
}

/**
 * Events service
 */
export class EventsService {
  constructor(private readonly executor: RequestExecutor) {}

  diff(): DiffRequestBuilder {
    return new DiffRequestBuilder(this.executor);
  }
}

/**
 * Account service
 */
export class AccountService {
  constructor(private readonly executor: RequestExecutor) {}

  userInfo(options?: CallOptions): Promise<UserInfo> {
    return getUserInfo(this.executor, options);
  }

  bestApiServer(options?: CallOptions): Promise<string> {
    return getBestApiServer(this.executor, options);
  }
}
