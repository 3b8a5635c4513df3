/**
 * Type definitions and Zod schemas for pCloud responses.
 *
 * Field names follow the wire format of https://docs.pcloud.com/structures/.
 */

import { z } from 'zod';

// =============================================================================
// Dates
// =============================================================================

/**
 * Format a date the way pCloud expects it in query parameters,
 * e.g. `Wed, 25 Jan 2023 12:09:14 +0000`.
 */
export function formatPCloudDate(date: Date): string {
  return date.toUTCString().replace('GMT', '+0000');
}

/**
 * Parse a pCloud date string. Returns undefined when the value is not a date.
 */
export function parsePCloudDate(value: string): Date | undefined {
  const millis = Date.parse(value);
  return Number.isNaN(millis) ? undefined : new Date(millis);
}

/**
 * Unix seconds, as taken by `mtime` and `ctime`.
 */
export function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export const PCloudDateSchema = z.string().transform((value, ctx) => {
  const date = parsePCloudDate(value);
  if (!date) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid pCloud date: ${value}` });
    return z.NEVER;
  }
  return date;
});

// =============================================================================
// Envelope
// =============================================================================

/**
 * Every pCloud response carries a `result` code; non-zero results carry `error`.
 */
export const ResultEnvelopeSchema = z.object({
  result: z.number().int(),
  error: z.string().optional(),
});

export type ResultEnvelope = z.infer<typeof ResultEnvelopeSchema>;

// =============================================================================
// Metadata
// =============================================================================

/**
 * Category of a file
 */
export const FileCategory = {
  Uncategorized: 0,
  Image: 1,
  Video: 2,
  Audio: 3,
  Document: 4,
  Archive: 5,
} as const;

export type FileCategory = (typeof FileCategory)[keyof typeof FileCategory];

/**
 * Metadata of a file or folder.
 * see https://docs.pcloud.com/structures/metadata.html
 */
export interface Metadata {
  /** folder the object resides in; absent for the root folder */
  parentfolderid?: number;
  isfolder: boolean;
  ismine?: boolean;
  /** permissions, only present when ismine is false */
  canread?: boolean;
  canmodify?: boolean;
  candelete?: boolean;
  cancreate?: boolean;
  /** owner, only present when ismine is false */
  userid?: number;
  isshared?: boolean;
  name: string;
  /** `d<folderid>` or `f<fileid>` */
  id: string;
  folderid?: number;
  fileid?: number;
  deletedfileid?: number;
  isdeleted?: boolean;
  path?: string;
  created: Date;
  modified: Date;
  icon?: string;
  category?: number;
  thumb?: boolean;
  size?: number;
  contenttype?: string;
  hash?: number;
  /** only filled by recursive folder listings */
  contents?: Metadata[];
  width?: number;
  height?: number;
  artist?: string;
  album?: string;
  title?: string;
  genre?: string;
  trackno?: string;
  duration?: string;
  fps?: string;
  videocodec?: string;
  audiocodec?: string;
  videobitrate?: number;
  audiobitrate?: number;
  audiosamplerate?: number;
  rotate?: number;
}

export const MetadataSchema: z.ZodType<Metadata, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    parentfolderid: z.number().int().optional(),
    isfolder: z.boolean(),
    ismine: z.boolean().optional(),
    canread: z.boolean().optional(),
    canmodify: z.boolean().optional(),
    candelete: z.boolean().optional(),
    cancreate: z.boolean().optional(),
    userid: z.number().int().optional(),
    isshared: z.boolean().optional(),
    name: z.string(),
    id: z.string(),
    folderid: z.number().int().optional(),
    fileid: z.number().int().optional(),
    deletedfileid: z.number().int().optional(),
    isdeleted: z.boolean().optional(),
    path: z.string().optional(),
    created: PCloudDateSchema,
    modified: PCloudDateSchema,
    icon: z.string().optional(),
    category: z.number().int().optional(),
    thumb: z.boolean().optional(),
    size: z.number().optional(),
    contenttype: z.string().optional(),
    hash: z.number().optional(),
    contents: z.array(MetadataSchema).optional(),
    width: z.number().optional(),
    height: z.number().optional(),
    artist: z.string().optional(),
    album: z.string().optional(),
    title: z.string().optional(),
    genre: z.string().optional(),
    trackno: z.string().optional(),
    duration: z.string().optional(),
    fps: z.string().optional(),
    videocodec: z.string().optional(),
    audiocodec: z.string().optional(),
    videobitrate: z.number().optional(),
    audiobitrate: z.number().optional(),
    audiosamplerate: z.number().optional(),
    rotate: z.number().optional(),
  })
);

/**
 * Result of `stat`, `listfolder`, `createfolder`, `copyfile`, `renamefile`, ...
 */
export const FileOrFolderStatSchema = z.object({
  metadata: MetadataSchema,
});

export type FileOrFolderStat = z.infer<typeof FileOrFolderStatSchema>;

/**
 * Result of `deletefolderrecursive`
 */
export const FolderDeletedRecursivelySchema = z.object({
  deletedfiles: z.number().int().default(0),
  deletedfolders: z.number().int().default(0),
});

export interface FolderDeletedRecursively {
  deletedFiles: number;
  deletedFolders: number;
}

// =============================================================================
// Files
// =============================================================================

/**
 * Result of `checksumfile`. sha1 is always present, md5 only on international
 * servers, sha256 only on European ones.
 */
export const FileChecksumsSchema = z.object({
  metadata: MetadataSchema.optional(),
  sha1: z.string().optional(),
  md5: z.string().optional(),
  sha256: z.string().optional(),
});

export type FileChecksumsResponse = z.infer<typeof FileChecksumsSchema>;

/**
 * Per-file error entry that can stand in the metadata array of `uploadfile`
 */
export const UploadFailureSchema = z.object({
  result: z.number().int(),
  error: z.string().optional(),
});

export type UploadFailure = z.infer<typeof UploadFailureSchema>;

/**
 * Result of `uploadfile`
 */
export const UploadedFilesSchema = z.object({
  fileids: z.array(z.number().int()).default([]),
  metadata: z.array(z.union([UploadFailureSchema, MetadataSchema])).default([]),
});

export type UploadedFiles = z.infer<typeof UploadedFilesSchema>;

/**
 * A single revision of a file
 */
export const RevisionSchema = z.object({
  revisionid: z.number().int(),
  size: z.number(),
  hash: z.number().optional(),
  created: PCloudDateSchema,
});

export type Revision = z.infer<typeof RevisionSchema>;

/**
 * Result of `listrevisions`
 */
export const RevisionsSchema = z.object({
  revisions: z.array(RevisionSchema).default([]),
  metadata: MetadataSchema.optional(),
});

export type Revisions = z.infer<typeof RevisionsSchema>;

// =============================================================================
// Links
// =============================================================================

/**
 * Result of `getfilelink` and `getpublinkdownload`
 */
export const DownloadLinkSchema = z.object({
  path: z.string(),
  expires: PCloudDateSchema.optional(),
  hosts: z.array(z.string()).default([]),
});

export type DownloadLink = z.infer<typeof DownloadLinkSchema>;

/**
 * Result of `getfilepublink`
 */
export const PublicFileLinkSchema = z.object({
  linkid: z.number().int().optional(),
  code: z.string().optional(),
  link: z.string().optional(),
  shortcode: z.string().optional(),
  shortlink: z.string().optional(),
  metadata: MetadataSchema.optional(),
  created: PCloudDateSchema.optional(),
  modified: PCloudDateSchema.optional(),
  downloadenabled: z.boolean().optional(),
  downloads: z.number().int().optional(),
});

export type PublicFileLink = z.infer<typeof PublicFileLinkSchema>;

// =============================================================================
// Account
// =============================================================================

/**
 * Result of `userinfo`
 */
export const UserInfoSchema = z.object({
  auth: z.string().optional(),
  userid: z.number().int().optional(),
  email: z.string().optional(),
  emailverified: z.boolean().optional(),
  registered: PCloudDateSchema.optional(),
  language: z.string().optional(),
  premium: z.boolean().optional(),
  usedquota: z.number().optional(),
  quota: z.number().optional(),
});

export type UserInfo = z.infer<typeof UserInfoSchema>;

/**
 * Result of `logout`
 */
export const LogoutResponseSchema = z.object({
  auth_deleted: z.boolean().optional(),
});

/**
 * Result of `getapiserver`; first entry is the best choice
 */
export const ApiServersSchema = z.object({
  api: z.array(z.string()).default([]),
  binapi: z.array(z.string()).default([]),
});

// =============================================================================
// Archives and file handles
// =============================================================================

/**
 * Result of `savezipprogress`
 */
export const SaveZipProgressSchema = z.object({
  files: z.number().int(),
  totalfiles: z.number().int(),
  bytes: z.number(),
  totalbytes: z.number(),
});

export type SaveZipProgress = z.infer<typeof SaveZipProgressSchema>;

/**
 * Result of `file_open`
 */
export const FileOpenSchema = z.object({
  fd: z.number().int(),
  fileid: z.number().int(),
});

/**
 * Result of `file_write`
 */
export const FileWriteSchema = z.object({
  bytes: z.number().int(),
});

/**
 * Result of `file_close`; carries nothing but the result code
 */
export const FileCloseSchema = z.object({});

// =============================================================================
// Events
// =============================================================================

/**
 * Event types delivered by `diff`.
 * see https://docs.pcloud.com/structures/event.html
 */
export const DIFF_EVENTS = [
  'reset',
  'createfolder',
  'deletefolder',
  'modifyfolder',
  'createfile',
  'modifyfile',
  'deletefile',
  'requestsharein',
  'acceptedsharein',
  'declinedsharein',
  'declinedshareout',
  'cancelledsharein',
  'removedsharein',
  'modifiedsharein',
  'modifyuserinfo',
] as const;

export type DiffEvent = (typeof DIFF_EVENTS)[number];

export const ShareSchema = z.object({
  folderid: z.number().int(),
  sharerequestid: z.number().int().optional(),
  shareid: z.number().int().optional(),
  sharename: z.string().optional(),
  created: PCloudDateSchema.optional(),
  expires: PCloudDateSchema.optional(),
  canread: z.boolean().optional(),
  canmodify: z.boolean().optional(),
  candelete: z.boolean().optional(),
  cancreate: z.boolean().optional(),
  message: z.string().optional(),
});

export type Share = z.infer<typeof ShareSchema>;

export const DiffEntrySchema = z.object({
  time: PCloudDateSchema,
  diffid: z.number().int(),
  event: z.enum(DIFF_EVENTS),
  metadata: MetadataSchema.optional(),
  share: ShareSchema.optional(),
});

export type DiffEntry = z.infer<typeof DiffEntrySchema>;

/**
 * Result of `diff`
 */
export const DiffSchema = z.object({
  diffid: z.number().int(),
  entries: z.array(DiffEntrySchema).default([]),
});

export type Diff = z.infer<typeof DiffSchema>;
