/**
 * Addressing of files and folders: either a server path or a numeric id.
 */

import { ConfigurationError } from '../errors';
import type { Metadata } from '../types';

export interface PathIdentifier {
  readonly kind: 'path';
  readonly path: string;
}

export interface IdIdentifier {
  readonly kind: 'id';
  readonly id: number;
}

export type Identifier = PathIdentifier | IdIdentifier;

export type EntityKind = 'folder' | 'file';

/**
 * Anything an operation accepts where a folder or file is expected
 */
export type IdentifierLike = Identifier | string | number | Metadata;

/**
 * Query parameter carrying an identifier
 */
export interface IdentifierParam {
  name: 'path' | 'folderid' | 'fileid' | 'topath' | 'tofolderid';
  value: string;
}

export const PATH_SEPARATOR = '/';

/**
 * Identifier from a server path. The path must start with a separator.
 */
export function pathOf(path: string): PathIdentifier {
  if (!path.startsWith(PATH_SEPARATOR)) {
    throw new ConfigurationError(`Path must start with "${PATH_SEPARATOR}": ${path}`);
  }
  return { kind: 'path', path };
}

/**
 * Identifier from a server-assigned id
 */
export function idOf(id: number): IdIdentifier {
  if (!Number.isSafeInteger(id) || id < 0) {
    throw new ConfigurationError(`Id must be a non-negative integer: ${id}`);
  }
  return { kind: 'id', id };
}

function isIdentifier(value: IdentifierLike): value is Identifier {
  return typeof value === 'object' && 'kind' in value;
}

function fromMetadata(metadata: Metadata, kind: EntityKind): IdIdentifier {
  const id = kind === 'folder' ? metadata.folderid : metadata.fileid;
  if (metadata.isfolder !== (kind === 'folder') || id === undefined) {
    throw new ConfigurationError(`"${metadata.name}" is not a ${kind}`);
  }
  return idOf(id);
}

/**
 * Normalize anything identifier-like into an Identifier for the given kind
 */
export function toIdentifier(value: IdentifierLike, kind: EntityKind): Identifier {
  if (typeof value === 'string') return pathOf(value);
  if (typeof value === 'number') return idOf(value);
  if (isIdentifier(value)) {
    return value.kind === 'path' ? pathOf(value.path) : idOf(value.id);
  }
  return fromMetadata(value, kind);
}

/**
 * Query parameter addressing the identifier as a source of the given kind
 */
export function identifierParam(identifier: Identifier, kind: EntityKind): IdentifierParam {
  switch (identifier.kind) {
    case 'path':
      return { name: 'path', value: identifier.path };
    case 'id':
      return { name: kind === 'folder' ? 'folderid' : 'fileid', value: String(identifier.id) };
  }
}

/**
 * Query parameter addressing the identifier as the destination folder of a copy or move
 */
export function targetParam(identifier: Identifier): IdentifierParam {
  switch (identifier.kind) {
    case 'path':
      return { name: 'topath', value: identifier.path };
    case 'id':
      return { name: 'tofolderid', value: String(identifier.id) };
  }
}

/**
 * Path of an entry inside a folder path
 */
export function childPath(folder: string, name: string): string {
  return `${folder.replace(/\/+$/, '')}${PATH_SEPARATOR}${name}`;
}

export function describeIdentifier(identifier: Identifier): string {
  return identifier.kind === 'path' ? identifier.path : `#${identifier.id}`;
}
