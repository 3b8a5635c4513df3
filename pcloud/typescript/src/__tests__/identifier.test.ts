/**
 * Tests for file and folder addressing.
 */

import { describe, it, expect } from 'vitest';
import {
  idOf,
  identifierParam,
  pathOf,
  targetParam,
  toIdentifier,
} from '../identifier';
import { ConfigurationError } from '../errors';
import { MetadataSchema } from '../types';
import { createMockFileMetadata, createMockFolderMetadata } from '../mocks';

describe('identifier', () => {
  describe('identifierParam', () => {
    it('should address ids by folderid or fileid', () => {
      for (const id of [0, 1, 42, 9007199254740991]) {
        expect(identifierParam(idOf(id), 'folder')).toEqual({ name: 'folderid', value: String(id) });
        expect(identifierParam(idOf(id), 'file')).toEqual({ name: 'fileid', value: String(id) });
      }
    });

    it('should address paths by path for both kinds', () => {
      for (const path of ['/', '/test-folder', '/a/b/c.txt', '/with space/ü.txt']) {
        expect(identifierParam(pathOf(path), 'folder')).toEqual({ name: 'path', value: path });
        expect(identifierParam(pathOf(path), 'file')).toEqual({ name: 'path', value: path });
      }
    });

    it('should address copy targets by topath or tofolderid', () => {
      expect(targetParam(pathOf('/backup'))).toEqual({ name: 'topath', value: '/backup' });
      expect(targetParam(idOf(7))).toEqual({ name: 'tofolderid', value: '7' });
    });
  });

  describe('construction', () => {
    it('should require a leading separator on paths', () => {
      expect(() => pathOf('test-folder')).toThrow(ConfigurationError);
      expect(() => pathOf('')).toThrow(ConfigurationError);
    });

    it('should reject negative and fractional ids', () => {
      expect(() => idOf(-1)).toThrow(ConfigurationError);
      expect(() => idOf(1.5)).toThrow(ConfigurationError);
    });
  });

  describe('toIdentifier', () => {
    it('should read strings as paths and numbers as ids', () => {
      expect(toIdentifier('/docs', 'folder')).toEqual({ kind: 'path', path: '/docs' });
      expect(toIdentifier(12, 'file')).toEqual({ kind: 'id', id: 12 });
    });

    it('should keep identifiers unchanged', () => {
      expect(toIdentifier({ kind: 'id', id: 3 }, 'folder')).toEqual({ kind: 'id', id: 3 });
      expect(toIdentifier({ kind: 'path', path: '/x' }, 'file')).toEqual({ kind: 'path', path: '/x' });
    });

    it('should take the matching id from metadata', () => {
      const file = MetadataSchema.parse(createMockFileMetadata());
      const folder = MetadataSchema.parse(createMockFolderMetadata());

      expect(toIdentifier(file, 'file')).toEqual({ kind: 'id', id: 100 });
      expect(toIdentifier(folder, 'folder')).toEqual({ kind: 'id', id: 10 });
    });

    it('should reject metadata of the other kind', () => {
      const file = MetadataSchema.parse(createMockFileMetadata());
      expect(() => toIdentifier(file, 'folder')).toThrow(ConfigurationError);
    });
  });
});
