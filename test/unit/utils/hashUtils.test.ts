/**
 * Unit tests for file comparison
 */

import { expect } from 'chai';
import { describe, it, beforeEach, afterEach } from 'mocha';
import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import {
  computeFileMd5,
  hashesEqual,
  metadataMatches,
  filesMatch
} from '../../../src/utils/hashUtils.js';
import { makeTempDir, removeDir } from '../../helpers/tempTree.js';

describe('hashUtils', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  describe('computeFileMd5', () => {
    it('should match the in-memory hash of the file content', async () => {
      const file = path.join(dir, 'a.txt');
      await fs.writeFile(file, 'abc');
      expect(await computeFileMd5(file)).to.equal('900150983cd24fb0d6963f7d28e17f72');
    });

    it('should hash an empty file', async () => {
      const file = path.join(dir, 'empty.txt');
      await fs.writeFile(file, '');
      expect(await computeFileMd5(file)).to.equal('d41d8cd98f00b204e9800998ecf8427e');
    });

    it('should stream files larger than one read chunk', async () => {
      const content = Buffer.alloc(200 * 1024, 7);
      const file = path.join(dir, 'big.bin');
      await fs.writeFile(file, content);
      expect(await computeFileMd5(file)).to.equal(createHash('md5').update(content).digest('hex'));
    });
  });

  describe('hashesEqual', () => {
    it('should ignore case', () => {
      expect(hashesEqual('ABCDEF', 'abcdef')).to.be.true;
      expect(hashesEqual('abc', 'abd')).to.be.false;
    });
  });

  describe('metadataMatches', () => {
    it('should compare size and whole seconds of mtime', () => {
      expect(metadataMatches({ size: 3, mtimeMs: 1000.4 }, { size: 3, mtimeMs: 1999 })).to.be.true;
      expect(metadataMatches({ size: 3, mtimeMs: 1000 }, { size: 3, mtimeMs: 2000 })).to.be.false;
      expect(metadataMatches({ size: 3, mtimeMs: 1000 }, { size: 4, mtimeMs: 1000 })).to.be.false;
    });
  });

  describe('filesMatch', () => {
    let a: string;
    let b: string;

    beforeEach(() => {
      a = path.join(dir, 'a');
      b = path.join(dir, 'b');
    });

    it('should report a size difference without reading either file', async () => {
      // Neither file exists: reading would reject
      const result = await filesMatch('content', a, { size: 1, mtimeMs: 0 }, b, { size: 2, mtimeMs: 0 });
      expect(result).to.be.false;
    });

    it('should compare content in content mode regardless of mtime', async () => {
      await fs.writeFile(a, 'same');
      await fs.writeFile(b, 'same');
      expect(await filesMatch('content', a, { size: 4, mtimeMs: 0 }, b, { size: 4, mtimeMs: 999999 })).to.be.true;

      await fs.writeFile(b, 'diff');
      expect(await filesMatch('content', a, { size: 4, mtimeMs: 0 }, b, { size: 4, mtimeMs: 0 })).to.be.false;
    });

    it('should trust size and mtime in metadata mode', async () => {
      // Contents differ but metadata agrees
      const result = await filesMatch('metadata', a, { size: 4, mtimeMs: 5000 }, b, { size: 4, mtimeMs: 5500 });
      expect(result).to.be.true;
    });
  });
});
