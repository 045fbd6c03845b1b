/**
 * Unit tests for FileFilter
 */

import { expect } from 'chai';
import { describe, it, beforeEach, afterEach } from 'mocha';
import { promises as fs } from 'fs';
import path from 'path';
import { FileFilter } from '../../../src/utils/fileFilter.js';
import { isTempCopyName, tempCopyName } from '../../../src/utils/fileFilter.patterns.js';
import { makeTempDir, removeDir } from '../../helpers/tempTree.js';

describe('FileFilter', () => {
  describe('exclude patterns', () => {
    it('should include everything without rules', () => {
      const filter = new FileFilter();
      expect(filter.filter('a.txt')).to.deep.equal({ skip: false });
      expect(filter.shouldSkip('sub', true)).to.be.false;
    });

    it('should match gitignore-style patterns at any depth', () => {
      const filter = new FileFilter({ excludePatterns: ['*.swp', 'node_modules/'] });

      expect(filter.filter('notes.swp')).to.deep.equal({ skip: true, reason: 'exclude_pattern' });
      expect(filter.shouldSkip('docs/notes.swp')).to.be.true;
      expect(filter.shouldSkip('node_modules', true)).to.be.true;
      expect(filter.shouldSkip('lib/node_modules', true)).to.be.true;
      expect(filter.shouldSkip('notes.txt')).to.be.false;
    });

    it('should apply directory-only patterns to directories only', () => {
      const filter = new FileFilter({ excludePatterns: ['build/'] });
      expect(filter.shouldSkip('build', true)).to.be.true;
      expect(filter.shouldSkip('build', false)).to.be.false;
    });

    it('should drop blank patterns', () => {
      const filter = new FileFilter({ excludePatterns: ['', '  ', '*.log'] });
      expect(filter.getExcludePatterns()).to.deep.equal(['*.log']);
    });
  });

  describe('alwaysExclude', () => {
    it('should exclude exact relative paths only', () => {
      const filter = new FileFilter({ alwaysExclude: ['logs/sync_log.txt'] });
      expect(filter.filter('logs/sync_log.txt')).to.deep.equal({ skip: true, reason: 'always_excluded' });
      expect(filter.shouldSkip('sync_log.txt')).to.be.false;
    });
  });

  describe('temporary copies', () => {
    it('should name and recognise interrupted copies', () => {
      expect(tempCopyName('b.txt', 123)).to.equal('.b.txt.123.tree-mirror.tmp');
      expect(isTempCopyName('.b.txt.123.tree-mirror.tmp')).to.be.true;
      expect(isTempCopyName('b.txt')).to.be.false;
    });

    it('should never exclude them, even under a matching pattern', () => {
      const filter = new FileFilter({ excludePatterns: ['.*'] });
      expect(filter.shouldSkip('sub/.b.txt.99.tree-mirror.tmp')).to.be.false;
      expect(filter.shouldSkip('sub/.hidden')).to.be.true;
    });
  });

  describe('loadIgnoreFile', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir();
    });

    afterEach(async () => {
      await removeDir(dir);
    });

    it('should read rules, skipping comments and blank lines', async () => {
      await fs.writeFile(path.join(dir, '.mirrorignore'), '# caches\n\ncache/\n*.tmp\r\n');
      const filter = new FileFilter();

      expect(await filter.loadIgnoreFile(dir)).to.equal(2);
      expect(filter.filter('cache', true)).to.deep.equal({ skip: true, reason: 'ignore_file' });
      expect(filter.shouldSkip('x.tmp')).to.be.true;
      expect(filter.shouldSkip('x.txt')).to.be.false;
    });

    it('should clear rules when the file disappears', async () => {
      const ignoreFile = path.join(dir, '.mirrorignore');
      await fs.writeFile(ignoreFile, '*.tmp\n');
      const filter = new FileFilter();
      await filter.loadIgnoreFile(dir);
      expect(filter.shouldSkip('x.tmp')).to.be.true;

      await fs.unlink(ignoreFile);
      expect(await filter.loadIgnoreFile(dir)).to.equal(0);
      expect(filter.shouldSkip('x.tmp')).to.be.false;
    });

    it('should honour a custom name and disabling', async () => {
      await fs.writeFile(path.join(dir, '.mirrorignore'), '*.tmp\n');
      await fs.writeFile(path.join(dir, '.backupignore'), '*.bak\n');

      const custom = new FileFilter({ ignoreFile: '.backupignore' });
      await custom.loadIgnoreFile(dir);
      expect(custom.shouldSkip('x.bak')).to.be.true;
      expect(custom.shouldSkip('x.tmp')).to.be.false;

      const disabled = new FileFilter({ ignoreFile: false });
      expect(await disabled.loadIgnoreFile(dir)).to.equal(0);
      expect(disabled.shouldSkip('x.tmp')).to.be.false;
    });

    it('should prefer the pattern reason over the ignore file', async () => {
      await fs.writeFile(path.join(dir, '.mirrorignore'), '*.log\n');
      const filter = new FileFilter({ excludePatterns: ['*.log'] });
      await filter.loadIgnoreFile(dir);
      expect(filter.filter('a.log').reason).to.equal('exclude_pattern');
    });
  });
});
