/**
 * Unit tests for the mirror startup sequence
 *
 * Runs single passes end to end against temporary directories.
 */

import { expect } from 'chai';
import { describe, it, beforeEach, afterEach } from 'mocha';
import sinon from 'sinon';
import { promises as fs } from 'fs';
import path from 'path';
import { runMirror, EXIT_OK, EXIT_PASS_FAILURES, type RunMirrorOptions } from '../../../src/cli/runMirror.js';
import type { MirrorConfig } from '../../../src/config/mirrorConfig.js';
import { LogSetupError, PathNotFoundError, ReplicaLockedError } from '../../../src/errors/mirrorErrors.js';
import { LockManager } from '../../../src/utils/lockManager.js';
import { silentLogger } from '../../../src/utils/logger.js';
import { exists, makeTempDir, readTree, removeDir, writeTree } from '../../helpers/tempTree.js';
import { recordingLogger, type RecordingLogger } from '../../helpers/recordingLogger.js';

const TIMESTAMP = /^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] /;

describe('runMirror', () => {
  let dir: string;
  let source: string;
  let replica: string;
  let logDir: string;
  let lockManager: LockManager;
  let startup: RecordingLogger;

  beforeEach(async () => {
    dir = await makeTempDir();
    source = path.join(dir, 'source');
    replica = path.join(dir, 'replica');
    logDir = path.join(dir, 'logs');
    await fs.mkdir(logDir);
    await writeTree(source, { 'a.txt': 'alpha', 'sub': { 'b.txt': 'bravo' } });
    lockManager = new LockManager({ lockDir: path.join(dir, 'locks'), logger: silentLogger });
    startup = recordingLogger();
    // The run logger echoes to stderr
    sinon.stub(console, 'error');
  });

  afterEach(async () => {
    sinon.restore();
    await removeDir(dir);
  });

  function config(overrides: Partial<MirrorConfig> = {}): MirrorConfig {
    return {
      sourceDir: source,
      replicaDir: replica,
      frequencySeconds: 60,
      logDir,
      compare: 'content',
      exclude: [],
      ignoreFile: '.mirrorignore',
      once: true,
      dryRun: false,
      debug: false,
      ...overrides
    };
  }

  function options(overrides: RunMirrorOptions = {}): RunMirrorOptions {
    return { console: startup, lockManager, cwd: dir, ...overrides };
  }

  async function logMessages(): Promise<string[]> {
    const content = await fs.readFile(path.join(logDir, 'sync_log.txt'), 'utf-8');
    return content.trimEnd().split('\n').map(line => line.replace(TIMESTAMP, ''));
  }

  it('should create the replica, run one pass and exit 0', async () => {
    const code = await runMirror(config(), options());

    expect(code).to.equal(EXIT_OK);
    expect(await readTree(replica)).to.deep.equal({ 'a.txt': 'alpha', 'sub': { 'b.txt': 'bravo' } });
  });

  it('should write the run to sync_log.txt', async () => {
    await runMirror(config(), options());

    const messages = await logMessages();
    expect(messages[0]).to.equal('Log created.');
    expect(messages[1]).to.equal(
      `Synchronization begun with "${source}" as the source directory, "${replica}" as the replica directory, and a 60 second update frequency.`
    );
    expect(messages).to.include('File "a.txt" copied.');
    expect(messages).to.include('Directory "sub" created.');
    expect(messages[messages.length - 1]).to.equal('Synchronization terminated.');
  });

  it('should print the resolved settings at startup', async () => {
    await runMirror(config({ frequencySeconds: 5 }), options());

    expect(startup.messages('info')).to.include.members([
      `- Source directory: ${source}`,
      `- Replica directory: ${replica}`,
      `- Log file path: ${path.join(logDir, 'sync_log.txt')}`,
      '- Synchronization frequency: 5 second(s)'
    ]);
  });

  it('should release the replica lock when done', async () => {
    await runMirror(config(), options());

    await fs.mkdir(replica, { recursive: true });
    expect(await exists(lockManager.getLockPath(await fs.realpath(replica)))).to.be.false;
  });

  it('should refuse a replica locked by another run', async () => {
    await fs.mkdir(replica);
    const other = new LockManager({ lockDir: path.join(dir, 'locks'), logger: silentLogger });
    await other.acquire(replica);

    try {
      await runMirror(config(), options());
      expect.fail('Expected runMirror to reject');
    } catch (error) {
      expect(error).to.be.instanceOf(ReplicaLockedError);
    } finally {
      await other.release(replica);
    }
    expect(await readTree(replica)).to.deep.equal({});
  });

  it('should fail before any pass for a missing source', async () => {
    try {
      await runMirror(config({ sourceDir: path.join(dir, 'missing') }), options());
      expect.fail('Expected runMirror to reject');
    } catch (error) {
      expect(error).to.be.instanceOf(PathNotFoundError);
    }
    expect(await exists(replica)).to.be.false;
  });

  it('should keep a log file inside the source out of the replica', async () => {
    const code = await runMirror(config({ logDir: source }), options());

    expect(code).to.equal(EXIT_OK);
    expect(await exists(path.join(source, 'sync_log.txt'))).to.be.true;
    expect(await exists(path.join(replica, 'sync_log.txt'))).to.be.false;
  });

  it('should refuse to start when both the log directory and cwd are inside the replica', async () => {
    await fs.mkdir(replica);

    try {
      await runMirror(config({ logDir: path.join(dir, 'missing') }), options({ cwd: replica }));
      expect.fail('Expected runMirror to reject');
    } catch (error) {
      expect(error).to.be.instanceOf(LogSetupError);
      expect(error).to.have.property('message', `Cannot write log file in "${replica}": directory is inside the replica directory`);
    }
    expect(await readTree(replica)).to.deep.equal({});
  });

  it('should refuse the default log directory when run from inside the replica', async () => {
    await writeTree(replica, { nested: {} });
    const nested = path.join(replica, 'nested');

    try {
      await runMirror(config({ logDir: nested }), options({ cwd: nested }));
      expect.fail('Expected runMirror to reject');
    } catch (error) {
      expect(error).to.be.instanceOf(LogSetupError);
    }
    expect(await exists(path.join(nested, 'sync_log.txt'))).to.be.false;
  });

  it('should apply exclusion patterns', async () => {
    await writeTree(source, { 'draft.swp': 'x' });

    await runMirror(config({ exclude: ['', '*.swp'] }), options());

    expect(await exists(path.join(replica, 'draft.swp'))).to.be.false;
    expect(startup.messages('info')).to.include('- Excluded patterns: *.swp');
  });

  it('should leave the replica untouched in a dry run', async () => {
    await fs.mkdir(replica);

    const code = await runMirror(config({ dryRun: true }), options());

    expect(code).to.equal(EXIT_OK);
    expect(await readTree(replica)).to.deep.equal({});
    expect(await logMessages()).to.include('[dry-run] would copy file "a.txt" (missing)');
  });

  it('should exit 2 when a pass had failures', async () => {
    // The excluded file keeps the extraneous directory from being removed
    await writeTree(replica, { old: { 'keep.swp': 'k' } });

    const code = await runMirror(config({ exclude: ['*.swp'] }), options());

    expect(code).to.equal(EXIT_PASS_FAILURES);
    const errors = (await logMessages()).filter(message => message.startsWith('ERROR: '));
    expect(errors).to.have.length(1);
    expect(errors[0]).to.match(/^ERROR: Cannot delete "old": ENOTEMPTY/);
  });

  it('should keep running until aborted and then exit 0', async () => {
    const controller = new AbortController();
    let passes = 0;
    const sleep = async (ms: number): Promise<void> => {
      expect(ms).to.be.greaterThan(0);
      passes++;
      if (passes === 2) {
        controller.abort();
      }
    };

    const code = await runMirror(config({ once: false }), options({ signal: controller.signal, sleep }));

    expect(code).to.equal(EXIT_OK);
    const completed = (await logMessages()).filter(message => message.startsWith('Synchronization pass complete'));
    expect(completed).to.have.length(2);
  });
});
