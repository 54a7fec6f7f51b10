/**
 * Organizer building blocks: folder placement, discovery and the worker pool
 */

import * as fs from 'fs';
import * as path from 'path';
import { ExtractionError, failedDecision, resolveDecision, type Decision } from '@docsort/shared';
import { IGNORED_DIRECTORIES, discoverDocuments } from '../../services/organizer/src/lib/discovery';
import { FolderMaterializer, sanitizeFolderName, suffixedName } from '../../services/organizer/src/lib/materializer';
import { WorkerPool } from '../../services/organizer/src/lib/worker-pool';
import { makeTempDir, policyWith, writeFile } from './helpers';

function decided(sourcePath: string, category: string): Decision {
  return resolveDecision({
    sourcePath,
    ruleResults: { [category]: { category, matchedRules: ['rule'], score: 0.9 } },
    policy: policyWith(),
    categoryNames: [category],
  });
}

describe('sanitizeFolderName', () => {
  it('should keep ordinary names unchanged', () => {
    expect(sanitizeFolderName('1.0.1 Cover Letter')).toBe('1.0.1 Cover Letter');
  });

  it('should replace characters that are not allowed in folder names', () => {
    expect(sanitizeFolderName('A/B: C?')).toBe('A-B- C-');
    expect(sanitizeFolderName('x<y>|"z"*')).toBe('x-y---z--');
  });

  it('should collapse whitespace and strip trailing dots and spaces', () => {
    expect(sanitizeFolderName('  Quarterly \t Report. ')).toBe('Quarterly Report');
  });

  it('should never produce an empty or relative name', () => {
    expect(sanitizeFolderName('..')).toBe('_');
    expect(sanitizeFolderName('   ')).toBe('_');
  });
});

describe('suffixedName', () => {
  it('should add the numeric suffix before the extension', () => {
    expect(suffixedName('a.pdf', 0)).toBe('a.pdf');
    expect(suffixedName('a.pdf', 2)).toBe('a_2.pdf');
    expect(suffixedName('archive.tar.gz', 1)).toBe('archive.tar_1.gz');
  });

  it('should append the suffix to names without an extension', () => {
    expect(suffixedName('README', 1)).toBe('README_1');
  });
});

describe('FolderMaterializer', () => {
  function setup() {
    const source = makeTempDir('place-src');
    const destination = makeTempDir('place-dest');
    const first = writeFile(source, 'x/report.txt', 'first');
    const second = writeFile(source, 'y/report.txt', 'second');
    return { source, destination, first, second };
  }

  it('should copy into the category folder and suffix name collisions', async () => {
    const { destination, first, second } = setup();
    const materializer = new FolderMaterializer({ destinationRoot: destination, mode: 'copy', dryRun: false });

    const a = await materializer.place(decided(first, 'Reports'));
    const b = await materializer.place(decided(second, 'Reports'));

    expect(a).toBe(path.join(destination, 'Reports', 'report.txt'));
    expect(b).toBe(path.join(destination, 'Reports', 'report_1.txt'));
    expect(fs.readFileSync(path.join(destination, 'Reports', 'report_1.txt'), 'utf-8')).toBe('second');
    expect(fs.existsSync(first)).toBe(true);
  });

  it('should never overwrite a file already in the destination', async () => {
    const { destination, first } = setup();
    writeFile(destination, 'Reports/report.txt', 'older');
    const materializer = new FolderMaterializer({ destinationRoot: destination, mode: 'copy', dryRun: false });

    const placed = await materializer.place(decided(first, 'Reports'));

    expect(placed).toBe(path.join(destination, 'Reports', 'report_1.txt'));
    expect(fs.readFileSync(path.join(destination, 'Reports', 'report.txt'), 'utf-8')).toBe('older');
  });

  it('should reuse a destination that already holds the same bytes', async () => {
    const { destination, first } = setup();
    writeFile(destination, 'Reports/report.txt', 'older');
    writeFile(destination, 'Reports/report_1.txt', 'first');
    const materializer = new FolderMaterializer({ destinationRoot: destination, mode: 'copy', dryRun: false });

    const placed = await materializer.place(decided(first, 'Reports'));

    expect(placed).toBe(path.join(destination, 'Reports', 'report_1.txt'));
    expect(fs.readdirSync(path.join(destination, 'Reports')).sort()).toEqual(['report.txt', 'report_1.txt']);
  });

  it('should remove the source when moving onto an identical file', async () => {
    const { destination, first } = setup();
    writeFile(destination, 'Reports/report.txt', 'first');
    const materializer = new FolderMaterializer({ destinationRoot: destination, mode: 'move', dryRun: false });

    const placed = await materializer.place(decided(first, 'Reports'));

    expect(placed).toBe(path.join(destination, 'Reports', 'report.txt'));
    expect(fs.existsSync(first)).toBe(false);
  });

  it('should move files in move mode', async () => {
    const { destination, first } = setup();
    const materializer = new FolderMaterializer({ destinationRoot: destination, mode: 'move', dryRun: false });

    await materializer.place(decided(first, 'Reports'));

    expect(fs.existsSync(first)).toBe(false);
    expect(fs.readFileSync(path.join(destination, 'Reports', 'report.txt'), 'utf-8')).toBe('first');
  });

  it('should sanitize the category into the folder name', async () => {
    const { destination, first } = setup();
    const materializer = new FolderMaterializer({ destinationRoot: destination, mode: 'copy', dryRun: false });

    const placed = await materializer.place(decided(first, 'Tax/Legal'));

    expect(placed).toBe(path.join(destination, 'Tax-Legal', 'report.txt'));
  });

  it('should plan distinct destinations in a dry run without writing', async () => {
    const { destination, first, second } = setup();
    const materializer = new FolderMaterializer({ destinationRoot: destination, mode: 'move', dryRun: true });

    const a = await materializer.place(decided(first, 'Reports'));
    const b = await materializer.place(decided(second, 'Reports'));

    expect([a, b]).toEqual([
      path.join(destination, 'Reports', 'report.txt'),
      path.join(destination, 'Reports', 'report_1.txt'),
    ]);
    expect(fs.existsSync(path.join(destination, 'Reports'))).toBe(false);
    expect(fs.existsSync(first)).toBe(true);
  });

  it('should leave failed documents where they are', async () => {
    const { destination, first } = setup();
    const materializer = new FolderMaterializer({ destinationRoot: destination, mode: 'move', dryRun: false });

    const placed = await materializer.place(failedDecision(first, new ExtractionError('Cannot parse PDF: bad', first)));

    expect(placed).toBeNull();
    expect(fs.existsSync(first)).toBe(true);
  });
});

describe('discoverDocuments', () => {
  it('should return supported files sorted, skipping hidden, ignored and excluded directories', async () => {
    const root = makeTempDir('discover');
    for (const relative of [
      'a.txt',
      'B.MD',
      'sub/c.pdf',
      'notes.docx',
      '.e.txt',
      '.hidden/d.txt',
      `${IGNORED_DIRECTORIES[0]}/f.txt`,
      'out/g.txt',
    ]) {
      writeFile(root, relative, 'x');
    }

    const files = await discoverDocuments(root, { extensions: ['.txt', 'md', 'PDF'], exclude: [path.join(root, 'out')] });

    expect(files).toEqual([path.join(root, 'B.MD'), path.join(root, 'a.txt'), path.join(root, 'sub', 'c.pdf')]);
  });

  it('should return nothing for an empty directory', async () => {
    await expect(discoverDocuments(makeTempDir('empty'), { extensions: ['txt'] })).resolves.toEqual([]);
  });

  it('should include links to files and skip dangling or directory links', async () => {
    const root = makeTempDir('links');
    const elsewhere = makeTempDir('link-targets');
    const target = writeFile(elsewhere, 'target.txt', 'x');
    writeFile(elsewhere, 'dir/inner.txt', 'x');
    fs.symlinkSync(target, path.join(root, 'linked.txt'));
    fs.symlinkSync(path.join(elsewhere, 'missing.txt'), path.join(root, 'dangling.txt'));
    fs.symlinkSync(path.join(elsewhere, 'dir'), path.join(root, 'linked-dir'));
    writeFile(root, 'plain.txt', 'x');

    const files = await discoverDocuments(root, { extensions: ['txt'] });

    expect(files).toEqual([path.join(root, 'linked.txt'), path.join(root, 'plain.txt')]);
  });

  describe('with an unreadable directory', () => {
    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('should skip the directory and keep the rest of the walk', async () => {
      const root = makeTempDir('unreadable');
      writeFile(root, 'a.txt', 'x');
      writeFile(root, 'locked/b.txt', 'x');
      const realReaddir = fs.promises.readdir;
      jest
        .spyOn(fs.promises, 'readdir')
        .mockImplementationOnce(realReaddir)
        .mockRejectedValueOnce(new Error('EACCES: permission denied'));

      const files = await discoverDocuments(root, { extensions: ['txt'] });

      expect(files).toEqual([path.join(root, 'a.txt')]);
    });

    it('should fail when the source root itself cannot be read', async () => {
      const root = makeTempDir('unreadable-root');
      jest.spyOn(fs.promises, 'readdir').mockRejectedValueOnce(new Error('EACCES: permission denied'));

      await expect(discoverDocuments(root, { extensions: ['txt'] })).rejects.toThrow('EACCES: permission denied');
    });
  });
});

describe('WorkerPool', () => {
  function deferred() {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((r) => {
      resolve = r;
    });
    return { promise, resolve };
  }

  it('should never run more tasks than it has workers', async () => {
    const pool = new WorkerPool(2);
    let running = 0;
    let peak = 0;

    const results = await Promise.all(
      [1, 2, 3, 4, 5].map((n) =>
        pool.execute(async () => {
          running++;
          peak = Math.max(peak, running);
          await new Promise((r) => setTimeout(r, 5));
          running--;
          return n * 10;
        })
      )
    );

    expect(results).toEqual([10, 20, 30, 40, 50]);
    expect(peak).toBe(2);
    expect(pool.getStats()).toEqual({ active: 0, queued: 0, max: 2 });
  });

  it('should queue tasks beyond its capacity in FIFO order', async () => {
    const pool = new WorkerPool(1);
    const gate = deferred();
    const order: string[] = [];

    const first = pool.execute(async () => {
      await gate.promise;
      order.push('first');
    });
    const second = pool.execute(async () => {
      order.push('second');
    });

    expect(pool.getStats()).toEqual({ active: 1, queued: 1, max: 1 });
    gate.resolve();
    await Promise.all([first, second]);
    await pool.waitForCompletion();

    expect(order).toEqual(['first', 'second']);
  });

  it('should pass task errors to the caller and keep going', async () => {
    const pool = new WorkerPool(1);

    await expect(pool.execute(() => Promise.reject(new Error('task failed')))).rejects.toThrow('task failed');
    await expect(pool.execute(async () => 'ok')).resolves.toBe('ok');
  });

  it('should reject queued and new tasks after shutdown', async () => {
    const pool = new WorkerPool(1);
    const gate = deferred();

    const running = pool.execute(() => gate.promise);
    const queued = pool.execute(async () => 'never');
    pool.shutdown();

    await expect(queued).rejects.toThrow('Worker pool is shut down');
    await expect(pool.execute(async () => 'late')).rejects.toThrow('Worker pool is shut down');
    gate.resolve();
    await expect(running).resolves.toBeUndefined();
  });

  it('should reject an invalid size', () => {
    expect(() => new WorkerPool(0)).toThrow(RangeError);
  });
});
