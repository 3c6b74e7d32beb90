import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { createTempDir, removeTempDir } from '@/__testutils__/index.js';
import { AtomicFileWriter } from '@/utils/atomicFile.js';

void describe('AtomicFileWriter contract', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = createTempDir('atomic-writer-');
  });

  afterEach(() => {
    removeTempDir(tmpDir);
  });

  void it('writes without leaving temporary artifacts', async () => {
    const filePath = path.join(tmpDir, 'station.yaml');

    await AtomicFileWriter.writeAsync(filePath, 'instruments: {}\n');

    assert.equal(fs.readFileSync(filePath, 'utf-8'), 'instruments: {}\n');
    const tempArtifacts = fs.readdirSync(tmpDir).filter((file) => file.startsWith('station.yaml.'));
    assert.equal(
      tempArtifacts.length,
      0,
      `Expected no leftover temp files, found: ${tempArtifacts.join(', ')}`
    );
  });

  void it('supports concurrent writes to the same target file', async () => {
    const filePath = path.join(tmpDir, 'concurrent.yaml');
    const payloads = ['first payload', 'second payload', 'third payload'];

    await Promise.all(payloads.map((payload) => AtomicFileWriter.writeAsync(filePath, payload)));

    const finalContent = fs.readFileSync(filePath, 'utf-8');
    assert(
      payloads.includes(finalContent),
      `Final content "${finalContent}" should match one of the concurrent writes`
    );
  });

  void it('cleans up the temporary file when rename fails', async () => {
    const blockedPath = path.join(tmpDir, 'cannot-overwrite');
    fs.mkdirSync(blockedPath);

    await assert.rejects(AtomicFileWriter.writeAsync(blockedPath, 'payload'), /EISDIR|directory/);

    const tempArtifacts = fs
      .readdirSync(tmpDir)
      .filter((file) => file.startsWith('cannot-overwrite.'));
    assert.equal(tempArtifacts.length, 0, 'Temporary file should be removed when rename fails');
    assert.equal(fs.statSync(blockedPath).isDirectory(), true);
  });

  void it('applies the requested file mode', async () => {
    const filePath = path.join(tmpDir, 'private.yaml');

    await AtomicFileWriter.writeAsync(filePath, 'secret: placeholder\n', { mode: 0o600 });

    assert.equal(fs.statSync(filePath).mode & 0o777, 0o600);
  });
});
