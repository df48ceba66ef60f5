#!/usr/bin/env node
/**
 * Upload log reconciliation tests
 */

import { afterEach, beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';
import path from 'path';
import fs from 'fs-extra';
import {
  appendRemovalLog,
  collectUploadMediaIds,
  filterUploadLines,
  parseUploadLine,
  readUploadLog,
  splitLines,
  writeUploadLog,
} from '../cli/services/uploads/upload-log';
import { MaintenanceError } from '../cli/lib/errors';
import { makeTempDir, uploadLine } from './helpers/fixtures';

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await makeTempDir('upload-log-test');
});

afterEach(async () => {
  await fs.remove(tmpDir);
});

test('parseUploadLine classifies blank, invalid and record lines', () => {
  assert.deepStrictEqual(parseUploadLine('   '), { kind: 'blank' });

  const notJson = parseUploadLine('{oops');
  assert.strictEqual(notJson.kind, 'invalid');

  const noUrl = parseUploadLine('{"name":"cat.png"}');
  assert.deepStrictEqual(noUrl, { kind: 'invalid', reason: 'missing a string "url" field' });

  const numericUrl = parseUploadLine('{"url": 12}');
  assert.strictEqual(numericUrl.kind, 'invalid');

  const array = parseUploadLine('["mxc://example.org/abc"]');
  assert.deepStrictEqual(array, { kind: 'invalid', reason: 'not a JSON object' });

  const record = parseUploadLine('{"url":"mxc://example.org/abc","size":10}');
  assert.deepStrictEqual(record, {
    kind: 'record',
    record: { url: 'mxc://example.org/abc', size: 10 },
    mediaId: 'abc',
  });
});

test('filterUploadLines keeps referenced lines verbatim and marks the rest', () => {
  const lines = [
    uploadLine('a1', { purpose: 'pinned' }),
    uploadLine('z9', { purpose: 'pinned', name: 'old.png' }),
  ];

  const result = filterUploadLines(lines, new Set(['a1']), { mark: true });

  assert.deepStrictEqual(result.kept, [lines[0]]);
  assert.deepStrictEqual(result.removed, [
    { url: 'mxc://example.org/z9', purpose: 'none', name: 'old.png' },
  ]);
  assert.strictEqual(result.droppedCount, 1);
  assert.strictEqual(result.unreadable, 0);
});

test('filterUploadLines without marking drops lines silently', () => {
  const lines = [uploadLine('a1'), uploadLine('z9')];
  const result = filterUploadLines(lines, new Set(['a1']), { mark: false });

  assert.deepStrictEqual(result.kept, [lines[0]]);
  assert.deepStrictEqual(result.removed, []);
  assert.strictEqual(result.droppedCount, 1);
});

test('filterUploadLines preserves blank and malformed lines', () => {
  const lines = [uploadLine('a1'), '', '{"url": "mxc://example.org/broken"', uploadLine('b2'), '   ', '{"size":3}'];

  const result = filterUploadLines(lines, new Set(), { mark: true });

  assert.deepStrictEqual(result.kept, ['', '{"url": "mxc://example.org/broken"', '   ', '{"size":3}']);
  assert.deepStrictEqual(
    result.removed.map((record) => record.url),
    ['mxc://example.org/a1', 'mxc://example.org/b2']
  );
  assert.strictEqual(result.unreadable, 2);
});

test('filterUploadLines leaves the source line unchanged', () => {
  const line = uploadLine('z9', { purpose: 'pinned' });
  const result = filterUploadLines([line], new Set(), { mark: true });
  assert.strictEqual(result.removed[0].purpose, 'none');
  assert.strictEqual(line, '{"url":"mxc://example.org/z9","purpose":"pinned"}');
});

test('filterUploadLines treats any purpose value as a readable record', () => {
  const lines = ['{"url":"mxc://example.org/z9","purpose":null}', '{"url":"mxc://example.org/y8","purpose":7}'];

  const result = filterUploadLines(lines, new Set(), { mark: true });

  assert.deepStrictEqual(result.kept, []);
  assert.deepStrictEqual(result.removed, [
    { url: 'mxc://example.org/z9', purpose: 'none' },
    { url: 'mxc://example.org/y8', purpose: 'none' },
  ]);
  assert.strictEqual(result.droppedCount, 2);
  assert.strictEqual(result.unreadable, 0);
});

test('filterUploadLines keeps the source key order in marked records', () => {
  const lines = [
    '{"content_type":"image/png","url":"mxc://example.org/z9","size":3}',
    '{"purpose":"pinned","url":"mxc://example.org/y8"}',
  ];

  const result = filterUploadLines(lines, new Set(), { mark: true });

  assert.deepStrictEqual(
    result.removed.map((record) => JSON.stringify(record)),
    [
      '{"content_type":"image/png","url":"mxc://example.org/z9","size":3,"purpose":"none"}',
      '{"purpose":"none","url":"mxc://example.org/y8"}',
    ]
  );
});

test('filtering twice with the same reference set changes nothing more', () => {
  const lines = [uploadLine('a1'), '', uploadLine('z9'), 'garbage', uploadLine('b2')];
  const referenced = new Set(['a1', 'b2']);

  const once = filterUploadLines(lines, referenced, { mark: true });
  const twice = filterUploadLines(once.kept, referenced, { mark: true });

  assert.deepStrictEqual(twice.kept, once.kept);
  assert.deepStrictEqual(twice.removed, []);
  assert.strictEqual(twice.droppedCount, 0);
});

test('collectUploadMediaIds lists IDs in order and counts unreadable lines', () => {
  const lines = [uploadLine('a1'), '', 'not json', uploadLine('b2'), '{"url":"mxc://example.org/"}'];
  assert.deepStrictEqual(collectUploadMediaIds(lines), { mediaIds: ['a1', 'b2'], invalid: 2 });
});

test('collectUploadMediaIds lists records whose purpose is not a string', () => {
  const lines = ['{"url":"mxc://example.org/z9","purpose":null}', '{"url":"mxc://example.org/y8","purpose":0}'];
  assert.deepStrictEqual(collectUploadMediaIds(lines), { mediaIds: ['z9', 'y8'], invalid: 0 });
});

test('splitLines drops only the final newline', () => {
  assert.deepStrictEqual(splitLines(''), []);
  assert.deepStrictEqual(splitLines('a\nb\n'), ['a', 'b']);
  assert.deepStrictEqual(splitLines('a\r\n\r\nb'), ['a', '', 'b']);
  assert.deepStrictEqual(splitLines('a\n\n'), ['a', '']);
});

test('readUploadLog and writeUploadLog keep line structure and end with a newline', async () => {
  const file = path.join(tmpDir, 'backup', 'uploads');
  await fs.outputFile(file, `${uploadLine('a1')}\n\n${uploadLine('b2')}`);

  const lines = await readUploadLog(file);
  assert.deepStrictEqual(lines, [uploadLine('a1'), '', uploadLine('b2')]);

  await writeUploadLog(file, lines);
  assert.strictEqual(await fs.readFile(file, 'utf-8'), `${uploadLine('a1')}\n\n${uploadLine('b2')}\n`);
});

test('writeUploadLog keeps trailing blank lines and writes nothing for no lines', async () => {
  const file = path.join(tmpDir, 'uploads');

  await writeUploadLog(file, [uploadLine('a1'), '']);
  assert.strictEqual(await fs.readFile(file, 'utf-8'), `${uploadLine('a1')}\n\n`);
  assert.deepStrictEqual(await readUploadLog(file), [uploadLine('a1'), '']);

  await writeUploadLog(file, []);
  assert.strictEqual(await fs.readFile(file, 'utf-8'), '');
});

test('readUploadLog fails when the file is missing', async () => {
  await assert.rejects(
    () => readUploadLog(path.join(tmpDir, 'missing')),
    (error: unknown) => error instanceof MaintenanceError && error.code === 'FILE_NOT_FOUND'
  );
});

test('appendRemovalLog appends one JSON object per line', async () => {
  const file = path.join(tmpDir, 'out', 'removed.ndjson');

  await appendRemovalLog(file, [{ url: 'mxc://example.org/z9', purpose: 'none' }]);
  await appendRemovalLog(file, []);
  await appendRemovalLog(file, [{ url: 'mxc://example.org/y8', purpose: 'none' }]);

  assert.strictEqual(
    await fs.readFile(file, 'utf-8'),
    '{"url":"mxc://example.org/z9","purpose":"none"}\n{"url":"mxc://example.org/y8","purpose":"none"}\n'
  );
});
