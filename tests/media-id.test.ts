#!/usr/bin/env node
/**
 * Media ID extraction tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { extractMediaId } from '../cli/lib/media-id';

test('extractMediaId returns the segment after the last slash of an mxc URL', () => {
  assert.strictEqual(extractMediaId('mxc://example.org/AbCdEf123'), 'AbCdEf123');
});

test('extractMediaId returns a bare name unchanged', () => {
  assert.strictEqual(extractMediaId('AbCdEf123'), 'AbCdEf123');
  assert.strictEqual(extractMediaId(''), '');
});

test('extractMediaId does not validate the scheme or authority', () => {
  assert.strictEqual(extractMediaId('https://cdn.example.org/a/b/c'), 'c');
  assert.strictEqual(extractMediaId('not-a-url/xyz'), 'xyz');
  assert.strictEqual(extractMediaId('mxc://example.org/'), '');
});

test('prefix plus extracted ID rebuilds the input string', () => {
  const samples = ['mxc://s/a1', 'a/b/c', '/leading', 'trailing/', '//', 'mxc://example.org/x/y'];
  for (const sample of samples) {
    const id = extractMediaId(sample);
    const prefix = sample.slice(0, sample.lastIndexOf('/') + 1);
    assert.strictEqual(prefix + id, sample, `round trip for ${sample}`);
    assert.ok(!id.includes('/'), `extracted ID has no slash for ${sample}`);
  }
});
