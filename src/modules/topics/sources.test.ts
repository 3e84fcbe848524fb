import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { TopicSourceError } from '../errors.js';
import { FileTopicSource, InlineTopicSource } from './sources.js';

describe('FileTopicSource', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'topics-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns the raw file text', async () => {
    const file = path.join(dir, 'genres.json');
    fs.writeFileSync(file, '{"genres":[]}');
    await expect(new FileTopicSource(file).load()).resolves.toBe('{"genres":[]}');
  });

  it('raises a source error for a missing file', async () => {
    await expect(new FileTopicSource(path.join(dir, 'missing.json')).load()).rejects.toBeInstanceOf(TopicSourceError);
  });
});

describe('InlineTopicSource', () => {
  it('hands back its payload', async () => {
    const payload = ['a'];
    await expect(new InlineTopicSource(payload).load()).resolves.toBe(payload);
  });
});
