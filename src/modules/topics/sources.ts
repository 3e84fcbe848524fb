import fs from 'node:fs/promises';
import { TopicSourceError, errorMessage } from '../errors.js';

/** Anything that can produce a raw, not yet normalized, genre payload. */
export interface TopicSource {
  readonly name: string;
  load(): Promise<unknown>;
}

/** Reads a JSON file; the normalizer does the parsing. */
export class FileTopicSource implements TopicSource {
  readonly name = 'file';

  constructor(private readonly filePath: string) {}

  async load(): Promise<unknown> {
    try {
      return await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      throw new TopicSourceError(`Cannot read ${this.filePath}: ${errorMessage(err)}`, this.name, { cause: err });
    }
  }
}

/** Wraps a payload that is already in memory (tests, piped input). */
export class InlineTopicSource implements TopicSource {
  readonly name = 'inline';

  constructor(private readonly payload: unknown) {}

  async load(): Promise<unknown> {
    return this.payload;
  }
}
