import { getLogger } from '../../utils/logger.js';
import { isRecord } from '../../utils/guards.js';
import { createTopic, type Topic } from './types.js';

/** Keys searched, in order, for the topic array inside a wrapping object. */
export const LIST_ALIASES = ['genres', 'ジャンル', 'results', 'data'] as const;

/** Entry fields; the Japanese key wins when both are present. */
export const FIELD_ALIASES = {
  name: ['ジャンル名', 'name'],
  keywords: ['関連するキーワード例', 'keywords'],
  description: ['説明', 'description'],
  audience: ['想定ターゲット層', 'audience'],
} as const;

export type Payload =
  | { kind: 'sequence'; items: readonly unknown[] }
  | { kind: 'mapping'; value: Record<string, unknown> }
  | { kind: 'text'; text: string }
  | { kind: 'scalar'; value: number | boolean | bigint }
  | { kind: 'unsupported'; type: string };

export function classifyPayload(raw: unknown): Payload {
  if (Array.isArray(raw)) return { kind: 'sequence', items: raw };
  if (isRecord(raw)) return { kind: 'mapping', value: raw };
  if (typeof raw === 'string') return { kind: 'text', text: raw };
  if (typeof raw === 'number' || typeof raw === 'boolean' || typeof raw === 'bigint') {
    return { kind: 'scalar', value: raw };
  }
  return { kind: 'unsupported', type: raw === null ? 'null' : typeof raw };
}

function firstField(entry: Record<string, unknown>, keys: readonly string[]): unknown {
  for (const key of keys) {
    if (entry[key] !== undefined && entry[key] !== null) return entry[key];
  }
  return undefined;
}

function textField(entry: Record<string, unknown>, keys: readonly string[]): string {
  const value = firstField(entry, keys);
  return typeof value === 'string' ? value.trim() : '';
}

function keywordField(entry: Record<string, unknown>, keys: readonly string[]): string[] {
  const value = firstField(entry, keys);
  const list: unknown[] = typeof value === 'string' ? [value] : Array.isArray(value) ? value : [];
  return list
    .filter((k): k is string => typeof k === 'string')
    .map(k => k.trim())
    .filter(k => k !== '');
}

function entryToTopic(entry: unknown, index: number): Topic | null {
  const log = getLogger();

  if (typeof entry === 'string') {
    const name = entry.trim();
    return name ? createTopic(name, [name]) : null;
  }

  if (!isRecord(entry)) {
    log.warn({ index, type: entry === null ? 'null' : typeof entry }, 'Skipping topic entry of unsupported type');
    return null;
  }

  const name = textField(entry, FIELD_ALIASES.name);
  const keywords = keywordField(entry, FIELD_ALIASES.keywords);
  if (!name || keywords.length === 0) {
    log.warn({ index, name }, 'Dropping topic without a name or keywords');
    return null;
  }

  return createTopic(name, keywords, {
    description: textField(entry, FIELD_ALIASES.description),
    audience: textField(entry, FIELD_ALIASES.audience),
  });
}

function fromSequence(items: readonly unknown[]): Topic[] {
  const topics: Topic[] = [];
  items.forEach((item, index) => {
    const topic = entryToTopic(item, index);
    if (topic) topics.push(topic);
  });
  return topics;
}

function fromMapping(value: Record<string, unknown>): Topic[] {
  for (const alias of LIST_ALIASES) {
    const list = value[alias];
    if (Array.isArray(list)) return fromSequence(list);
  }
  return fromSequence([value]);
}

/**
 * Coerce an untyped genre payload into topics. Never throws; anything that
 * cannot be read yields an empty list and a warning.
 */
export function normalize(raw: unknown): Topic[] {
  const log = getLogger();
  const payload = classifyPayload(raw);

  switch (payload.kind) {
    case 'sequence':
      return fromSequence(payload.items);
    case 'mapping':
      return fromMapping(payload.value);
    case 'text': {
      let parsed: unknown;
      try {
        parsed = JSON.parse(payload.text);
      } catch {
        log.warn({ preview: payload.text.slice(0, 80) }, 'Topic payload is not valid JSON');
        return [];
      }
      const inner = classifyPayload(parsed);
      if (inner.kind === 'sequence') return fromSequence(inner.items);
      if (inner.kind === 'mapping') return fromMapping(inner.value);
      log.warn({ kind: inner.kind }, 'Parsed topic payload is neither a list nor an object');
      return [];
    }
    case 'scalar':
      log.warn({ value: String(payload.value) }, 'Topic payload is a bare scalar');
      return [];
    case 'unsupported':
      log.warn({ type: payload.type }, 'Unsupported topic payload');
      return [];
    default: {
      const unreachable: never = payload;
      return unreachable;
    }
  }
}
