import Anthropic from '@anthropic-ai/sdk';
import { getLogger } from '../../utils/logger.js';
import { TopicSourceError, errorMessage } from '../errors.js';
import type { TopicSource } from './sources.js';

export const SUGGESTION_MODEL = 'claude-sonnet-4-5-20250929';

const SYSTEM_PROMPT = 'あなたは日本のアフィリエイトマーケティングの専門家です。創造的で実用的なアイデアを提供します。';

export function buildSuggestionPrompt(count: number): string {
  return `日本のアフィリエイトマーケティングにおいて、以下の条件を満たす有望なジャンルを${count}個リストアップし、JSONフォーマットで返してください：

1. 十分なニーズがある（または今後成長が見込める）
2. 比較的競合が少ない
3. アフィリエイト収益化が可能

以下の形式のJSONで出力してください:

{
  "genres": [
    {
      "ジャンル名": "ジャンル1",
      "説明": "このジャンルが有望な理由",
      "想定ターゲット層": "このジャンルの対象となる人々",
      "関連するキーワード例": ["キーワード1", "キーワード2", "キーワード3", "キーワード4", "キーワード5"]
    }
  ]
}

厳密にJSON形式で出力してください。他の説明は不要です。`;
}

/**
 * Cut the outermost `{...}` block out of a model reply. Returns null when
 * the reply holds no braces in order.
 */
export function extractJsonBlock(reply: string): string | null {
  const start = reply.indexOf('{');
  const end = reply.lastIndexOf('}');
  if (start < 0 || end <= start) return null;
  return reply.slice(start, end + 1);
}

export interface SuggestionUsage {
  model: string;
  inputTokens: number;
  outputTokens: number;
}

/** The parts of a Messages API reply the suggester reads. */
export interface SuggestionResponse {
  content: ReadonlyArray<{ type: string; text?: string }>;
  usage: { input_tokens: number; output_tokens: number };
}

/** The slice of the Anthropic client the suggester calls; replaced in tests. */
export interface MessagesApi {
  create(params: Anthropic.MessageCreateParamsNonStreaming): Promise<SuggestionResponse>;
}

/**
 * Topic source backed by the Anthropic Messages API. `load()` resolves to
 * the JSON text of the reply; token usage of the last call is kept for
 * cost tracking.
 */
export class GenreSuggester implements TopicSource {
  readonly name = 'anthropic';
  lastUsage: SuggestionUsage | null = null;

  private log = getLogger();
  private messages: MessagesApi;

  constructor(apiKey: string, private readonly count: number, messages?: MessagesApi) {
    if (!apiKey && !messages) {
      throw new TopicSourceError('ANTHROPIC_API_KEY is required for genre suggestions', this.name);
    }
    this.messages = messages ?? new Anthropic({ apiKey }).messages;
  }

  async load(): Promise<string> {
    this.log.debug({ count: this.count, model: SUGGESTION_MODEL }, 'Requesting genre suggestions');

    let response: SuggestionResponse;
    try {
      response = await this.messages.create({
        model: SUGGESTION_MODEL,
        max_tokens: 4000,
        temperature: 0.7,
        system: SYSTEM_PROMPT,
        messages: [{ role: 'user', content: buildSuggestionPrompt(this.count) }],
      });
    } catch (err) {
      throw new TopicSourceError(`Suggestion request failed: ${errorMessage(err)}`, this.name, { cause: err });
    }

    this.lastUsage = {
      model: SUGGESTION_MODEL,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    };

    let reply = '';
    for (const block of response.content) {
      if (block.type === 'text' && block.text) reply += block.text;
    }

    const json = extractJsonBlock(reply);
    if (json === null) {
      throw new TopicSourceError('Suggestion reply contained no JSON object', this.name);
    }

    this.log.info({ tokens: this.lastUsage.inputTokens + this.lastUsage.outputTokens }, 'Genre suggestions received');
    return json;
  }
}
