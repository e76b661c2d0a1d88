// =======================================================================
// ANSWER COMPOSER: grounded prose over a ranked voucher list
// =======================================================================

import OpenAI from 'openai';
import { logger } from '@/services/logger';
import type { SearchResult } from '@/types/core';
import { RetrievalError, errorMessage } from '@/utils/errors';

export interface ComposedAnswer {
  answer: string;
  /** Ids of the results the prompt was grounded on, in rank order. */
  sourceIds: string[];
}

export interface AnswerComposer {
  compose(query: string, results: SearchResult[]): Promise<ComposedAnswer>;
}

export const MAX_PROMPT_RESULTS = 5;
export const MAX_EXCERPT_CHARS = 400;
export const NO_RESULTS_ANSWER =
  'Xin lỗi, hiện chưa tìm thấy voucher phù hợp với yêu cầu của bạn. Bạn có thể thử mô tả khác hoặc chọn khu vực khác.';

function clip(text: string, max: number): string {
  const chars = Array.from(text);
  return chars.length <= max ? text : `${chars.slice(0, max).join('')}...`;
}

export function buildAnswerPrompt(query: string, results: SearchResult[]): string {
  const listed = results.slice(0, MAX_PROMPT_RESULTS).map((r, i) =>
    [
      `${i + 1}. ${r.name}`,
      `   Địa điểm: ${r.facets.location}`,
      `   Điểm phù hợp: ${r.score.toFixed(3)}`,
      `   Nội dung: ${clip(r.excerpt, MAX_EXCERPT_CHARS)}`,
    ].join('\n'),
  );

  return [
    'Bạn là trợ lý tư vấn voucher. Chỉ trả lời dựa trên danh sách voucher dưới đây;',
    'không bịa thêm voucher, giá hay địa điểm không có trong danh sách.',
    '',
    `Câu hỏi của khách hàng: ${query}`,
    '',
    'Danh sách voucher phù hợp:',
    ...listed,
    '',
    'Hãy trả lời ngắn gọn bằng tiếng Việt, nêu tên voucher và lý do phù hợp.',
  ].join('\n');
}

/** The slice of the OpenAI client used here; an `OpenAI` instance satisfies it. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: {
        model: string;
        temperature: number;
        max_tokens: number;
        messages: Array<{ role: 'user'; content: string }>;
      }): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export interface OpenAIAnswerComposerConfig {
  apiKey: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
}

export class OpenAIAnswerComposer implements AnswerComposer {
  private client: ChatCompletionsClient;

  constructor(
    private readonly config: OpenAIAnswerComposerConfig,
    client?: ChatCompletionsClient,
  ) {
    this.client = client ?? new OpenAI({ apiKey: config.apiKey });
  }

  async compose(query: string, results: SearchResult[]): Promise<ComposedAnswer> {
    if (results.length === 0) {
      return { answer: NO_RESULTS_ANSWER, sourceIds: [] };
    }

    const sourceIds = results.slice(0, MAX_PROMPT_RESULTS).map((r) => r.id);
    try {
      const completion = await this.client.chat.completions.create({
        model: this.config.model,
        temperature: this.config.temperature ?? 0.3,
        max_tokens: this.config.maxTokens ?? 800,
        messages: [{ role: 'user', content: buildAnswerPrompt(query, results) }],
      });
      const answer = completion.choices[0]?.message?.content?.trim() ?? '';
      return { answer, sourceIds };
    } catch (err) {
      logger.error('answer composition failed', { error: errorMessage(err) });
      throw new RetrievalError(`answer composition failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
