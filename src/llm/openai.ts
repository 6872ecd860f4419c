import OpenAI, { APIConnectionError, APIError } from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import { FatalInvocationError, TransientInvocationError } from '../errors';
import type { TranscriptTurn } from '../session/transcript';
import type { DecisionProcess } from './types';

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

/** The slice of the SDK client this module calls. */
export interface ChatClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
    };
  };
}

export interface OpenAIProcessOptions {
  id: string;
  apiKey: string;
  model: string;
  /** Chat-completions base URL; OpenAI's own when omitted. */
  baseURL?: string;
  temperature?: number;
  maxTokens?: number;
  client?: ChatClient;
}

export function toMessages(turns: readonly TranscriptTurn[]): ChatCompletionMessageParam[] {
  return turns.map((t): ChatCompletionMessageParam =>
    t.role === 'assistant'
      ? { role: 'assistant', content: t.content }
      : { role: 'user', content: t.role === 'tool' ? `Tool results:\n${t.content}` : t.content },
  );
}

/** Maps SDK failures onto the invocation taxonomy the retry policy understands. */
export function toInvocationError(err: unknown): Error {
  if (err instanceof APIConnectionError) return new TransientInvocationError(err.message, err);
  if (err instanceof APIError) {
    const status = err.status ?? 0;
    if (status === 408 || status === 429 || status >= 500 || status === 0) {
      return new TransientInvocationError(err.message, err);
    }
    return new FatalInvocationError(err.message, err);
  }
  return err instanceof Error ? err : new FatalInvocationError(String(err));
}

export function createOpenAIProcess(opts: OpenAIProcessOptions): DecisionProcess {
  const isOpenRouter = opts.baseURL?.includes('openrouter.ai') ?? false;
  const client: ChatClient =
    opts.client ??
    new OpenAI({
      apiKey: opts.apiKey,
      baseURL: opts.baseURL,
      // RetryPolicy owns retrying
      maxRetries: 0,
      defaultHeaders: isOpenRouter ? { 'X-Title': process.env.OPENROUTER_APP_TITLE ?? 'tradeday' } : undefined,
    });

  return {
    id: opts.id,
    async invoke(turns) {
      let res: ChatCompletion;
      try {
        res = await client.chat.completions.create({
          model: opts.model,
          messages: toMessages(turns),
          temperature: opts.temperature ?? 0.2,
          max_tokens: opts.maxTokens,
        });
      } catch (err) {
        throw toInvocationError(err);
      }
      const content = res.choices[0]?.message?.content;
      if (typeof content !== 'string') {
        throw new TransientInvocationError(`${opts.model} returned no message content`);
      }
      return content;
    },
  };
}
