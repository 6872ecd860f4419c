import { createMockProcess } from './llm/mock';
import { OPENROUTER_BASE_URL, createOpenAIProcess } from './llm/openai';
import type { DecisionProcess } from './llm/types';
import { logger as rootLogger } from './logger';
import type { Logger } from './logger';

function optionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

/**
 * One decision process per identity, from `AGENT_<id>_PROVIDER`, `_MODEL`,
 * `_API_KEY` and `_ENDPOINT`. Identities without a usable provider get the
 * dry-run mock.
 */
export function loadAgentsFromEnv(
  ids: string[],
  env: NodeJS.ProcessEnv = process.env,
  log: Logger = rootLogger,
): Map<string, DecisionProcess> {
  const agents = new Map<string, DecisionProcess>();
  const temperature = optionalNumber(env.LLM_TEMPERATURE);
  const maxTokens = optionalNumber(env.LLM_MAX_TOKENS);
  for (const id of ids) {
    const provider = env[`AGENT_${id}_PROVIDER`];
    if (!provider || provider === 'mock') {
      if (!provider) log.warn({ id }, 'no provider configured; using mock agent');
      agents.set(id, createMockProcess(id));
      continue;
    }
    if (provider !== 'openai' && provider !== 'openrouter') {
      log.warn({ id, provider }, 'unknown provider; using mock agent');
      agents.set(id, createMockProcess(id));
      continue;
    }
    const model = env[`AGENT_${id}_MODEL`];
    const keyEnv = env[`AGENT_${id}_API_KEY`];
    // unexpanded ${VAR} placeholders from .env templates do not count as keys
    const key = keyEnv && !keyEnv.includes('${') ? keyEnv : provider === 'openrouter' ? env.OPENROUTER_API_KEY : env.OPENAI_API_KEY;
    if (!model || !key) {
      log.warn({ id, provider }, 'missing model or API key; using mock agent');
      agents.set(id, createMockProcess(id));
      continue;
    }
    const baseURL = env[`AGENT_${id}_ENDPOINT`] ?? (provider === 'openrouter' ? OPENROUTER_BASE_URL : undefined);
    agents.set(id, createOpenAIProcess({ id, apiKey: key, model, baseURL, temperature, maxTokens }));
  }
  return agents;
}
