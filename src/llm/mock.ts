import type { TranscriptTurn } from '../session/transcript';
import { STOP_TOKEN } from '../session/stopSignal';
import type { DecisionProcess } from './types';

export type ScriptStep = string | Error | ((turns: readonly TranscriptTurn[]) => string);

/**
 * Replays a fixed script, one step per invocation. An `Error` step is thrown.
 * Once the script runs out every reply is the stop token.
 */
export function createScriptedProcess(id: string, script: ScriptStep[]): DecisionProcess & { calls: number } {
  const steps = [...script];
  const proc = {
    id,
    calls: 0,
    async invoke(turns: readonly TranscriptTurn[]): Promise<string> {
      proc.calls++;
      const step = steps.shift();
      if (step === undefined) return STOP_TOKEN;
      if (step instanceof Error) throw step;
      return typeof step === 'function' ? step(turns) : step;
    },
  };
  return proc;
}

/**
 * Dry-run process: checks the price of one symbol once,
 * then stops. Lets the whole pipeline run without model credentials.
 */
export function createMockProcess(id: string, symbol = 'AAPL'): DecisionProcess {
  return {
    id,
    async invoke(turns) {
      const date = /Today is (\d{4}-\d{2}-\d{2})/.exec(turns[0]?.content ?? '')?.[1];
      const asked = turns.some((t) => t.role === 'tool');
      if (asked || !date) return `Holding today. ${STOP_TOKEN}`;
      return ['```json', JSON.stringify({ tool_calls: [{ name: 'get_price_local', arguments: { symbol, date } }] }), '```'].join('\n');
    },
  };
}
