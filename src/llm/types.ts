import type { TranscriptTurn } from '../session/transcript';

export type ProviderKind = 'openai' | 'openrouter' | 'mock';

/** A decision-making process: reads the whole transcript, answers with one reply. */
export interface DecisionProcess {
  readonly id: string;
  invoke(turns: readonly TranscriptTurn[]): Promise<string>;
}
