export const STOP_TOKEN = '<FINISH_SIGNAL>';

export type StopMatch = 'anywhere' | 'trailing';

/**
 * `anywhere`: the token occurs somewhere in the reply.
 * `trailing`: the last non-blank line, trimmed, ends with the token.
 */
export function isStopSignal(text: string, token: string = STOP_TOKEN, mode: StopMatch = 'anywhere'): boolean {
  if (!token) return false;
  if (mode === 'anywhere') return text.includes(token);
  const lines = text.split(/\r?\n/).map((l) => l.trim()).filter(Boolean);
  const last = lines[lines.length - 1];
  return last !== undefined && last.endsWith(token);
}
