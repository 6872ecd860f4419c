import { isPlainObject } from '../utils';

/** A tool request as written by the decision process, before validation. */
export interface RequestedAction {
  name: string;
  arguments: unknown;
}

const FENCE_RE = /```(?:json)?\s*([\s\S]*?)```/g;

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function toAction(item: unknown): RequestedAction | null {
  if (!isPlainObject(item)) return null;
  // {"action":"buy","symbol":"AAPL","amount":10}
  const action = item.action;
  if (typeof action === 'string' && item.name === undefined) {
    const rest: Record<string, unknown> = { ...item };
    delete rest.action;
    return { name: action.toLowerCase(), arguments: rest };
  }
  return {
    name: typeof item.name === 'string' ? item.name : '',
    arguments: item.arguments ?? item.args ?? {},
  };
}

function collect(doc: unknown): RequestedAction[] {
  let items: unknown[];
  if (Array.isArray(doc)) items = doc;
  else if (isPlainObject(doc) && Array.isArray(doc.tool_calls)) items = doc.tool_calls;
  else if (isPlainObject(doc) && Array.isArray(doc.decisions)) items = doc.decisions;
  else if (isPlainObject(doc) && (typeof doc.name === 'string' || typeof doc.action === 'string')) items = [doc];
  else return [];
  return items.map(toAction).filter((a): a is RequestedAction => a !== null);
}

/**
 * Pulls tool requests out of a decision-process reply. Requests live in
 * ```json fences; without fences the outermost JSON object or array in the
 * text is tried. Accepted shapes: `{"tool_calls":[{name, arguments}]}`, a bare
 * array of calls, a single call, and `{"decisions":[{action, symbol, amount}]}`.
 */
export function extractToolCalls(text: string): RequestedAction[] {
  const fenced = [...text.matchAll(FENCE_RE)].map((m) => m[1]);
  if (fenced.length) {
    return fenced.flatMap((block) => collect(tryParse(block.trim())));
  }
  const candidates: string[] = [];
  const obj = [text.indexOf('{'), text.lastIndexOf('}')];
  if (obj[0] >= 0 && obj[1] > obj[0]) candidates.push(text.slice(obj[0], obj[1] + 1));
  const arr = [text.indexOf('['), text.lastIndexOf(']')];
  if (arr[0] >= 0 && arr[1] > arr[0]) candidates.push(text.slice(arr[0], arr[1] + 1));
  for (const c of candidates) {
    const calls = collect(tryParse(c));
    if (calls.length) return calls;
  }
  return [];
}
