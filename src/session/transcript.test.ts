import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { JsonlTranscriptSink, MemoryTranscriptSink } from './transcript';

describe('JsonlTranscriptSink', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'transcript-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('appends one line per turn under <identity>/log/<date>/log.jsonl', async () => {
    const sink = new JsonlTranscriptSink(dir);
    await sink.append('alpha', '2025-01-03', { role: 'user', content: 'hello' });
    await sink.append('alpha', '2025-01-03', { role: 'assistant', content: 'line one\nline two' });
    const text = await fs.readFile(path.join(dir, 'alpha', 'log', '2025-01-03', 'log.jsonl'), 'utf8');
    expect(text).toBe('{"role":"user","content":"hello"}\n{"role":"assistant","content":"line one\\nline two"}\n');
  });
});

describe('MemoryTranscriptSink', () => {
  it('keeps turns per identity and date', async () => {
    const sink = new MemoryTranscriptSink();
    await sink.append('alpha', '2025-01-03', { role: 'user', content: 'a' });
    await sink.append('beta', '2025-01-03', { role: 'user', content: 'b' });
    expect(sink.get('alpha', '2025-01-03')).toEqual([{ role: 'user', content: 'a' }]);
    expect(sink.get('alpha', '2025-01-06')).toEqual([]);
  });
});
