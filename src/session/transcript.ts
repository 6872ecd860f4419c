import fs from 'fs/promises';
import path from 'path';
import { PersistenceError } from '../errors';

export type TurnRole = 'user' | 'assistant' | 'tool';

export interface TranscriptTurn {
  role: TurnRole;
  content: string;
}

export interface TranscriptSink {
  append(identity: string, date: string, turn: TranscriptTurn): Promise<void>;
}

/** `<root>/<identity>/log/<date>/log.jsonl`, one turn per line. */
export class JsonlTranscriptSink implements TranscriptSink {
  constructor(private readonly rootDir: string) {}

  filePath(identity: string, date: string): string {
    return path.join(this.rootDir, identity, 'log', date, 'log.jsonl');
  }

  async append(identity: string, date: string, turn: TranscriptTurn): Promise<void> {
    const file = this.filePath(identity, date);
    try {
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.appendFile(file, JSON.stringify({ role: turn.role, content: turn.content }) + '\n', 'utf8');
    } catch (err) {
      throw new PersistenceError(`cannot write transcript ${file}`, err);
    }
  }
}

export class MemoryTranscriptSink implements TranscriptSink {
  readonly turns = new Map<string, TranscriptTurn[]>();

  async append(identity: string, date: string, turn: TranscriptTurn): Promise<void> {
    const key = `${identity}/${date}`;
    const list = this.turns.get(key) ?? [];
    list.push({ ...turn });
    this.turns.set(key, list);
  }

  get(identity: string, date: string): TranscriptTurn[] {
    return this.turns.get(`${identity}/${date}`) ?? [];
  }
}
