/**
 * Checkpoint storage
 * Persists conversation snapshots so a suspended run can be resumed exactly
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { ConversationStateSchema, type ConversationState } from '../contracts/index.js';
import { FatalError, ValidationError, errnoCode, formatZodIssues } from '../errors/index.js';

export interface CheckpointStore {
  save(state: ConversationState): Promise<void>;
  /** Active snapshot first, then the archive. */
  load(conversationId: string): Promise<ConversationState | null>;
  archive(state: ConversationState): Promise<void>;
  listActive(): Promise<ConversationState[]>;
}

export class InMemoryCheckpointStore implements CheckpointStore {
  private readonly active: Map<string, ConversationState> = new Map();
  private readonly archived: Map<string, ConversationState> = new Map();

  async save(state: ConversationState): Promise<void> {
    this.active.set(state.conversation_id, structuredClone(state));
  }

  async load(conversationId: string): Promise<ConversationState | null> {
    const state = this.active.get(conversationId) ?? this.archived.get(conversationId);
    return state ? structuredClone(state) : null;
  }

  async archive(state: ConversationState): Promise<void> {
    this.active.delete(state.conversation_id);
    this.archived.set(state.conversation_id, structuredClone(state));
  }

  async listActive(): Promise<ConversationState[]> {
    return [...this.active.values()].map((state) => structuredClone(state));
  }
}

/**
 * One JSON file per conversation under `active/` until the run ends, then
 * moved to `archive/`. Writes go through a temp file and a rename.
 */
export class FileCheckpointStore implements CheckpointStore {
  private readonly activeDir: string;
  private readonly archiveDir: string;

  constructor(root: string) {
    this.activeDir = join(root, 'active');
    this.archiveDir = join(root, 'archive');
  }

  async save(state: ConversationState): Promise<void> {
    await this.write(this.activeDir, state);
  }

  async load(conversationId: string): Promise<ConversationState | null> {
    const fileName = this.fileName(conversationId);
    return (await this.read(join(this.activeDir, fileName))) ?? (await this.read(join(this.archiveDir, fileName)));
  }

  async archive(state: ConversationState): Promise<void> {
    await this.write(this.archiveDir, state);
    await fs.rm(join(this.activeDir, this.fileName(state.conversation_id)), { force: true });
  }

  async listActive(): Promise<ConversationState[]> {
    await fs.mkdir(this.activeDir, { recursive: true });
    const files = (await fs.readdir(this.activeDir)).filter((f) => f.endsWith('.json')).sort();
    const states: ConversationState[] = [];
    for (const file of files) {
      const state = await this.read(join(this.activeDir, file));
      if (state) states.push(state);
    }
    return states;
  }

  private fileName(conversationId: string): string {
    if (!/^[A-Za-z0-9_-]+$/.test(conversationId)) {
      throw new ValidationError(`Invalid conversation id: ${conversationId}`);
    }
    return `${conversationId}.json`;
  }

  private async write(dir: string, state: ConversationState): Promise<void> {
    await fs.mkdir(dir, { recursive: true });
    const target = join(dir, this.fileName(state.conversation_id));
    const tmp = `${target}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(state, null, 2), 'utf-8');
    await fs.rename(tmp, target);
  }

  private async read(path: string): Promise<ConversationState | null> {
    let content: string;
    try {
      content = await fs.readFile(path, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') return null;
      throw error;
    }

    const raw: unknown = JSON.parse(content);
    const result = ConversationStateSchema.safeParse(raw);
    if (!result.success) {
      throw new FatalError(`Corrupt checkpoint ${path}`, formatZodIssues(result.error));
    }
    return result.data;
  }
}
