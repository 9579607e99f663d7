import type { Checkpoint, CheckpointStore } from "./types";

interface StoredCheckpoint {
  seq: number;
  checkpoint: Checkpoint;
}

/**
 * Process-local checkpoint store for tests and ephemeral sessions.
 */
export class InMemoryCheckpointStore implements CheckpointStore {
  private readonly checkpoints = new Map<string, StoredCheckpoint>();
  private seq = 0;

  async create(checkpoint: Checkpoint): Promise<void> {
    if (this.checkpoints.has(checkpoint.id)) {
      throw new Error(`Checkpoint already exists: ${checkpoint.id}`);
    }
    this.checkpoints.set(checkpoint.id, { seq: ++this.seq, checkpoint: copyCheckpoint(checkpoint) });
  }

  async get(checkpointId: string): Promise<Checkpoint | undefined> {
    const stored = this.checkpoints.get(checkpointId);
    return stored ? copyCheckpoint(stored.checkpoint) : undefined;
  }

  async getLatest(sessionId: string): Promise<Checkpoint | undefined> {
    const [latest] = this.newestFirst(sessionId);
    return latest ? copyCheckpoint(latest.checkpoint) : undefined;
  }

  async list(sessionId: string): Promise<Checkpoint[]> {
    return this.newestFirst(sessionId).map((stored) => copyCheckpoint(stored.checkpoint));
  }

  async delete(checkpointId: string): Promise<void> {
    this.checkpoints.delete(checkpointId);
  }

  async deleteOldest(sessionId: string, keep: number): Promise<number> {
    const excess = this.newestFirst(sessionId).slice(Math.max(0, keep));
    for (const stored of excess) {
      this.checkpoints.delete(stored.checkpoint.id);
    }
    return excess.length;
  }

  private newestFirst(sessionId: string): StoredCheckpoint[] {
    return Array.from(this.checkpoints.values())
      .filter((stored) => stored.checkpoint.sessionId === sessionId)
      .sort((a, b) => b.checkpoint.timestamp - a.checkpoint.timestamp || b.seq - a.seq);
  }
}

function copyCheckpoint(checkpoint: Checkpoint): Checkpoint {
  return { ...checkpoint, state: new Uint8Array(checkpoint.state) };
}
