export type ShardInfo = {
  id: number;
  total: number;
};

/** Connection status across every shard of the current topology */
export class ShardData {
  private readonly connectedShards = new Set<number>();
  private sentShardsReady = false;

  constructor(private totalShards = 1) {}

  get total() {
    return this.totalShards;
  }

  get connected(): number[] {
    return [...this.connectedShards].sort((a, b) => a - b);
  }

  get hasSentShardsReady() {
    return this.sentShardsReady;
  }

  get allConnected() {
    return this.connectedShards.size >= this.totalShards;
  }

  /** Starts a new topology; `ShardsReady` may fire once more */
  reset(totalShards: number) {
    this.totalShards = totalShards;
    this.connectedShards.clear();
    this.sentShardsReady = false;
  }

  /** Returns `true` exactly once per topology, when the last shard connects */
  connect(shardId: number): boolean {
    this.connectedShards.add(shardId);
    if (this.sentShardsReady || !this.allConnected) return false;
    this.sentShardsReady = true;
    return true;
  }

  disconnect(shardId: number) {
    this.connectedShards.delete(shardId);
  }
}
