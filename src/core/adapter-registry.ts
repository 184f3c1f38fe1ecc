import { FetchAdapter, SourceCost, SourceId } from "./types.js";

export interface SourceDescriptor {
  source: SourceId;
  displayName: string;
  cost: SourceCost;
  maxConcurrency: number;
}

export class AdapterRegistry {
  private adapters = new Map<SourceId, FetchAdapter>();

  register(adapter: FetchAdapter): void {
    this.adapters.set(adapter.source, adapter);
  }

  get(source: SourceId): FetchAdapter {
    const adapter = this.adapters.get(source);
    if (!adapter) throw new Error(`Unknown source: ${source}`);
    return adapter;
  }

  has(source: SourceId): boolean {
    return this.adapters.has(source);
  }

  all(): FetchAdapter[] {
    return [...this.adapters.values()];
  }

  describeAll(): SourceDescriptor[] {
    return this.all().map((a) => ({
      source: a.source,
      displayName: a.displayName,
      cost: a.cost,
      maxConcurrency: a.maxConcurrency,
    }));
  }
}
