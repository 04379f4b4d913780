import type { ExistenceOracle } from '@/infra/registry/types';
import { createLogger, type Logger } from '@/lib/logger';

export interface FakeOracleSeed {
  /** References that exist, written exactly as the code under test asks for them. */
  images?: readonly string[];
  /** Tag lists keyed by repository. */
  tags?: Readonly<Record<string, readonly string[]>>;
  /** Build labels keyed by `repository:tag`. */
  labels?: Readonly<Record<string, string>>;
}

/**
 * In-memory registry that records every question it is asked.
 */
export class FakeOracle implements ExistenceOracle {
  readonly existsCalls: string[] = [];
  readonly listTagsCalls: string[] = [];
  readonly labelCalls: string[] = [];

  private readonly images: Set<string>;
  private readonly tags: Map<string, readonly string[]>;
  private readonly labels: Map<string, string>;

  constructor(seed: FakeOracleSeed = {}) {
    this.images = new Set(seed.images ?? []);
    this.tags = new Map(Object.entries(seed.tags ?? {}));
    this.labels = new Map(Object.entries(seed.labels ?? {}));
  }

  addImage(reference: string): void {
    this.images.add(reference);
  }

  async exists(reference: string): Promise<boolean> {
    this.existsCalls.push(reference);
    return this.images.has(reference);
  }

  async listTags(repository: string): Promise<string[]> {
    this.listTagsCalls.push(repository);
    return [...(this.tags.get(repository) ?? [])];
  }

  async getBuildLabel(reference: string, _label: string): Promise<string | undefined> {
    this.labelCalls.push(reference);
    return this.labels.get(reference);
  }
}

export function createTestLogger(): Logger {
  return createLogger({ name: 'test', level: 'silent' });
}
