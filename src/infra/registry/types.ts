/**
 * Capabilities the resolver consumes. Implementations may call out to
 * registries or models; every method is async.
 */

/**
 * Answers questions about images in a registry. Definitive answers resolve;
 * an implementation may throw when the registry cannot answer right now,
 * and `guardOracle` turns that into `false`, `[]` or `undefined`.
 */
export interface ExistenceOracle {
  exists(reference: string): Promise<boolean>;
  listTags(repository: string): Promise<string[]>;
  /** Value of a config label, e.g. `org.opencontainers.image.created`. */
  getBuildLabel(reference: string, label: string): Promise<string | undefined>;
}

export interface RegistryAccessCapability {
  isAccessible(reference: string): Promise<boolean>;
}

export interface FuzzySuggestion {
  image: string | null;
  confidence: number;
  rationale?: string;
  alternatives?: string[];
}

export interface FuzzyMatchCapability {
  /** Suggestions below this confidence are declined unless the caller overrides it. */
  readonly confidenceThreshold: number;
  suggest(reference: string): Promise<FuzzySuggestion>;
}
