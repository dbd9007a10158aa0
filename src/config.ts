/**
 * Shape limits of a single cell.
 * These should match the virtual machine the encoded data is destined for.
 */
export interface CellConfig {
  /**
   * Maximum number of data bits a cell may hold.
   * Default in the canonical profile is 1023.
   */
  maxBits: number;

  /**
   * Maximum number of child references a cell may hold.
   * Default in the canonical profile is 4.
   */
  maxRefs: number;
}

export const DEFAULT_CONFIG: CellConfig = {
  maxBits: 1023,
  maxRefs: 4,
};

/**
 * Merge a partial config over the canonical profile.
 */
export function resolveConfig(config: Partial<CellConfig> = {}): CellConfig {
  const resolved = { ...DEFAULT_CONFIG, ...config };
  if (!Number.isInteger(resolved.maxBits) || resolved.maxBits < 1) {
    throw new RangeError(`maxBits must be a positive integer, got ${resolved.maxBits}`);
  }
  if (!Number.isInteger(resolved.maxRefs) || resolved.maxRefs < 1) {
    throw new RangeError(`maxRefs must be a positive integer, got ${resolved.maxRefs}`);
  }
  return resolved;
}
