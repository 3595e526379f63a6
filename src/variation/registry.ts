import {
  DuplicateVariationError,
  InvalidVariationValueError,
  UnknownVariationError,
  UnresolvableVariationError,
  VariationRegistryLockedError,
} from '../errors.js';
import type { VariationMode } from '../config/engineConfig.js';
import { deriveVariationSeed, sampleUniform } from './sampling.js';
import type {
  VariationDeclaration,
  VariationDomain,
  VariationReference,
  VariationResolution,
} from './types.js';

type Entry = {
  domain: VariationDomain;
  default?: string;
  pinned?: string;
  resolution?: VariationResolution;
};

export type VariationRegistryOptions = {
  mode?: VariationMode;
  seed?: number;
  /** Content hash of the encounter, mixed into sampling seeds. */
  encounterHash?: string;
};

export type ResolveContext = {
  resolvedBy?: string;
};

const EMPTY_HASH = '00';

const inDomain = (domain: VariationDomain, value: string) =>
  domain.kind === 'symbolic' || domain.values.includes(value);

/**
 * Session-scoped table of named random variables. Resolution is monotonic:
 * once a variation has a value it keeps it until an explicit `reset`.
 * Registration, pinning and resetting are authoring operations and are
 * rejected while the registry is frozen for playback.
 */
export class VariationRegistry {
  private readonly entries = new Map<string, Entry>();
  private readonly log: VariationResolution[] = [];
  private frozen = false;
  private sequence = 0;
  readonly mode: VariationMode;
  readonly seed: number;
  readonly encounterHash: string;

  constructor(options: VariationRegistryOptions = {}) {
    this.mode = options.mode ?? 'planning';
    this.seed = (options.seed ?? 1337) >>> 0;
    this.encounterHash = options.encounterHash ?? EMPTY_HASH;
  }

  static fromDeclarations(
    declarations: readonly VariationDeclaration[],
    options: VariationRegistryOptions = {},
  ): VariationRegistry {
    const registry = new VariationRegistry(options);
    for (const declaration of declarations) {
      registry.register(declaration.id, declaration.domain, declaration.default);
      if (declaration.pinned !== undefined) {
        registry.pin(declaration.id, declaration.pinned);
      }
    }
    return registry;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  freeze(): void {
    this.frozen = true;
  }

  thaw(): void {
    this.frozen = false;
  }

  private assertWritable(operation: string) {
    if (this.frozen) {
      throw new VariationRegistryLockedError(operation);
    }
  }

  private entry(id: string): Entry {
    const entry = this.entries.get(id);
    if (!entry) {
      throw new UnknownVariationError(id);
    }
    return entry;
  }

  register(id: string, domain: VariationDomain, defaultValue?: string): void {
    this.assertWritable(`register variation "${id}"`);
    if (this.entries.has(id)) {
      throw new DuplicateVariationError(id);
    }
    if (domain.kind === 'finite' && domain.values.length === 0) {
      throw new RangeError(`Variation "${id}" has an empty finite domain`);
    }
    if (defaultValue !== undefined && !inDomain(domain, defaultValue)) {
      throw new InvalidVariationValueError(id, defaultValue);
    }
    this.entries.set(id, {
      domain: domain.kind === 'finite' ? { kind: 'finite', values: [...domain.values] } : domain,
      default: defaultValue,
    });
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  ids(): string[] {
    return Array.from(this.entries.keys());
  }

  domain(id: string): VariationDomain {
    return this.entry(id).domain;
  }

  pin(id: string, value: string): void {
    this.assertWritable(`pin variation "${id}"`);
    const entry = this.entry(id);
    if (!inDomain(entry.domain, value)) {
      throw new InvalidVariationValueError(id, value);
    }
    entry.pinned = value;
  }

  unpin(id: string): void {
    this.assertWritable(`unpin variation "${id}"`);
    delete this.entry(id).pinned;
  }

  peek(id: string): string | undefined {
    return this.entry(id).resolution?.value;
  }

  resolution(id: string): VariationResolution | undefined {
    return this.entry(id).resolution;
  }

  /** Resolutions in the order they happened this session. */
  resolutions(): readonly VariationResolution[] {
    return this.log;
  }

  resolve(id: string, context: ResolveContext = {}): string {
    const entry = this.entry(id);
    if (entry.resolution) {
      return entry.resolution.value;
    }
    const { value, source } = this.choose(id, entry);
    const resolution: VariationResolution = {
      variationId: id,
      value,
      source,
      resolvedBy: context.resolvedBy,
      sequence: this.sequence++,
    };
    entry.resolution = resolution;
    this.log.push(resolution);
    return value;
  }

  private choose(id: string, entry: Entry): { value: string; source: VariationResolution['source'] } {
    if (this.mode === 'planning' && entry.pinned !== undefined) {
      return { value: entry.pinned, source: 'pinned' };
    }
    if (entry.domain.kind === 'symbolic') {
      if (entry.default !== undefined) {
        return { value: entry.default, source: 'default' };
      }
      throw new UnresolvableVariationError(id);
    }
    if (this.mode === 'planning' && entry.default !== undefined) {
      return { value: entry.default, source: 'default' };
    }
    const seed = deriveVariationSeed(this.encounterHash, id, this.seed);
    return { value: sampleUniform(entry.domain.values, seed), source: 'sampled' };
  }

  /** Clears one resolution, or every resolution when `id` is omitted. */
  reset(id?: string): void {
    this.assertWritable(id === undefined ? 'reset variations' : `reset variation "${id}"`);
    if (id === undefined) {
      for (const entry of this.entries.values()) {
        delete entry.resolution;
      }
      this.log.length = 0;
      this.sequence = 0;
      return;
    }
    const entry = this.entry(id);
    delete entry.resolution;
    const index = this.log.findIndex((resolution) => resolution.variationId === id);
    if (index >= 0) {
      this.log.splice(index, 1);
    }
  }

  /** Whether `resolve(id)` can produce a value under the current pins and mode. */
  isResolvable(id: string): boolean {
    const entry = this.entry(id);
    return (
      entry.resolution !== undefined ||
      entry.domain.kind === 'finite' ||
      entry.default !== undefined ||
      (this.mode === 'planning' && entry.pinned !== undefined)
    );
  }

  /** Checks that every referenced variation exists and has a value to resolve to. */
  validateReferences(references: Iterable<VariationReference>): void {
    for (const reference of references) {
      if (!this.entries.has(reference.variationId)) {
        throw new UnknownVariationError(reference.variationId, reference.segmentId);
      }
      if (!this.isResolvable(reference.variationId)) {
        throw new UnresolvableVariationError(reference.variationId);
      }
    }
  }
}
