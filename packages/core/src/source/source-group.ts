import type { SeismicSource } from './types.js';

/**
 * A group of sources sharing a tectonic region type. `changes` counts the
 * uncertainty applications that produced the group.
 */
export class SourceGroup implements Iterable<SeismicSource> {
  public changes = 0;

  constructor(
    public readonly tectonicRegionType: string,
    public readonly sources: readonly SeismicSource[] = [],
    public readonly name: string = ''
  ) {}

  [Symbol.iterator](): Iterator<SeismicSource> {
    return this.sources[Symbol.iterator]();
  }

  get length(): number {
    return this.sources.length;
  }

  /**
   * New group with the same identity fields and the given sources
   */
  withSources(sources: readonly SeismicSource[], changes: number): SourceGroup {
    const group = new SourceGroup(this.tectonicRegionType, sources, this.name);
    group.changes = changes;
    return group;
  }
}
