import type { Reflection } from "./reflection";

/**
 * Immutable map of relationship name to reflection for one model class.
 *
 * A subclass registry is composed from a copy of its parent's entries plus
 * its own; a parent is never modified by its subclasses.
 */
export class ReflectionRegistry {
  private readonly entries: ReadonlyMap<string, Reflection>;

  private constructor(entries: ReadonlyMap<string, Reflection>) {
    this.entries = entries;
  }

  public static empty(): ReflectionRegistry {
    return new ReflectionRegistry(new Map());
  }

  /**
   * Build a registry holding the parent's reflections and the given ones;
   * own reflections win on name clashes.
   */
  public static compose(
    parent: ReflectionRegistry | undefined,
    own: Reflection[],
  ): ReflectionRegistry {
    const entries = new Map(parent?.entries);

    for (const reflection of own) {
      entries.set(reflection.name, reflection);
    }

    return new ReflectionRegistry(entries);
  }

  public get(name: string): Reflection | undefined {
    return this.entries.get(name);
  }

  public has(name: string): boolean {
    return this.entries.has(name);
  }

  public names(): string[] {
    return Array.from(this.entries.keys());
  }

  /**
   * Every reflection, in declaration order (inherited first).
   */
  public all(): Reflection[] {
    return Array.from(this.entries.values());
  }

  /**
   * Reflections of collection relationships.
   */
  public collections(): Reflection[] {
    return this.all().filter((reflection) => reflection.isCollection);
  }

  public get size(): number {
    return this.entries.size;
  }
}
