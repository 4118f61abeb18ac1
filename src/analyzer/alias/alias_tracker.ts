/**
 * Alias tracker: the "A points to B" graph for all values, together with
 * wildcards and writes. Values and instructions are opaque identities
 * owned by the caller; the tracker compares them by identity.
 */

import { AliasTrackerError } from "../errors/alias_errors.js";
import {
  BfsDirection,
  type Element,
  type ElementId,
  PointsToGraph,
} from "./points_to_graph.js";
import { addAll, setsIntersect } from "./utils/sets.js";

export interface AliasTrackerOptions<V, N> {
  formatValue?: (value: V) => string;
  formatInstruction?: (instruction: N) => string;
}

export class AliasTracker<V, N> {
  private readonly graph = new PointsToGraph<V>();
  // Current element of each value
  private readonly index = new Map<V, ElementId>();
  private readonly wildcards = new Set<V>();
  private readonly wildcardWriters = new Set<N>();
  private readonly writeIndex = new Map<N, Set<V>>();
  private numWrites = 0;

  private cachedWrittenToLocations = new Set<ElementId>();
  private cacheStale = true;

  private readonly formatValue: (value: V) => string;
  private readonly formatInstruction: (instruction: N) => string;

  constructor(options: AliasTrackerOptions<V, N> = {}) {
    this.formatValue = options.formatValue ?? String;
    this.formatInstruction = options.formatInstruction ?? String;
  }

  /**
   * Does `v` currently have an element?
   */
  contains(v: V): boolean {
    return this.index.has(v);
  }

  /**
   * Give `v` a fresh element that points nowhere. A previous element of
   * `v` keeps its edges but is no longer reachable through `v`.
   */
  makeFreshValue(v: V): void {
    const element = this.graph.createElement(v);
    this.index.set(v, element.id);
    this.cacheStale = true;
  }

  /**
   * Make `v` point at `to`, creating elements for either side as needed.
   * Repeated calls accumulate targets.
   */
  makePointerTo(v: V, to: V): void {
    const from = this.ensureElement(v);
    const target = this.ensureElement(to);
    if (this.graph.addEdge(from, target)) {
      this.cacheStale = true;
    }
  }

  setWildcard(v: V): void {
    this.wildcards.add(v);
  }

  isWildcard(v: V): boolean {
    return this.wildcards.has(v);
  }

  /**
   * Record that `n` writes `v` directly.
   */
  registerWrite(v: V, n: N): void {
    const wildcard = this.isWildcard(v);
    if (!wildcard && !this.contains(v)) {
      throw AliasTrackerError.unknownValue(
        this.formatValue(v),
        "registerWrite",
      );
    }

    this.numWrites++;
    let written = this.writeIndex.get(n);
    if (!written) {
      written = new Set();
      this.writeIndex.set(n, written);
    }
    written.add(v);
    if (wildcard) {
      this.wildcardWriters.add(n);
    }
    this.cacheStale = true;
  }

  /**
   * Does `n` write to `v` directly? Aliases are not considered.
   */
  writesTo(n: N, v: V): boolean {
    return this.writeIndex.get(n)?.has(v) ?? false;
  }

  get writeCount(): number {
    return this.numWrites;
  }

  getWildcardWriters(): ReadonlySet<N> {
    return this.wildcardWriters;
  }

  /**
   * The element currently standing for `v`, if any.
   */
  elementOf(v: V): ElementId | undefined {
    return this.index.get(v);
  }

  getMemoryLocations(v: V): ReadonlySet<ElementId> {
    return this.graph.getMemoryLocations(
      this.requireElement(v, "getMemoryLocations"),
    );
  }

  /**
   * Do `a` and `b` potentially share a memory location?
   */
  mayAlias(a: V, b: V): boolean {
    if (this.isWildcard(a) || this.isWildcard(b)) {
      return true;
    }
    return setsIntersect(
      this.getMemoryLocations(a),
      this.getMemoryLocations(b),
    );
  }

  /**
   * Do any values in `groupA` potentially share a memory location with any
   * value in `groupB`? Either group may contain duplicates. Members with no
   * element contribute no locations.
   */
  mayAliasGroups(groupA: Iterable<V>, groupB: Iterable<V>): boolean {
    const a = new Set(groupA);
    const b = new Set(groupB);
    if (a.size === 0 || b.size === 0) {
      return false;
    }

    const locationsA = new Set<ElementId>();
    for (const value of a) {
      if (this.isWildcard(value)) return true;
      const id = this.index.get(value);
      if (id !== undefined) {
        addAll(locationsA, this.graph.getMemoryLocations(id));
      }
    }

    for (const value of b) {
      if (this.isWildcard(value)) return true;
      const id = this.index.get(value);
      if (id === undefined) continue;
      if (setsIntersect(locationsA, this.graph.getMemoryLocations(id))) {
        return true;
      }
    }
    return false;
  }

  /**
   * Every other value that may represent the same memory location as `v`:
   * the weakly connected component of its element. Wildcards are not
   * considered.
   */
  getAliases(v: V): Set<V> {
    const start = this.requireElement(v, "getAliases");
    const aliases = new Set<V>();
    this.graph.bfs(
      start,
      (element) => {
        if (element.value !== v) aliases.add(element.value);
        return false;
      },
      BfsDirection.Both,
    );
    return aliases;
  }

  /**
   * Does anything write to the memory locations `v` may point to?
   */
  hasWriters(v: V): boolean {
    if (this.wildcardWriters.size > 0) {
      return true;
    }
    if (this.isWildcard(v)) {
      return this.numWrites > 0;
    }
    const locations = this.getMemoryLocations(v);
    if (this.cacheStale) {
      this.rebuildCache();
    }
    return setsIntersect(this.cachedWrittenToLocations, locations);
  }

  dump(): string {
    const lines: string[] = ["=== Alias tracker ===", "Elements:"];
    const elements = this.graph.allElements();
    if (elements.length === 0) {
      lines.push("  (none)");
    }
    for (const element of elements) {
      lines.push(`  ${this.formatElement(element)}`);
    }

    const wildcards = Array.from(this.wildcards, this.formatValue);
    lines.push(
      `Wildcards: ${wildcards.length > 0 ? wildcards.join(", ") : "(none)"}`,
    );

    lines.push(`Writes (${this.numWrites}):`);
    if (this.writeIndex.size === 0) {
      lines.push("  (none)");
    }
    for (const [instruction, values] of this.writeIndex) {
      const written = Array.from(values, this.formatValue).join(", ");
      lines.push(`  ${this.formatInstruction(instruction)} writes ${written}`);
    }

    lines.push("Wildcard writers:");
    if (this.wildcardWriters.size === 0) {
      lines.push("  (none)");
    }
    for (const instruction of this.wildcardWriters) {
      lines.push(`  ${this.formatInstruction(instruction)}`);
    }
    return lines.join("\n");
  }

  private formatElement(element: Element<V>): string {
    const stale = this.index.get(element.value) !== element.id;
    const label = `%${element.id} ${this.formatValue(element.value)}${stale ? " (stale)" : ""}`;
    if (element.pointsTo.size === 0) {
      return `${label} (location)`;
    }
    const targets = Array.from(element.pointsTo, (id) => `%${id}`).join(", ");
    return `${label} -> ${targets}`;
  }

  private ensureElement(v: V): ElementId {
    const existing = this.index.get(v);
    if (existing !== undefined) return existing;
    this.makeFreshValue(v);
    return this.requireElement(v, "makePointerTo");
  }

  private requireElement(v: V, operation: string): ElementId {
    const id = this.index.get(v);
    if (id === undefined) {
      throw AliasTrackerError.unknownValue(this.formatValue(v), operation);
    }
    return id;
  }

  private rebuildCache(): void {
    const locations = new Set<ElementId>();
    for (const values of this.writeIndex.values()) {
      for (const value of values) {
        const id = this.index.get(value);
        // Wildcards written without an element are covered by the
        // wildcard-writer check.
        if (id !== undefined) {
          addAll(locations, this.graph.getMemoryLocations(id));
        }
      }
    }
    this.cachedWrittenToLocations = locations;
    this.cacheStale = false;
  }
}
