/**
 * Points-to graph: an arena of elements connected by bidirectional edges.
 */

import { addAll } from "./utils/sets.js";

export type ElementId = number;

/**
 * Traversal direction for breadth-first searches
 */
export enum BfsDirection {
  PointsTo = "PointsTo",
  PointedFrom = "PointedFrom",
  // Both directions: the closure is the whole alias set of an element.
  Both = "Both",
}

/**
 * Vertex of the points-to graph. Each element stands for one value.
 */
export interface Element<V> {
  readonly id: ElementId;
  readonly value: V;
  // Elements this one may point to. Several targets model control-flow joins.
  readonly pointsTo: Set<ElementId>;
  // Back-references to elements pointing at this one
  readonly pointedFrom: Set<ElementId>;
}

type MemoryLocationCache = {
  epoch: number;
  locations: ReadonlySet<ElementId>;
};

type TarjanFrame = {
  id: ElementId;
  targets: ElementId[];
  next: number;
};

export class PointsToGraph<V> {
  private readonly elements: Element<V>[] = [];
  private readonly locationCache = new Map<ElementId, MemoryLocationCache>();
  private terminalCache: MemoryLocationCache | null = null;
  private currentEpoch = 0;

  get size(): number {
    return this.elements.length;
  }

  /**
   * Bumped every time an edge is added. Memoized closures are only valid
   * for the epoch they were computed in.
   */
  get epoch(): number {
    return this.currentEpoch;
  }

  createElement(value: V): Element<V> {
    const element: Element<V> = {
      id: this.elements.length,
      value,
      pointsTo: new Set(),
      pointedFrom: new Set(),
    };
    this.elements.push(element);
    return element;
  }

  getElement(id: ElementId): Element<V> {
    const element = this.elements[id];
    if (!element) {
      throw new RangeError(`Element %${id} does not exist`);
    }
    return element;
  }

  allElements(): readonly Element<V>[] {
    return this.elements;
  }

  /**
   * Add the edge `from -> to`. Returns false when the edge already existed.
   */
  addEdge(from: ElementId, to: ElementId): boolean {
    const source = this.getElement(from);
    const target = this.getElement(to);
    if (source.pointsTo.has(to)) return false;
    source.pointsTo.add(to);
    target.pointedFrom.add(from);
    this.currentEpoch++;
    return true;
  }

  /**
   * Breadth-first search from `start`, running `fn` on every visited
   * element (including `start`). With `shortCircuit`, stops and returns
   * true the first time `fn` holds; otherwise visits the whole closure and
   * returns whether `fn` ever held.
   */
  bfs(
    start: ElementId,
    fn: (element: Element<V>) => boolean,
    direction: BfsDirection,
    shortCircuit = false,
  ): boolean {
    const visited = new Set<ElementId>([start]);
    const queue: ElementId[] = [start];
    let matched = false;

    for (let head = 0; head < queue.length; head++) {
      const element = this.getElement(queue[head]);
      if (fn(element)) {
        if (shortCircuit) return true;
        matched = true;
      }

      for (const next of this.neighbors(element, direction)) {
        if (visited.has(next)) continue;
        visited.add(next);
        queue.push(next);
      }
    }

    return matched;
  }

  /**
   * Concrete storage an element may denote: the sinks reachable along
   * points-to edges. A pointer cycle with no way out is its own location,
   * so every member of such a cycle is reported.
   */
  getMemoryLocations(id: ElementId): ReadonlySet<ElementId> {
    const cached = this.locationCache.get(id);
    if (cached && cached.epoch === this.currentEpoch) {
      return cached.locations;
    }

    const locations = new Set<ElementId>();
    this.bfs(
      id,
      (element) => {
        if (this.isMemoryLocation(element)) {
          locations.add(element.id);
        }
        return false;
      },
      BfsDirection.PointsTo,
    );

    this.locationCache.set(id, { epoch: this.currentEpoch, locations });
    return locations;
  }

  private isMemoryLocation(element: Element<V>): boolean {
    // Elements created after the last component pass have no edges yet.
    return (
      element.pointsTo.size === 0 || this.terminalMembers().has(element.id)
    );
  }

  /**
   * Members of strongly connected components with no edge leaving them.
   * Computed once per epoch with an iterative Tarjan pass.
   */
  private terminalMembers(): ReadonlySet<ElementId> {
    if (this.terminalCache && this.terminalCache.epoch === this.currentEpoch) {
      return this.terminalCache.locations;
    }

    const count = this.elements.length;
    const order = new Array<number>(count).fill(-1);
    const low = new Array<number>(count).fill(0);
    const onStack = new Array<boolean>(count).fill(false);
    const component = new Array<number>(count).fill(-1);
    const stack: ElementId[] = [];
    const components: ElementId[][] = [];
    let counter = 0;

    const enter = (id: ElementId, frames: TarjanFrame[]) => {
      order[id] = counter;
      low[id] = counter;
      counter++;
      stack.push(id);
      onStack[id] = true;
      frames.push({ id, targets: [...this.elements[id].pointsTo], next: 0 });
    };

    for (let root = 0; root < count; root++) {
      if (order[root] !== -1) continue;
      const frames: TarjanFrame[] = [];
      enter(root, frames);

      while (frames.length > 0) {
        const frame = frames[frames.length - 1];
        if (frame.next < frame.targets.length) {
          const target = frame.targets[frame.next++];
          if (order[target] === -1) {
            enter(target, frames);
          } else if (onStack[target]) {
            low[frame.id] = Math.min(low[frame.id], order[target]);
          }
          continue;
        }

        frames.pop();
        const parent = frames[frames.length - 1];
        if (parent) {
          low[parent.id] = Math.min(low[parent.id], low[frame.id]);
        }
        if (low[frame.id] !== order[frame.id]) continue;

        const members: ElementId[] = [];
        let member: ElementId | undefined;
        do {
          member = stack.pop();
          if (member === undefined) break;
          onStack[member] = false;
          component[member] = components.length;
          members.push(member);
        } while (member !== frame.id);
        components.push(members);
      }
    }

    const locations = new Set<ElementId>();
    components.forEach((members, index) => {
      const closed = members.every((id) => {
        for (const target of this.elements[id].pointsTo) {
          if (component[target] !== index) return false;
        }
        return true;
      });
      if (closed) addAll(locations, members);
    });

    this.terminalCache = { epoch: this.currentEpoch, locations };
    return locations;
  }

  private neighbors(
    element: Element<V>,
    direction: BfsDirection,
  ): Iterable<ElementId> {
    switch (direction) {
      case BfsDirection.PointsTo:
        return element.pointsTo;
      case BfsDirection.PointedFrom:
        return element.pointedFrom;
      case BfsDirection.Both:
        return [...element.pointsTo, ...element.pointedFrom];
    }
  }
}
