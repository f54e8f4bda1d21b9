import type { UnitDefinition } from "@stackgate/core";
import { StackgateError } from "@stackgate/core";

/**
 * Dependency graph over an arena of units.
 *
 * Units are addressed by their index in `units`; edges are index lists,
 * so the graph stays plain data. Construction validates names and edges
 * and rejects cycles, so an existing UnitGraph is always a DAG.
 */
export class UnitGraph {
  readonly units: readonly UnitDefinition[];
  /** `dependencies[i]`: indices of the units unit i waits on. */
  readonly dependencies: readonly (readonly number[])[];
  /** `dependents[i]`: indices of the units waiting on unit i. */
  readonly dependents: readonly (readonly number[])[];
  /** Topological order; ties broken by declaration order. */
  readonly order: readonly number[];

  private readonly indexByName: ReadonlyMap<string, number>;

  private constructor(
    units: readonly UnitDefinition[],
    indexByName: Map<string, number>,
    dependencies: number[][],
    dependents: number[][],
    order: number[],
  ) {
    this.units = units;
    this.indexByName = indexByName;
    this.dependencies = dependencies;
    this.dependents = dependents;
    this.order = order;
  }

  static build(units: readonly UnitDefinition[]): UnitGraph {
    const indexByName = new Map<string, number>();
    units.forEach((unit, index) => {
      if (indexByName.has(unit.name)) {
        throw new StackgateError(
          "DUPLICATE_UNIT",
          `Duplicate unit name: ${unit.name}`,
          { unit: unit.name },
        );
      }
      indexByName.set(unit.name, index);
    });

    const dependencies: number[][] = units.map(() => []);
    const dependents: number[][] = units.map(() => []);

    units.forEach((unit, index) => {
      for (const name of unit.dependsOn) {
        const upstream = indexByName.get(name);
        if (upstream === undefined) {
          throw new StackgateError(
            "UNKNOWN_DEPENDENCY",
            `Unit ${unit.name} depends on unknown unit ${name}`,
            { unit: unit.name, dependency: name },
          );
        }
        if (!dependencies[index].includes(upstream)) {
          dependencies[index].push(upstream);
          dependents[upstream].push(index);
        }
      }
    });

    const order = topologicalOrder(units, dependencies, dependents);
    return new UnitGraph(units, indexByName, dependencies, dependents, order);
  }

  get size(): number {
    return this.units.length;
  }

  indexOf(name: string): number {
    const index = this.indexByName.get(name);
    if (index === undefined) {
      throw new Error(`Unknown unit: ${name}`);
    }
    return index;
  }

  has(name: string): boolean {
    return this.indexByName.has(name);
  }

  /** Names in start order. */
  orderedNames(): string[] {
    return this.order.map((index) => this.units[index].name);
  }

  /** All units that depend on `name`, directly or transitively. */
  transitiveDependents(name: string): string[] {
    const seen = new Set<number>();
    const stack = [...this.dependents[this.indexOf(name)]];
    while (stack.length > 0) {
      const next = stack.pop();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);
      stack.push(...this.dependents[next]);
    }
    return this.order
      .filter((index) => seen.has(index))
      .map((index) => this.units[index].name);
  }
}

/** Kahn's algorithm, always taking the lowest ready index. */
function topologicalOrder(
  units: readonly UnitDefinition[],
  dependencies: number[][],
  dependents: number[][],
): number[] {
  const inDegree = dependencies.map((deps) => deps.length);
  const ready: number[] = [];
  inDegree.forEach((degree, index) => {
    if (degree === 0) ready.push(index);
  });

  const order: number[] = [];
  while (ready.length > 0) {
    ready.sort((a, b) => a - b);
    const current = ready.shift();
    if (current === undefined) break;
    order.push(current);
    for (const dependent of dependents[current]) {
      inDegree[dependent] -= 1;
      if (inDegree[dependent] === 0) ready.push(dependent);
    }
  }

  if (order.length !== units.length) {
    const cycle = findCycle(units, dependencies, inDegree);
    throw new StackgateError(
      "CYCLE_DETECTED",
      `Dependency cycle detected: ${cycle.join(" -> ")}`,
      { cycle },
    );
  }
  return order;
}

/**
 * Every unit left with a positive in-degree waits on another such unit,
 * so following the first remaining dependency from the lowest index must
 * revisit a unit.
 */
function findCycle(
  units: readonly UnitDefinition[],
  dependencies: number[][],
  inDegree: number[],
): string[] {
  const remaining = (index: number): boolean => inDegree[index] > 0;
  let current = inDegree.findIndex((degree) => degree > 0);
  const path: number[] = [];
  const position = new Map<number, number>();

  while (!position.has(current)) {
    position.set(current, path.length);
    path.push(current);
    const next = dependencies[current].find(remaining);
    if (next === undefined) break;
    current = next;
  }

  const start = position.get(current) ?? 0;
  return [...path.slice(start), current].map((index) => units[index].name);
}
