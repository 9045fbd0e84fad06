// src/util/toposort.ts
import { CycleError, UnknownTableError } from "../errors.js";

type Graph<T extends string> = Readonly<Record<T, readonly T[]>>;

/**
 * Expand a set of tables with their transitive dependencies.
 * Fixed point: repeat full passes until one adds nothing.
 */
export function dependencyClosure<T extends string>(
  tables: Iterable<T>,
  graph: Graph<T>,
  enumeration: readonly T[],
): Set<T> {
  const closure = new Set<T>(tables);
  let added = true;

  while (added) {
    added = false;
    for (const table of [...closure]) {
      for (const dep of graph[table] ?? []) {
        if (!enumeration.includes(dep)) {
          throw new UnknownTableError(dep, enumeration);
        }
        if (!closure.has(dep)) {
          closure.add(dep);
          added = true;
        }
      }
    }
  }

  return closure;
}

/**
 * Order tables so that parents come before children.
 *
 * Walks the enumeration repeatedly, placing every remaining table whose
 * dependencies are already placed or outside the set. Ties are broken by
 * enumeration order, so the result is deterministic.
 */
export function toposort<T extends string>(
  tables: ReadonlySet<T>,
  graph: Graph<T>,
  enumeration: readonly T[],
): T[] {
  const ordered: T[] = [];
  const placed = new Set<T>();
  const remaining = new Set<T>(tables);

  while (remaining.size > 0) {
    let progressed = false;

    for (const table of enumeration) {
      if (!remaining.has(table)) continue;

      const ready = (graph[table] ?? []).every(
        (dep) => placed.has(dep) || !tables.has(dep),
      );
      if (ready) {
        ordered.push(table);
        placed.add(table);
        remaining.delete(table);
        progressed = true;
      }
    }

    if (!progressed) {
      throw new CycleError(enumeration.filter((t) => remaining.has(t)));
    }
  }

  return ordered;
}
