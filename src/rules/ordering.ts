import type { ListItem, ListItemKind } from "../source/types.js";
import type { RuleHit } from "./types.js";

const KIND_RANK: Readonly<Record<ListItemKind, number>> = {
  kind: 0,
  class: 1,
  effect: 2,
  type: 3,
  operator: 4,
  function: 5,
  module: 6,
};

/**
 * Case-insensitive alphabetical order, ties broken by code unit so the
 * order is total.
 */
export function compareNames(a: string, b: string): number {
  const lowerA = a.toLowerCase();
  const lowerB = b.toLowerCase();
  if (lowerA !== lowerB) {
    return lowerA < lowerB ? -1 : 1;
  }
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

export function compareItems(a: ListItem, b: ListItem): number {
  const rankDelta = KIND_RANK[a.kind] - KIND_RANK[b.kind];
  if (rankDelta !== 0) {
    return rankDelta;
  }
  return compareNames(a.name, b.name);
}

/**
 * The first adjacent pair that breaks the order, or `null` when sorted.
 */
export function firstOutOfOrder<T>(
  items: readonly T[],
  compare: (a: T, b: T) => number,
): readonly [T, T] | null {
  for (let index = 1; index < items.length; index += 1) {
    const previous = items[index - 1];
    const current = items[index];
    if (previous === undefined || current === undefined) {
      continue;
    }
    if (compare(previous, current) > 0) {
      return [previous, current];
    }
  }
  return null;
}

export function checkListOrder(
  items: readonly ListItem[],
  listName: string,
): RuleHit[] {
  const pair = firstOutOfOrder(items, compareItems);
  if (!pair) {
    return [];
  }
  const [previous, current] = pair;
  return [
    {
      line: current.line,
      column: current.column,
      message: `${listName}: ${previous.kind} "${previous.name}" should come after ${current.kind} "${current.name}"`,
    },
  ];
}

export function checkConstructorLists(
  items: readonly ListItem[],
  listName: string,
): RuleHit[] {
  const hits: RuleHit[] = [];
  for (const item of items) {
    const constructors = item.constructors;
    if (item.kind !== "type" || constructors === null || constructors === "all") {
      continue;
    }
    if (constructors.length === 0) {
      continue;
    }
    hits.push({
      line: item.line,
      column: item.column,
      message: `${listName}: type "${item.name}" lists only some constructors (${constructors.join(", ")}); use ${item.name}(..) or omit them`,
    });
  }
  return hits;
}
