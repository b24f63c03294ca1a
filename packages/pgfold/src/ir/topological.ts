/**
 * Dependency ordering
 *
 * Kahn's algorithm over string keys. Nodes that become ready at the same
 * time come out in name order; when only cycles remain, the smallest name
 * is taken next and its unmet dependencies are dropped.
 */

const byName = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

function insertSorted(queue: string[], key: string): void {
  const at = queue.findIndex(k => byName(key, k) < 0);
  if (at === -1) queue.push(key);
  else queue.splice(at, 0, key);
}

/**
 * Order `nodes` so that every node follows the nodes it depends on.
 * Dependencies outside `nodes` and self references are ignored.
 */
export function topologicalSort(
  nodes: readonly string[],
  dependsOn: (node: string) => readonly string[],
): string[] {
  const members = new Set(nodes);
  const inDegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const node of members) {
    const deps = new Set(dependsOn(node).filter(d => d !== node && members.has(d)));
    inDegree.set(node, deps.size);
    for (const dep of deps) {
      const list = dependents.get(dep) ?? [];
      list.push(node);
      dependents.set(dep, list);
    }
  }

  const queue: string[] = [];
  for (const [node, degree] of inDegree) {
    if (degree === 0) insertSorted(queue, node);
  }

  const result: string[] = [];
  const done = new Set<string>();
  while (result.length < members.size) {
    let next = queue.shift();
    if (next === undefined) {
      // cycle: break it at the smallest remaining name
      next = [...members].filter(n => !done.has(n)).sort(byName)[0];
      if (next === undefined) break;
    }
    if (done.has(next)) continue;
    done.add(next);
    result.push(next);

    for (const dependent of dependents.get(next) ?? []) {
      if (done.has(dependent)) continue;
      const degree = (inDegree.get(dependent) ?? 0) - 1;
      inDegree.set(dependent, degree);
      if (degree === 0) insertSorted(queue, dependent);
    }
  }
  return result;
}
