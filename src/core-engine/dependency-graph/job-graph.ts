// ============================================================
// JobGraph — Bi-directional dependency relation between jobs.
//
// WHY: The scheduler needs both directions: a job's
// dependencies (in-degree, readiness) and its dependents (who
// to unblock on success, who to block on failure). Traversals
// are iterative so deep pipelines cannot overflow the stack.
// ============================================================

import {ConfigError, CycleError} from "../../errors";

export interface JobNode {
  name: string;
  requires: readonly string[];
}

export class JobGraph {
  // Map of job -> jobs that require it
  private dependents = new Map<string, Set<string>>();
  // Map of job -> jobs it requires
  private dependencies = new Map<string, Set<string>>();
  // Insertion order, used to keep every traversal deterministic
  private readonly order: string[] = [];

  /**
   * @throws ConfigError for duplicate job names or unknown `requires` entries.
   */
  static fromJobs(jobs: readonly JobNode[]): JobGraph {
    const graph = new JobGraph();
    const issues: string[] = [];

    for (const job of jobs) {
      if (graph.has(job.name)) {
        issues.push(`duplicate job name "${job.name}"`);
        continue;
      }
      graph.addJob(job.name);
    }
    for (const job of jobs) {
      for (const dependency of job.requires) {
        if (!graph.has(dependency)) {
          issues.push(`job "${job.name}" requires unknown job "${dependency}"`);
          continue;
        }
        graph.addDependency(dependency, job.name);
      }
    }

    if (issues.length > 0) {
      throw new ConfigError("Invalid job graph", issues);
    }
    return graph;
  }

  addJob(name: string): void {
    if (this.has(name)) return;
    this.order.push(name);
    this.dependents.set(name, new Set());
    this.dependencies.set(name, new Set());
  }

  /**
   * Add a dependency: `dependent` requires `dependency`.
   */
  addDependency(dependency: string, dependent: string): void {
    this.addJob(dependency);
    this.addJob(dependent);
    this.dependents.get(dependency)?.add(dependent);
    this.dependencies.get(dependent)?.add(dependency);
  }

  has(name: string): boolean {
    return this.dependencies.has(name);
  }

  get jobNames(): readonly string[] {
    return this.order;
  }

  get nodeCount(): number {
    return this.order.length;
  }

  getDependencies(name: string): string[] {
    return this.sorted(this.dependencies.get(name));
  }

  getDependents(name: string): string[] {
    return this.sorted(this.dependents.get(name));
  }

  /**
   * Every job that directly or transitively requires the given job.
   */
  getTransitiveDependents(name: string): string[] {
    return this.walk([name], (job) => this.dependents.get(job));
  }

  /**
   * The named jobs plus every job they transitively require.
   * @throws ConfigError for an unknown job name.
   */
  dependencyClosure(names: readonly string[]): string[] {
    const unknown = names.filter((n) => !this.has(n));
    if (unknown.length > 0) {
      throw new ConfigError("Unknown job selected", unknown.map((n) => `"${n}"`));
    }
    const closure = new Set([...names, ...this.walk(names, (job) => this.dependencies.get(job))]);
    return this.order.filter((n) => closure.has(n));
  }

  /**
   * Kahn's algorithm; jobs of equal rank keep insertion order.
   * @throws CycleError naming the jobs of one cycle.
   */
  topologicalOrder(): string[] {
    const inDegree = new Map<string, number>();
    for (const name of this.order) {
      inDegree.set(name, this.dependencies.get(name)?.size ?? 0);
    }
    const ready = this.order.filter((n) => inDegree.get(n) === 0);
    const result: string[] = [];

    for (let i = 0; i < ready.length; i++) {
      const current = ready[i];
      result.push(current);
      for (const dependent of this.getDependents(current)) {
        const remaining = (inDegree.get(dependent) ?? 0) - 1;
        inDegree.set(dependent, remaining);
        if (remaining === 0) ready.push(dependent);
      }
    }

    if (result.length < this.order.length) {
      const placed = new Set(result);
      throw new CycleError(this.findCycle(this.order.filter((n) => !placed.has(n))));
    }
    return result;
  }

  /** @throws CycleError if the graph is not a DAG. */
  assertAcyclic(): void {
    this.topologicalOrder();
  }

  // ─── Private Helpers ──────────────────────────────────────

  private walk(start: readonly string[], next: (job: string) => Set<string> | undefined): string[] {
    const queue = [...start];
    const visited = new Set<string>(start);
    const found = new Set<string>();

    for (let i = 0; i < queue.length; i++) {
      for (const neighbour of this.sorted(next(queue[i]))) {
        if (visited.has(neighbour)) continue;
        visited.add(neighbour);
        found.add(neighbour);
        queue.push(neighbour);
      }
    }
    return this.order.filter((n) => found.has(n));
  }

  /**
   * Follow dependency edges among the unplaced jobs until a job repeats.
   * Every unplaced job lies on or downstream of a cycle, and each has an
   * unplaced dependency, so the walk always closes a loop.
   */
  private findCycle(unplaced: string[]): string[] {
    const remaining = new Set(unplaced);
    const path: string[] = [];
    const position = new Map<string, number>();
    let current: string | undefined = unplaced[0];

    while (current !== undefined && !position.has(current)) {
      position.set(current, path.length);
      path.push(current);
      current = this.getDependencies(current).find((d) => remaining.has(d));
    }

    if (current === undefined) {
      return unplaced;
    }
    const start = position.get(current) ?? 0;
    const cycle = path.slice(start).reverse();
    return [...cycle, cycle[0]];
  }

  private sorted(set: Set<string> | undefined): string[] {
    if (!set) return [];
    return this.order.filter((n) => set.has(n));
  }
}
