/**
 * The task graph: a slot array of nodes plus its derived indices.
 *
 * Nodes are addressed by handle (their slot). Removal leaves a `null`
 * tombstone so that handles stay stable until `clean()` compacts the graph,
 * which is the only operation that renumbers.
 *
 * Every mutation accepts a NodeId: numbers are validated as handles and
 * strings go through the resolver (date, relative date, handle, alias).
 */

import type {
  GraphNode,
  GraphSnapshot,
  Handle,
  NodeContent,
  NodeId,
  TaskState,
  TraversalEntry,
  TraverseOptions,
} from '../../types/graph.js';
import { cloneNode, isDate, isTask } from '../../types/graph.js';
import { invariant } from '../errors.js';
import { getLogger } from '../logger.js';
import { parseDateKey } from '../dates.js';
import { GraphError } from './errors.js';
import { propagateDown, propagateUp, type NodeArena } from './propagation.js';
import { checkHandle, resolveToken } from './resolver.js';
import { compactSnapshot } from './compact.js';
import { traverse } from './traverse.js';

export interface GraphOptions {
  /** Clock for relative dates. Defaults to the current time. */
  now?: () => Date;
}

function emptySnapshot(): GraphSnapshot {
  return { nodes: [], roots: [], archived: [], dates: new Map(), aliases: new Map() };
}

function without(list: Handle[], handle: Handle): Handle[] {
  return list.filter((h) => h !== handle);
}

export class Graph {
  private state: GraphSnapshot;
  private readonly now: () => Date;
  private readonly arena: NodeArena = { get: (handle) => this.slot(handle) };

  constructor(snapshot?: GraphSnapshot, options: GraphOptions = {}) {
    this.state = snapshot ?? emptySnapshot();
    this.now = options.now ?? (() => new Date());
  }

  // ---------------------------------------------------------------------------
  // Read access
  // ---------------------------------------------------------------------------

  /** Raw slots, tombstones included. Do not mutate. */
  get slots(): readonly (GraphNode | null)[] {
    return this.state.nodes;
  }

  get roots(): readonly Handle[] {
    return this.state.roots;
  }

  get archived(): readonly Handle[] {
    return this.state.archived;
  }

  get dates(): ReadonlyMap<string, Handle> {
    return this.state.dates;
  }

  get aliases(): ReadonlyMap<string, Handle> {
    return this.state.aliases;
  }

  /** Number of slots, tombstones included. */
  get slotCount(): number {
    return this.state.nodes.length;
  }

  /** Number of live nodes. */
  get nodeCount(): number {
    return this.state.nodes.reduce((count, node) => (node ? count + 1 : count), 0);
  }

  get tombstoneCount(): number {
    return this.slotCount - this.nodeCount;
  }

  isLive(handle: Handle): boolean {
    return Number.isInteger(handle) && handle >= 0 && this.state.nodes[handle] != null;
  }

  /** A copy of the live node at `handle`. */
  node(handle: Handle): GraphNode {
    return cloneNode(this.slot(checkHandle(this, handle)));
  }

  /** A copy of the node, or null for a tombstone or out-of-range handle. */
  tryNode(handle: Handle): GraphNode | null {
    return this.isLive(handle) ? cloneNode(this.slot(handle)) : null;
  }

  children(id: NodeId): Handle[] {
    return [...this.slot(this.resolve(id)).metadata.children];
  }

  parents(id: NodeId): Handle[] {
    return [...this.slot(this.resolve(id)).metadata.parents];
  }

  /** Deep copy of the graph's storage. */
  snapshot(): GraphSnapshot {
    return {
      nodes: this.state.nodes.map((node) => (node ? cloneNode(node) : null)),
      roots: [...this.state.roots],
      archived: [...this.state.archived],
      dates: new Map(this.state.dates),
      aliases: new Map(this.state.aliases),
    };
  }

  /** Resolve a handle or token to a live handle. */
  resolve(id: NodeId): Handle {
    if (typeof id === 'number') {
      return checkHandle(this, id);
    }
    return resolveToken(this, id, this.now());
  }

  traverse(starts: readonly NodeId[], options: TraverseOptions = {}): TraversalEntry[] {
    return traverse(this, starts, options);
  }

  // ---------------------------------------------------------------------------
  // Insertion
  // ---------------------------------------------------------------------------

  /** Append a parentless node and list it as a root. */
  insertRoot(title: string, pseudo = false): Handle {
    const handle = this.append(title, pseudo ? { kind: 'pseudo' } : { kind: 'task', state: 'none' });
    this.state.roots.push(handle);
    getLogger('graph').debug({ handle, pseudo }, 'inserted root');
    return handle;
  }

  /**
   * Append a date node and register it under its canonical key.
   * A date that is already registered returns its existing handle.
   */
  insertDate(date: string, title?: string): Handle {
    const key = parseDateKey(date.trim());
    if (key === null) {
      throw GraphError.malformedDate(date);
    }

    const existing = this.state.dates.get(key);
    if (existing !== undefined && this.isLive(existing)) {
      return existing;
    }

    const handle = this.append(title ?? key, { kind: 'date', date: key });
    this.state.dates.set(key, handle);
    getLogger('graph').debug({ handle, date: key }, 'inserted date');
    return handle;
  }

  /** Append a node as the last child of `parentId`. */
  insertChild(title: string, parentId: NodeId, pseudo = false): Handle {
    const parent = this.resolve(parentId);
    const handle = this.append(title, pseudo ? { kind: 'pseudo' } : { kind: 'task', state: 'none' });
    this.attach(parent, handle);
    if (!pseudo) {
      propagateUp(this.arena, [parent]);
    }
    getLogger('graph').debug({ handle, parent, pseudo }, 'inserted child');
    return handle;
  }

  // ---------------------------------------------------------------------------
  // Edges
  // ---------------------------------------------------------------------------

  /** Add the edge parent -> child. Linking an existing edge does nothing. */
  link(parentId: NodeId, childId: NodeId): void {
    const parent = this.resolve(parentId);
    const child = this.resolve(childId);
    if (this.slot(parent).metadata.children.includes(child)) return;

    this.attach(parent, child);
    propagateUp(this.arena, [...this.slot(child).metadata.parents]);
    getLogger('graph').debug({ parent, child }, 'linked');
  }

  /** Remove the edge parent -> child. Unlinking a missing edge does nothing. */
  unlink(parentId: NodeId, childId: NodeId): void {
    const parent = this.resolve(parentId);
    const child = this.resolve(childId);
    if (!this.slot(parent).metadata.children.includes(child)) return;

    const formerParents = [...this.slot(child).metadata.parents];
    this.detach(parent, child);
    propagateUp(this.arena, formerParents);
    getLogger('graph').debug({ parent, child }, 'unlinked');
  }

  /** Detach a node from every parent, leaving it as a root. */
  cleanParents(targetId: NodeId): void {
    const target = this.resolve(targetId);
    const formerParents = [...this.slot(target).metadata.parents];
    for (const parent of formerParents) {
      this.detach(parent, target);
    }
    propagateUp(this.arena, formerParents);
  }

  /**
   * Move a child within its parent's ordered child list by `delta` positions,
   * clamped to the list bounds. Returns the new position.
   */
  reorderChild(childId: NodeId, parentId: NodeId, delta: number): number {
    const child = this.resolve(childId);
    const parent = this.resolve(parentId);
    const siblings = this.slot(parent).metadata.children;
    const from = siblings.indexOf(child);
    if (from < 0) {
      throw new GraphError('InvalidHandle', child, `Node ${child} is not a child of ${parent}`);
    }

    const to = Math.min(Math.max(from + delta, 0), siblings.length - 1);
    siblings.splice(from, 1);
    siblings.splice(to, 0, child);
    return to;
  }

  // ---------------------------------------------------------------------------
  // Removal
  // ---------------------------------------------------------------------------

  /**
   * Tombstone a single node. Children left without parents become roots.
   */
  remove(targetId: NodeId): void {
    const target = this.resolve(targetId);
    const node = this.slot(target);
    const formerParents = [...node.metadata.parents];
    const children = [...node.metadata.children];

    for (const parent of formerParents) {
      this.detach(parent, target);
    }
    for (const child of children) {
      this.detach(target, child);
    }

    this.unregister(target);
    this.state.nodes[target] = null;
    propagateUp(this.arena, formerParents.filter((h) => this.isLive(h)));
    getLogger('graph').debug({ handle: target }, 'removed');
  }

  /**
   * Tombstone a node and everything reachable below it, depth first.
   * Parents outside the removed set are recomputed afterwards.
   */
  removeRecursive(targetId: NodeId): void {
    const target = this.resolve(targetId);
    const affected = new Set<Handle>();
    this.removeSubtree(target, affected);
    propagateUp(this.arena, [...affected].filter((h) => this.isLive(h)));
    getLogger('graph').debug({ handle: target }, 'removed recursively');
  }

  private removeSubtree(handle: Handle, affected: Set<Handle>): void {
    const node = this.slot(handle);
    for (const parent of [...node.metadata.parents]) {
      this.slot(parent).metadata.children = without(this.slot(parent).metadata.children, handle);
      affected.add(parent);
    }
    node.metadata.parents = [];

    for (const child of [...node.metadata.children]) {
      if (!this.isLive(child)) continue;
      this.slot(child).metadata.parents = without(this.slot(child).metadata.parents, handle);
      this.removeSubtree(child, affected);
    }
    node.metadata.children = [];

    this.unregister(handle);
    this.state.nodes[handle] = null;
  }

  // ---------------------------------------------------------------------------
  // Field mutation
  // ---------------------------------------------------------------------------

  rename(targetId: NodeId, title: string): void {
    this.slot(this.resolve(targetId)).title = title;
  }

  setArchived(targetId: NodeId, archived: boolean): void {
    const target = this.resolve(targetId);
    const node = this.slot(target);
    if (node.metadata.archived === archived) return;

    node.metadata.archived = archived;
    this.state.archived = archived
      ? [...this.state.archived, target]
      : without(this.state.archived, target);
  }

  /**
   * Point `alias` at the target. A previous owner of the same alias is not
   * cleared; `clean()` reconciles the node-local field with the table.
   */
  setAlias(targetId: NodeId, alias: string): void {
    const target = this.resolve(targetId);
    const name = alias.trim();
    if (name === '') {
      throw GraphError.invalidAlias(alias);
    }

    const node = this.slot(target);
    const previous = node.metadata.alias;
    if (previous !== null && this.state.aliases.get(previous) === target) {
      this.state.aliases.delete(previous);
    }
    this.state.aliases.set(name, target);
    node.metadata.alias = name;
  }

  unsetAlias(targetId: NodeId): void {
    const target = this.resolve(targetId);
    const node = this.slot(target);
    const alias = node.metadata.alias;
    if (alias === null) {
      throw new GraphError('InvalidAlias', target, `Node ${target} has no alias`);
    }
    if (this.state.aliases.get(alias) === target) {
      this.state.aliases.delete(alias);
    }
    node.metadata.alias = null;
  }

  /**
   * Set a task's completion state. With `propagate`, the state is pushed to
   * every task descendant and the ancestors are recomputed.
   */
  setState(targetId: NodeId, state: TaskState, propagate = true): void {
    const target = this.resolve(targetId);
    const node = this.slot(target);
    if (!isTask(node.content)) {
      throw GraphError.notTaskNode(target);
    }
    node.content = { kind: 'task', state };
    if (!propagate) return;

    propagateDown(this.arena, [...node.metadata.children], state, new Set([target]));
    propagateUp(this.arena, [...node.metadata.parents]);
  }

  // ---------------------------------------------------------------------------
  // Compaction
  // ---------------------------------------------------------------------------

  /** Resynchronize indices from node-local fields and renumber densely. */
  clean(): void {
    const before = this.slotCount;
    this.state = compactSnapshot(this.state);
    getLogger('graph').debug({ before, after: this.slotCount }, 'compacted');
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  /** The live node at a handle already known to be valid. */
  private slot(handle: Handle): GraphNode {
    const node = this.state.nodes[handle];
    invariant(node != null, `handle ${handle} is not live`);
    return node;
  }

  private append(title: string, content: NodeContent): Handle {
    const index = this.state.nodes.length;
    this.state.nodes.push({
      title,
      content,
      metadata: { archived: false, index, alias: null, parents: [], children: [] },
    });
    return index;
  }

  private attach(parent: Handle, child: Handle): void {
    this.slot(parent).metadata.children.push(child);
    this.slot(child).metadata.parents.push(parent);
    this.state.roots = without(this.state.roots, child);
  }

  private detach(parent: Handle, child: Handle): void {
    const parentNode = this.slot(parent);
    const childNode = this.slot(child);
    parentNode.metadata.children = without(parentNode.metadata.children, child);
    childNode.metadata.parents = without(childNode.metadata.parents, parent);
    if (childNode.metadata.parents.length === 0 && !isDate(childNode.content)
      && !this.state.roots.includes(child)) {
      this.state.roots.push(child);
    }
  }

  /** Drop a node from roots, archived, aliases and dates. */
  private unregister(handle: Handle): void {
    const node = this.slot(handle);
    this.state.roots = without(this.state.roots, handle);
    this.state.archived = without(this.state.archived, handle);
    if (node.metadata.alias !== null && this.state.aliases.get(node.metadata.alias) === handle) {
      this.state.aliases.delete(node.metadata.alias);
    }
    if (isDate(node.content) && this.state.dates.get(node.content.date) === handle) {
      this.state.dates.delete(node.content.date);
    }
  }
}
