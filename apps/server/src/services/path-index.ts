/**
 * PathIndex - per-version directory tree over the flat asset paths
 *
 * Leaves are 1:1 with live assets. Every directory (root included) carries
 * the file count and total size of the leaves below it; both are adjusted
 * in the same draft commit that changes the live asset set.
 */

import type { ArchiveStore } from "../db/store.ts";
import type { ListOptions, PaginatedResult, PathNode } from "../types.ts";
import { ancestorsOf, nameOf, parentOf } from "../util/path.ts";

// ============================================================================
// Types
// ============================================================================

/** A leaf as it enters or leaves the index */
export type LeafEntry = {
  path: string;
  assetId: string;
  size: number;
};

export type DirectoryDelta = {
  path: string;
  fileCount: number;
  totalSize: number;
};

export type PathPlan = {
  leafPuts: LeafEntry[];
  leafDeletes: string[];
  /** Root first, one entry per directory node */
  directoryDeltas: DirectoryDelta[];
};

/** Node writes ready for ArchiveStore.commitDraftChange */
export type PathWrites = {
  nodePuts: PathNode[];
  nodeDeletes: string[];
};

export type PathIndex = {
  /**
   * Immediate children of a directory prefix ("" or ending in "/").
   * Null when a non-root prefix names no directory.
   */
  childrenOf: (
    versionId: string,
    pathPrefix: string,
    options?: ListOptions
  ) => Promise<PaginatedResult<PathNode> | null>;

  /** Plan a leaf removal and/or addition and resolve it against stored nodes */
  prepareChange: (
    versionId: string,
    removed: LeafEntry | null,
    added: LeafEntry | null
  ) => Promise<PathWrites>;
};

// ============================================================================
// Planning
// ============================================================================

/**
 * Compute leaf writes and per-directory deltas for removing one leaf and
 * adding another. Deltas are merged per directory, so a replace at the same
 * path touches each ancestor once; zero deltas are dropped.
 */
export const planPathChange = (
  removed: LeafEntry | null = null,
  added: LeafEntry | null = null
): PathPlan => {
  const deltas = new Map<string, DirectoryDelta>();
  const bump = (leaf: LeafEntry, sign: 1 | -1) => {
    for (const dir of ancestorsOf(leaf.path)) {
      const delta = deltas.get(dir) ?? { path: dir, fileCount: 0, totalSize: 0 };
      delta.fileCount += sign;
      delta.totalSize += sign * leaf.size;
      deltas.set(dir, delta);
    }
  };

  if (removed) bump(removed, -1);
  if (added) bump(added, 1);

  return {
    leafPuts: added ? [added] : [],
    leafDeletes: removed && removed.path !== added?.path ? [removed.path] : [],
    directoryDeltas: [...deltas.values()].filter((d) => d.fileCount !== 0 || d.totalSize !== 0),
  };
};

const toLeafNode = (leaf: LeafEntry): PathNode => ({
  path: leaf.path,
  parentPath: parentOf(leaf.path),
  name: nameOf(leaf.path),
  isLeaf: true,
  fileCount: 1,
  totalSize: leaf.size,
  assetId: leaf.assetId,
});

/**
 * Apply a plan to the current directory nodes. Directories that end up
 * empty are deleted rather than written.
 */
export const resolvePathPlan = (
  plan: PathPlan,
  current: ReadonlyMap<string, PathNode>
): PathWrites => {
  const nodePuts: PathNode[] = [];
  const nodeDeletes: string[] = [];

  for (const delta of plan.directoryDeltas) {
    const node = current.get(delta.path);
    const fileCount = (node?.fileCount ?? 0) + delta.fileCount;
    const totalSize = (node?.totalSize ?? 0) + delta.totalSize;
    if (fileCount <= 0) {
      if (node) nodeDeletes.push(delta.path);
      continue;
    }
    nodePuts.push({
      path: delta.path,
      parentPath: parentOf(delta.path),
      name: nameOf(delta.path),
      isLeaf: false,
      fileCount,
      totalSize,
      assetId: null,
    });
  }

  nodePuts.push(...plan.leafPuts.map(toLeafNode));
  nodeDeletes.push(...plan.leafDeletes);
  return { nodePuts, nodeDeletes };
};

// ============================================================================
// Factory
// ============================================================================

type PathIndexDeps = {
  store: ArchiveStore;
};

export const createPathIndex = ({ store }: PathIndexDeps): PathIndex => {
  const childrenOf: PathIndex["childrenOf"] = async (versionId, pathPrefix, options) => {
    if (pathPrefix !== "") {
      if (!pathPrefix.endsWith("/")) return null;
      const dir = await store.getPathNode(versionId, pathPrefix);
      if (!dir) return null;
    }
    return store.listPathChildren(versionId, pathPrefix, options);
  };

  const prepareChange: PathIndex["prepareChange"] = async (versionId, removed, added) => {
    const plan = planPathChange(removed, added);
    const nodes = await Promise.all(
      plan.directoryDeltas.map((d) => store.getPathNode(versionId, d.path))
    );
    const current = new Map<string, PathNode>();
    for (const node of nodes) {
      if (node) current.set(node.path, node);
    }
    return resolvePathPlan(plan, current);
  };

  return { childrenOf, prepareChange };
};
