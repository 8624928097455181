import { BundleDepthExceededError } from './bundles.errors';

export type ComponentIdLookup = (bundleId: number) => Promise<number[]>;

/**
 * Looks for a path that the edge `bundleId -> componentId` would close into a
 * cycle, walking down from the component. Returns the cycle as a list of
 * product ids starting and ending with `bundleId`, or null when the edge is
 * safe. Walks at most `maxDepth` edges below the bundle.
 */
export async function findCyclePath(
  bundleId: number,
  componentId: number,
  listComponentIds: ComponentIdLookup,
  maxDepth: number,
): Promise<number[] | null> {
  if (bundleId === componentId) {
    return [bundleId, componentId];
  }
  const visited = new Set<number>();

  const walk = async (node: number, path: number[]): Promise<number[] | null> => {
    if (node === bundleId) {
      return path;
    }
    if (path.length - 1 > maxDepth) {
      throw new BundleDepthExceededError(bundleId, componentId, maxDepth);
    }
    if (visited.has(node)) {
      return null;
    }
    visited.add(node);
    for (const child of await listComponentIds(node)) {
      const found = await walk(child, [...path, child]);
      if (found) {
        return found;
      }
    }
    return null;
  };

  return walk(componentId, [bundleId, componentId]);
}
