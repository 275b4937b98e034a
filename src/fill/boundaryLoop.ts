/**
 * Mesh Adjacency Extractor
 *
 * Turns an unordered selection of boundary edges into one ordered vertex
 * ring, then orients it with the Orientation Resolver.
 */

import type { BoundaryLoop, EdgeRef } from '../types';
import type { MeshQueries } from '../host/types';
import { defaultHoleFillConfig, type HoleFillConfig } from '../config/holeFill';
import { fail, succeed, type HoleFillResult } from './errors';
import { detectHoleNormal, resolveOrientation, type OrderedBoundary } from './orientation';
import { debug } from '../utils/debug';

const dedupeEdges = (edges: readonly EdgeRef[]): EdgeRef[] => {
  const seen = new Set<string>();
  return edges.filter(edge => {
    const key = `${edge.meshId}#${edge.index}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
};

/**
 * Order the vertices of a closed boundary by walking its adjacency.
 *
 * The walk starts at the first vertex of the first edge and always steps to
 * the neighbor it did not come from. It fails rather than guessing when the
 * edges are not exactly one simple cycle.
 */
export function extractBoundaryLoop(
  host: Pick<MeshQueries, 'boundaryEdgesToVertexPairs' | 'vertexWorldPosition'>,
  edges: readonly EdgeRef[],
  config: Pick<HoleFillConfig, 'minimumEdges'> = defaultHoleFillConfig
): HoleFillResult<OrderedBoundary & { meshId: string }> {
  const unique = dedupeEdges(edges);
  if (unique.length < config.minimumEdges) {
    return fail(
      'insufficient-edges',
      `Need at least ${config.minimumEdges} boundary edges (got ${unique.length})`,
      { edgeCount: unique.length }
    );
  }

  const meshId = unique[0].meshId;
  if (unique.some(edge => edge.meshId !== meshId)) {
    return fail('malformed-boundary', 'Boundary edges belong to more than one mesh', {
      edgeCount: unique.length,
    });
  }

  const adjacency = new Map<number, number[]>();
  const link = (a: number, b: number): void => {
    const neighbors = adjacency.get(a);
    if (neighbors) {
      neighbors.push(b);
    } else {
      adjacency.set(a, [b]);
    }
  };

  const pairs = host.boundaryEdgesToVertexPairs(unique);
  for (let i = 0; i < pairs.length; i++) {
    const pair = pairs[i];
    if (pair.length !== 2 || pair[0].index === pair[1].index) {
      return fail('malformed-boundary', `Edge ${unique[i].index} does not have two distinct vertices`, {
        edgeCount: unique.length,
        edge: unique[i].index,
      });
    }
    link(pair[0].index, pair[1].index);
    link(pair[1].index, pair[0].index);
  }

  for (const [vertex, neighbors] of adjacency) {
    if (neighbors.length !== 2) {
      return fail(
        'malformed-boundary',
        `Vertex ${vertex} has ${neighbors.length} boundary neighbors; the edges must form a single loop`,
        { edgeCount: unique.length, vertexCount: adjacency.size, vertex }
      );
    }
  }

  const start = pairs[0][0].index;
  const ordered = [start];
  let prev = -1;
  let curr = start;
  while (true) {
    const neighbors = adjacency.get(curr) ?? [];
    const next = neighbors[0] !== prev ? neighbors[0] : neighbors[1];
    if (next === undefined || next === prev) {
      return fail('malformed-boundary', `Boundary walk stalled at vertex ${curr}`, {
        edgeCount: unique.length,
        vertexCount: adjacency.size,
      });
    }
    if (next === start) break;
    ordered.push(next);
    prev = curr;
    curr = next;
  }

  if (ordered.length !== adjacency.size) {
    return fail(
      'malformed-boundary',
      `Boundary closes after ${ordered.length} of ${adjacency.size} vertices; select a single loop`,
      { edgeCount: unique.length, vertexCount: adjacency.size }
    );
  }

  return succeed({
    meshId,
    vertices: ordered,
    positions: ordered.map(index => host.vertexWorldPosition({ meshId, index })),
  });
}

/**
 * Extract, orient and package a boundary loop from an edge selection
 */
export function captureBoundary(
  host: MeshQueries,
  edges: readonly EdgeRef[],
  config: HoleFillConfig = defaultHoleFillConfig
): HoleFillResult<BoundaryLoop> {
  const extracted = extractBoundaryLoop(host, edges, config);
  if (!extracted.ok) return extracted;

  const holeNormal = detectHoleNormal(host, dedupeEdges(edges), config);
  const resolved = resolveOrientation(extracted.value, holeNormal, config);
  const n = resolved.vertices.length;

  debug(
    'capture',
    `Captured ${n}-vertex loop on ${extracted.value.meshId}` +
      `${resolved.reversed ? ' (reversed)' : ''}, hole normal ${holeNormal.map(c => c.toFixed(3)).join(',')}`
  );

  return succeed({
    meshId: extracted.value.meshId,
    vertices: resolved.vertices,
    positions: resolved.positions,
    holeNormal,
    windingNormal: resolved.windingNormal,
    isOdd: n % 2 === 1,
  });
}
