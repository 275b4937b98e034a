/**
 * Orientation Resolver
 *
 * Decides which way a hole faces (from the faces around it) and which way
 * its boundary winds (from the boundary positions), then orders the
 * boundary counter-clockwise about the hole normal.
 */

import type { EdgeRef, Vec3 } from '../types';
import type { MeshQueries } from '../host/types';
import { defaultHoleFillConfig, type HoleFillConfig } from '../config/holeFill';
import { dot, meanVector, newellNormal, normalizeOrUp } from '../utils/vector';

type Tolerances = Pick<HoleFillConfig, 'normalEpsilon' | 'windingEpsilon'>;

/**
 * Average normal of the faces bordering the boundary edges. +Y when the
 * edges have no faces or the normals cancel out.
 */
export function detectHoleNormal(
  host: Pick<MeshQueries, 'facesAdjacentToEdge' | 'faceNormal'>,
  edges: readonly EdgeRef[],
  tolerances: Tolerances = defaultHoleFillConfig
): Vec3 {
  const normals: Vec3[] = [];
  for (const edge of edges) {
    for (const face of host.facesAdjacentToEdge(edge)) {
      normals.push(host.faceNormal(face));
    }
  }
  return normalizeOrUp(meanVector(normals), tolerances.normalEpsilon);
}

/**
 * Winding normal of the closed loop through `positions` (Newell's method)
 */
export function loopNormal(
  positions: readonly Vec3[],
  tolerances: Tolerances = defaultHoleFillConfig
): Vec3 {
  return normalizeOrUp(newellNormal(positions), tolerances.windingEpsilon);
}

export interface OrderedBoundary {
  vertices: number[];
  positions: Vec3[];
}

export interface ResolvedOrientation extends OrderedBoundary {
  windingNormal: Vec3;
  reversed: boolean;
}

/**
 * Reverse the boundary when it winds clockwise about `holeNormal`.
 * Exactly perpendicular normals (dot = 0) keep the input order.
 */
export function resolveOrientation(
  boundary: OrderedBoundary,
  holeNormal: Vec3,
  tolerances: Tolerances = defaultHoleFillConfig
): ResolvedOrientation {
  const winding = loopNormal(boundary.positions, tolerances);
  if (dot(winding, holeNormal) < 0) {
    const positions = [...boundary.positions].reverse();
    return {
      vertices: [...boundary.vertices].reverse(),
      positions,
      windingNormal: loopNormal(positions, tolerances),
      reversed: true,
    };
  }
  return {
    vertices: [...boundary.vertices],
    positions: [...boundary.positions],
    windingNormal: winding,
    reversed: false,
  };
}
