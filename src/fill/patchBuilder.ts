/**
 * Patch Builder - instantiates a computed PatchGrid as host geometry
 */

import type { BoundarySource, PatchGrid, Vec3 } from '../types';
import type { MeshHost } from '../host/types';
import { defaultHoleFillConfig, type HoleFillConfig } from '../config/holeFill';
import { computePatchGrid } from './patchGrid';
import { describeCause, fail, succeed, type HoleFillResult } from './errors';
import { dot, meanVector, toVec3 } from '../utils/vector';
import { debug } from '../utils/debug';

export interface BuiltPatch {
  meshId: string;
  grid: PatchGrid;
  /** Whether the face winding was reversed to face the hole normal */
  flipped: boolean;
}

/**
 * Create the patch mesh for `boundary`, position every grid vertex, and turn
 * the faces toward `holeNormal`. A partially built mesh is deleted on failure.
 */
export function buildPatch(
  host: MeshHost,
  boundary: BoundarySource,
  spansX: number,
  holeNormal: Vec3,
  config: HoleFillConfig = defaultHoleFillConfig
): HoleFillResult<BuiltPatch> {
  const computed = computePatchGrid(boundary, spansX, config);
  if (!computed.ok) return computed;
  const grid = computed.value;

  let meshId: string;
  try {
    meshId = host.createGrid(config.gridSize.width, config.gridSize.height, grid.spansX, grid.spansY);
  } catch (err) {
    return fail('construction-failure', 'Could not create the patch grid', {
      density: grid.spansX,
      spansY: grid.spansY,
      cause: describeCause(err),
    });
  }

  try {
    const expected = grid.positions.length;
    const actual = host.vertexCount(meshId);
    if (actual !== expected) {
      throw new Error(`Grid has ${actual} vertices, expected ${expected}`);
    }

    grid.positions.forEach((position, index) => {
      host.setVertexWorldPosition({ meshId, index }, position);
    });

    const normals: Vec3[] = [];
    const faceCount = host.faceCount(meshId);
    for (let index = 0; index < faceCount; index++) {
      normals.push(host.faceNormal({ meshId, index }));
    }
    const average = meanVector(normals);
    let flipped = false;
    if (average.length() > config.normalEpsilon) {
      if (dot(toVec3(average.normalize()), holeNormal) < 0) {
        host.flipFaceOrientation(meshId);
        flipped = true;
      }
    }

    debug('preview', `Built patch ${meshId} (Sx=${grid.spansX}, Sy=${grid.spansY}${flipped ? ', flipped' : ''})`);
    return succeed({ meshId, grid, flipped });
  } catch (err) {
    host.deleteMesh(meshId);
    return fail('construction-failure', `Could not position patch ${meshId}`, {
      density: grid.spansX,
      spansY: grid.spansY,
      cause: describeCause(err),
    });
  }
}
