/**
 * Patch Grid - Coons patch over an even boundary
 *
 * Pure computation: lays the boundary around the perimeter of an
 * (Sx+1)×(Sy+1) grid and fills the interior by bilinear transfinite
 * interpolation of the four boundary curves.
 *
 *   row Sy   c01 ←── top ──── c11
 *             │                ↑
 *           left             right
 *             ↓                │
 *   row 0    c00 ── bottom ──→ c10
 *           col 0            col Sx
 */

import { Vector3 } from 'three';
import type { BoundarySource, PatchGrid, Vec3 } from '../types';
import { defaultHoleFillConfig, type HoleFillConfig } from '../config/holeFill';
import { deriveSpansY } from './effectiveBoundary';
import { fail, succeed, type HoleFillResult } from './errors';
import { nearlyEqual, toVec3, toVector3 } from '../utils/vector';

/**
 * Perimeter grid indices: bottom row left→right, right column bottom→top,
 * top row right→left, left column top→bottom. Corners appear once.
 */
export function boundaryWalk(spansX: number, spansY: number): number[] {
  const stride = spansX + 1;
  const walk: number[] = [];
  for (let col = 0; col <= spansX; col++) walk.push(col);
  for (let row = 1; row < spansY; row++) walk.push(row * stride + spansX);
  for (let col = spansX; col >= 0; col--) walk.push(spansY * stride + col);
  for (let row = spansY - 1; row > 0; row--) walk.push(row * stride);
  return walk;
}

/**
 * Resample a polyline to exactly `count` points, uniformly in parameter.
 * Each output point blends the two input samples around it.
 */
export function resampleCurve(curve: readonly Vec3[], count: number): Vec3[] {
  if (curve.length === count || curve.length === 1) {
    return Array.from({ length: count }, (_, i) => [...curve[Math.min(i, curve.length - 1)]]);
  }
  const out: Vec3[] = [];
  for (let i = 0; i < count; i++) {
    const t = i / Math.max(count - 1, 1);
    const s = t * (curve.length - 1);
    const j = Math.min(Math.floor(s), curve.length - 2);
    const f = s - j;
    out.push(toVec3(toVector3(curve[j]).lerp(toVector3(curve[j + 1]), f)));
  }
  return out;
}

/** Sample `curve[i]`, clamped to the last sample */
const at = (curve: readonly Vec3[], i: number): Vector3 =>
  toVector3(curve[Math.min(i, curve.length - 1)]);

/**
 * Build the patch grid for `boundary` with `spansX` spans along the first axis.
 * Fails with invalid-span when the boundary cannot hold that many.
 */
export function computePatchGrid(
  boundary: BoundarySource,
  spansX: number,
  config: Pick<HoleFillConfig, 'closedCurveTolerance'> = defaultHoleFillConfig
): HoleFillResult<PatchGrid> {
  const count = boundary.count;
  const spansY = deriveSpansY(count, spansX);
  if (spansY === null) {
    return fail('invalid-span', `Density ${spansX} leaves no spans for a ${count}-slot boundary`, {
      density: spansX,
      vertexCount: count,
    });
  }

  const sx = spansX;
  const sy = spansY;
  const stride = sx + 1;
  const walk = boundaryWalk(sx, sy);
  const positions: Vec3[] = new Array<Vec3>(stride * (sy + 1));

  for (let k = 0; k < count; k++) {
    positions[walk[k]] = [...boundary.position(k)];
  }

  const c00 = toVector3(boundary.position(0));
  const c10 = toVector3(boundary.position(sx));
  const c11 = toVector3(boundary.position(sx + sy));
  const c01 = toVector3(boundary.position(2 * sx + sy));

  const slots = (from: number, to: number): Vec3[] => {
    const points: Vec3[] = [];
    for (let k = from; k <= to; k++) points.push(boundary.position(k));
    return points;
  };

  const bottom = slots(0, sx);
  const right = slots(sx, sx + sy);
  const top = slots(sx + sy, 2 * sx + sy).reverse();

  // Left runs from the top-left corner back to the start; an odd boundary's
  // duplicated slot already closes it, otherwise the start point is appended.
  const rawLeft = slots(2 * sx + sy, count - 1);
  const closed = nearlyEqual(boundary.position(count - 1), boundary.position(0), config.closedCurveTolerance);
  if (!closed) rawLeft.push(boundary.position(0));
  const left = resampleCurve(rawLeft.reverse(), sy + 1);

  const onBoundary = new Set(walk);
  for (let idx = 0; idx < positions.length; idx++) {
    if (onBoundary.has(idx)) continue;
    const col = idx % stride;
    const row = Math.floor(idx / stride);
    const u = col / sx;
    const v = row / sy;

    const corners = new Vector3()
      .addScaledVector(c00, (1 - u) * (1 - v))
      .addScaledVector(c10, u * (1 - v))
      .addScaledVector(c01, (1 - u) * v)
      .addScaledVector(c11, u * v);

    const p = new Vector3()
      .addScaledVector(at(left, row), 1 - u)
      .addScaledVector(at(right, row), u)
      .addScaledVector(at(bottom, col), 1 - v)
      .addScaledVector(at(top, col), v)
      .sub(corners);

    positions[idx] = toVec3(p);
  }

  return succeed({ spansX: sx, spansY: sy, positions, boundaryWalk: walk });
}
