/**
 * Odd-Boundary Adapter
 *
 * EffectiveBoundary presents a BoundaryLoop rotated by `offset` and, for odd
 * loops, extended by one slot that repeats the first rotated vertex. The
 * repeated slot gives the grid builder an even perimeter; welding it back
 * onto the same target vertex at commit leaves a single 5-valence pole.
 *
 * Rotation is index arithmetic over the loop's arrays; nothing is copied.
 */

import type { BoundaryLoop, BoundarySource, ParameterBounds, PatchParameters, Vec3 } from '../types';
import { fail, succeed, type HoleFillResult } from './errors';

export class EffectiveBoundary implements BoundarySource {
  readonly loop: BoundaryLoop;
  readonly offset: number;
  readonly count: number;

  constructor(loop: BoundaryLoop, offset: number) {
    const n = loop.vertices.length;
    if (!Number.isInteger(offset) || offset < 0 || offset >= n) {
      throw new Error(`Offset ${offset} is outside the loop [0, ${n - 1}]`);
    }
    this.loop = loop;
    this.offset = offset;
    this.count = loop.isOdd ? n + 1 : n;
  }

  /** True when the last slot duplicates slot 0 */
  get hasPole(): boolean {
    return this.loop.isOdd;
  }

  /**
   * Index into the loop arrays for an effective slot
   */
  loopIndex(slot: number): number {
    if (!Number.isInteger(slot) || slot < 0 || slot >= this.count) {
      throw new Error(`Slot ${slot} is outside the boundary [0, ${this.count - 1}]`);
    }
    const n = this.loop.vertices.length;
    return slot === n ? this.offset : (this.offset + slot) % n;
  }

  position(slot: number): Vec3 {
    return this.loop.positions[this.loopIndex(slot)];
  }

  /** Target mesh vertex index for an effective slot */
  vertex(slot: number): number {
    return this.loop.vertices[this.loopIndex(slot)];
  }
}

/**
 * Spans along the second axis for a given density, or null if the
 * combination does not fit the perimeter.
 */
export function deriveSpansY(count: number, density: number): number | null {
  if (!Number.isInteger(density) || density < 1) return null;
  const spansY = (count - 2 * density) / 2;
  return Number.isInteger(spansY) && spansY >= 1 ? spansY : null;
}

/**
 * Parameter ranges for a loop: offset walks the whole loop, density leaves
 * at least one span for the second axis.
 */
export function parameterBounds(loop: BoundaryLoop): ParameterBounds {
  const n = loop.vertices.length;
  const count = loop.isOdd ? n + 1 : n;
  const maxDensity = Math.max(1, count / 2 - 1);
  return {
    maxOffset: Math.max(0, n - 1),
    minDensity: 1,
    maxDensity,
    defaultDensity: Math.max(1, Math.floor(maxDensity / 2)),
  };
}

/**
 * Check parameters against a loop and return the boundary and second-axis spans
 */
export function validateParameters(
  loop: BoundaryLoop,
  params: PatchParameters
): HoleFillResult<{ boundary: EffectiveBoundary; spansY: number }> {
  const n = loop.vertices.length;
  if (!Number.isInteger(params.offset) || params.offset < 0 || params.offset >= n) {
    return fail('invalid-offset', `Offset must be an integer in [0, ${n - 1}] (got ${params.offset})`, {
      offset: params.offset,
      vertexCount: n,
    });
  }
  const count = loop.isOdd ? n + 1 : n;
  const spansY = deriveSpansY(count, params.density);
  if (spansY === null) {
    return fail(
      'invalid-span',
      `Density ${params.density} leaves no spans for a ${count}-slot boundary; reduce density`,
      { density: params.density, vertexCount: n, spansY: (count - 2 * params.density) / 2 }
    );
  }
  return succeed({ boundary: new EffectiveBoundary(loop, params.offset), spansY });
}
