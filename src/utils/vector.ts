/**
 * Vector helpers over three.js Vector3.
 *
 * Public data uses plain Vec3 tuples; these convert at the edges and keep
 * the arithmetic in Vector3.
 */

import { Vector3 } from 'three';
import type { Vec3 } from '../types';

export const UP: Vec3 = [0, 1, 0];

export const toVector3 = (p: Vec3): Vector3 => new Vector3(p[0], p[1], p[2]);

export const toVec3 = (v: Vector3): Vec3 => [v.x, v.y, v.z];

export const dot = (a: Vec3, b: Vec3): number => a[0] * b[0] + a[1] * b[1] + a[2] * b[2];

/**
 * True when every component differs by less than `tolerance`
 */
export const nearlyEqual = (a: Vec3, b: Vec3, tolerance: number): boolean =>
  Math.abs(a[0] - b[0]) < tolerance &&
  Math.abs(a[1] - b[1]) < tolerance &&
  Math.abs(a[2] - b[2]) < tolerance;

/**
 * Normalize `v`, or return +Y when its length is at or below `epsilon`
 */
export const normalizeOrUp = (v: Vector3, epsilon: number): Vec3 => {
  const length = v.length();
  if (length <= epsilon) return [...UP];
  return toVec3(v.divideScalar(length));
};

/**
 * Newell's method: unnormalized normal of a closed polygon.
 */
export function newellNormal(points: readonly Vec3[]): Vector3 {
  const n = new Vector3();
  for (let i = 0; i < points.length; i++) {
    const c = points[i];
    const d = points[(i + 1) % points.length];
    n.x += (c[1] - d[1]) * (c[2] + d[2]);
    n.y += (c[2] - d[2]) * (c[0] + d[0]);
    n.z += (c[0] - d[0]) * (c[1] + d[1]);
  }
  return n;
}

/**
 * Component-wise mean of a set of vectors (zero vector when empty)
 */
export function meanVector(vectors: readonly Vec3[]): Vector3 {
  const sum = new Vector3();
  for (const v of vectors) {
    sum.add(toVector3(v));
  }
  return vectors.length > 0 ? sum.divideScalar(vectors.length) : sum;
}
