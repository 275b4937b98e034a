/**
 * Core types shared by the hole filler, the mesh host and the session.
 *
 * All types are plain TypeScript data; vector math lives in utils/vector.ts.
 */

// =============================================================================
// Geometry
// =============================================================================

export type Vec3 = [number, number, number];

/** A vertex, edge or face addressed by mesh and index */
export interface ComponentRef {
  meshId: string;
  index: number;
}

export type VertexRef = ComponentRef;
export type EdgeRef = ComponentRef;
export type FaceRef = ComponentRef;

// =============================================================================
// Boundary Loop
// =============================================================================

/**
 * Ordered cycle of vertices around a hole, already oriented so the walk is
 * counter-clockwise about the hole normal.
 */
export interface BoundaryLoop {
  meshId: string;
  /** Vertex indices on the target mesh, in walk order */
  vertices: number[];
  /** World positions, parallel to `vertices` */
  positions: Vec3[];
  /** Averaged normal of the faces bordering the hole */
  holeNormal: Vec3;
  /** Newell normal of `positions` in walk order */
  windingNormal: Vec3;
  isOdd: boolean;
}

/**
 * Read-only positional access to an even-length boundary.
 * Implemented by EffectiveBoundary; the grid builder only needs this much.
 */
export interface BoundarySource {
  readonly count: number;
  position(slot: number): Vec3;
}

// =============================================================================
// Patch
// =============================================================================

export interface PatchParameters {
  /** Rotation of the loop start (pole position on odd loops) */
  offset: number;
  /** Spans along the first grid axis (Sx) */
  density: number;
}

export interface PatchGrid {
  spansX: number;
  spansY: number;
  /** Grid vertex positions, indexed `row * (spansX + 1) + col` */
  positions: Vec3[];
  /** Perimeter grid indices: bottom L→R, right B→T, top R→L, left T→B */
  boundaryWalk: number[];
}

export interface ParameterBounds {
  maxOffset: number;
  minDensity: number;
  maxDensity: number;
  defaultDensity: number;
}

export interface CommitSummary {
  /** Id of the combined mesh that replaced the target */
  meshId: string;
  originalVertexCount: number;
  patchVertexCount: number;
  /** Vertices removed by the seam weld */
  weldedVertexCount: number;
  vertexCount: number;
  /** True when an odd loop was filled with a 5-valence pole */
  pole: boolean;
}
