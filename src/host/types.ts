/**
 * Mesh Host Interface
 *
 * The narrow set of mesh queries, edits and history controls the hole filler
 * needs from a 3D host. Any modeling application can be adapted to it;
 * MemoryMeshHost is the in-process implementation.
 *
 * Programmer errors (unknown mesh ids, unbalanced scopes) may throw.
 */

import type { EdgeRef, FaceRef, Vec3, VertexRef } from '../types';

export interface MeshQueries {
  /** Incident vertices of each edge, in input order. A well-formed edge has two. */
  boundaryEdgesToVertexPairs(edges: readonly EdgeRef[]): VertexRef[][];
  vertexWorldPosition(vertex: VertexRef): Vec3;
  faceNormal(face: FaceRef): Vec3;
  facesAdjacentToEdge(edge: EdgeRef): FaceRef[];
  vertexCount(meshId: string): number;
  faceCount(meshId: string): number;
}

export interface MeshEdits {
  setVertexWorldPosition(vertex: VertexRef, position: Vec3): void;
  /**
   * Create a planar grid of (spansX + 1) × (spansY + 1) vertices, indexed
   * `row * (spansX + 1) + col`, with quads wound counter-clockwise in (col, row).
   */
  createGrid(width: number, height: number, spansX: number, spansY: number): string;
  deleteMesh(meshId: string): void;
  /**
   * Combine two meshes into a new one and consume both inputs. Vertices of
   * `a` keep their indices; vertices of `b` follow them in order.
   */
  unionMeshes(a: string, b: string): string;
  /**
   * Weld vertices from `vertices` that lie within `tolerance` of each other.
   * Vertices outside the set are never touched.
   * @returns number of vertices removed
   */
  mergeVerticesByDistance(meshId: string, vertices: readonly number[], tolerance: number): number;
  flipFaceOrientation(meshId: string): void;
}

export interface HistoryControl {
  /** Stop recording edits. Calls nest; recording resumes at the outermost end. */
  beginHistorySuppression(): void;
  endHistorySuppression(): void;
  /** Group every recorded edit until closeTransaction into one named entry */
  openTransaction(name: string): void;
  closeTransaction(): void;
  /** Close the open transaction and revert every edit made inside it */
  abortTransaction(): void;
}

export type MeshHost = MeshQueries & MeshEdits & HistoryControl;
