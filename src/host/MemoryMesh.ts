/**
 * MemoryMesh - polygon mesh held as positions plus face corner lists
 *
 * Edges are derived from faces in first-appearance order, so an edge index
 * is stable for as long as the face list is unchanged.
 */

import type { Vec3 } from '../types';
import { newellNormal, normalizeOrUp } from '../utils/vector';

export interface MeshEdge {
  vertices: [number, number];
  faces: number[];
}

export const edgeKey = (a: number, b: number): string => (a <= b ? `${a}:${b}` : `${b}:${a}`);

export class MemoryMesh {
  readonly positions: Vec3[];
  readonly faces: number[][];
  private _edges: MeshEdge[] | null = null;
  private _edgeByKey: Map<string, number> | null = null;

  constructor(positions: Vec3[], faces: number[][]) {
    this.positions = positions;
    this.faces = faces;
  }

  get vertexCount(): number {
    return this.positions.length;
  }

  get faceCount(): number {
    return this.faces.length;
  }

  get edges(): readonly MeshEdge[] {
    return this.buildEdges().edges;
  }

  /**
   * Index of the edge joining two vertices, or -1
   */
  findEdge(a: number, b: number): number {
    return this.buildEdges().byKey.get(edgeKey(a, b)) ?? -1;
  }

  /**
   * Indices of edges used by exactly one face
   */
  boundaryEdges(): number[] {
    const result: number[] = [];
    this.edges.forEach((edge, index) => {
      if (edge.faces.length === 1) result.push(index);
    });
    return result;
  }

  faceNormal(face: number): Vec3 {
    const corners = this.faces[face].map(v => this.positions[v]);
    return normalizeOrUp(newellNormal(corners), 1e-12);
  }

  setPosition(vertex: number, position: Vec3): void {
    this.positions[vertex] = [position[0], position[1], position[2]];
  }

  /**
   * Reverse the winding of every face
   */
  flip(): void {
    for (const face of this.faces) {
      face.reverse();
    }
    this.invalidateEdges();
  }

  /**
   * New mesh with this mesh's vertices first, then `other`'s
   */
  append(other: MemoryMesh): MemoryMesh {
    const offset = this.vertexCount;
    return new MemoryMesh(
      [...this.clonePositions(), ...other.clonePositions()],
      [
        ...this.faces.map(face => [...face]),
        ...other.faces.map(face => face.map(v => v + offset)),
      ]
    );
  }

  /**
   * Weld the given vertices that lie within `tolerance` of each other.
   *
   * Each cluster collapses onto its lowest index, which keeps its position.
   * Remaining indices are compacted in order, repeated corners are dropped
   * from faces, and faces left with fewer than three corners are removed.
   * @returns number of vertices removed
   */
  mergeVertices(candidates: readonly number[], tolerance: number): number {
    const sorted = [...new Set(candidates)].sort((a, b) => a - b);
    const root = new Map<number, number>();
    const find = (v: number): number => {
      let r = v;
      let next = root.get(r);
      while (next !== undefined && next !== r) {
        r = next;
        next = root.get(r);
      }
      return r;
    };

    for (const v of sorted) root.set(v, v);
    for (let i = 0; i < sorted.length; i++) {
      for (let j = i + 1; j < sorted.length; j++) {
        const a = this.positions[sorted[i]];
        const b = this.positions[sorted[j]];
        const d = Math.hypot(a[0] - b[0], a[1] - b[1], a[2] - b[2]);
        if (d > tolerance) continue;
        const ra = find(sorted[i]);
        const rb = find(sorted[j]);
        if (ra !== rb) root.set(Math.max(ra, rb), Math.min(ra, rb));
      }
    }

    const survivor = (v: number): number => (root.has(v) ? find(v) : v);
    const remap = new Map<number, number>();
    const kept: Vec3[] = [];
    this.positions.forEach((position, v) => {
      if (survivor(v) !== v) return;
      remap.set(v, kept.length);
      kept.push(position);
    });
    const removed = this.positions.length - kept.length;
    if (removed === 0) return 0;

    const faces: number[][] = [];
    for (const face of this.faces) {
      const corners: number[] = [];
      for (const v of face) {
        const mapped = remap.get(survivor(v));
        if (mapped === undefined) {
          throw new Error(`Vertex ${v} lost its survivor during merge`);
        }
        if (corners[corners.length - 1] !== mapped) corners.push(mapped);
      }
      if (corners.length > 1 && corners[0] === corners[corners.length - 1]) {
        corners.pop();
      }
      if (new Set(corners).size >= 3) faces.push(corners);
    }

    this.positions.splice(0, this.positions.length, ...kept);
    this.faces.splice(0, this.faces.length, ...faces);
    this.invalidateEdges();
    return removed;
  }

  clone(): MemoryMesh {
    return new MemoryMesh(
      this.clonePositions(),
      this.faces.map(face => [...face])
    );
  }

  private clonePositions(): Vec3[] {
    return this.positions.map(p => [p[0], p[1], p[2]]);
  }

  private invalidateEdges(): void {
    this._edges = null;
    this._edgeByKey = null;
  }

  private buildEdges(): { edges: MeshEdge[]; byKey: Map<string, number> } {
    if (this._edges && this._edgeByKey) {
      return { edges: this._edges, byKey: this._edgeByKey };
    }
    const edges: MeshEdge[] = [];
    const byKey = new Map<string, number>();
    this.faces.forEach((face, f) => {
      for (let i = 0; i < face.length; i++) {
        const a = face[i];
        const b = face[(i + 1) % face.length];
        const key = edgeKey(a, b);
        let index = byKey.get(key);
        if (index === undefined) {
          index = edges.length;
          byKey.set(key, index);
          edges.push({ vertices: [a, b], faces: [] });
        }
        edges[index].faces.push(f);
      }
    });
    this._edges = edges;
    this._edgeByKey = byKey;
    return { edges, byKey };
  }
}

/**
 * Planar grid in the XZ plane facing +Y, vertex index `row * (spansX + 1) + col`.
 * Row 0 lies at +height/2 on Z; columns run along +X.
 */
export function createGridMesh(width: number, height: number, spansX: number, spansY: number): MemoryMesh {
  if (!Number.isInteger(spansX) || !Number.isInteger(spansY) || spansX < 1 || spansY < 1) {
    throw new Error(`Grid spans must be positive integers (got ${spansX}×${spansY})`);
  }
  const positions: Vec3[] = [];
  for (let row = 0; row <= spansY; row++) {
    for (let col = 0; col <= spansX; col++) {
      positions.push([
        -width / 2 + (width * col) / spansX,
        0,
        height / 2 - (height * row) / spansY,
      ]);
    }
  }
  const faces: number[][] = [];
  const stride = spansX + 1;
  for (let row = 0; row < spansY; row++) {
    for (let col = 0; col < spansX; col++) {
      const i = row * stride + col;
      faces.push([i, i + 1, i + stride + 1, i + stride]);
    }
  }
  return new MemoryMesh(positions, faces);
}
