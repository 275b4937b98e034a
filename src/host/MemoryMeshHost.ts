/**
 * MemoryMeshHost - in-process MeshHost with an undo history
 *
 * Every mutation outside a suppression scope is recorded:
 * - outside a transaction, as its own history entry;
 * - inside a transaction, folded into the single entry written when the
 *   outermost transaction closes.
 *
 * Entries store a snapshot of the whole scene taken before the edit, so
 * undo() and abortTransaction() restore it exactly. Suppressed edits made
 * inside a transaction are replayed onto its snapshot when it closes, so
 * undoing the entry does not bring back what they removed.
 */

import type { EdgeRef, FaceRef, Vec3, VertexRef } from '../types';
import type { MeshHost } from './types';
import { MemoryMesh, createGridMesh } from './MemoryMesh';
import { debug } from '../utils/debug';

type SceneSnapshot = Map<string, MemoryMesh>;

/** Applies an edit to a scene other than the live one */
type SceneReplay = (scene: SceneSnapshot) => void;

export interface HistoryEntry {
  name: string;
  before: SceneSnapshot;
}

interface OpenTransaction {
  name: string;
  depth: number;
  before: SceneSnapshot;
  unrecorded: SceneReplay[];
}

export class MemoryMeshHost implements MeshHost {
  private meshes = new Map<string, MemoryMesh>();
  private _history: HistoryEntry[] = [];
  private suppressionDepth = 0;
  private transaction: OpenTransaction | null = null;
  private nextId = 1;

  // ==========================================================================
  // Scene Access
  // ==========================================================================

  /**
   * Add a mesh to the scene (recorded like any other edit)
   */
  addMesh(mesh: MemoryMesh, name?: string): string {
    const meshId = name ?? this.generateId('mesh');
    if (this.meshes.has(meshId)) {
      throw new Error(`Mesh ${meshId} already exists`);
    }
    const copy = mesh.clone();
    this.record(
      'add-mesh',
      () => {
        this.meshes.set(meshId, mesh);
      },
      scene => scene.set(meshId, copy)
    );
    return meshId;
  }

  getMesh(meshId: string): MemoryMesh {
    const mesh = this.meshes.get(meshId);
    if (!mesh) {
      throw new Error(`Unknown mesh: ${meshId}`);
    }
    return mesh;
  }

  hasMesh(meshId: string): boolean {
    return this.meshes.has(meshId);
  }

  meshIds(): string[] {
    return Array.from(this.meshes.keys());
  }

  findEdge(meshId: string, a: number, b: number): EdgeRef {
    const index = this.getMesh(meshId).findEdge(a, b);
    if (index < 0) {
      throw new Error(`Mesh ${meshId} has no edge ${a}-${b}`);
    }
    return { meshId, index };
  }

  boundaryEdges(meshId: string): EdgeRef[] {
    return this.getMesh(meshId).boundaryEdges().map(index => ({ meshId, index }));
  }

  // ==========================================================================
  // History
  // ==========================================================================

  get history(): readonly HistoryEntry[] {
    return this._history;
  }

  get isRecording(): boolean {
    return this.suppressionDepth === 0;
  }

  get inTransaction(): boolean {
    return this.transaction !== null;
  }

  /**
   * Revert the last history entry. Returns its name, or null when empty.
   */
  undo(): string | null {
    if (this.transaction) {
      throw new Error('Cannot undo while a transaction is open');
    }
    const entry = this._history.pop();
    if (!entry) return null;
    this.meshes = cloneScene(entry.before);
    debug('host', `undo ${entry.name}`);
    return entry.name;
  }

  beginHistorySuppression(): void {
    this.suppressionDepth++;
  }

  endHistorySuppression(): void {
    if (this.suppressionDepth === 0) {
      throw new Error('History suppression is not active');
    }
    this.suppressionDepth--;
  }

  openTransaction(name: string): void {
    if (this.transaction) {
      this.transaction.depth++;
      return;
    }
    this.transaction = { name, depth: 1, before: cloneScene(this.meshes), unrecorded: [] };
  }

  closeTransaction(): void {
    const transaction = this.transaction;
    if (!transaction) {
      throw new Error('No transaction is open');
    }
    transaction.depth--;
    if (transaction.depth > 0) return;
    this.transaction = null;
    for (const replay of transaction.unrecorded) {
      replay(transaction.before);
    }
    this._history.push({ name: transaction.name, before: transaction.before });
    debug('host', `transaction ${transaction.name} closed`);
  }

  abortTransaction(): void {
    const transaction = this.transaction;
    if (!transaction) {
      throw new Error('No transaction is open');
    }
    this.transaction = null;
    this.meshes = cloneScene(transaction.before);
    debug('host', `transaction ${transaction.name} aborted`);
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  boundaryEdgesToVertexPairs(edges: readonly EdgeRef[]): VertexRef[][] {
    return edges.map(edge => {
      const meshEdge = this.getMesh(edge.meshId).edges[edge.index];
      if (!meshEdge) return [];
      return meshEdge.vertices.map(index => ({ meshId: edge.meshId, index }));
    });
  }

  vertexWorldPosition(vertex: VertexRef): Vec3 {
    const position = this.getMesh(vertex.meshId).positions[vertex.index];
    if (!position) {
      throw new Error(`Mesh ${vertex.meshId} has no vertex ${vertex.index}`);
    }
    return [position[0], position[1], position[2]];
  }

  faceNormal(face: FaceRef): Vec3 {
    const mesh = this.getMesh(face.meshId);
    if (face.index < 0 || face.index >= mesh.faceCount) {
      throw new Error(`Mesh ${face.meshId} has no face ${face.index}`);
    }
    return mesh.faceNormal(face.index);
  }

  facesAdjacentToEdge(edge: EdgeRef): FaceRef[] {
    const meshEdge = this.getMesh(edge.meshId).edges[edge.index];
    return meshEdge ? meshEdge.faces.map(index => ({ meshId: edge.meshId, index })) : [];
  }

  vertexCount(meshId: string): number {
    return this.getMesh(meshId).vertexCount;
  }

  faceCount(meshId: string): number {
    return this.getMesh(meshId).faceCount;
  }

  // ==========================================================================
  // Edits
  // ==========================================================================

  setVertexWorldPosition(vertex: VertexRef, position: Vec3): void {
    const mesh = this.getMesh(vertex.meshId);
    if (vertex.index < 0 || vertex.index >= mesh.vertexCount) {
      throw new Error(`Mesh ${vertex.meshId} has no vertex ${vertex.index}`);
    }
    this.record(
      'move-vertex',
      () => mesh.setPosition(vertex.index, position),
      scene => scene.get(vertex.meshId)?.setPosition(vertex.index, position)
    );
  }

  createGrid(width: number, height: number, spansX: number, spansY: number): string {
    const grid = createGridMesh(width, height, spansX, spansY);
    const meshId = this.generateId('grid');
    const copy = grid.clone();
    this.record(
      'create-grid',
      () => {
        this.meshes.set(meshId, grid);
      },
      scene => scene.set(meshId, copy)
    );
    return meshId;
  }

  deleteMesh(meshId: string): void {
    this.getMesh(meshId);
    const remove: SceneReplay = scene => scene.delete(meshId);
    this.record('delete-mesh', () => remove(this.meshes), remove);
  }

  unionMeshes(a: string, b: string): string {
    if (a === b) {
      throw new Error(`Cannot unite mesh ${a} with itself`);
    }
    const combined = this.getMesh(a).append(this.getMesh(b));
    const meshId = this.generateId('combined');
    this.record(
      'union',
      () => {
        this.meshes.delete(a);
        this.meshes.delete(b);
        this.meshes.set(meshId, combined);
      },
      scene => {
        const first = scene.get(a);
        const second = scene.get(b);
        if (!first || !second) return;
        scene.delete(a);
        scene.delete(b);
        scene.set(meshId, first.append(second));
      }
    );
    return meshId;
  }

  mergeVerticesByDistance(meshId: string, vertices: readonly number[], tolerance: number): number {
    const mesh = this.getMesh(meshId);
    for (const v of vertices) {
      if (v < 0 || v >= mesh.vertexCount) {
        throw new Error(`Mesh ${meshId} has no vertex ${v}`);
      }
    }
    let removed = 0;
    this.record(
      'merge-vertices',
      () => {
        removed = mesh.mergeVertices(vertices, tolerance);
      },
      scene => scene.get(meshId)?.mergeVertices(vertices, tolerance)
    );
    return removed;
  }

  flipFaceOrientation(meshId: string): void {
    const mesh = this.getMesh(meshId);
    this.record(
      'flip-faces',
      () => mesh.flip(),
      scene => scene.get(meshId)?.flip()
    );
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private generateId(prefix: string): string {
    return `${prefix}-${this.nextId++}`;
  }

  /**
   * Run a mutation, writing a history entry when recording outside a
   * transaction. `replay` repeats it on an open transaction's snapshot when
   * history is suppressed.
   */
  private record(name: string, mutate: () => void, replay: SceneReplay): void {
    const transaction = this.transaction;
    if (this.suppressionDepth > 0 && transaction) {
      mutate();
      transaction.unrecorded.push(replay);
      return;
    }
    if (this.suppressionDepth > 0 || this.transaction) {
      mutate();
      return;
    }
    const before = cloneScene(this.meshes);
    mutate();
    this._history.push({ name, before });
  }
}

const cloneScene = (scene: SceneSnapshot): SceneSnapshot => {
  const copy: SceneSnapshot = new Map();
  scene.forEach((mesh, id) => copy.set(id, mesh.clone()));
  return copy;
};
