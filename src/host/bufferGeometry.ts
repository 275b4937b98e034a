/**
 * three.js conversion for rendering preview and committed meshes.
 */

import { BufferGeometry, Float32BufferAttribute } from 'three';
import type { MemoryMesh } from './MemoryMesh';

/**
 * Triangulate every face as a fan from its first corner and return an
 * indexed BufferGeometry sharing the mesh's vertices.
 */
export function toBufferGeometry(mesh: MemoryMesh): BufferGeometry {
  const positions: number[] = [];
  for (const p of mesh.positions) {
    positions.push(p[0], p[1], p[2]);
  }

  const indices: number[] = [];
  for (const face of mesh.faces) {
    for (let i = 1; i < face.length - 1; i++) {
      indices.push(face[0], face[i], face[i + 1]);
    }
  }

  const geometry = new BufferGeometry();
  geometry.setAttribute('position', new Float32BufferAttribute(positions, 3));
  geometry.setIndex(indices);
  geometry.computeVertexNormals();
  return geometry;
}
