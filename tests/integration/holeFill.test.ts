/**
 * Hole Fill Integration Tests
 *
 * Drives PreviewSession against the in-memory host from selection to commit
 * and validates the resulting meshes and history.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { PreviewSession } from '../../src/session/PreviewSession';
import { createPolygonHole, createSquareHole } from '../fixtures/meshes';
import { expectOk, expectVec3Close } from '../fixtures/assertions';
import { formatValidationResult, validateFill } from '../validators';

const fill = (sides: number, offset: number, density: number) => {
  const fixture = createPolygonHole(sides);
  const session = new PreviewSession(fixture.host);
  const loop = expectOk(session.captureBoundary(fixture.holeEdges));
  expectOk(session.setParameters({ offset, density }));
  const summary = expectOk(session.commit());
  return { ...fixture, session, loop, summary };
};

describe('Hole fill', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('even holes', () => {
    it('fills a hexagon with quads and no stray geometry', () => {
      const { host, summary } = fill(6, 0, 2);

      expect(summary.vertexCount).toBe(12);
      expect(summary.weldedVertexCount).toBe(6);
      expect(host.faceCount(summary.meshId)).toBe(8);

      const result = validateFill(host, summary.meshId, { failOnWarnings: true });
      expect(result.valid, formatValidationResult(result.mesh)).toBe(true);
    });

    it('adds interior vertices for larger holes', () => {
      const { host, summary } = fill(12, 0, 2);

      // 3×5 grid: 12 perimeter vertices weld onto the hole, 3 interior stay
      expect(summary.patchVertexCount).toBe(15);
      expect(summary.weldedVertexCount).toBe(12);
      expect(summary.vertexCount).toBe(27);
      expect(host.faceCount(summary.meshId)).toBe(20);

      // The middle interior vertex of a regular polygon lands on its center
      expectVec3Close(host.vertexWorldPosition({ meshId: summary.meshId, index: 25 }), [0, 0, 0]);

      for (let index = 12; index < 20; index++) {
        expectVec3Close(host.faceNormal({ meshId: summary.meshId, index }), [0, 1, 0]);
      }
      expect(validateFill(host, summary.meshId, { failOnWarnings: true }).valid).toBe(true);
    });

    it('gives the same result for every offset', () => {
      for (let offset = 0; offset < 6; offset++) {
        const { host, summary } = fill(6, offset, 1);

        expect(summary.vertexCount).toBe(12);
        expect(validateFill(host, summary.meshId).valid).toBe(true);
      }
    });
  });

  describe('odd holes', () => {
    it('collapses the duplicated corner into one triangle beside the pole', () => {
      const { host, loop, summary } = fill(5, 0, 1);
      const mesh = host.getMesh(summary.meshId);
      const t = (slot: number) => loop.vertices[slot % 5];

      expect(summary.pole).toBe(true);
      expect(summary.weldedVertexCount).toBe(6);
      expect(summary.vertexCount).toBe(10);
      expect(mesh.faces[5]).toEqual([t(0), t(1), t(2)]);
      expect(mesh.faces[6]).toEqual([t(0), t(2), t(3), t(4)]);
    });

    it('moves the pole with the offset', () => {
      const { host, loop, summary } = fill(5, 2, 1);
      const mesh = host.getMesh(summary.meshId);
      const t = (slot: number) => loop.vertices[(2 + slot) % 5];

      expect(mesh.faces[5]).toEqual([t(0), t(1), t(2)]);
      expect(mesh.faces[6]).toEqual([t(0), t(2), t(3), t(4)]);
    });

    it('leaves a consistently wound surface with a single non-quad face', () => {
      const { host, summary } = fill(7, 3, 2);

      const result = validateFill(host, summary.meshId);

      expect(result.valid).toBe(true);
      expect(result.mesh.warnings).toHaveLength(1);
    });
  });

  describe('seam', () => {
    it.each([
      { sides: 8, offset: 3, vertexCount: 17 },
      { sides: 7, offset: 3, vertexCount: 15 },
    ])('leaves every target vertex in place for a $sides-sided hole', ({ sides, offset, vertexCount }) => {
      const fixture = createPolygonHole(sides);
      const before = fixture.host.getMesh(fixture.meshId).positions.map(p => [...p]);
      const session = new PreviewSession(fixture.host);
      expectOk(session.captureBoundary(fixture.holeEdges));
      expectOk(session.setParameters({ offset, density: 2 }));

      const summary = expectOk(session.commit());

      // 3×3 grid: all 8 perimeter vertices weld, 1 interior vertex stays
      expect(summary.originalVertexCount).toBe(2 * sides);
      expect(summary.patchVertexCount).toBe(9);
      expect(summary.weldedVertexCount).toBe(8);
      expect(summary.vertexCount).toBe(vertexCount);
      expect(summary.vertexCount).toBe(
        summary.originalVertexCount + summary.patchVertexCount - summary.weldedVertexCount
      );
      expect(fixture.host.vertexCount(summary.meshId)).toBe(summary.vertexCount);
      expect(fixture.host.getMesh(summary.meshId).positions.slice(0, summary.originalVertexCount)).toEqual(before);
    });
  });

  describe('history', () => {
    it('records a burst of rebuilds and a commit as one entry', () => {
      const { host, holeEdges } = createPolygonHole(8);
      const session = new PreviewSession(host);
      const open = vi.spyOn(host, 'openTransaction');
      const begin = vi.spyOn(host, 'beginHistorySuppression');
      const end = vi.spyOn(host, 'endHistorySuppression');

      expectOk(session.captureBoundary(holeEdges));
      for (let step = 0; step < 24; step++) {
        expectOk(session.setParameters({ offset: step % 8, density: 1 + (step % 3) }));
      }
      expect(host.history).toHaveLength(1);

      expectOk(session.commit());

      expect(host.history.map(entry => entry.name)).toEqual(['add-mesh', 'hole-fill']);
      expect(open).toHaveBeenCalledTimes(1);
      expect(begin.mock.calls.length).toBe(end.mock.calls.length);
      expect(host.isRecording).toBe(true);
      expect(host.inTransaction).toBe(false);
    });

    it('undo brings back only the hole', () => {
      const { host, meshId, holeEdges } = createSquareHole();
      const before = host.getMesh(meshId).clone();
      const session = new PreviewSession(host);
      expectOk(session.captureBoundary(holeEdges));
      expectOk(session.setParameters({ offset: 1, density: 1 }));
      expectOk(session.commit());

      expect(host.undo()).toBe('hole-fill');

      expect(host.meshIds()).toEqual([meshId]);
      expect(host.getMesh(meshId).positions).toEqual(before.positions);
      expect(host.getMesh(meshId).faces).toEqual(before.faces);
    });
  });
});
