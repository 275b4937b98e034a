import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PreviewSession } from './PreviewSession';
import { getPreviewMeshId } from './sessionReducer';
import { createPolygonHole, createSquareHole, type HoleFixture } from '../../tests/fixtures/meshes';
import { expectError, expectOk, expectVec3Close } from '../../tests/fixtures/assertions';

describe('PreviewSession', () => {
  let fixture: HoleFixture;
  let session: PreviewSession;

  beforeEach(() => {
    fixture = createSquareHole();
    session = new PreviewSession(fixture.host);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const startPreview = () => {
    expectOk(session.captureBoundary(fixture.holeEdges));
    return expectOk(session.setParameters({ offset: 0, density: 1 }));
  };

  // ===========================================================================
  // Capture
  // ===========================================================================

  describe('captureBoundary', () => {
    it('moves to captured with the loop', () => {
      const loop = expectOk(session.captureBoundary(fixture.holeEdges));

      expect(session.phase).toBe('captured');
      expect(loop.meshId).toBe(fixture.meshId);
      expect(loop.vertices).toHaveLength(4);
    });

    it('leaves the session alone when capture fails', () => {
      startPreview();

      expectError(session.captureBoundary(fixture.holeEdges.slice(0, 3)), 'insufficient-edges');

      expect(session.phase).toBe('previewing');
      expect(fixture.host.meshIds()).toHaveLength(2);
    });

    it('reports edges of a mesh that no longer exists', () => {
      const edges = [0, 1, 2, 3].map(index => ({ meshId: 'gone', index }));

      const error = expectError(session.captureBoundary(edges), 'malformed-boundary');

      expect(error.details).toEqual({ edgeCount: 4, cause: 'Unknown mesh: gone' });
      expect(session.phase).toBe('idle');
    });

    it('cannot capture again from edges consumed by a commit', () => {
      startPreview();
      expectOk(session.commit());

      expectError(session.captureBoundary(fixture.holeEdges), 'malformed-boundary');
      expect(session.phase).toBe('idle');
    });

    it('keeps the current session when the old preview cannot be discarded', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      startPreview();
      vi.spyOn(fixture.host, 'deleteMesh').mockImplementationOnce(() => {
        throw new Error('mesh locked');
      });

      expectError(session.captureBoundary(fixture.holeEdges), 'discard-failure');

      expect(session.phase).toBe('previewing');
      expect(fixture.host.meshIds()).toHaveLength(2);
      expect(fixture.host.isRecording).toBe(true);
    });

    it('discards an active preview without recording history', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      startPreview();

      expectOk(session.captureBoundary(fixture.holeEdges));

      expect(warn).toHaveBeenCalledWith('Preview already active, discarding previous preview');
      expect(session.phase).toBe('captured');
      expect(fixture.host.meshIds()).toEqual([fixture.meshId]);
      expect(fixture.host.history).toHaveLength(1);
    });
  });

  // ===========================================================================
  // Preview
  // ===========================================================================

  describe('setParameters', () => {
    it('requires a captured boundary', () => {
      const error = expectError(session.setParameters({ offset: 0, density: 1 }), 'inactive-session');

      expect(error.details.phase).toBe('idle');
    });

    it('builds a preview mesh beside the target', () => {
      const grid = startPreview();

      expect(session.phase).toBe('previewing');
      expect(grid.spansX).toBe(1);
      expect(grid.spansY).toBe(1);
      const previewId = getPreviewMeshId(session.getState());
      expect(previewId).not.toBeNull();
      expect(fixture.host.meshIds()).toEqual([fixture.meshId, previewId]);
    });

    it('keeps exactly one preview across rebuilds and records nothing', () => {
      const begin = vi.spyOn(fixture.host, 'beginHistorySuppression');
      const end = vi.spyOn(fixture.host, 'endHistorySuppression');
      startPreview();

      for (let offset = 0; offset < 4; offset++) {
        expectOk(session.setParameters({ offset, density: 1 }));
      }

      expect(fixture.host.meshIds()).toHaveLength(2);
      expect(fixture.host.history).toHaveLength(1);
      expect(begin).toHaveBeenCalledTimes(5);
      expect(end).toHaveBeenCalledTimes(5);
      expect(fixture.host.isRecording).toBe(true);
    });

    it('rejects invalid parameters before touching the preview', () => {
      startPreview();
      const previewId = getPreviewMeshId(session.getState());

      expectError(session.setParameters({ offset: 0, density: 2 }), 'invalid-span');
      expectError(session.setParameters({ offset: 4, density: 1 }), 'invalid-offset');

      expect(getPreviewMeshId(session.getState())).toBe(previewId);
      expect(session.getState()).toMatchObject({ params: { offset: 0, density: 1 } });
    });

    it('falls back to captured when the rebuild fails', () => {
      startPreview();
      vi.spyOn(fixture.host, 'createGrid').mockImplementation(() => {
        throw new Error('grid primitive unavailable');
      });

      expectError(session.setParameters({ offset: 1, density: 1 }), 'construction-failure');

      expect(session.phase).toBe('captured');
      expect(fixture.host.meshIds()).toEqual([fixture.meshId]);
      expect(fixture.host.isRecording).toBe(true);
    });
  });

  // ===========================================================================
  // Commit
  // ===========================================================================

  describe('commit', () => {
    it('requires a preview', () => {
      expectOk(session.captureBoundary(fixture.holeEdges));

      const error = expectError(session.commit(), 'inactive-session');

      expect(error.details.phase).toBe('captured');
    });

    it('merges the patch into the target and welds the seam', () => {
      startPreview();

      const summary = expectOk(session.commit());

      expect(summary).toMatchObject({
        originalVertexCount: 16,
        patchVertexCount: 4,
        weldedVertexCount: 4,
        vertexCount: 16,
        pole: false,
      });
      expect(session.phase).toBe('idle');
      expect(fixture.host.meshIds()).toEqual([summary.meshId]);
      expect(fixture.host.faceCount(summary.meshId)).toBe(9);
      expect(fixture.host.boundaryEdges(summary.meshId)).toHaveLength(12);
      expectVec3Close(fixture.host.faceNormal({ meshId: summary.meshId, index: 8 }), [0, 1, 0]);
    });

    it('writes exactly one named history entry', () => {
      const open = vi.spyOn(fixture.host, 'openTransaction');
      const close = vi.spyOn(fixture.host, 'closeTransaction');
      startPreview();

      expectOk(session.commit());

      expect(fixture.host.history.map(entry => entry.name)).toEqual(['add-mesh', 'hole-fill']);
      expect(open).toHaveBeenCalledTimes(1);
      expect(open).toHaveBeenCalledWith('hole-fill');
      expect(close).toHaveBeenCalledTimes(1);
    });

    it('uses the configured transaction name', () => {
      session = new PreviewSession(fixture.host, { transactionName: 'Fill Hole' });
      startPreview();

      expectOk(session.commit());

      expect(fixture.host.history[1].name).toBe('Fill Hole');
    });

    it('undo restores the target and the preview', () => {
      startPreview();
      const previewId = getPreviewMeshId(session.getState());
      expectOk(session.commit());

      expect(fixture.host.undo()).toBe('hole-fill');

      expect(fixture.host.meshIds()).toEqual([fixture.meshId, previewId]);
      expect(fixture.host.vertexCount(fixture.meshId)).toBe(16);
      expect(fixture.host.faceCount(fixture.meshId)).toBe(8);
    });

    it('aborts on failure and stays previewing so the commit can be retried', () => {
      startPreview();
      const previewId = getPreviewMeshId(session.getState());
      vi.spyOn(fixture.host, 'mergeVerticesByDistance').mockImplementationOnce(() => {
        throw new Error('weld failed');
      });

      const error = expectError(session.commit(), 'commit-failure');

      expect(error.message).toBe('Could not merge the patch into the target mesh');
      expect(error.details.cause).toBe('weld failed');
      expect(session.phase).toBe('previewing');
      expect(fixture.host.inTransaction).toBe(false);
      expect(fixture.host.history).toHaveLength(1);
      expect(fixture.host.meshIds()).toEqual([fixture.meshId, previewId]);

      const summary = expectOk(session.commit());
      expect(summary.vertexCount).toBe(16);
      expect(fixture.host.history).toHaveLength(2);
    });

    it('reports a five-valence pole for odd loops', () => {
      const pentagon = createPolygonHole(5);
      session = new PreviewSession(pentagon.host);
      expectOk(session.captureBoundary(pentagon.holeEdges));
      expectOk(session.setParameters({ offset: 0, density: 1 }));

      const summary = expectOk(session.commit());

      expect(summary.pole).toBe(true);
      expect(summary.patchVertexCount).toBe(6);
      expect(summary.weldedVertexCount).toBe(6);
      expect(summary.vertexCount).toBe(10);
      expect(pentagon.host.faceCount(summary.meshId)).toBe(7);
    });
  });

  // ===========================================================================
  // Cancel
  // ===========================================================================

  describe('cancel', () => {
    it('deletes the preview and returns to idle', () => {
      startPreview();

      expectOk(session.cancel());

      expect(session.phase).toBe('idle');
      expect(fixture.host.meshIds()).toEqual([fixture.meshId]);
      expect(fixture.host.history).toHaveLength(1);
    });

    it('does nothing while idle', () => {
      expectOk(session.cancel());

      expect(session.phase).toBe('idle');
      expect(fixture.host.history).toHaveLength(1);
    });

    it('keeps the preview and stays previewing when deleting it fails', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      startPreview();
      const previewId = getPreviewMeshId(session.getState());
      vi.spyOn(fixture.host, 'deleteMesh').mockImplementationOnce(() => {
        throw new Error('mesh locked');
      });

      const error = expectError(session.cancel(), 'discard-failure');

      expect(error.details).toEqual({ meshId: previewId, cause: 'mesh locked' });
      expect(warn).toHaveBeenCalledWith(`Could not discard preview ${previewId}`);
      expect(session.phase).toBe('previewing');
      expect(getPreviewMeshId(session.getState())).toBe(previewId);
      expect(fixture.host.isRecording).toBe(true);

      expectOk(session.cancel());
      expect(session.phase).toBe('idle');
      expect(fixture.host.meshIds()).toEqual([fixture.meshId]);
      expect(fixture.host.history).toHaveLength(1);
    });
  });
});
