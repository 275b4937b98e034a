/**
 * PreviewSession - live preview and commit of a hole fill
 *
 * Drives the hole filler through explicit calls:
 * - captureBoundary: read and orient the selected boundary loop
 * - setParameters: rebuild the preview patch; never recorded in history
 * - commit: rebuild once more, unite with the target and weld the seam,
 *   all inside one named transaction (one history entry)
 * - cancel: drop the preview without recording history
 *
 * The target mesh is referenced, never owned. The preview mesh is owned
 * until commit or cancel.
 */

import type { BoundaryLoop, CommitSummary, EdgeRef, PatchGrid, PatchParameters } from '../types';
import type { MeshHost } from '../host/types';
import { resolveHoleFillConfig, type HoleFillConfig } from '../config/holeFill';
import { captureBoundary as captureBoundaryLoop } from '../fill/boundaryLoop';
import { validateParameters } from '../fill/effectiveBoundary';
import { buildPatch, type BuiltPatch } from '../fill/patchBuilder';
import { withHistorySuppressed, withTransaction } from '../fill/historyScopes';
import { describeCause, fail, succeed, type HoleFillResult } from '../fill/errors';
import {
  initialSessionState,
  sessionReducer,
  canCommit,
  canPreview,
  getPreviewMeshId,
  type PreviewSessionState,
  type SessionAction,
  type SessionPhase,
} from './sessionReducer';
import { debug } from '../utils/debug';

export class PreviewSession {
  private state: PreviewSessionState = initialSessionState;
  readonly config: HoleFillConfig;

  constructor(
    private readonly host: MeshHost,
    config?: Partial<HoleFillConfig>
  ) {
    this.config = resolveHoleFillConfig(config);
  }

  getState(): PreviewSessionState {
    return this.state;
  }

  get phase(): SessionPhase {
    return this.state.phase;
  }

  // ==========================================================================
  // Capture
  // ==========================================================================

  /**
   * Capture the hole bounded by `edges`. A failed capture leaves any current
   * session as it was; a successful one replaces it.
   */
  captureBoundary(edges: readonly EdgeRef[]): HoleFillResult<BoundaryLoop> {
    let captured: HoleFillResult<BoundaryLoop>;
    try {
      captured = captureBoundaryLoop(this.host, edges, this.config);
    } catch (err) {
      captured = fail('malformed-boundary', 'Selected edges could not be read from the mesh', {
        edgeCount: edges.length,
        cause: describeCause(err),
      });
    }
    if (!captured.ok) {
      debug('capture', `Capture failed: ${captured.error.message}`);
      return captured;
    }

    if (this.state.phase === 'previewing') {
      console.warn('Preview already active, discarding previous preview');
      const discarded = this.discardPreview();
      if (!discarded.ok) return discarded;
    }
    this.dispatch({ type: 'BOUNDARY_CAPTURED', loop: captured.value });
    return captured;
  }

  // ==========================================================================
  // Preview
  // ==========================================================================

  /**
   * Rebuild the preview patch for new parameters. Invalid parameters are
   * rejected before the current preview is touched.
   */
  setParameters(params: PatchParameters): HoleFillResult<PatchGrid> {
    const state = this.state;
    if (!canPreview(state)) {
      return fail('inactive-session', 'Capture a boundary before setting parameters', {
        phase: state.phase,
      });
    }

    const validated = validateParameters(state.loop, params);
    if (!validated.ok) return validated;
    const { boundary } = validated.value;
    const loop = state.loop;

    let built: HoleFillResult<BuiltPatch>;
    try {
      built = withHistorySuppressed(this.host, () => {
        this.releasePreview();
        return buildPatch(this.host, boundary, params.density, loop.holeNormal, this.config);
      });
    } catch (err) {
      built = fail('construction-failure', 'Preview rebuild failed', {
        offset: params.offset,
        density: params.density,
        cause: describeCause(err),
      });
    }

    if (!built.ok) {
      debug('preview', `Preview failed: ${built.error.message}`);
      return built;
    }

    this.dispatch({
      type: 'PREVIEW_REPLACED',
      params,
      preview: { meshId: built.value.meshId, grid: built.value.grid },
    });
    return succeed(built.value.grid);
  }

  // ==========================================================================
  // Commit / Cancel
  // ==========================================================================

  /**
   * Merge the patch into the target mesh as one history entry.
   *
   * On failure the transaction is aborted, which restores the scene (preview
   * included) and leaves the session previewing so the caller can retry.
   */
  commit(): HoleFillResult<CommitSummary> {
    const state = this.state;
    if (!canCommit(state)) {
      return fail('inactive-session', 'Preview a patch before committing', { phase: state.phase });
    }

    const { loop, params, preview } = state;
    const validated = validateParameters(loop, params);
    if (!validated.ok) return validated;
    const { boundary } = validated.value;

    let result: HoleFillResult<CommitSummary>;
    try {
      result = withTransaction(this.host, this.config.transactionName, scope => {
        withHistorySuppressed(this.host, () => this.host.deleteMesh(preview.meshId));

        const originalVertexCount = this.host.vertexCount(loop.meshId);
        const built = buildPatch(this.host, boundary, params.density, loop.holeNormal, this.config);
        if (!built.ok) return built;

        const patch = built.value;
        const patchVertexCount = this.host.vertexCount(patch.meshId);
        const combined = this.host.unionMeshes(loop.meshId, patch.meshId);

        const seam: number[] = patch.grid.boundaryWalk.map(index => originalVertexCount + index);
        for (let slot = 0; slot < boundary.count; slot++) {
          seam.push(boundary.vertex(slot));
        }
        const weldedVertexCount = this.host.mergeVerticesByDistance(combined, seam, this.config.weldTolerance);

        scope.complete();
        return succeed({
          meshId: combined,
          originalVertexCount,
          patchVertexCount,
          weldedVertexCount,
          vertexCount: this.host.vertexCount(combined),
          pole: boundary.hasPole,
        });
      });
    } catch (err) {
      result = fail('commit-failure', 'Could not merge the patch into the target mesh', {
        offset: params.offset,
        density: params.density,
        cause: describeCause(err),
      });
    }

    if (!result.ok) {
      debug('commit', `Commit failed: ${result.error.message}`);
      return result;
    }

    debug(
      'commit',
      `Filled ${loop.vertices.length}-vertex hole into ${result.value.meshId}` +
        ` (welded ${result.value.weldedVertexCount}${result.value.pole ? ', 5-pole' : ''})`
    );
    this.dispatch({ type: 'COMMITTED' });
    return result;
  }

  /**
   * Drop the preview (unrecorded) and return to idle. If the preview cannot
   * be deleted the session keeps it and stays previewing.
   */
  cancel(): HoleFillResult<void> {
    if (this.state.phase === 'idle') return succeed(undefined);
    const discarded = this.discardPreview();
    if (!discarded.ok) return discarded;
    this.dispatch({ type: 'CANCELLED' });
    return discarded;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * Delete the live preview under history suppression, reporting a host
   * failure instead of throwing
   */
  private discardPreview(): HoleFillResult<void> {
    try {
      withHistorySuppressed(this.host, () => this.releasePreview());
      return succeed(undefined);
    } catch (err) {
      const meshId = getPreviewMeshId(this.state);
      console.warn(`Could not discard preview ${meshId}`);
      return fail('discard-failure', 'Could not discard the preview mesh', {
        meshId,
        cause: describeCause(err),
      });
    }
  }

  /**
   * Delete the live preview, then forget it. Callers hold the suppression scope.
   */
  private releasePreview(): void {
    const meshId = getPreviewMeshId(this.state);
    if (meshId === null) return;
    this.host.deleteMesh(meshId);
    this.dispatch({ type: 'PREVIEW_CLEARED' });
  }

  private dispatch(action: SessionAction): void {
    this.state = sessionReducer(this.state, action);
  }
}
