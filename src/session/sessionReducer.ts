/**
 * Preview Session State Machine
 *
 * Pure reducer with no host access. PreviewSession performs the mesh edits
 * and dispatches the matching action once they succeed.
 *
 *   idle ──BOUNDARY_CAPTURED──→ captured ──PREVIEW_REPLACED──→ previewing
 *                                  ↑                              │  ↺ PREVIEW_REPLACED
 *                                  └──────PREVIEW_CLEARED─────────┘
 *   captured | previewing ──COMMITTED | CANCELLED──→ idle
 */

import type { BoundaryLoop, PatchGrid, PatchParameters } from '../types';

// =============================================================================
// State
// =============================================================================

export type SessionPhase = 'idle' | 'captured' | 'previewing';

export interface LivePreview {
  meshId: string;
  grid: PatchGrid;
}

export type PreviewSessionState =
  | { phase: 'idle' }
  | { phase: 'captured'; loop: BoundaryLoop; params: PatchParameters | null }
  | { phase: 'previewing'; loop: BoundaryLoop; params: PatchParameters; preview: LivePreview };

export const initialSessionState: PreviewSessionState = { phase: 'idle' };

// =============================================================================
// Actions
// =============================================================================

export type SessionAction =
  | { type: 'BOUNDARY_CAPTURED'; loop: BoundaryLoop }
  | { type: 'PREVIEW_REPLACED'; params: PatchParameters; preview: LivePreview }
  | { type: 'PREVIEW_CLEARED' }
  | { type: 'COMMITTED' }
  | { type: 'CANCELLED' };

// =============================================================================
// Reducer
// =============================================================================

export function sessionReducer(state: PreviewSessionState, action: SessionAction): PreviewSessionState {
  switch (action.type) {
    case 'BOUNDARY_CAPTURED':
      return { phase: 'captured', loop: action.loop, params: null };

    case 'PREVIEW_REPLACED':
      if (state.phase === 'idle') {
        return state;
      }
      return {
        phase: 'previewing',
        loop: state.loop,
        params: { ...action.params },
        preview: action.preview,
      };

    case 'PREVIEW_CLEARED':
      if (state.phase !== 'previewing') {
        return state;
      }
      // Parameters survive so a later rebuild or retry can reuse them
      return { phase: 'captured', loop: state.loop, params: state.params };

    case 'COMMITTED':
    case 'CANCELLED':
      return initialSessionState;

    default:
      return state;
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * A boundary is held, so parameters can be applied
 */
export function canPreview(
  state: PreviewSessionState
): state is Exclude<PreviewSessionState, { phase: 'idle' }> {
  return state.phase !== 'idle';
}

/**
 * A live preview exists to commit
 */
export function canCommit(
  state: PreviewSessionState
): state is Extract<PreviewSessionState, { phase: 'previewing' }> {
  return state.phase === 'previewing';
}

export function getSessionParameters(state: PreviewSessionState): PatchParameters | null {
  return state.phase === 'idle' ? null : state.params;
}

export function getPreviewMeshId(state: PreviewSessionState): string | null {
  return state.phase === 'previewing' ? state.preview.meshId : null;
}
