import { createStore, type StoreApi } from 'zustand/vanilla';
import type { CommitSummary, EdgeRef, ParameterBounds, PatchParameters } from '../types';
import type { MeshHost } from '../host/types';
import type { HoleFillConfig } from '../config/holeFill';
import type { HoleFillError } from '../fill/errors';
import { parameterBounds } from '../fill/effectiveBoundary';
import { PreviewSession } from '../session/PreviewSession';
import type { SessionPhase } from '../session/sessionReducer';

// =============================================================================
// Hole Fill Store - interaction-facing state for the hole filler
// =============================================================================
//
// Mirrors the session into plain fields a UI can subscribe to (status line,
// slider ranges, last error) and exposes the button/slider actions:
//   startPreview(edges)  - capture and preview at the default density
//   setOffset / setDensity - rebuild the preview with one field changed
//   commit / cancel
// =============================================================================

export interface HoleFillState {
  status: SessionPhase;
  loopSize: number;
  isOdd: boolean;
  params: PatchParameters | null;
  bounds: ParameterBounds | null;
  lastError: HoleFillError | null;
  message: string;
  lastCommit: CommitSummary | null;
}

export interface HoleFillActions {
  startPreview: (edges: readonly EdgeRef[]) => boolean;
  setOffset: (offset: number) => boolean;
  setDensity: (density: number) => boolean;
  commit: () => boolean;
  cancel: () => boolean;
}

export type HoleFillStore = StoreApi<HoleFillState & HoleFillActions> & {
  session: PreviewSession;
};

export const IDLE_MESSAGE = 'Select border edges, then start a preview';

export const INITIAL_HOLE_FILL_STATE: HoleFillState = {
  status: 'idle',
  loopSize: 0,
  isOdd: false,
  params: null,
  bounds: null,
  lastError: null,
  message: IDLE_MESSAGE,
  lastCommit: null,
};

/**
 * Status line for a captured loop
 */
export const describeLoop = (loopSize: number, isOdd: boolean): string =>
  isOdd
    ? `Odd: ${loopSize} edges | 5-pole at offset | change offset to move it`
    : `Even: ${loopSize} edges | clean all-quad`;

export function createHoleFillStore(host: MeshHost, config?: Partial<HoleFillConfig>): HoleFillStore {
  const session = new PreviewSession(host, config);

  const store = createStore<HoleFillState & HoleFillActions>()((set, get) => {
    const applyParams = (params: PatchParameters): boolean => {
      const result = session.setParameters(params);
      if (!result.ok) {
        set({ lastError: result.error, message: result.error.message });
        return false;
      }
      set({ status: session.phase, params: { ...params }, lastError: null });
      return true;
    };

    return {
      ...INITIAL_HOLE_FILL_STATE,

      startPreview: (edges) => {
        const captured = session.captureBoundary(edges);
        if (!captured.ok) {
          set({ lastError: captured.error, message: captured.error.message });
          return false;
        }
        const loop = captured.value;
        const bounds = parameterBounds(loop);
        set({
          status: session.phase,
          loopSize: loop.vertices.length,
          isOdd: loop.isOdd,
          params: null,
          bounds,
          lastError: null,
          lastCommit: null,
          message: describeLoop(loop.vertices.length, loop.isOdd),
        });
        return applyParams({ offset: 0, density: bounds.defaultDensity });
      },

      setOffset: (offset) => {
        const { params, bounds } = get();
        if (!bounds) return false;
        return applyParams({ offset, density: params?.density ?? bounds.defaultDensity });
      },

      setDensity: (density) => {
        const { params, bounds } = get();
        if (!bounds) return false;
        return applyParams({ offset: params?.offset ?? 0, density });
      },

      commit: () => {
        const result = session.commit();
        if (!result.ok) {
          set({ status: session.phase, lastError: result.error, message: result.error.message });
          return false;
        }
        set({
          ...INITIAL_HOLE_FILL_STATE,
          lastCommit: result.value,
          message: result.value.pole ? 'Quad fill done (5-pole)' : 'Quad fill done',
        });
        return true;
      },

      cancel: () => {
        const result = session.cancel();
        if (!result.ok) {
          set({ status: session.phase, lastError: result.error, message: result.error.message });
          return false;
        }
        set({ ...INITIAL_HOLE_FILL_STATE });
        return true;
      },
    };
  });

  return Object.assign(store, { session });
}
