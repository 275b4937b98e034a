/**
 * Centralized tolerances and defaults for the hole filler.
 * Any module that compares distances or normals should read them from here.
 */

export interface HoleFillConfig {
  /** Fewest boundary edges a hole may have */
  minimumEdges: number;
  /** Seam vertices closer than this are welded on commit */
  weldTolerance: number;
  /** Left boundary curve counts as closed when its ends are this close */
  closedCurveTolerance: number;
  /** Averaged normals shorter than this fall back to +Y */
  normalEpsilon: number;
  /** Newell normals shorter than this fall back to +Y */
  windingEpsilon: number;
  /** Name of the history entry recorded by commit */
  transactionName: string;
  /** Size of the grid primitive before its vertices are positioned */
  gridSize: {
    width: number;
    height: number;
  };
}

export const defaultHoleFillConfig: HoleFillConfig = {
  minimumEdges: 4,
  weldTolerance: 1e-4,
  closedCurveTolerance: 1e-6,
  normalEpsilon: 1e-6,
  windingEpsilon: 1e-9,
  transactionName: 'hole-fill',
  gridSize: { width: 1, height: 1 },
};

export const resolveHoleFillConfig = (overrides?: Partial<HoleFillConfig>): HoleFillConfig => ({
  ...defaultHoleFillConfig,
  ...overrides,
  gridSize: { ...defaultHoleFillConfig.gridSize, ...overrides?.gridSize },
});
