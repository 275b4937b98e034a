/**
 * Quad Fill
 *
 * Coons-patch hole filler for polygon meshes:
 * - Fill: boundary extraction, orientation, patch grid, odd-loop poles
 * - Session: undo-safe live preview and single-entry commit
 * - Host: the mesh interface it drives, plus an in-memory implementation
 */

// Types
export * from './types';
export * from './fill/errors';

// Configuration
export { defaultHoleFillConfig, resolveHoleFillConfig } from './config/holeFill';
export type { HoleFillConfig } from './config/holeFill';

// Fill algorithm (pure, testable)
export { extractBoundaryLoop, captureBoundary } from './fill/boundaryLoop';
export { detectHoleNormal, loopNormal, resolveOrientation } from './fill/orientation';
export type { OrderedBoundary, ResolvedOrientation } from './fill/orientation';
export {
  EffectiveBoundary,
  deriveSpansY,
  parameterBounds,
  validateParameters,
} from './fill/effectiveBoundary';
export { boundaryWalk, resampleCurve, computePatchGrid } from './fill/patchGrid';
export { buildPatch } from './fill/patchBuilder';
export type { BuiltPatch } from './fill/patchBuilder';
export { withHistorySuppressed, withTransaction } from './fill/historyScopes';
export type { TransactionScope } from './fill/historyScopes';

// Session
export { PreviewSession } from './session/PreviewSession';
export {
  sessionReducer,
  initialSessionState,
  canPreview,
  canCommit,
  getSessionParameters,
  getPreviewMeshId,
} from './session/sessionReducer';
export type { PreviewSessionState, SessionAction, SessionPhase, LivePreview } from './session/sessionReducer';

// Store
export { createHoleFillStore, describeLoop, INITIAL_HOLE_FILL_STATE } from './store/holeFillStore';
export type { HoleFillStore, HoleFillState, HoleFillActions } from './store/holeFillStore';

// Host
export type { MeshHost, MeshQueries, MeshEdits, HistoryControl } from './host/types';
export { MemoryMesh, createGridMesh, edgeKey } from './host/MemoryMesh';
export type { MeshEdge } from './host/MemoryMesh';
export { MemoryMeshHost } from './host/MemoryMeshHost';
export type { HistoryEntry } from './host/MemoryMeshHost';
export { toBufferGeometry } from './host/bufferGeometry';
export { MeshValidator, validateMesh, formatValidationResult } from './host/validators/MeshValidator';
export type { ValidationResult, ValidationError, MeshValidatorOptions } from './host/validators/MeshValidator';

// Debug
export {
  debug,
  enableDebugTag,
  disableDebugTag,
  setDebugTags,
  getDebugTags,
  isDebugTagActive,
  appendDebug,
  hasDebug,
  getDebug,
  getDebugLines,
  clearDebug,
} from './utils/debug';
export type { DebugTag, DebugLine } from './utils/debug';
