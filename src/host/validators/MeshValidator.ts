/**
 * Mesh Validator
 *
 * Checks topology rules a filled mesh must keep. Used by integration tests
 * to verify a commit leaves the target a clean, consistently wound surface.
 */

import type { MemoryMesh } from '../MemoryMesh';
import { edgeKey } from '../MemoryMesh';

// =============================================================================
// Types
// =============================================================================

export interface ValidationError {
  rule: string;
  severity: 'error' | 'warning';
  message: string;
  details: Record<string, unknown>;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationError[];
  summary: {
    rulesChecked: string[];
    errorCount: number;
    warningCount: number;
  };
}

export interface MeshValidatorOptions {
  /** Vertices closer than this count as coincident */
  coincidentTolerance?: number;
  /** Report non-quad faces as warnings */
  expectQuads?: boolean;
}

// =============================================================================
// Mesh Validator
// =============================================================================

export class MeshValidator {
  private errors: ValidationError[] = [];
  private warnings: ValidationError[] = [];
  private rulesChecked = new Set<string>();
  private readonly coincidentTolerance: number;
  private readonly expectQuads: boolean;

  constructor(
    private mesh: MemoryMesh,
    options: MeshValidatorOptions = {}
  ) {
    this.coincidentTolerance = options.coincidentTolerance ?? 1e-4;
    this.expectQuads = options.expectQuads ?? true;
  }

  validateAll(): ValidationResult {
    this.errors = [];
    this.warnings = [];
    this.rulesChecked.clear();

    this.validateFaceCorners();
    this.validateCoincidentVertices();
    this.validateEdgeUse();
    if (this.expectQuads) {
      this.validateQuads();
    }

    return this.buildResult();
  }

  private buildResult(): ValidationResult {
    return {
      valid: this.errors.length === 0,
      errors: this.errors,
      warnings: this.warnings,
      summary: {
        rulesChecked: Array.from(this.rulesChecked),
        errorCount: this.errors.length,
        warningCount: this.warnings.length,
      },
    };
  }

  private addError(rule: string, message: string, details: Record<string, unknown> = {}): void {
    this.rulesChecked.add(rule);
    this.errors.push({ rule, severity: 'error', message, details });
  }

  private addWarning(rule: string, message: string, details: Record<string, unknown> = {}): void {
    this.rulesChecked.add(rule);
    this.warnings.push({ rule, severity: 'warning', message, details });
  }

  private markRuleChecked(rule: string): void {
    this.rulesChecked.add(rule);
  }

  // ===========================================================================
  // Faces
  // ===========================================================================

  private validateFaceCorners(): void {
    this.markRuleChecked('mesh:face-corners');
    const { faces, vertexCount } = this.mesh;
    faces.forEach((face, index) => {
      if (face.some(v => v < 0 || v >= vertexCount)) {
        this.addError('mesh:face-corners', `Face ${index} references a missing vertex`, { face });
        return;
      }
      if (new Set(face).size !== face.length || face.length < 3) {
        this.addError('mesh:face-corners', `Face ${index} repeats a corner or has fewer than 3`, { face });
      }
    });
  }

  private validateQuads(): void {
    this.markRuleChecked('mesh:all-quads');
    this.mesh.faces.forEach((face, index) => {
      if (face.length !== 4) {
        this.addWarning('mesh:all-quads', `Face ${index} has ${face.length} corners`, { face });
      }
    });
  }

  // ===========================================================================
  // Vertices
  // ===========================================================================

  private validateCoincidentVertices(): void {
    this.markRuleChecked('mesh:coincident-vertices');
    const positions = this.mesh.positions;
    for (let i = 0; i < positions.length; i++) {
      for (let j = i + 1; j < positions.length; j++) {
        const a = positions[i];
        const b = positions[j];
        const d = Math.hypot(a[0] - b[0], a[1] - b[1], a[2] - b[2]);
        if (d < this.coincidentTolerance) {
          this.addError('mesh:coincident-vertices', `Vertices ${i} and ${j} coincide`, { distance: d });
        }
      }
    }
  }

  // ===========================================================================
  // Edges
  // ===========================================================================

  /**
   * Every edge borders at most two faces, and a shared edge is walked in
   * opposite directions by its two faces.
   */
  private validateEdgeUse(): void {
    this.markRuleChecked('mesh:manifold-edges');
    this.markRuleChecked('mesh:consistent-winding');

    const directed = new Map<string, number>();
    for (const face of this.mesh.faces) {
      for (let i = 0; i < face.length; i++) {
        const key = `${face[i]}>${face[(i + 1) % face.length]}`;
        directed.set(key, (directed.get(key) ?? 0) + 1);
      }
    }

    for (const edge of this.mesh.edges) {
      const [a, b] = edge.vertices;
      if (edge.faces.length > 2) {
        this.addError('mesh:manifold-edges', `Edge ${edgeKey(a, b)} borders ${edge.faces.length} faces`, {
          faces: edge.faces,
        });
        continue;
      }
      if (edge.faces.length === 2) {
        const forward = directed.get(`${a}>${b}`) ?? 0;
        const backward = directed.get(`${b}>${a}`) ?? 0;
        if (forward !== 1 || backward !== 1) {
          this.addError('mesh:consistent-winding', `Faces ${edge.faces.join(', ')} disagree on winding`, {
            edge: edgeKey(a, b),
          });
        }
      }
    }
  }
}

/**
 * Validate a mesh with the default rules
 */
export function validateMesh(mesh: MemoryMesh, options?: MeshValidatorOptions): ValidationResult {
  return new MeshValidator(mesh, options).validateAll();
}

/**
 * Format validation result for console output
 */
export function formatValidationResult(result: ValidationResult): string {
  const lines: string[] = [];

  lines.push('='.repeat(60));
  lines.push('MESH VALIDATION');
  lines.push('='.repeat(60));
  lines.push(`Status: ${result.valid ? '✓ VALID' : '✗ INVALID'}`);
  lines.push(`Errors: ${result.summary.errorCount}`);
  lines.push(`Warnings: ${result.summary.warningCount}`);

  for (const error of result.errors) {
    lines.push(`✗ [${error.rule}] ${error.message}`);
  }
  for (const warning of result.warnings) {
    lines.push(`⚠ [${warning.rule}] ${warning.message}`);
  }

  return lines.join('\n');
}
