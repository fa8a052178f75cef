/**
 * MultivariateNormal - Densidades normais multivariadas
 *
 * Duas implementações:
 * - CholeskyNormalDensity: exige covariância simétrica definida positiva.
 *   Também avalia a densidade ao longo de uma reta em lote (forma quadrática
 *   em k), usada pelo caminho rápido do OLR.
 * - GeneralizedNormalDensity: via autodecomposição, aceita covariâncias
 *   singulares (pseudo-inversa e pseudo-determinante).
 *
 * @version 1.0.0
 */

import { CholeskyDecomposition, EigenvalueDecomposition, Matrix } from "ml-matrix";
import {
  createConfigInvalidError,
  createDimensionMismatchError,
  createMatrixNotPsdError,
  createNotPositiveDefiniteError,
} from "../utils/LabErrors";
import { symmetrizeFromLower } from "../utils/MathUtils";

// ============================================================================
// TYPES
// ============================================================================

export interface NormalDensity {
  readonly dimension: number;
  logDensity(point: readonly number[]): number;
  density(point: readonly number[]): number;
}

const LOG_TWO_PI = Math.log(2 * Math.PI);

/** Fator de tolerância espectral: autovalores abaixo de eps contam como zero */
const EIGEN_TOLERANCE_FACTOR = 1e6;

const SYMMETRY_TOLERANCE = 1e-10;

// ============================================================================
// HELPERS
// ============================================================================

function checkSquare(covariance: readonly (readonly number[])[], dimension: number): void {
  if (covariance.length !== dimension) {
    throw createDimensionMismatchError("covariance rows", dimension, covariance.length);
  }
  for (const row of covariance) {
    if (row.length !== dimension) {
      throw createDimensionMismatchError("covariance columns", dimension, row.length);
    }
    if (row.some(value => !Number.isFinite(value))) {
      throw createConfigInvalidError("covariance", "valores devem ser finitos");
    }
  }
}

function deviation(point: readonly number[], mean: readonly number[]): number[] {
  if (point.length !== mean.length) {
    throw createDimensionMismatchError("point", mean.length, point.length);
  }
  return point.map((value, i) => value - mean[i]);
}

export function isSymmetric(matrix: readonly (readonly number[])[]): boolean {
  for (let i = 0; i < matrix.length; i++) {
    for (let j = 0; j < i; j++) {
      const a = matrix[i][j];
      const b = matrix[j][i];
      if (Math.abs(a - b) > SYMMETRY_TOLERANCE * Math.max(1, Math.abs(a), Math.abs(b))) {
        return false;
      }
    }
  }
  return true;
}

/**
 * Simétrica (a menos de tolerância) e com fatoração de Cholesky válida
 */
export function isSymmetricPositiveDefinite(matrix: readonly (readonly number[])[]): boolean {
  if (matrix.length === 0 || matrix.some(row => row.length !== matrix.length)) return false;
  if (!isSymmetric(matrix)) return false;

  const [symmetric] = symmetrizeFromLower([matrix]);
  return new CholeskyDecomposition(new Matrix(symmetric)).isPositiveDefinite();
}

/**
 * Resolve L·z = b por substituição direta
 */
function forwardSubstitute(lower: Matrix, b: readonly number[]): number[] {
  const z: number[] = [];
  for (let i = 0; i < b.length; i++) {
    let acc = b[i];
    for (let j = 0; j < i; j++) {
      acc -= lower.get(i, j) * z[j];
    }
    z.push(acc / lower.get(i, i));
  }
  return z;
}

function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i];
  return sum;
}

// ============================================================================
// CHOLESKY DENSITY
// ============================================================================

export class CholeskyNormalDensity implements NormalDensity {
  readonly dimension: number;
  private readonly mean: number[];
  private readonly lower: Matrix;
  private readonly logNormalizer: number;

  /**
   * @param component - índice do componente, usado apenas na mensagem de erro
   */
  constructor(mean: readonly number[], covariance: readonly (readonly number[])[], component: number = 0) {
    this.dimension = mean.length;
    checkSquare(covariance, this.dimension);

    if (!isSymmetric(covariance)) {
      throw createNotPositiveDefiniteError(component);
    }

    const [symmetric] = symmetrizeFromLower([covariance]);
    const cholesky = new CholeskyDecomposition(new Matrix(symmetric));
    if (!cholesky.isPositiveDefinite()) {
      throw createNotPositiveDefiniteError(component);
    }

    this.mean = [...mean];
    this.lower = cholesky.lowerTriangularMatrix;

    let logDet = 0;
    for (let i = 0; i < this.dimension; i++) {
      logDet += 2 * Math.log(this.lower.get(i, i));
    }
    this.logNormalizer = -0.5 * (this.dimension * LOG_TWO_PI + logDet);
  }

  logDensity(point: readonly number[]): number {
    const z = forwardSubstitute(this.lower, deviation(point, this.mean));
    return this.logNormalizer - 0.5 * dot(z, z);
  }

  density(point: readonly number[]): number {
    return Math.exp(this.logDensity(point));
  }

  /**
   * Log-densidades em origin + k·direction para k = 0..count-1.
   * A distância de Mahalanobis é quadrática em k, então basta uma
   * substituição para a origem e outra para a direção.
   */
  logDensityAlongLine(origin: readonly number[], direction: readonly number[], count: number): Float64Array {
    const z0 = forwardSubstitute(this.lower, deviation(origin, this.mean));
    const zd = forwardSubstitute(this.lower, [...direction]);

    const a = dot(z0, z0);
    const b = dot(z0, zd);
    const c = dot(zd, zd);

    const out = new Float64Array(count);
    for (let k = 0; k < count; k++) {
      out[k] = this.logNormalizer - 0.5 * (a + 2 * b * k + c * k * k);
    }
    return out;
  }

  densityAlongLine(origin: readonly number[], direction: readonly number[], count: number): Float64Array {
    return this.logDensityAlongLine(origin, direction, count).map(Math.exp);
  }
}

// ============================================================================
// GENERALIZED DENSITY (singular-tolerant)
// ============================================================================

export class GeneralizedNormalDensity implements NormalDensity {
  readonly dimension: number;
  readonly rank: number;
  private readonly mean: number[];
  /** Colunas u_i / sqrt(s_i) dos autovalores acima da tolerância */
  private readonly whitening: number[][];
  private readonly logNormalizer: number;

  constructor(mean: readonly number[], covariance: readonly (readonly number[])[]) {
    this.dimension = mean.length;
    checkSquare(covariance, this.dimension);

    // Apenas o triângulo inferior é lido
    const [symmetric] = symmetrizeFromLower([covariance]);
    const decomposition = new EigenvalueDecomposition(new Matrix(symmetric), { assumeSymmetric: true });
    const eigenvalues = decomposition.realEigenvalues;
    const vectors = decomposition.eigenvectorMatrix;

    const largest = Math.max(...eigenvalues.map(Math.abs));
    const eps = EIGEN_TOLERANCE_FACTOR * Number.EPSILON * largest;
    const smallest = Math.min(...eigenvalues);

    if (smallest < -eps) {
      throw createMatrixNotPsdError(smallest);
    }

    const whitening: number[][] = [];
    let logPseudoDet = 0;

    eigenvalues.forEach((s, col) => {
      if (s <= eps) return;
      logPseudoDet += Math.log(s);
      const scale = 1 / Math.sqrt(s);
      whitening.push(Array.from({ length: this.dimension }, (_, row) => vectors.get(row, col) * scale));
    });

    this.mean = [...mean];
    this.whitening = whitening;
    this.rank = whitening.length;
    this.logNormalizer = -0.5 * (this.rank * LOG_TWO_PI + logPseudoDet);
  }

  logDensity(point: readonly number[]): number {
    const dev = deviation(point, this.mean);
    let mahalanobis = 0;
    for (const column of this.whitening) {
      const projection = dot(dev, column);
      mahalanobis += projection * projection;
    }
    return this.logNormalizer - 0.5 * mahalanobis;
  }

  density(point: readonly number[]): number {
    return Math.exp(this.logDensity(point));
  }
}

// ============================================================================
// FUNCTIONS
// ============================================================================

/**
 * weight · N(point; mean, covariance), tolerando covariância singular
 */
export function weightedNormalDensity(
  point: readonly number[],
  weight: number,
  mean: readonly number[],
  covariance: readonly (readonly number[])[]
): number {
  return weight * new GeneralizedNormalDensity(mean, covariance).density(point);
}
