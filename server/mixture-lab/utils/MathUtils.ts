/**
 * MathUtils - Funções numéricas compartilhadas
 *
 * @version 1.0.0
 */

/**
 * Comparação com tolerância: vale a maior entre a relativa e a absoluta
 */
export function isClose(a: number, b: number, relTol: number = 1e-9, absTol: number = 0): boolean {
  if (a === b) return true;
  const diff = Math.abs(a - b);
  return diff <= Math.max(relTol * Math.max(Math.abs(a), Math.abs(b)), absTol);
}

/**
 * Arredonda para `digits` casas decimais
 */
export function roundTo(value: number, digits: number): number {
  return Number(value.toFixed(digits));
}

/**
 * Copia o triângulo inferior sobre o superior em cada matriz.
 * Não altera as matrizes recebidas.
 */
export function symmetrizeFromLower(matrices: readonly (readonly (readonly number[])[])[]): number[][][] {
  return matrices.map(matrix =>
    matrix.map((row, i) => row.map((value, j) => (j <= i ? value : matrix[j][i])))
  );
}

export function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * log(exp(a) + exp(b)) sem overflow nem underflow
 */
export function logAddExp(a: number, b: number): number {
  const max = Math.max(a, b);
  if (max === Number.NEGATIVE_INFINITY) return max;
  return max + Math.log(Math.exp(a - max) + Math.exp(b - max));
}
