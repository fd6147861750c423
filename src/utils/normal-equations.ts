/**
 * Dense linear least squares via the normal equations.
 *
 * Solves min ||A x − b||² by forming AᵀA x = Aᵀb and factoring AᵀA with
 * Cholesky. Intended for small, well-scaled systems (a handful of columns).
 */

/**
 * Solve (AᵀA) x = Aᵀb. Returns null when AᵀA is not positive definite.
 */
export function solveNormalEquations(A: number[][], b: number[]): number[] | null {
  const numRows = A.length;
  const numCols = A[0]?.length ?? 0;

  // AᵀA (symmetric, fill lower triangle and mirror)
  const AtA: number[][] = new Array(numCols);
  for (let i = 0; i < numCols; i++) {
    AtA[i] = new Array(numCols).fill(0);
    for (let j = 0; j <= i; j++) {
      let sum = 0;
      for (let k = 0; k < numRows; k++) {
        sum += A[k][i] * A[k][j];
      }
      AtA[i][j] = sum;
      if (i !== j) AtA[j][i] = sum;
    }
  }

  const Atb: number[] = new Array(numCols).fill(0);
  for (let j = 0; j < numCols; j++) {
    let sum = 0;
    for (let k = 0; k < numRows; k++) {
      sum += A[k][j] * b[k];
    }
    Atb[j] = sum;
  }

  return choleskySolve(AtA, Atb);
}

/**
 * Solve M x = rhs for symmetric positive definite M.
 */
export function choleskySolve(M: number[][], rhs: number[]): number[] | null {
  const n = rhs.length;
  const L: number[][] = new Array(n);
  for (let i = 0; i < n; i++) {
    L[i] = new Array(n).fill(0);
  }

  for (let i = 0; i < n; i++) {
    for (let j = 0; j <= i; j++) {
      let sum = M[i][j];
      for (let k = 0; k < j; k++) {
        sum -= L[i][k] * L[j][k];
      }
      if (i === j) {
        if (sum <= 0) {
          return null;
        }
        L[i][j] = Math.sqrt(sum);
      } else {
        L[i][j] = sum / L[j][j];
      }
    }
  }

  // Forward substitution: L y = rhs
  const y: number[] = new Array(n);
  for (let i = 0; i < n; i++) {
    let sum = rhs[i];
    for (let j = 0; j < i; j++) {
      sum -= L[i][j] * y[j];
    }
    y[i] = sum / L[i][i];
  }

  // Back substitution: Lᵀ x = y
  const x: number[] = new Array(n);
  for (let i = n - 1; i >= 0; i--) {
    let sum = y[i];
    for (let j = i + 1; j < n; j++) {
      sum -= L[j][i] * x[j];
    }
    x[i] = sum / L[i][i];
  }

  return x;
}
