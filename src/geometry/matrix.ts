/**
 * Small dense-matrix helpers for the GDOP computation.
 *
 * Matrices are row-major `number[][]`. Sizes here are tiny (4×4 normal
 * matrices, N×4 design matrices), so everything is plain loops.
 */

export type Matrix = number[][];

export function zeros(rows: number, cols: number): Matrix {
  return Array.from({ length: rows }, () => new Array<number>(cols).fill(0));
}

export function identity(n: number): Matrix {
  const m = zeros(n, n);
  for (let i = 0; i < n; i++) m[i][i] = 1;
  return m;
}

export function transpose(m: Matrix): Matrix {
  const rows = m.length;
  const cols = rows > 0 ? m[0].length : 0;
  const t = zeros(cols, rows);
  for (let i = 0; i < rows; i++) {
    for (let j = 0; j < cols; j++) t[j][i] = m[i][j];
  }
  return t;
}

export function multiply(a: Matrix, b: Matrix): Matrix {
  const n = a.length;
  const inner = b.length;
  const p = inner > 0 ? b[0].length : 0;
  const out = zeros(n, p);
  for (let i = 0; i < n; i++) {
    for (let k = 0; k < inner; k++) {
      const aik = a[i][k];
      if (aik === 0) continue;
      for (let j = 0; j < p; j++) out[i][j] += aik * b[k][j];
    }
  }
  return out;
}

/**
 * Gauss-Jordan inverse with partial pivoting.
 * Returns `undefined` when a pivot vanishes relative to the matrix scale.
 */
export function invert(m: Matrix): Matrix | undefined {
  const n = m.length;
  const a = m.map((row) => [...row]);
  const inv = identity(n);

  let scale = 0;
  for (const row of a) for (const v of row) scale = Math.max(scale, Math.abs(v));
  if (scale === 0 || !Number.isFinite(scale)) return undefined;
  const tolerance = scale * n * Number.EPSILON;

  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let r = col + 1; r < n; r++) {
      if (Math.abs(a[r][col]) > Math.abs(a[pivot][col])) pivot = r;
    }
    if (Math.abs(a[pivot][col]) <= tolerance) return undefined;

    if (pivot !== col) {
      [a[pivot], a[col]] = [a[col], a[pivot]];
      [inv[pivot], inv[col]] = [inv[col], inv[pivot]];
    }

    const d = a[col][col];
    for (let j = 0; j < n; j++) {
      a[col][j] /= d;
      inv[col][j] /= d;
    }

    for (let r = 0; r < n; r++) {
      if (r === col) continue;
      const f = a[r][col];
      if (f === 0) continue;
      for (let j = 0; j < n; j++) {
        a[r][j] -= f * a[col][j];
        inv[r][j] -= f * inv[col][j];
      }
    }
  }

  return inv;
}

export interface SymmetricEigen {
  /** Eigenvalues, unsorted */
  values: number[];
  /** Eigenvectors as columns */
  vectors: Matrix;
}

/**
 * Cyclic Jacobi eigendecomposition of a symmetric matrix
 */
export function symmetricEigen(m: Matrix, maxSweeps = 100): SymmetricEigen {
  const n = m.length;
  const a = m.map((row) => [...row]);
  const v = identity(n);

  for (let sweep = 0; sweep < maxSweeps; sweep++) {
    let off = 0;
    for (let p = 0; p < n; p++) {
      for (let q = p + 1; q < n; q++) off += a[p][q] * a[p][q];
    }
    if (off < 1e-30) break;

    for (let p = 0; p < n; p++) {
      for (let q = p + 1; q < n; q++) {
        if (Math.abs(a[p][q]) < 1e-300) continue;

        const theta = (a[q][q] - a[p][p]) / (2 * a[p][q]);
        const t = Math.sign(theta || 1) / (Math.abs(theta) + Math.sqrt(theta * theta + 1));
        const c = 1 / Math.sqrt(t * t + 1);
        const s = t * c;

        for (let k = 0; k < n; k++) {
          const akp = a[k][p];
          const akq = a[k][q];
          a[k][p] = c * akp - s * akq;
          a[k][q] = s * akp + c * akq;
        }
        for (let k = 0; k < n; k++) {
          const apk = a[p][k];
          const aqk = a[q][k];
          a[p][k] = c * apk - s * aqk;
          a[q][k] = s * apk + c * aqk;
        }
        for (let k = 0; k < n; k++) {
          const vkp = v[k][p];
          const vkq = v[k][q];
          v[k][p] = c * vkp - s * vkq;
          v[k][q] = s * vkp + c * vkq;
        }
      }
    }
  }

  return { values: a.map((row, i) => row[i]), vectors: v };
}

/**
 * Moore-Penrose pseudo-inverse of a symmetric matrix. Eigenvalues at or
 * below `rcond × max|λ|` are treated as zero.
 */
export function pseudoInverseSymmetric(m: Matrix, rcond: number): Matrix {
  const n = m.length;
  const { values, vectors } = symmetricEigen(m);
  const largest = values.reduce((max, value) => Math.max(max, Math.abs(value)), 0);
  const cutoff = rcond * largest;

  const out = zeros(n, n);
  for (let k = 0; k < n; k++) {
    if (Math.abs(values[k]) <= cutoff || values[k] === 0) continue;
    const inv = 1 / values[k];
    for (let i = 0; i < n; i++) {
      for (let j = 0; j < n; j++) out[i][j] += vectors[i][k] * inv * vectors[j][k];
    }
  }
  return out;
}

/**
 * 2-norm condition number of a symmetric matrix; `Infinity` when singular
 */
export function conditionNumberSymmetric(m: Matrix): number {
  const { values } = symmetricEigen(m);
  const magnitudes = values.map((value) => Math.abs(value));
  const largest = Math.max(...magnitudes);
  const smallest = Math.min(...magnitudes);
  if (!Number.isFinite(largest)) return Number.POSITIVE_INFINITY;
  if (smallest <= largest * Number.EPSILON) return Number.POSITIVE_INFINITY;
  return largest / smallest;
}
