/**
 * Álgebra linear e estatística mínima para o otimizador.
 *
 * Matrizes são number[][] em ordem de linha. Séries de retornos chegam como
 * linhas = períodos, colunas = ativos.
 */

export function dotProduct(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function matVecMul(A: number[][], x: number[]): number[] {
  const result = new Array<number>(A.length).fill(0);
  for (let i = 0; i < A.length; i++) {
    for (let j = 0; j < x.length; j++) {
      result[i] += A[i][j] * x[j];
    }
  }
  return result;
}

export function sum(values: number[]): number {
  return values.reduce((a, b) => a + b, 0);
}

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return sum(values) / values.length;
}

/**
 * Variância amostral (divide por n - 1)
 */
export function sampleVariance(values: number[]): number {
  const n = values.length;
  if (n < 2) return 0;

  const m = mean(values);
  let ss = 0;
  for (const x of values) ss += (x - m) ** 2;
  return ss / (n - 1);
}

export function sampleStdDev(values: number[]): number {
  return Math.sqrt(sampleVariance(values));
}

/**
 * Médias por coluna
 */
export function columnMeans(rows: number[][]): number[] {
  if (rows.length === 0) return [];
  const n = rows[0].length;
  const means = new Array<number>(n).fill(0);
  for (const row of rows) {
    for (let j = 0; j < n; j++) means[j] += row[j];
  }
  return means.map(m => m / rows.length);
}

/**
 * Covariância amostral (n - 1) entre colunas
 */
export function sampleCovariance(rows: number[][]): number[][] {
  const T = rows.length;
  const N = T > 0 ? rows[0].length : 0;
  const cov: number[][] = Array.from({ length: N }, () => new Array<number>(N).fill(0));
  if (T < 2) return cov;

  const means = columnMeans(rows);

  for (let i = 0; i < N; i++) {
    for (let j = i; j < N; j++) {
      let acc = 0;
      for (let t = 0; t < T; t++) {
        acc += (rows[t][i] - means[i]) * (rows[t][j] - means[j]);
      }
      const c = acc / (T - 1);
      cov[i][j] = c;
      cov[j][i] = c;
    }
  }
  return cov;
}

/**
 * Índice de Herfindahl: soma dos pesos ao quadrado
 */
export function herfindahl(weights: number[]): number {
  return dotProduct(weights, weights);
}

export function identity(n: number, scale: number = 1): number[][] {
  return Array.from({ length: n }, (_, i) =>
    Array.from({ length: n }, (_, j) => (i === j ? scale : 0))
  );
}

export function zeros(rows: number, cols: number): number[][] {
  return Array.from({ length: rows }, () => new Array<number>(cols).fill(0));
}

/**
 * A + s * B (mesmas dimensões)
 */
export function addScaled(A: number[][], B: number[][], s: number): number[][] {
  return A.map((row, i) => row.map((v, j) => v + s * B[i][j]));
}
