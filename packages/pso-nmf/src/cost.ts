/**
 * Squared Frobenius residual of a candidate H.
 *
 *   f(H) = Σ_{r,c} (X_rc − Σ_i W_ri · max(lb, H_ic))²
 *
 * Entries below the lower bound are lifted to it before evaluation. This uses
 * the same bound as the position projection, so for any stored particle the
 * lift is a no-op; it only matters for candidates built outside the swarm.
 */

import type { CostFunction, Matrix, MatrixInput } from './types.js'
import { toMatrix, multiply } from './matrix.js'
import { ShapeMismatchError } from './errors.js'

/**
 * Build the cost function for fixed W (g×k) and X (g×s).
 * Candidates are flat column-major vectors of length k·s.
 */
export function createCostFunction(W: Matrix, X: Matrix, lowerBound: number): CostFunction {
  const g = W.rows
  const k = W.cols
  const s = X.cols
  const column = new Float64Array(k)

  return (flat: Float64Array): number => {
    let sum = 0
    for (let c = 0; c < s; c++) {
      const offset = c * k
      for (let i = 0; i < k; i++) {
        const v = flat[offset + i]!
        column[i] = v < lowerBound ? lowerBound : v
      }
      for (let r = 0; r < g; r++) {
        let pred = 0
        const wRow = r * k
        for (let i = 0; i < k; i++) {
          pred += W.data[wRow + i]! * column[i]!
        }
        const resid = X.data[r * s + c]! - pred
        sum += resid * resid
      }
    }
    return sum
  }
}

/** ‖X − W·H‖_F, the figure usually reported after a fit. */
export function reconstructionError(W: MatrixInput, X: MatrixInput, H: MatrixInput): number {
  const w = toMatrix(W, 'W')
  const x = toMatrix(X, 'X')
  const h = toMatrix(H, 'H')
  if (w.cols !== h.rows || w.rows !== x.rows || h.cols !== x.cols) {
    throw new ShapeMismatchError(
      'reconstruction',
      `W is ${w.rows}x${w.cols}, H is ${h.rows}x${h.cols}, X is ${x.rows}x${x.cols}`,
    )
  }
  const approx = multiply(w, h)
  let sum = 0
  for (let i = 0; i < x.data.length; i++) {
    const d = x.data[i]! - approx.data[i]!
    sum += d * d
  }
  return Math.sqrt(sum)
}
