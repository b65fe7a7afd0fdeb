/**
 * Dense matrix helpers and the particle encoding.
 *
 * A particle stores the unknown k×s matrix H as one flat vector in
 * column-major order: flat[c * k + r] = H[r][c]. `flattenColumnMajor` and
 * `unflattenColumnMajor` are the only places that convention is spelled out.
 */

import { z } from 'zod'
import type { Matrix, MatrixInput } from './types.js'
import { ShapeMismatchError, NumericInstabilityError } from './errors.js'

// NaN passes here so it is reported as numeric instability, not as a shape problem
const entrySchema = z.union([z.number(), z.nan()], {
  errorMap: () => ({ message: 'entries must be numbers' }),
})

const nestedRowsSchema = z.array(
  z.array(entrySchema, { invalid_type_error: 'expected a 2-D array of rows' }),
  { invalid_type_error: 'expected a 2-D array of rows' },
)

function isMatrix(value: unknown): value is Matrix {
  if (typeof value !== 'object' || value === null) return false
  if (!('rows' in value) || !('cols' in value) || !('data' in value)) return false
  return (
    typeof value.rows === 'number' &&
    typeof value.cols === 'number' &&
    value.data instanceof Float64Array
  )
}

function assertFinite(m: Matrix, label: string): void {
  for (let i = 0; i < m.data.length; i++) {
    const v = m.data[i]!
    if (!Number.isFinite(v)) {
      const r = Math.floor(i / m.cols)
      const c = i % m.cols
      throw new NumericInstabilityError(label, `entry (${r}, ${c}) is ${v}`)
    }
  }
}

/**
 * Validate and copy a caller matrix into dense row-major form.
 * Rejects anything that is not a non-empty rectangular rank-2 matrix of finite numbers.
 */
export function toMatrix(value: unknown, label: string): Matrix {
  if (isMatrix(value)) {
    if (!Number.isInteger(value.rows) || !Number.isInteger(value.cols) || value.rows < 1 || value.cols < 1) {
      throw new ShapeMismatchError(label, `dimensions must be positive integers, got ${value.rows}x${value.cols}`)
    }
    if (value.data.length !== value.rows * value.cols) {
      throw new ShapeMismatchError(
        label,
        `data length ${value.data.length} does not match ${value.rows}x${value.cols}`,
      )
    }
    const m = { rows: value.rows, cols: value.cols, data: new Float64Array(value.data) }
    assertFinite(m, label)
    return m
  }

  const parsed = nestedRowsSchema.safeParse(value)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new ShapeMismatchError(label, issue ? issue.message : 'expected a 2-D array of rows')
  }
  const rows = parsed.data
  if (rows.length === 0) throw new ShapeMismatchError(label, 'matrix has no rows')
  const firstRow = rows[0]
  const cols = firstRow ? firstRow.length : 0
  if (cols === 0) throw new ShapeMismatchError(label, 'matrix has no columns')

  const data = new Float64Array(rows.length * cols)
  for (let r = 0; r < rows.length; r++) {
    const row = rows[r]
    if (!row || row.length !== cols) {
      throw new ShapeMismatchError(label, `row ${r} has ${row ? row.length : 0} entries, expected ${cols}`)
    }
    data.set(row, r * cols)
  }
  const m = { rows: rows.length, cols, data }
  assertFinite(m, label)
  return m
}

/** Build a dense matrix from nested rows (validated). */
export function matrixFromRows(rows: MatrixInput): Matrix {
  return toMatrix(rows, 'matrix')
}

/** Dense matrix → nested rows */
export function toRows(m: Matrix): number[][] {
  const out: number[][] = []
  for (let r = 0; r < m.rows; r++) {
    out.push(Array.from(m.data.subarray(r * m.cols, (r + 1) * m.cols)))
  }
  return out
}

/** Encode a k×s matrix as a particle position (column-major). */
export function flattenColumnMajor(m: Matrix): Float64Array {
  const flat = new Float64Array(m.rows * m.cols)
  for (let c = 0; c < m.cols; c++) {
    for (let r = 0; r < m.rows; r++) {
      flat[c * m.rows + r] = m.data[r * m.cols + c]!
    }
  }
  return flat
}

/** Decode a particle position back into a rows×cols matrix. */
export function unflattenColumnMajor(flat: Float64Array, rows: number, cols: number): Matrix {
  if (flat.length !== rows * cols) {
    throw new ShapeMismatchError('particle', `length ${flat.length} does not match ${rows}x${cols}`)
  }
  const data = new Float64Array(rows * cols)
  for (let c = 0; c < cols; c++) {
    for (let r = 0; r < rows; r++) {
      data[r * cols + c] = flat[c * rows + r]!
    }
  }
  return { rows, cols, data }
}

/** C = A · B */
export function multiply(a: Matrix, b: Matrix): Matrix {
  if (a.cols !== b.rows) {
    throw new ShapeMismatchError('product', `cannot multiply ${a.rows}x${a.cols} by ${b.rows}x${b.cols}`)
  }
  const data = new Float64Array(a.rows * b.cols)
  for (let i = 0; i < a.rows; i++) {
    for (let p = 0; p < a.cols; p++) {
      const aip = a.data[i * a.cols + p]!
      if (aip === 0) continue
      for (let j = 0; j < b.cols; j++) {
        const at = i * b.cols + j
        data[at] = data[at]! + aip * b.data[p * b.cols + j]!
      }
    }
  }
  return { rows: a.rows, cols: b.cols, data }
}
