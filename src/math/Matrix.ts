import { EPSILON } from "@/config/tracerConfig";
import type { MatrixInversion, Tuple } from "@/types";
import { approxEqual } from "./Tuple";

/**
 * Thrown by Matrix.inverse() when the determinant is zero
 */
export class NotInvertibleError extends Error {
  readonly determinant: number;

  constructor(determinant: number) {
    super(`Matrix is not invertible (determinant ${determinant})`);
    this.name = "NotInvertibleError";
    this.determinant = determinant;
  }
}

/**
 * Matrix - Immutable square matrix, stored row-major.
 *
 * 4x4 is the working size for transforms; 2x2 and 3x3 appear as submatrices
 * during determinant expansion. Determinant and inverse are computed lazily
 * and cached.
 */
export class Matrix {
  /** Number of rows (and columns) */
  readonly size: number;
  private readonly _values: readonly number[];
  /** Cached determinant (lazy computed) */
  private _determinant: number | null = null;
  /** Cached inversion result (lazy computed) */
  private _inversion: MatrixInversion | null = null;

  private constructor(size: number, values: readonly number[]) {
    this.size = size;
    this._values = values;
  }

  /**
   * Create a matrix from a list of rows.
   * All rows must have the same length as the number of rows.
   */
  static fromRows(rows: readonly (readonly number[])[]): Matrix {
    const size = rows.length;
    if (size === 0) {
      throw new Error("Matrix requires at least one row");
    }
    for (const row of rows) {
      if (row.length !== size) {
        throw new Error(`Matrix must be square: expected rows of ${size}, got ${row.length}`);
      }
    }
    return new Matrix(size, rows.flat());
  }

  static identity(size = 4): Matrix {
    const values: number[] = [];
    for (let row = 0; row < size; row++) {
      for (let col = 0; col < size; col++) {
        values.push(row === col ? 1 : 0);
      }
    }
    return new Matrix(size, values);
  }

  /**
   * Get the element at (row, col).
   */
  get(row: number, col: number): number {
    if (!this._inBounds(row) || !this._inBounds(col)) {
      throw new RangeError(
        `Matrix index (${row}, ${col}) out of bounds for ${this.size}x${this.size} matrix`
      );
    }
    return this._at(row, col);
  }

  /**
   * Copy of the elements as nested rows
   */
  toRows(): number[][] {
    const rows: number[][] = [];
    for (let row = 0; row < this.size; row++) {
      rows.push(this._values.slice(row * this.size, (row + 1) * this.size));
    }
    return rows;
  }

  /**
   * Matrix product this * other.
   * Transforms compose right-to-left: (A * B) * p applies B first, then A.
   */
  multiply(other: Matrix): Matrix {
    this._assertSameSize(other);
    const n = this.size;
    const values: number[] = [];
    for (let row = 0; row < n; row++) {
      for (let col = 0; col < n; col++) {
        let sum = 0;
        for (let i = 0; i < n; i++) {
          sum += this._at(row, i) * other._at(i, col);
        }
        values.push(sum);
      }
    }
    return new Matrix(n, values);
  }

  /**
   * Apply this 4x4 matrix to a tuple
   */
  multiplyTuple(t: Tuple): Tuple {
    if (this.size !== 4) {
      throw new Error(`Only 4x4 matrices can transform tuples, got ${this.size}x${this.size}`);
    }
    const row = (r: number) =>
      this._at(r, 0) * t.x + this._at(r, 1) * t.y + this._at(r, 2) * t.z + this._at(r, 3) * t.w;
    return { x: row(0), y: row(1), z: row(2), w: row(3) };
  }

  transpose(): Matrix {
    const n = this.size;
    const values: number[] = [];
    for (let row = 0; row < n; row++) {
      for (let col = 0; col < n; col++) {
        values.push(this._at(col, row));
      }
    }
    return new Matrix(n, values);
  }

  /**
   * Matrix one size smaller, with the given row and column removed
   */
  submatrix(row: number, col: number): Matrix {
    if (this.size < 2) {
      throw new Error("Cannot take a submatrix of a 1x1 matrix");
    }
    if (!this._inBounds(row) || !this._inBounds(col)) {
      throw new RangeError(`Submatrix index (${row}, ${col}) out of bounds`);
    }
    const values: number[] = [];
    for (let r = 0; r < this.size; r++) {
      if (r === row) continue;
      for (let c = 0; c < this.size; c++) {
        if (c === col) continue;
        values.push(this._at(r, c));
      }
    }
    return new Matrix(this.size - 1, values);
  }

  /**
   * Determinant of the submatrix at (row, col)
   */
  minor(row: number, col: number): number {
    return this.submatrix(row, col).determinant();
  }

  /**
   * Minor with its sign flipped when row + col is odd
   */
  cofactor(row: number, col: number): number {
    const minor = this.minor(row, col);
    return (row + col) % 2 === 0 ? minor : -minor;
  }

  /**
   * 2x2: ad - bc. Larger: cofactor expansion along row 0.
   */
  determinant(): number {
    if (this._determinant === null) {
      this._determinant = this._computeDeterminant();
    }
    return this._determinant;
  }

  /**
   * |det| >= epsilon. A non-finite determinant (NaN entries) is never invertible.
   * With epsilon 0 only an exact zero determinant counts as singular.
   */
  isInvertible(epsilon: number = EPSILON): boolean {
    const det = this.determinant();
    return Number.isFinite(det) && det !== 0 && Math.abs(det) >= epsilon;
  }

  /**
   * Invert the matrix, reporting a singular matrix instead of dividing by zero.
   * Only the default-epsilon result is cached.
   */
  invert(epsilon: number = EPSILON): MatrixInversion {
    if (epsilon !== EPSILON) {
      return this._computeInversion(epsilon);
    }
    if (this._inversion === null) {
      this._inversion = this._computeInversion(epsilon);
    }
    return this._inversion;
  }

  /**
   * Inverse of the matrix.
   * @throws NotInvertibleError if the determinant is zero
   */
  inverse(): Matrix {
    const inversion = this.invert();
    if (!inversion.invertible) {
      throw new NotInvertibleError(inversion.determinant);
    }
    return inversion.matrix;
  }

  equals(other: Matrix, epsilon: number = EPSILON): boolean {
    if (other.size !== this.size) return false;
    return this._values.every((value, i) => approxEqual(value, other._values[i], epsilon));
  }

  private _computeDeterminant(): number {
    if (this.size === 1) {
      return this._at(0, 0);
    }
    if (this.size === 2) {
      return this._at(0, 0) * this._at(1, 1) - this._at(0, 1) * this._at(1, 0);
    }
    let det = 0;
    for (let col = 0; col < this.size; col++) {
      det += this._at(0, col) * this.cofactor(0, col);
    }
    return det;
  }

  private _computeInversion(epsilon: number): MatrixInversion {
    const det = this.determinant();
    if (!this.isInvertible(epsilon)) {
      return { invertible: false, determinant: det };
    }
    const n = this.size;
    const values = new Array<number>(n * n).fill(0);
    for (let row = 0; row < n; row++) {
      for (let col = 0; col < n; col++) {
        // Writing to [col][row] transposes the cofactor matrix (the adjugate)
        values[col * n + row] = this.cofactor(row, col) / det;
      }
    }
    return { invertible: true, matrix: new Matrix(n, values) };
  }

  private _at(row: number, col: number): number {
    return this._values[row * this.size + col];
  }

  private _inBounds(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.size;
  }

  private _assertSameSize(other: Matrix): void {
    if (other.size !== this.size) {
      throw new Error(`Matrix size mismatch: ${this.size}x${this.size} vs ${other.size}x${other.size}`);
    }
  }
}
