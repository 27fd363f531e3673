import type { Scalar } from "./dtype.js";
import { NDArray } from "./ndarray.js";

export type IndexLabel = string | number;

/**
 * Single labelled column. On the wire it travels as a plain typed array,
 * so name and index do not survive a round trip.
 */
export class Series {
  constructor(
    readonly values: NDArray,
    readonly name: string | null = null,
    readonly index: readonly IndexLabel[] | null = null
  ) {
    if (values.ndim !== 1) {
      throw new RangeError(`series values must be 1-D, got ${values.ndim}-D`);
    }
    if (index && index.length !== values.size) {
      throw new RangeError(`Length mismatch: expected ${values.size} index labels, got ${index.length}`);
    }
  }

  get length(): number {
    return this.values.size;
  }

  *[Symbol.iterator](): Iterator<Scalar> {
    for (let i = 0; i < this.values.size; i++) yield this.values.data[i];
  }
}

/**
 * Named-column table over one 2-D array (rows × columns). A null index stands
 * for the implicit 0..n-1 range.
 */
export class DataFrame {
  readonly columns: readonly string[];
  readonly values: NDArray;
  readonly index: readonly IndexLabel[] | null;

  constructor(columns: readonly string[], values: NDArray, index: readonly IndexLabel[] | null = null) {
    if (columns.length > 0 && (values.ndim !== 2 || values.shape[1] !== columns.length)) {
      throw new RangeError(
        `Shape of passed values is (${values.shape.join(", ")}), columns imply ${columns.length} columns`
      );
    }
    const rows = values.ndim === 0 ? 0 : values.shape[0];
    if (index && index.length !== rows) {
      throw new RangeError(`Length mismatch: expected ${rows} index labels, got ${index.length}`);
    }
    this.columns = [...columns];
    this.values = values;
    this.index = index ? [...index] : null;
  }

  get rows(): number {
    return this.values.ndim === 0 ? 0 : this.values.shape[0];
  }

  column(name: string): Series {
    const j = this.columns.indexOf(name);
    if (j === -1) throw new RangeError(`no column named '${name}'`);
    const width = this.columns.length;
    const picked: Scalar[] = [];
    for (let i = 0; i < this.rows; i++) picked.push(this.values.data[i * width + j]);
    return new Series(NDArray.from(picked, this.values.dtype), name, this.index);
  }

  /** One object per row, keyed by column name. */
  toRecords(): Record<string, Scalar>[] {
    const width = this.columns.length;
    const records: Record<string, Scalar>[] = [];
    for (let i = 0; i < this.rows; i++) {
      const record: Record<string, Scalar> = {};
      this.columns.forEach((column, j) => {
        record[column] = this.values.data[i * width + j];
      });
      records.push(record);
    }
    return records;
  }

  toString(): string {
    return `DataFrame(${this.rows}x${this.columns.length}, columns=[${this.columns.join(", ")}])`;
  }
}
