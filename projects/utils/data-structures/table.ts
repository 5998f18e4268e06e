import type { IHaveDebugStr } from '../debug.js';

export interface ConstTable<D> extends IHaveDebugStr {
  numRows: number;
  numCols: number;
  getCell(row: number, col: number): D;
}

/**
 * A grid of cells that grows one row or column at a time. Used for
 * rendering transition tables.
 */
export class Table<D> implements ConstTable<D> {
  private rows: D[][] = [];
  private _numCols: number = 0;
  private makeDefault: () => D;

  constructor(makeDefault: () => D) {
    this.makeDefault = makeDefault;
  }

  static init<D>(numRows: number, numCols: number, makeDefault: () => D) {
    let table = new Table(makeDefault);
    for (let row = 0; row < numRows; row++) {
      table.addRow();
    }
    for (let col = 0; col < numCols; col++) {
      table.addCol();
    }
    return table;
  }

  get numRows() {
    return this.rows.length;
  }
  get numCols() {
    return this._numCols;
  }

  /**
   * Add a row where each cell holds the default value.
   */
  addRow() {
    let cols: D[] = [];
    for (let c = 0; c < this._numCols; c++) {
      cols.push(this.makeDefault());
    }
    this.rows.push(cols);
  }

  /**
   * Add a column where each cell holds the default value.
   */
  addCol() {
    this._numCols++;
    for (let rowi = 0; rowi < this.rows.length; rowi++) {
      this.rows[rowi].push(this.makeDefault());
    }
  }

  setCell(row: number, col: number, value: D) {
    if (row < 0 || row >= this.rows.length) {
      throw new Error(
        `TableIndexError: Invalid row ${row}. Must be between 0 and ${this.rows.length} exclusive`
      );
    }
    if (col < 0 || col >= this._numCols) {
      throw new Error(
        `TableIndexError: Invalid col ${col}. Must be between 0 and ${this._numCols} exclusive`
      );
    }
    this.rows[row][col] = value;
  }

  getCell(row: number, col: number): D {
    return this.rows[row][col];
  }

  /**
   * Render the table with every column right-aligned to its widest cell
   * plus two spaces of padding.
   */
  toDebugStr() {
    let out = '';
    let minWidths: number[] = [];
    for (let ci = 0; ci < this.numCols; ci++) {
      let minWidth = 1;
      for (let ri = 0; ri < this.numRows; ri++) {
        minWidth = Math.max(minWidth, `${this.getCell(ri, ci)}`.length);
      }
      minWidths.push(minWidth);
    }

    for (let row = 0; row < this.numRows; row++) {
      for (let col = 0; col < this.numCols; col++) {
        out += `${this.getCell(row, col)}`.padStart(minWidths[col] + 2);
      }
      out += '\n';
    }
    return out;
  }
}
