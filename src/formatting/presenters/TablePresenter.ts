import { BasePresenter } from './BasePresenter'
import { Cell } from '../Presenter'

const COLUMN_GAP = '  '
// Packets, Bytes and rate always close the row
const NUMERIC_COLUMNS = 3
const numberFormat = new Intl.NumberFormat('en-US')

/**
 * Plain-text table: header, dashed rule, rows. Text columns are
 * left-aligned; counter and rate columns are right-aligned.
 */
export class TablePresenter extends BasePresenter {
  protected renderTable(headers: string[], rows: Cell[][]): string {
    const text = rows.map((row) => row.map((cell) => this.formatCell(cell)))
    const rightAligned = headers.map((_, column) => column >= headers.length - NUMERIC_COLUMNS)

    const widths = headers.map((header, column) =>
      Math.max(header.length, ...text.map((row) => row[column].length))
    )

    const line = (cells: string[]): string =>
      cells
        .map((cell, column) =>
          rightAligned[column] ? cell.padStart(widths[column]) : cell.padEnd(widths[column])
        )
        .join(COLUMN_GAP)
        .trimEnd()

    return [
      line(headers),
      widths.map((width) => '-'.repeat(width)).join(COLUMN_GAP),
      ...text.map(line),
    ].join('\n')
  }

  private formatCell(cell: Cell): string {
    if (cell.kind === 'counter' && cell.value.kind === 'count') {
      return numberFormat.format(cell.value.value)
    }
    return this.rawText(cell)
  }
}
