import { BasePresenter } from './BasePresenter'
import { Cell } from '../Presenter'

/**
 * JSON array with one record per row, keyed by header. Counters are kept
 * as decimal strings so 64-bit values survive.
 */
export class JsonPresenter extends BasePresenter {
  protected renderTable(headers: string[], rows: Cell[][]): string {
    const records = rows.map((row) =>
      Object.fromEntries(headers.map((header, column) => [header, this.rawText(row[column])]))
    )
    return JSON.stringify(records, null, 2)
  }
}
