import { ReadingSet } from '../../contracts'
import {
  BYTES_HEADER,
  Cell,
  NAMESPACE_HEADER,
  PACKETS_HEADER,
  PresentOptions,
  Presenter,
  RATE_HEADER,
} from '../Presenter'
import { naturalSort } from '../../utils/naturalSort'
import { NOT_AVAILABLE } from '../../counters/values'

/**
 * Shared header and row selection; subclasses only decide how cells print
 */
export abstract class BasePresenter implements Presenter {
  render(readings: ReadingSet, options: PresentOptions): string {
    return this.renderTable(this.buildHeaders(options), this.buildRows(readings, options))
  }

  protected buildHeaders(options: PresentOptions): string[] {
    const headers = [options.counterType.nameHeader, PACKETS_HEADER, BYTES_HEADER, RATE_HEADER]
    return options.showNamespace ? [NAMESPACE_HEADER, ...headers] : headers
  }

  /**
   * Rows ordered by namespace, then entity name, both in natural order
   */
  protected buildRows(readings: ReadingSet, options: PresentOptions): Cell[][] {
    const namespaces = options.namespace === undefined
      ? naturalSort(Object.keys(readings))
      : [options.namespace]

    const rows: Cell[][] = []
    for (const namespace of namespaces) {
      const namespaceReadings = Object.hasOwn(readings, namespace) ? readings[namespace] : {}
      for (const name of naturalSort(Object.keys(namespaceReadings))) {
        const reading = namespaceReadings[name]
        const row: Cell[] = [
          { kind: 'text', text: name },
          { kind: 'counter', value: reading.packets },
          { kind: 'counter', value: reading.bytes },
          { kind: 'rate', value: reading.rate },
        ]
        rows.push(options.showNamespace ? [{ kind: 'text', text: namespace }, ...row] : row)
      }
    }
    return rows
  }

  /**
   * Cell text without display formatting
   */
  protected rawText(cell: Cell): string {
    switch (cell.kind) {
      case 'text':
        return cell.text
      case 'counter':
        return cell.value.kind === 'count' ? cell.value.value.toString() : NOT_AVAILABLE
      case 'rate':
        return cell.value.kind === 'rate' ? cell.value.display : NOT_AVAILABLE
    }
  }

  protected abstract renderTable(headers: string[], rows: Cell[][]): string
}
