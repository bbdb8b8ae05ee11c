import { OutputFormat, Presenter } from './Presenter'
import { TablePresenter } from './presenters/TablePresenter'
import { JsonPresenter } from './presenters/JsonPresenter'

/**
 * Factory for creating presenter instances based on the requested output
 */
export class PresenterFactory {
  static createPresenter(format: OutputFormat): Presenter {
    return format === 'json' ? new JsonPresenter() : new TablePresenter()
  }
}
