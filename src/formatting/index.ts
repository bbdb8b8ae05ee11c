export type { Presenter, PresentOptions, OutputFormat, Cell } from './Presenter'
export { NAMESPACE_HEADER, PACKETS_HEADER, BYTES_HEADER, RATE_HEADER } from './Presenter'
export { PresenterFactory } from './PresenterFactory'
export { BasePresenter } from './presenters/BasePresenter'
export { TablePresenter } from './presenters/TablePresenter'
export { JsonPresenter } from './presenters/JsonPresenter'
