export { exportDot, escapeDotLabel } from './dot-exporter';
export type { DotExportOptions } from './dot-exporter';
export { exportJsonGraph } from './json-exporter';
export type { JsonExportOptions, JsonGraphDocument, JsonGraphNode } from './json-exporter';
export { listTypes } from './type-listing';
export type { ListTypesOptions, TypeFilter } from './type-listing';
export { accessSymbol, stereotype } from './formatting';
