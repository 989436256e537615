export { ArrayDataSource, type ArrayDataSourceConfig } from './array-data-source.js';
export { FetchSpecification, formatWithBindings, type FetchSpecificationInit } from './fetch-specification.js';
export {
  compareByOrderings,
  parseSelector,
  selectorToString,
  SortOrdering,
  sortObjects,
  type SortSelector,
} from './sort-ordering.js';
