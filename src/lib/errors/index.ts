export {
  ConnectionError,
  DataError,
  DataTransformError,
  QueryError,
  isDataError,
  wrapDatabaseError,
  type DataErrorOptions,
} from "./data-errors";
export { FilterDefinitionError, isFilterDefinitionError } from "./filter-errors";
