export { AppError } from './AppError';
export {
  MetricsError,
  DuplicateMetricError,
  InvalidLabelError,
  InvalidMetricValueError,
  InvalidMetricNameError,
  InvalidBucketsError,
  UnknownMetricError,
} from './MetricsError';
export { bodyParserStatus, statusCodeForError } from './statusCode';
