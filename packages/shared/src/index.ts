export { ok, err } from "./result.js";
export type { Ok, Err, Result } from "./result.js";
export { FEED_ERRORS, errorStatus, makeErrorResponse } from "./errors.js";
export type { ErrorCategory, ErrorResponse, FeedErrorCode } from "./errors.js";
export { createMetricsRegistry } from "./metrics.js";
export type { MetricLabels, MetricsRegistry } from "./metrics.js";
