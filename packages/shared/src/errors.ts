export type ErrorCategory =
  | "Unauthorized"
  | "NotFound"
  | "Forbidden"
  | "Conflict"
  | "Validation"
  | "RateLimited"
  | "Internal";

export type FeedErrorCode =
  | "unauthorized"
  | "tweet_not_found"
  | "media_not_found"
  | "like_not_found"
  | "user_not_found"
  | "follow_not_found"
  | "file_missing"
  | "not_tweet_owner"
  | "already_liked"
  | "already_following"
  | "self_follow"
  | "self_unfollow"
  | "file_too_large"
  | "route_not_found"
  | "invalid_request"
  | "rate_limited"
  | "internal_error";

type ErrorDescriptor = {
  category: ErrorCategory;
  status: number;
  message: string;
};

export const FEED_ERRORS: Record<FeedErrorCode, ErrorDescriptor> = {
  unauthorized: { category: "Unauthorized", status: 401, message: "User not found" },
  tweet_not_found: { category: "NotFound", status: 404, message: "Tweet not found" },
  media_not_found: { category: "NotFound", status: 404, message: "Media not found" },
  like_not_found: { category: "NotFound", status: 404, message: "Like not found" },
  user_not_found: { category: "NotFound", status: 404, message: "User not found" },
  follow_not_found: { category: "NotFound", status: 404, message: "Follow not found" },
  // Missing filename shares the "file not found" code.
  file_missing: { category: "NotFound", status: 404, message: "File not found" },
  route_not_found: { category: "NotFound", status: 404, message: "Route not found" },
  not_tweet_owner: { category: "Forbidden", status: 403, message: "Not allowed to delete this tweet" },
  already_liked: { category: "Conflict", status: 409, message: "Tweet already liked" },
  already_following: { category: "Conflict", status: 409, message: "Already following this user" },
  self_follow: { category: "Validation", status: 400, message: "You cannot follow yourself" },
  self_unfollow: { category: "Validation", status: 400, message: "You cannot unfollow yourself" },
  file_too_large: { category: "Validation", status: 400, message: "File exceeds the upload limit" },
  invalid_request: { category: "Validation", status: 400, message: "Invalid request" },
  rate_limited: { category: "RateLimited", status: 429, message: "Too many requests" },
  internal_error: { category: "Internal", status: 500, message: "Internal error" }
};

export type ErrorResponse = {
  result: false;
  error_type: ErrorCategory;
  error_message: string;
  debug?: { cause?: string; hint?: string };
};

type ErrorOptions = {
  message?: string;
  debug?: { cause?: string; hint?: string };
  devMode?: boolean;
};

export const errorStatus = (code: FeedErrorCode) => FEED_ERRORS[code].status;

export const makeErrorResponse = (
  code: FeedErrorCode,
  options: ErrorOptions = {}
): ErrorResponse => {
  const descriptor = FEED_ERRORS[code];
  const response: ErrorResponse = {
    result: false,
    error_type: descriptor.category,
    error_message: options.message ?? descriptor.message
  };
  if (options.devMode && options.debug) {
    response.debug = options.debug;
  }
  return response;
};
