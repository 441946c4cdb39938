// file: src/enums/error-code.enum.ts

export const ErrorCodeEnum = {
  ACCESS_UNAUTHORIZED: "ACCESS_UNAUTHORIZED",

  AUTH_USER_NOT_FOUND: "AUTH_USER_NOT_FOUND",
  AUTH_EMAIL_ALREADY_EXISTS: "AUTH_EMAIL_ALREADY_EXISTS",
  AUTH_INVALID_TOKEN: "AUTH_INVALID_TOKEN",
  AUTH_NOT_FOUND: "AUTH_NOT_FOUND",
  AUTH_TOO_MANY_ATTEMPTS: "AUTH_TOO_MANY_ATTEMPTS",
  AUTH_UNAUTHORIZED_ACCESS: "AUTH_UNAUTHORIZED_ACCESS",
  AUTH_TOKEN_NOT_FOUND: "AUTH_TOKEN_NOT_FOUND",
  AUTH_ACCOUNT_LOCKED: "AUTH_ACCOUNT_LOCKED",

  VALIDATION_ERROR: "VALIDATION_ERROR",
  RESOURCE_NOT_FOUND: "RESOURCE_NOT_FOUND",
  RESOURCE_CONFLICT: "RESOURCE_CONFLICT",
  REQUEST_TOO_LARGE: "REQUEST_TOO_LARGE",
  PAGINATION_INVALID_PAGE: "PAGINATION_INVALID_PAGE",

  SERVICE_NOT_FOUND: "SERVICE_NOT_FOUND",
  SERVICE_IN_USE: "SERVICE_IN_USE",
  PRICING_BLOCK_NOT_FOUND: "PRICING_BLOCK_NOT_FOUND",
  PRICING_OPTION_MISMATCH: "PRICING_OPTION_MISMATCH",
  PRICING_QUANTITY_OUT_OF_RANGE: "PRICING_QUANTITY_OUT_OF_RANGE",

  ORDER_NOT_FOUND: "ORDER_NOT_FOUND",
  ORDER_INVALID_STATUS_TRANSITION: "ORDER_INVALID_STATUS_TRANSITION",
  ORDER_TERMINAL_STATE: "ORDER_TERMINAL_STATE",
  TIMESLOT_UNAVAILABLE: "TIMESLOT_UNAVAILABLE",
  TIMESLOT_MISALIGNED: "TIMESLOT_MISALIGNED",
  CLEANER_NOT_FOUND: "CLEANER_NOT_FOUND",
  CLEANER_TIMESLOT_CONFLICT: "CLEANER_TIMESLOT_CONFLICT",

  DATABASE_CONNECTION_ERROR: "DATABASE_CONNECTION_ERROR",
  INTERNAL_SERVER_ERROR: "INTERNAL_SERVER_ERROR",
} as const;

export type ErrorCodeEnumType = keyof typeof ErrorCodeEnum;
