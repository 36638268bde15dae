export { ErrorCodes, ErrorMessages, TaggrError, isTaggrError, wrapError, type ErrorCode } from "./errors";
