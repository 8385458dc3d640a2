export { EmmError, ErrorCode, isEmmError, wrapError } from './EmmError';
