export { ReaderError, ReaderErrorCode, type ReaderErrorCodeType } from './errors';
