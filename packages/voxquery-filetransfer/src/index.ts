// voxquery-filetransfer - file transfers over a query connection
// Negotiates transfers on the control connection and moves the bytes over
// a separate data connection.

export {
  FileTransfer,
  parseInitReply,
  type DataConnector,
  type FileTransferOptions,
  type UploadOptions,
  type DownloadOptions,
  type DownloadedFile,
  type InitReply,
} from "./filetransfer.ts";
export {
  TransferSession,
  type TransferDirection,
  type TransferProgress,
  type TransferResult,
} from "./session.ts";
export { type UploadSource, bufferSource, fileSource } from "./sources.ts";
export { IntegrityError, type IntegrityKind } from "./errors.ts";
