export {
  FileTransferResolver,
  type FileTransferResolverConfig,
  type TransferResult,
} from './fileTransferResolver.js';

export {
  buildSuffixedName,
  resolveAvailablePath,
  DEFAULT_MAX_SUFFIX,
} from './uniqueName.js';
