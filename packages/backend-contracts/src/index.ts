/**
 * @pkbridge/backend-contracts
 *
 * Shared types for the package-daemon backend bridge: daemon enumerations,
 * bitfields, package ids, the host job surface, errors and runtime record
 * schemas.
 */

// Enumerations
export {
  Group,
  Role,
  Filter,
  Info,
  Status,
  TransactionFlag,
  enumValues,
  roleToString,
  roleFromString,
  groupToString,
  groupFromString,
  infoToString,
  infoFromString,
  statusToString,
  transactionFlagToString,
  filterToString,
  filterFromString,
  filterNegation,
  filterBase,
} from './enums.js';

// Bitfields
export type { Bitfield } from './bitfield.js';
export {
  EMPTY_BITFIELD,
  bitfieldAdd,
  bitfieldRemove,
  bitfieldContains,
  bitfieldContainsAny,
  bitfieldUnion,
  bitfieldFromEnums,
  bitfieldToEnums,
  roleBitfieldToString,
  roleBitfieldFromString,
  groupBitfieldToString,
  groupBitfieldFromString,
  filterBitfieldToString,
  filterBitfieldFromString,
} from './bitfield.js';

// Package ids
export type { PackageIdParts } from './package-id.js';
export { buildPackageId, parsePackageId, isValidPackageId } from './package-id.js';

// Host job surface
export type { BackendJob, PackageDetails, RepoDetail, UpdateDetail, KeyFile } from './job.js';

// Logging
export type { BackendLogger } from './logger.js';
export { noopLogger } from './logger.js';

// Errors
export type { ErrorCodeType, SerializedError } from './errors.js';
export {
  ErrorCode,
  BackendError,
  LifecycleError,
  RuntimeUnavailableError,
  RuntimeStartError,
  RuntimeCallError,
  MalformedResultError,
  InvalidArgumentError,
  FilterInvalidError,
  PackageIdInvalidError,
  NotSupportedError,
  ConfigError,
  isKnownErrorCode,
  isBackendError,
  isErrorLike,
  isThenable,
  normalizeError,
} from './errors.js';

// Runtime records
export type {
  PackageRecord,
  DetailsRecord,
  FilesRecord,
  RepoRecord,
  UpdateDetailRecord,
  DownloadRecord,
} from './records.js';
export {
  infoNameSchema,
  groupNameSchema,
  packageRecordSchema,
  detailsRecordSchema,
  filesRecordSchema,
  repoRecordSchema,
  updateDetailRecordSchema,
  downloadRecordSchema,
} from './records.js';
