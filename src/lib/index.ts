/**
 * DNS-01 issuer library - core exports
 */

// Request orchestration
export * from './core/index.js';

// Configuration
export * from './config/index.js';

// DNS providers
export * from './providers/index.js';

// Host collaborators
export * from './runtime/index.js';

// CSR handling
export * from './crypto/index.js';

// Errors
export {
  IssuerError,
  ConfigError,
  CsrParseError,
  SubjectTooLongError,
  ExecutionError,
  CertificateRetrievalError,
  InfrastructureUnavailableError,
  UnknownProviderError,
  isIssuerError,
  type IssuerErrorType,
} from './errors/errors.js';
export { ISSUER_ERROR, type IssuerErrorCode } from './errors/codes.js';

// Constants
export * from './constants/defaults.js';
export {
  UNIT_STATUS,
  REQUEST_STATE,
  STATUS_MESSAGE,
  type UnitStatusValue,
  type RequestStateValue,
} from './constants/status.js';

// Types
export type {
  UnitConfig,
  AcmeConfig,
  ConfigSource,
  ProviderEnvironment,
  ValidationResult,
} from './types/config.js';
export type { CertificateCreationRequest, CertificateChain, Publication } from './types/request.js';
export {
  activeStatus,
  blockedStatus,
  waitingStatus,
  maintenanceStatus,
  isActive,
  describeStatus,
  type OperationalStatus,
  type ActiveStatus,
  type BlockedStatus,
  type WaitingStatus,
  type MaintenanceStatus,
} from './types/status.js';

// Utils
export * from './utils/index.js';
