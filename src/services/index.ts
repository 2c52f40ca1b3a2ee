/**
 * Core services
 */

export { SecureLogger, DEFAULT_SENSITIVE_FIELDS, DIGEST_LENGTH, type SecureLoggerOptions } from './SecureLogger.js';
export {
  RegistrationRegistry,
  DEFAULT_REGISTRATION_TTL_MS,
  type RegistryConfig,
} from './RegistrationRegistry.js';
export { RegistrySweepJob, DEFAULT_SWEEP_INTERVAL_MS } from './RegistrySweepJob.js';
export {
  RequestCoordinator,
  DEFAULT_ADMIN_CHECK_TIMEOUT_MS,
  type CoordinatorConfig,
} from './RequestCoordinator.js';
