export {
  validateGenericAcmeConfig,
  validateProviderConfig,
  isValidEmail,
  isValidServer,
} from './acme-config-validator.js';
export { parseUnitConfig, acmeConfigFrom, StaticConfigSource } from './unit-config.js';
export {
  acmeServers,
  resolveServerUrl,
  friendlyServerName,
  type AcmeServerEntry,
  type AcmeServerConfig,
} from './acme-servers.js';
