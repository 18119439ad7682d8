export { FatalError, FATAL_EXIT_CODE } from "./errors.js";
export {
  DiagnosticLogger,
  createLogger,
  formatLogLines,
  silentLogger,
  streamSink,
  toVerbosity,
  type LogSettings,
  type LogSink,
  type Verbosity,
} from "./utils/logger.js";
export {
  AddressFamily,
  familyIpTuple,
  familyToString,
  type NameServerEntry,
} from "./net/address.js";
export { isLocalAddress, type BindableSocket, type LocalAddressOptions } from "./net/local-address.js";
export {
  PRIMARY_RESOLV_CONF,
  REDIRECTED_RESOLV_CONF,
  discoverNameservers,
  parseResolvConf,
  readConfigFile,
  resolvConfFiles,
  type ReadConfigResult,
  type ResolverContext,
} from "./dns/resolv-conf.js";
export {
  FALLBACK_NAMESERVER,
  selectNameserver,
  shuffle,
  type RandomSource,
  type SelectContext,
} from "./dns/select.js";
export {
  DEFAULT_PATH_DIRS,
  FALLBACK_PATH_DIRS,
  SUBPROCESS_LOCALE,
  buildSearchPath,
  buildSubprocessEnv,
  getPath,
  type SearchPathOptions,
  type SubprocessEnv,
  type SubprocessEnvOptions,
} from "./system/search-path.js";
export { which, type WhichContext } from "./system/which.js";
export { loadConfig, parseConfig } from "./config/loader.js";
export { configSchema, type Config } from "./config/schema.js";
