export {
  DEFAULTS,
  DEFAULT_SCHEMA_ID,
  ResolverConfigSchema,
  ServerConfigSchema,
  type LoggingConfig,
  type ResolverConfig,
  type ServerConfig,
} from "./server-config.js";
export {
  addressSchema,
  byteLength,
  bytes32Schema,
  hexBytesSchema,
  isBytes32,
  isHexBytes,
  isZeroAddress,
  normalizeAddress,
  normalizeBytes32,
  requireNonZeroAddress,
  sameAddress,
  uintSchema,
} from "./primitives.js";
