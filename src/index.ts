// Naming engine
export type {
  Namespace,
  FullyQualifiedName,
  NameErrorKind,
  NameErrorReason,
  NameResult,
  NameErrorDetails,
} from './naming/index.js';

export {
  SEPARATOR,
  ROOT_NAMESPACE,
  PRIVATE_NAMESPACE_PREFIX,
  TOKEN_PATTERN,
  NameError,
  isNameError,
  validateToken,
  isValidToken,
  normalizeNamespace,
  isCanonicalNamespace,
  namespaceSegments,
  joinNamespace,
  NodeIdentity,
  SubIdentity,
  validateSubNamespace,
  tryCreateSubIdentity,
  createSubIdentity,
  loggerName,
} from './naming/index.js';

// Clock
export type { ClockType, Clock } from './clock/index.js';
export { CLOCK_TYPES, Time, SystemClock } from './clock/index.js';

// Logging
export type { LogSeverity, LogRecord, LogSink, NodeLoggerOptions } from './logging/index.js';
export { LOG_SEVERITIES, NodeLogger, formatLogRecord, consoleSink } from './logging/index.js';

// Graph node facade
export type { NodeOptions, NodeSettings } from './node/index.js';
export { NodeOptionsSchema, NodeOptionsError, parseNodeOptions, GraphNode } from './node/index.js';

// Node manifest
export type { NodeEntry, NodeManifest, ResolvedNodeEntry, ManifestResolution } from './config/index.js';
export {
  NodeEntrySchema,
  NodeManifestSchema,
  DEFAULT_NODE_MANIFEST,
  DEFAULT_MANIFEST_PATH,
  NodeManifestError,
  readNodeManifest,
  validateNodeManifest,
  resolveNodeEntry,
  resolveNodeManifest,
} from './config/index.js';
