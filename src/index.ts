export { PrefixRunner, ensureTrailingSeparator } from './core/pipeline/runner.js';
export type { PrefixRunnerDeps, PrefixRunnerOptions } from './core/pipeline/runner.js';
export { discover, orderFiles, parsePrefix } from './core/pipeline/discovery.js';
export {
  buildInvocation,
  defaultExtensions,
  extensionOf,
  mergeExtensions,
  resolveCommand,
} from './core/pipeline/extensions.js';
export { createDirectoryReader } from './core/pipeline/directory-reader.js';
export { NodeProcessLauncher, commandExists } from './core/pipeline/process-launcher.js';
export type { LaunchedChild, NodeProcessLauncherOptions, SpawnFn } from './core/pipeline/process-launcher.js';
export {
  formatElapsed,
  formatReport,
  formatTimestamp,
  renderReport,
  renderTable,
  REPORT_HEADERS,
} from './core/report/format.js';
export { loadRuntimeConfig, parseExtensionFlag, resolveConfigSources } from './core/config/runtime-config.js';
export { createLogger, noopLogger } from './core/kernel/logger.js';
export type { LogEntry, RunLogger } from './core/kernel/logger.js';
export { runCli, parseCliArgs } from './core/app/cli.js';
export * from './errors.js';
export type {
  DirectoryReader,
  ExtensionMap,
  FinalizedRecord,
  InProgressRecord,
  JsonValue,
  LaunchOutcome,
  LogLevel,
  OrderedFile,
  ProcessLauncher,
  ReportEntry,
  RunRecord,
  RunReport,
  RuntimeConfig,
  RuntimeFlags,
  StepStatus,
  StructuredLogger,
} from './core/kernel/contracts.js';
