// @auditray/core: entry point
export * from './errors.js';
export * from './config/config.defaults.js';
export * from './config/config.loader.js';
export { createLogger, configureLogging, isLogLevel } from './logging/logger.js';
export type { Logger, LogStream } from './logging/logger.js';
export { TriggerChannel } from './channels/trigger.channel.js';
export { ResultChannel } from './channels/result.channel.js';
export type { StatusConsumer } from './channels/result.channel.js';
export { UpdateCoordinator } from './coordinator/update.coordinator.js';
export type { Checker, CheckStart, CoordinatorOptions } from './coordinator/update.coordinator.js';
export * from './status/status.model.js';
export { IconTheme } from './theme/icon.theme.js';
export {
  resolveIconSet,
  parseIconSet,
  BUILTIN_ICON_SET,
  BUNDLED_ICONS_DIR,
  DEFAULT_ICON_PATHS,
} from './theme/icon.resolver.js';
export type { IconGlyph, IconSet, ResolvedIconSet } from './theme/icon.resolver.js';
export {
  ArchAuditChecker,
  parseAdvisories,
  formatAdvisory,
  DEFAULT_ADVISORY_BASE_URL,
} from './checker/arch-audit.checker.js';
export type { AdvisoryRecord, ArchAuditCheckerOptions } from './checker/arch-audit.checker.js';
export { DbWatcher } from './watcher/db.watcher.js';
export type { TriggerSource, DbWatcherOptions } from './watcher/db.watcher.js';
export { StatusServer } from './server/status.server.js';
export type { StatusServerOptions } from './server/status.server.js';
export { Daemon, createDaemon } from './daemon/daemon.js';
export type { DaemonDeps } from './daemon/daemon.js';
