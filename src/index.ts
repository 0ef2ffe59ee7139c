export {
  LogStoreError,
  isLogStoreError,
  type LogStoreErrorCode
} from './core/entities/errors.js'
export { compareNames, toLogPath, type FileStatus, type LogPath } from './core/entities/logPath.js'
export type { CloseableLineIterator, Lines, LogStore } from './core/ports/logStore.js'
export type { StorageBackend } from './core/ports/storageBackend.js'
export {
  ConsoleTelemetrySink,
  NoopTelemetrySink,
  type TelemetryEvent,
  type TelemetrySink
} from './core/ports/telemetry.js'
export { RenameLogStore, type RenameLogStoreOptions } from './infrastructure/logstore/renameLogStore.js'
export { createTempPath, isTempPathName, type TokenSource } from './infrastructure/logstore/tempPath.js'
export { LocalStorageBackend } from './infrastructure/storage/localStorageBackend.js'
export { MemFsStorageBackend } from './infrastructure/storage/memFsStorageBackend.js'
export { WebHdfsStorageBackend, type WebHdfsOptions } from './infrastructure/storage/webHdfsStorageBackend.js'
export {
  CommitLogService,
  commitFileName,
  parseCommitVersion,
  type CommitEntry
} from './application/services/commitLogService.js'
export { loadAppConfig, type AppConfig, type BackendKind } from './config/appConfig.js'
export { createApp, type App } from './interfaces/app/createApp.js'
