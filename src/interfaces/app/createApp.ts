import type { LogStore } from '../../core/ports/logStore.js'
import type { StorageBackend } from '../../core/ports/storageBackend.js'
import { ConsoleTelemetrySink, NoopTelemetrySink, type TelemetrySink } from '../../core/ports/telemetry.js'
import { RenameLogStore } from '../../infrastructure/logstore/renameLogStore.js'
import type { TokenSource } from '../../infrastructure/logstore/tempPath.js'
import { LocalStorageBackend } from '../../infrastructure/storage/localStorageBackend.js'
import { MemFsStorageBackend } from '../../infrastructure/storage/memFsStorageBackend.js'
import { WebHdfsStorageBackend } from '../../infrastructure/storage/webHdfsStorageBackend.js'
import { CommitLogService } from '../../application/services/commitLogService.js'
import { loadAppConfig, type AppConfig } from '../../config/appConfig.js'

// ============================================================================
// App Container
// ============================================================================

/**
 * App container: holds the wired-up store and services.
 *
 * - backend: storage primitives selected by configuration
 * - store: create-once file layer over the backend
 * - commitLog: versioned commits over the store
 */
export type App = {
  config: AppConfig
  backend: StorageBackend
  store: LogStore
  commitLog: CommitLogService
  telemetry: TelemetrySink
}

export type CreateAppOptions = {
  config?: AppConfig
  /** Replaces the configured backend, e.g. with a test double. */
  backend?: StorageBackend
  telemetry?: TelemetrySink
  tokens?: TokenSource
}

export function createApp(opts: CreateAppOptions = {}): App {
  const config = opts.config ?? loadAppConfig(process.env)
  const telemetry = opts.telemetry ?? createTelemetrySink(config)
  const backend = opts.backend ?? createBackend(config)
  const store = new RenameLogStore({ backend, telemetry, tokens: opts.tokens })
  const commitLog = new CommitLogService(store, { maxCommitAttempts: config.commit.maxAttempts })

  return { config, backend, store, commitLog, telemetry }
}

export function createBackend(config: AppConfig): StorageBackend {
  switch (config.backend.kind) {
    case 'local':
      return new LocalStorageBackend()
    case 'memory':
      return new MemFsStorageBackend()
    case 'webhdfs': {
      const { url, user } = config.backend.webhdfs
      if (!url) throw new Error('WebHDFS backend requires a URL')
      return new WebHdfsStorageBackend({ baseUrl: url, user: user ?? undefined })
    }
  }
}

function createTelemetrySink(config: AppConfig): TelemetrySink {
  return config.telemetry.sink === 'console' ? new ConsoleTelemetrySink() : new NoopTelemetrySink()
}
