import { z } from 'zod'

export type BackendKind = 'local' | 'memory' | 'webhdfs'

export type AppConfig = {
  backend: {
    kind: BackendKind
    webhdfs: {
      url: string | null
      user: string | null
    }
  }
  telemetry: {
    sink: 'none' | 'console'
  }
  commit: {
    /** Versions tried by `append` before giving up on a contended log. */
    maxAttempts: number
  }
}

const EnvSchema = z.object({
  COMMITLOG_BACKEND: z.enum(['local', 'memory', 'webhdfs']).default('local'),
  COMMITLOG_WEBHDFS_URL: z.string().url().optional(),
  COMMITLOG_WEBHDFS_USER: z.string().min(1).optional(),
  COMMITLOG_TELEMETRY_SINK: z.enum(['none', 'console']).default('none'),
  COMMITLOG_MAX_COMMIT_ATTEMPTS: z.coerce.number().int().min(1).default(10),
})

export function loadAppConfig(
  env: NodeJS.ProcessEnv,
  opts?: { backend?: BackendKind },
): AppConfig {
  const parsed = EnvSchema.parse(env)
  const kind = opts?.backend ?? parsed.COMMITLOG_BACKEND

  if (kind === 'webhdfs' && !parsed.COMMITLOG_WEBHDFS_URL) {
    throw new Error('COMMITLOG_WEBHDFS_URL is required for the webhdfs backend')
  }

  return {
    backend: {
      kind,
      webhdfs: {
        url: parsed.COMMITLOG_WEBHDFS_URL ?? null,
        user: parsed.COMMITLOG_WEBHDFS_USER ?? null,
      },
    },
    telemetry: {
      sink: parsed.COMMITLOG_TELEMETRY_SINK,
    },
    commit: {
      maxAttempts: parsed.COMMITLOG_MAX_COMMIT_ATTEMPTS,
    },
  }
}
