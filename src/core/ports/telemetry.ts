export type TelemetryEvent =
  | {
      type: 'commit_published'
      payload: { path: string }
    }
  | {
      type: 'commit_conflict'
      payload: { path: string }
    }
  | {
      type: 'rename_inconsistent'
      payload: { path: string; tempPath: string }
    }
  | {
      type: 'cleanup_failed'
      payload: { path: string; step: 'close_stream' | 'delete_temp'; message: string }
    }

export interface TelemetrySink {
  emit(event: TelemetryEvent): void
}

export class NoopTelemetrySink implements TelemetrySink {
  emit(_event: TelemetryEvent): void {}
}

export class ConsoleTelemetrySink implements TelemetrySink {
  emit(event: TelemetryEvent): void {
    console.log(JSON.stringify({ ts: Date.now(), ...event }))
  }
}
