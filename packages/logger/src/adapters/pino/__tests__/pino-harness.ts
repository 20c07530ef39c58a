import { Writable } from "node:stream"
import type { CapturedLog, LoggerHarness } from "../../../ports/__tests__/logger-harness"
import { type LogLevelName, LogLevels } from "../../../ports/log-level"
import { PinoLogger } from "../pino-logger"

const nameByNumber = new Map<number, LogLevelName>([
  [LogLevels.Trace, "trace"],
  [LogLevels.Debug, "debug"],
  [LogLevels.Info, "info"],
  [LogLevels.Warn, "warn"],
  [LogLevels.Error, "error"],
  [LogLevels.Fatal, "fatal"],
])

function captureLines(sink: CapturedLog[]): Writable {
  return new Writable({
    write(chunk: Buffer, _encoding, done) {
      const payload: Record<string, unknown> = JSON.parse(chunk.toString("utf8"))
      sink.push({ level: nameByNumber.get(Number(payload.level)) ?? "info", payload })
      done()
    },
  })
}

export function pinoHarness(): LoggerHarness {
  return {
    name: "PinoLogger",
    make: (opts) => {
      const captured: CapturedLog[] = []
      const logger = new PinoLogger(
        { destination: captureLines(captured) },
        { level: opts?.level ?? "trace" },
      )

      return {
        logger,
        read: () => captured.slice(),
        clear: () => captured.splice(0),
      }
    },
  }
}
