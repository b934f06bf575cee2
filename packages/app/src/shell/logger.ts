import * as Logger from "effect/Logger"
import * as LogLevel from "effect/LogLevel"

// CHANGE: route Effect logs to stderr in logfmt
// WHY: stdout carries generated declarations and must stay clean
// REF: req-logging-1
// SOURCE: n/a
// PURITY: SHELL
// EFFECT: Layer<never>
// INVARIANT: nothing is logged to stdout
// COMPLEXITY: O(1)

export const stderrLogger = Logger.map(Logger.logfmtLogger, (line) => {
  process.stderr.write(`${line}\n`)
})

export const StderrLoggerLive = Logger.replace(Logger.defaultLogger, stderrLogger)

export const minimumLogLevel = (verbose: boolean): LogLevel.LogLevel => verbose ? LogLevel.Debug : LogLevel.Warning
