import pino from "pino"
import { prettyFactory } from "pino-pretty"

const prettify = prettyFactory({ sync: true })

export type Logger = pino.Logger

/**
 * Create the logger shared by the analysis pipeline. Debug output is pretty-printed to the
 * console; without `debug` nothing is written.
 */
export function createLogger({ debug = false }: { debug?: boolean } = {}): Logger {
  return pino(
    { level: debug ? "debug" : "info" },
    {
      write(str) {
        if (debug) {
          console.log(prettify(str))
        }
      },
    }
  )
}
