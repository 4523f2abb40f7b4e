import { createWriteStream } from "node:fs"
import { Writable } from "node:stream"
import {
  configure,
  getConsoleSink,
  getStreamSink,
  withFilter,
} from "@logtape/logtape"

const LOG_PIPE_PATH = "./log.jsonl"

const logPipeStream = createWriteStream(LOG_PIPE_PATH, { flags: "w" })

// Configure LogTape for tests
await configure({
  reset: true,
  sinks: {
    console: getConsoleSink(),
    warnings: withFilter(getConsoleSink(), "warning"),
    file: getStreamSink(Writable.toWeb(logPipeStream)),
  },
  loggers: [
    {
      category: ["gattlink"],
      lowestLevel: "trace",
      sinks: ["file", "warnings"],
    },
    {
      category: ["logtape", "meta"],
      lowestLevel: "warning",
      sinks: ["console"],
    },
  ],
})
