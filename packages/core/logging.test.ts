import {
  DefaultLogger,
  LogLevel,
  type LogData,
  type LogWriter,
} from "./logging.js"

class MemoryWriter implements LogWriter {
  readonly entries: LogData[] = []

  log(data: LogData): void {
    this.entries.push(data)
  }
}

describe("DefaultLogger", () => {
  test("Should filter messages below the level", () => {
    const writer = new MemoryWriter()
    const logger = new DefaultLogger({ name: "test", writer, level: LogLevel.WARN })

    logger.debug("debug")
    logger.info("info")
    logger.warn("warn")
    logger.error("error")
    logger.fatal("fatal")

    expect(writer.entries.map((e) => e.message)).toStrictEqual([
      "warn",
      "error",
      "fatal",
    ])
    expect(writer.entries.map((e) => e.level)).toStrictEqual([
      LogLevel.WARN,
      LogLevel.ERROR,
      LogLevel.FATAL,
    ])
    expect(writer.entries[0].source).toBe("test")
  })

  test("Should honor level changes", () => {
    const writer = new MemoryWriter()
    const logger = new DefaultLogger({ writer })

    logger.debug("hidden")
    logger.setLevel(LogLevel.DEBUG)
    logger.debug("shown", { id: 1 })

    expect(logger.level).toBe(LogLevel.DEBUG)
    expect(writer.entries).toHaveLength(1)
    expect(writer.entries[0].message).toBe("shown")
    expect(writer.entries[0].context).toStrictEqual({ id: 1 })
  })

  test("Should always write fatal messages", () => {
    const writer = new MemoryWriter()
    const logger = new DefaultLogger({ writer, level: LogLevel.FATAL })

    logger.error("hidden")
    logger.fatal("shown")

    expect(writer.entries.map((e) => e.message)).toStrictEqual(["shown"])
  })

  test("Child loggers should share the writer and level", () => {
    const writer = new MemoryWriter()
    const logger = new DefaultLogger({ name: "parent", writer, level: LogLevel.DEBUG })
    const child = logger.child("child")

    child.debug("from child")

    expect(child.level).toBe(LogLevel.DEBUG)
    expect(child.name).toBe("child")
    expect(writer.entries[0].source).toBe("child")
  })
})
