/**
 * Timing helpers backed by the high resolution process clock
 */

/** Factors for translating nanoseconds -> microseconds */
const NANO_PER_MICRO = 1_000n
const MICRO_PER_SECOND = 1_000_000
const MICRO_PER_MILLI = 1_000

/**
 * Represents an elapsed amount of time with microsecond resolution
 */
export class Duration {
  private readonly _microseconds: number

  private constructor(nanoseconds: bigint) {
    this._microseconds = Number(nanoseconds / NANO_PER_MICRO)
  }

  /**
   * @returns The number of seconds with 6 decimal places
   */
  seconds(): number {
    return this._microseconds / MICRO_PER_SECOND
  }

  /**
   * @returns The number of milliseconds with 3 decimal places
   */
  milliseconds(): number {
    return this._microseconds / MICRO_PER_MILLI
  }

  toString(): string {
    return `${this.seconds()}s`
  }

  /**
   * Create a {@link Duration} from a nanosecond measurement such as the
   * difference between two `process.hrtime.bigint()` calls
   *
   * @param nanoseconds The number of nanoseconds elapsed
   * @returns A new {@link Duration}
   */
  static ofNano(nanoseconds: bigint): Duration {
    return new Duration(nanoseconds < 0n ? 0n : nanoseconds)
  }

  static readonly ZERO: Duration = Duration.ofNano(0n)
}

/**
 * Tracks the elapsed {@link Duration} between start and stop
 */
export class Timer {
  private _started = 0n
  private _running = false

  /**
   * Start a new timer
   *
   * @returns A running {@link Timer}
   */
  static startNew(): Timer {
    const timer = new Timer()
    timer.start()
    return timer
  }

  get running(): boolean {
    return this._running
  }

  start(): void {
    if (!this._running) {
      this._started = process.hrtime.bigint()
      this._running = true
    }
  }

  /**
   * Stop the timer
   *
   * @returns The {@link Duration} the timer ran for or {@link Duration.ZERO}
   * if it was never started
   */
  stop(): Duration {
    if (!this._running) {
      return Duration.ZERO
    }

    this._running = false
    return Duration.ofNano(process.hrtime.bigint() - this._started)
  }
}

/**
 * A point in time captured from the high resolution clock
 */
export class Timestamp {
  private static readonly ORIGIN_HRTIME = process.hrtime.bigint()
  private static readonly ORIGIN_UTC = Date.now()

  readonly value: bigint

  constructor(value: bigint) {
    this.value = value
  }

  /**
   * @returns The {@link Timestamp} as an ISO-8601 string
   */
  toISOString(): string {
    const offset = Duration.ofNano(this.value - Timestamp.ORIGIN_HRTIME)
    return new Date(
      Timestamp.ORIGIN_UTC + Math.floor(offset.milliseconds()),
    ).toISOString()
  }
}

/**
 * A clock that can be used to track time at sub-millisecond precision
 */
export class HiResClock {
  /**
   * @returns The current {@link Timestamp}
   */
  static timestamp(): Timestamp {
    return new Timestamp(process.hrtime.bigint())
  }
}
