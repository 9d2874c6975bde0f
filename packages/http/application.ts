/**
 * Application facade tying a root router, its configuration and dispatch
 * together
 */

import {
  DefaultLogger,
  LogLevel,
  NoopLogWriter,
  type Logger,
  type LogWriter,
} from "@trellis/core/logging.js"
import type { Optional } from "@trellis/core/type/utils.js"
import { DefaultFieldBinder, type FieldBinder } from "./fields.js"
import type { HttpRequest, HttpResponse } from "./index.js"
import { Dispatcher } from "./routing/dispatcher.js"
import { Router, type RouteDocumentation } from "./routing/router.js"
import { DEFAULT_ERROR_CONFIG, type ErrorConfig } from "./utils.js"

/**
 * Configuration for an {@link Application}
 */
export interface ApplicationConfig {
  /** The application name, also the root router name */
  name: string
  version: string
  /** The minimum {@link LogLevel} for the application logger */
  logLevel: LogLevel
  logWriter: LogWriter
  /** Controls the shape of 400/404/405 responses */
  errorConfig: ErrorConfig
  /** Log the routing tree when the application is frozen */
  visualizeRoutesOnStartup: boolean
  /** The {@link FieldBinder} used for every route */
  binder: FieldBinder
}

export const DEFAULT_APPLICATION_CONFIG: Readonly<ApplicationConfig> = {
  name: "app",
  version: "0.0.0",
  logLevel: LogLevel.INFO,
  logWriter: NoopLogWriter,
  errorConfig: DEFAULT_ERROR_CONFIG,
  visualizeRoutesOnStartup: false,
  binder: new DefaultFieldBinder(),
}

/**
 * An application is the root {@link Router} of a service
 */
export class Application extends Router {
  readonly config: Readonly<ApplicationConfig>
  readonly logger: Logger

  private _dispatcher: Optional<Dispatcher>

  constructor(config: Readonly<ApplicationConfig>) {
    const logger = new DefaultLogger({
      name: config.name,
      level: config.logLevel,
      writer: config.logWriter,
    })

    super({ name: config.name, logger: logger.child(`${config.name}.router`) })

    this.config = config
    this.logger = logger
  }

  /**
   * Mount the router beneath the prefix
   *
   * @param prefix The slash rooted prefix
   * @param router The {@link Router} to include
   * @returns This {@link Application} for chaining
   */
  include(prefix: string, router: Router): this {
    return this.mount(prefix, router)
  }

  /**
   * Enumerate every route for documentation, freezing the application
   *
   * @returns The {@link RouteDocumentation} for every route
   */
  routes(): RouteDocumentation[] {
    this.freeze()
    return this.allRoutes()
  }

  override freeze(): void {
    if (this.frozen) {
      return
    }

    super.freeze()
    this.logger.info(
      `${this.config.name} v${this.config.version} serving ${this.allRoutes().length} route(s)`,
    )

    if (this.config.visualizeRoutesOnStartup) {
      this.logger.info(`Routing tree:\n${this.visualize()}`)
    }
  }

  /**
   * Serve the request, the application is frozen on the first request
   *
   * A `ConfigurationErrors` from that freeze rejects the returned promise
   *
   * @param request The {@link HttpRequest} to serve
   * @param abort An optional {@link AbortSignal} passed to the handler
   * @returns The {@link HttpResponse}
   */
  async handle(
    request: HttpRequest,
    abort?: AbortSignal,
  ): Promise<HttpResponse> {
    this._dispatcher ??= new Dispatcher(this, {
      binder: this.config.binder,
      errorConfig: this.config.errorConfig,
      logger: this.logger.child(`${this.config.name}.dispatcher`),
    })

    return this._dispatcher.handle(request, abort)
  }
}

/**
 * Create a new {@link Application}
 *
 * @param config The configuration overrides, anything omitted uses
 * {@link DEFAULT_APPLICATION_CONFIG}
 * @returns A new {@link Application}
 */
export function createApplication(
  config?: Partial<ApplicationConfig>,
): Application {
  return new Application({ ...DEFAULT_APPLICATION_CONFIG, ...config })
}
