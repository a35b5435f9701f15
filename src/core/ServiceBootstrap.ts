import { EventEmitter } from 'events';
import type { AddressInfo } from 'net';
import { loadConfig, ServiceConfig } from '../config';
import { handleError, toError } from '../utils/errors';
import { log, setLogLevel } from '../utils/logger';
import type { ApplicationHandle } from '../types';
import { loadApplication } from './ApplicationLoader';
import { HttpServer, HttpServerOptions } from './HttpServer';
import { Lifecycle, ServiceState, TransitionListener } from './lifecycle';

export type ConfigSource = Readonly<ServiceConfig> | (() => Readonly<ServiceConfig>);

export type ServerFactory = (application: ApplicationHandle, options: HttpServerOptions) => HttpServer;

export interface BootstrapOptions {
  /** Replaces the by-name lookup of the application module */
  loadApplication?: (config: Readonly<ServiceConfig>) => ApplicationHandle;
  createServer?: ServerFactory;
  /** Emitter the termination signals are read from, `process` by default */
  signalSource?: EventEmitter;
  signals?: NodeJS.Signals[];
}

export interface ServiceStatus {
  state: ServiceState;
  target: string | null;
  address: AddressInfo | null;
  inFlight: number;
  uptime: number;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

const DEFAULT_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Runs the service process: configure, load the application, listen, drain
 * on a termination signal, stop.
 */
export class ServiceBootstrap {
  private readonly lifecycle = new Lifecycle();
  private readonly signalSource: EventEmitter;
  private readonly signals: NodeJS.Signals[];
  private config?: Readonly<ServiceConfig>;
  private application?: ApplicationHandle;
  private server?: HttpServer;
  private startupTimestamp?: number;
  private running?: Promise<number>;
  private stopping?: Promise<number>;
  /** Reason of a stop requested before the service was listening */
  private pendingStop?: string;
  private resolveStopped?: (exitCode: number) => void;
  private readonly onSignal = (signal: NodeJS.Signals) => this.handleSignal(signal);

  constructor(
    private readonly configSource: ConfigSource,
    private readonly options: BootstrapOptions = {}
  ) {
    this.signalSource = options.signalSource ?? process;
    this.signals = options.signals ?? DEFAULT_SIGNALS;

    this.lifecycle.onTransition((from, to) => {
      log.info(`Service ${to}`, { from });
    });
  }

  /**
   * Bootstrapper reading its configuration from an environment map.
   */
  static fromEnvironment(env: NodeJS.ProcessEnv = process.env, options: BootstrapOptions = {}): ServiceBootstrap {
    return new ServiceBootstrap(() => loadConfig(env), options);
  }

  get state(): ServiceState {
    return this.lifecycle.state;
  }

  onStateChange(listener: TransitionListener): void {
    this.lifecycle.onTransition(listener);
  }

  /**
   * Starts the service and resolves with the process exit code once it has
   * stopped. Startup failures resolve with EXIT_FAILURE.
   */
  run(): Promise<number> {
    if (!this.running) {
      this.running = this.start();
    }
    return this.running;
  }

  /**
   * Stops accepting connections, drains in-flight requests within the grace
   * period and releases the socket. Resolves with the exit code. Called
   * during startup, the stop happens once the startup hook has returned.
   */
  shutdown(reason: string = 'shutdown'): Promise<number> {
    if (this.stopping) {
      return this.stopping;
    }
    const state = this.lifecycle.state;
    if (this.running && (state === ServiceState.CONFIGURING || state === ServiceState.LOADING_APP)) {
      // 启动流程结束后再停止
      log.info('Shutdown requested during startup', { state, reason });
      this.pendingStop = reason;
      return this.running;
    }
    if (state !== ServiceState.LISTENING) {
      log.warn('Shutdown requested while not listening', { state: this.lifecycle.state, reason });
      return this.running ?? Promise.resolve(EXIT_OK);
    }

    this.lifecycle.transition(ServiceState.DRAINING);
    log.info('Draining connections', {
      reason,
      inFlight: this.server?.inFlight ?? 0,
      gracePeriodMs: this.config?.gracefulShutdownTimeout
    });

    this.stopping = this.drain();
    return this.stopping;
  }

  getStatus(): ServiceStatus {
    return {
      state: this.lifecycle.state,
      target: this.application?.target ?? null,
      address: this.server?.address() ?? null,
      inFlight: this.server?.inFlight ?? 0,
      uptime: this.startupTimestamp ? Date.now() - this.startupTimestamp : 0
    };
  }

  private async start(): Promise<number> {
    let startupCompleted = false;
    this.installSignalHandlers();

    try {
      const config = this.resolveConfig();
      this.config = config;
      setLogLevel(config.logLevel);
      this.lifecycle.transition(ServiceState.LOADING_APP);

      const application = this.options.loadApplication
        ? this.options.loadApplication(config)
        : loadApplication(config.appTarget, config.appDir);
      this.application = application;

      await application.startup();
      startupCompleted = true;

      if (this.pendingStop !== undefined) {
        return await this.stopBeforeListening(this.pendingStop);
      }

      const serverOptions: HttpServerOptions = {
        host: config.host,
        port: config.port,
        maxBodyBytes: config.maxBodyBytes
      };
      const server = this.options.createServer
        ? this.options.createServer(application, serverOptions)
        : new HttpServer(application, serverOptions);
      this.server = server;

      const address = await server.listen();
      this.startupTimestamp = Date.now();
      this.lifecycle.transition(ServiceState.LISTENING);

      log.info(`Listening on http://${address.address}:${address.port}`, {
        target: application.target,
        environment: config.environment
      });
    } catch (error) {
      handleError(toError(error), 'bootstrap');
      if (startupCompleted) {
        await this.runShutdownHook();
      }
      this.removeSignalHandlers();
      this.lifecycle.transition(ServiceState.STOPPED);
      return EXIT_FAILURE;
    }

    if (this.pendingStop !== undefined) {
      return this.shutdown(this.pendingStop);
    }
    return new Promise<number>((resolve) => {
      this.resolveStopped = resolve;
    });
  }

  private resolveConfig(): Readonly<ServiceConfig> {
    return typeof this.configSource === 'function' ? this.configSource() : this.configSource;
  }

  private async stopBeforeListening(reason: string): Promise<number> {
    log.info('Startup finished after a stop request, not binding', { reason });
    const hookSucceeded = await this.runShutdownHook();
    this.removeSignalHandlers();
    this.lifecycle.transition(ServiceState.STOPPED);
    return hookSucceeded ? EXIT_OK : EXIT_FAILURE;
  }

  private async drain(): Promise<number> {
    const gracePeriod = this.config?.gracefulShutdownTimeout ?? 0;
    const result = this.server ? await this.server.close(gracePeriod) : { forced: false };
    if (result.forced) {
      log.warn('Some requests did not finish within the grace period');
    }

    const hookSucceeded = await this.runShutdownHook();
    this.removeSignalHandlers();
    this.lifecycle.transition(ServiceState.STOPPED);

    const exitCode = hookSucceeded ? EXIT_OK : EXIT_FAILURE;
    log.info('Service stopped', { exitCode, forced: result.forced });
    this.resolveStopped?.(exitCode);
    return exitCode;
  }

  private async runShutdownHook(): Promise<boolean> {
    if (!this.application) {
      return true;
    }
    try {
      await this.application.shutdown();
      return true;
    } catch (error) {
      handleError(toError(error), 'application shutdown');
      return false;
    }
  }

  private handleSignal(signal: NodeJS.Signals): void {
    if (this.lifecycle.state === ServiceState.DRAINING) {
      log.warn(`Received ${signal} while draining, resetting open connections`);
      this.server?.terminate();
      return;
    }

    log.info(`Received ${signal}, shutting down gracefully`);
    this.shutdown(signal).catch((error) => {
      handleError(toError(error), 'shutdown');
    });
  }

  private installSignalHandlers(): void {
    for (const signal of this.signals) {
      this.signalSource.on(signal, this.onSignal);
    }
  }

  private removeSignalHandlers(): void {
    for (const signal of this.signals) {
      this.signalSource.off(signal, this.onSignal);
    }
  }
}
