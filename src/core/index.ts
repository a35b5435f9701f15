// Bootstrap
export { ServiceBootstrap, EXIT_OK, EXIT_FAILURE } from './ServiceBootstrap';
export type { BootstrapOptions, ConfigSource, ServerFactory, ServiceStatus } from './ServiceBootstrap';

// Lifecycle
export { Lifecycle, ServiceState } from './lifecycle';
export type { TransitionListener } from './lifecycle';

// Application loading
export { loadApplication, createApplicationHandle, parseAppTarget } from './ApplicationLoader';
export type { AppTarget } from './ApplicationLoader';

// HTTP server
export { HttpServer, normalizeResponse } from './HttpServer';
export type { HttpServerOptions, CloseResult } from './HttpServer';
