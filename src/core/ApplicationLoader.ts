import path from 'path';
import { ConfigError, LoadError } from '../utils/errors';
import { log } from '../utils/logger';
import type { ApplicationHandle, HttpRequest } from '../types';

export interface AppTarget {
  moduleName: string;
  attribute: string;
}

const MODULE_NAME = /^[A-Za-z_][\w-]*(\.[A-Za-z_][\w-]*)*$/;
const ATTRIBUTE = /^[A-Za-z_$][\w$]*(\.[A-Za-z_$][\w$]*)*$/;

/**
 * Splits a `<module>:<attribute>` target. Both halves may be dotted:
 * `api.main:server.app` loads `api/main` and reads `server.app` from it.
 */
export function parseAppTarget(target: string): AppTarget {
  const separator = target.indexOf(':');
  const moduleName = separator === -1 ? '' : target.slice(0, separator);
  const attribute = separator === -1 ? '' : target.slice(separator + 1);

  if (!MODULE_NAME.test(moduleName) || !ATTRIBUTE.test(attribute)) {
    throw new ConfigError(
      `Invalid APP_TARGET: '${target}'. Expected format '<module>:<attribute>'.`,
      'APP_TARGET'
    );
  }

  return { moduleName, attribute };
}

function isObjectLike(value: unknown): value is object {
  return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

function bindMethod(owner: object, name: string): ((...args: unknown[]) => unknown) | undefined {
  const method: unknown = Reflect.get(owner, name);
  if (typeof method !== 'function') {
    return undefined;
  }
  return (...args: unknown[]): unknown => Reflect.apply(method, owner, args);
}

/**
 * Normalises an exported value into an ApplicationHandle. Accepts a request
 * handler function or an object with a `handle` method and optional
 * `startup`/`shutdown` hooks.
 */
export function createApplicationHandle(exported: unknown, target: string): ApplicationHandle {
  if (typeof exported === 'function') {
    const handler = exported;
    return {
      target,
      handle: async (request: HttpRequest): Promise<unknown> => Reflect.apply(handler, undefined, [request]),
      startup: async () => undefined,
      shutdown: async () => undefined
    };
  }

  const handle = isObjectLike(exported) ? bindMethod(exported, 'handle') : undefined;
  if (!isObjectLike(exported) || !handle) {
    throw new LoadError(
      `"${target}" is not an application: expected a request handler or an object with a handle() method`,
      target
    );
  }

  const startup = bindMethod(exported, 'startup');
  const shutdown = bindMethod(exported, 'shutdown');

  return {
    target,
    handle: async (request: HttpRequest): Promise<unknown> => handle(request),
    startup: async () => {
      await startup?.();
    },
    shutdown: async () => {
      await shutdown?.();
    }
  };
}

function errorMessage(error: unknown): string {
  const message: unknown = isObjectLike(error) ? Reflect.get(error, 'message') : undefined;
  return typeof message === 'string' ? message : String(error);
}

function isMissingModule(error: unknown, modulePath: string): boolean {
  if (!isObjectLike(error) || Reflect.get(error, 'code') !== 'MODULE_NOT_FOUND') {
    return false;
  }
  // 只把目标模块本身缺失视为"未找到"，其内部依赖缺失属于导入错误
  return errorMessage(error).includes(`'${modulePath}'`);
}

function importModule(moduleName: string, appDir: string, target: string): unknown {
  const modulePath = path.resolve(appDir, ...moduleName.split('.'));
  try {
    const loaded: unknown = require(modulePath);
    return loaded;
  } catch (error) {
    if (isMissingModule(error, modulePath)) {
      throw new LoadError(`Could not import module "${moduleName}"`, target, error);
    }
    throw new LoadError(`Error while importing module "${moduleName}": ${errorMessage(error)}`, target, error);
  }
}

/**
 * Resolves the application object named by `target` (default `app:app`)
 * from a module under `appDir`.
 */
export function loadApplication(target: string, appDir: string): ApplicationHandle {
  const { moduleName, attribute } = parseAppTarget(target);
  log.debug('Loading application', { target, appDir });

  let current: unknown = importModule(moduleName, appDir, target);
  for (const part of attribute.split('.')) {
    if (!isObjectLike(current) || !(part in current)) {
      throw new LoadError(`Attribute "${attribute}" not found in module "${moduleName}"`, target);
    }
    current = Reflect.get(current, part);
  }

  const handle = createApplicationHandle(current, target);
  log.info('Application loaded', { target });
  return handle;
}
