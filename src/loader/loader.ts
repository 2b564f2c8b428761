/**
 * Module loader: resolves dotted module names against a load path, parses
 * each file and follows imports until the whole graph is loaded.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import type { Config } from '../config/types.js';
import { DEFAULT_PATHS } from '../config/defaults.js';
import { failure, success, type Result } from '../errors/types.js';
import { parseModuleName, parseName, renderName, type Name } from '../names/name.js';
import { parseModule } from '../parser/parser.js';
import type { Definition, Module, ModuleGraph } from '../types/types.js';
import { validateModules } from '../validator/validator.js';
import { Logger } from '../utils/logger.js';
import { errorCode, safeReadTextFile } from '../utils/safe-fs.js';

/**
 * Reads a text file. Rejections carrying a `code` of `ENOENT` or `ENOTDIR`
 * mean "not here"; anything else is reported as an I/O error.
 */
export type ReadFile = (filePath: string) => Promise<string>;

/**
 * Options for {@link loadModule}.
 */
export interface LoaderOptions {
  /** Directories searched, in order, for module files. */
  readonly loadPath: readonly string[];
  /**
   * Module file extension, including the dot.
   * @defaultValue ".theta"
   */
  readonly extension?: string;
  /** File reader; defaults to reading from disk. */
  readonly readFile?: ReadFile;
  readonly logger?: Logger;
}

/** Codes that mean the file is absent from one directory of the load path. */
const NOT_FOUND_CODES: ReadonlySet<string> = new Set(['ENOENT', 'ENOTDIR']);

const defaultLogger = new Logger({ component: 'ModuleLoader', debugMode: false });

/**
 * A module file found on the load path.
 */
interface FoundModule {
  readonly filePath: string;
  readonly source: string;
}

/**
 * Relative path of a module's file: `a.b.c` becomes `a/b/c.theta`.
 */
export function modulePath(moduleName: string, extension: string = DEFAULT_PATHS.extension): string {
  return path.join(...moduleName.split('.')) + extension;
}

/**
 * Builds loader options from a resolved configuration.
 *
 * @example
 * ```typescript
 * const config = applyEnvOverrides(await readConfigFile('theta.toml'));
 * const graph = await loadModule('com.example.user', loaderOptionsFromConfig(config));
 * ```
 */
export function loaderOptionsFromConfig(config: Config, readFile?: ReadFile): LoaderOptions {
  const logger = new Logger({ component: 'ModuleLoader', debugMode: config.logging.debug });
  return {
    loadPath: config.paths.load_path,
    extension: config.paths.extension,
    logger,
    ...(readFile === undefined ? {} : { readFile }),
  };
}

/**
 * Looks for a module's file in each load-path directory in turn.
 */
async function findModule(moduleName: string, options: LoaderOptions): Promise<Result<FoundModule>> {
  const relative = modulePath(moduleName, options.extension);
  const readFile = options.readFile ?? safeReadTextFile;

  for (const directory of options.loadPath) {
    const filePath = path.join(directory, relative);
    try {
      const source = await readFile(filePath);
      return success({ filePath, source });
    } catch (error) {
      const code = errorCode(error);
      if (code !== undefined && NOT_FOUND_CODES.has(code)) {
        continue;
      }
      return failure({
        kind: 'IOError',
        path: filePath,
        message: error instanceof Error ? error.message : String(error),
        ...(code === undefined ? {} : { code }),
      });
    }
  }

  return failure({
    kind: 'MissingModule',
    searchPath: options.loadPath.join(':'),
    moduleName,
  });
}

/**
 * Finds, reads and parses a single module.
 */
async function readModule(moduleName: string, options: LoaderOptions, logger: Logger): Promise<Result<Module>> {
  const found = await findModule(moduleName, options);
  if (!found.success) {
    if (found.error.kind === 'MissingModule') {
      logger.debug('module_missing', { module: moduleName, searchPath: found.error.searchPath });
    }
    return found;
  }

  const parsed = parseModule(found.value.source, moduleName, { sourceName: found.value.filePath });
  if (parsed.success) {
    logger.debug('module_loaded', {
      module: moduleName,
      path: found.value.filePath,
      imports: parsed.value.imports.length,
      definitions: parsed.value.definitions.length,
    });
  }
  return parsed;
}

/**
 * Loads a module and everything it imports, transitively.
 *
 * Each module is read once, so import cycles terminate. Imports are loaded
 * one at a time, in the order they are first seen; the first failure stops
 * the load.
 *
 * @param moduleName - Dotted name of the root module.
 * @returns The graph with `root` set to `moduleName`, or the first error.
 *
 * @example
 * ```typescript
 * const result = await loadModule('com.example.user', { loadPath: ['schemas'] });
 * if (!result.success) {
 *   console.error(renderError(result.error));
 * }
 * ```
 */
export async function loadModule(moduleName: string, options: LoaderOptions): Promise<Result<ModuleGraph>> {
  const logger = options.logger ?? defaultLogger;

  const root = parseModuleName(moduleName);
  if (!root.success) {
    return root;
  }

  const modules: Module[] = [];
  const seen = new Set<string>([root.value]);
  const pending: string[] = [root.value];

  for (let next = pending.shift(); next !== undefined; next = pending.shift()) {
    const loaded = await readModule(next, options, logger);
    if (!loaded.success) {
      return loaded;
    }
    modules.push(loaded.value);

    for (const imported of loaded.value.imports) {
      if (!seen.has(imported)) {
        seen.add(imported);
        pending.push(imported);
      }
    }
  }

  logger.debug('graph_loaded', { root: root.value, modules: modules.length });
  return success({ root: root.value, modules });
}

/**
 * Loads a module graph and validates it.
 *
 * @returns The graph, or the load error, or an `InvalidModule` error listing
 * every violation in the graph.
 */
export async function loadAndValidate(
  moduleName: string,
  options: LoaderOptions
): Promise<Result<ModuleGraph>> {
  const loaded = await loadModule(moduleName, options);
  if (!loaded.success) {
    return loaded;
  }
  return validateModules(loaded.value, options.logger === undefined ? {} : { logger: options.logger });
}

/**
 * Finds the definition of a fully-qualified name in a loaded graph.
 *
 * @param name - A {@link Name}, or its dotted text such as `com.example.User`.
 * @returns The definition, or `MissingName` when no module in the graph
 * defines it (`InvalidName` / `UnqualifiedName` for malformed text).
 */
export function lookupName(graph: ModuleGraph, name: Name | string): Result<Definition> {
  const parsed = typeof name === 'string' ? parseName(name) : success(name);
  if (!parsed.success) {
    return parsed;
  }

  const wanted = renderName(parsed.value);
  for (const module of graph.modules) {
    if (module.name !== parsed.value.moduleName) {
      continue;
    }
    const found = module.definitions.find((definition) => renderName(definition.name) === wanted);
    if (found !== undefined) {
      return success(found);
    }
  }

  return failure({ kind: 'MissingName', name: parsed.value });
}
