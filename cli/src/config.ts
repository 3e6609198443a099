/**
 * Shelfkeep CLI — Configuration
 *
 * Central location for the CLI's paths and environment overrides.
 * By default the catalog lives at ~/.shelfkeep/library.json.
 *
 * Environment:
 *   SHELFKEEP_HOME        data directory (default ~/.shelfkeep)
 *   SHELFKEEP_FILE        catalog file (default $SHELFKEEP_HOME/library.json)
 *   SHELFKEEP_LOG_LEVEL   pino level when --debug is not given (default silent)
 */

import * as os from "os";
import * as path from "path";
import { Catalog, createLogger, isLogLevel, LogLevel } from "@shelfkeep/catalog";
import { printDebug } from "./output";

export interface CliConfig {
  /** Data directory */
  home: string;
  /** Catalog file used when --file is not given */
  libraryFile: string;
  logLevel: LogLevel;
}

/** Options defined on the root command */
export type GlobalOptions = {
  file?: string;
  debug?: boolean;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const home = env.SHELFKEEP_HOME || path.join(os.homedir(), ".shelfkeep");
  const level = env.SHELFKEEP_LOG_LEVEL || "silent";

  return {
    home,
    libraryFile: env.SHELFKEEP_FILE || path.join(home, "library.json"),
    logLevel: isLogLevel(level) ? level : "silent",
  };
}

/**
 * Absolute path of the catalog file: --file, then configuration.
 */
export function resolveLibraryPath(opts: GlobalOptions, config: CliConfig = loadConfig()): string {
  return path.resolve(opts.file ?? config.libraryFile);
}

/**
 * Open the catalog selected by the global options.
 */
export function openCatalog(opts: GlobalOptions): Catalog {
  const config = loadConfig();
  const filePath = resolveLibraryPath(opts, config);
  printDebug(`Catalog file: ${filePath}`);

  const logger = createLogger({ level: opts.debug ? "debug" : config.logLevel });
  return new Catalog(filePath, { logger });
}
