/**
 * @module config
 * Server configuration read from the environment.
 */

import * as path from 'path';

export interface ServerConfig {
  /** Directory relative image paths resolve against. */
  root: string;
}

/** Read `RASTER_EDIT_ROOT`, falling back to the working directory. */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const root = env.RASTER_EDIT_ROOT?.trim();
  return { root: path.resolve(root ? root : process.cwd()) };
}

/** Absolute path for a tool argument. Absolute arguments are kept as given. */
export function resolveImagePath(config: ServerConfig, file: string): string {
  return path.resolve(config.root, file);
}
