/**
 * Runtime configuration resolved from the environment.
 */

import path from 'path';

export interface VibeCoderConfig {
  /** HTTP port for the REST API and the /ws change feed */
  port: number;
  /** Directory the relative data paths are resolved against */
  rootDir: string;
  /** One JSON file per agent: <agentsDir>/<id>.json */
  agentsDir: string;
  /** One JSON file per MCP server: <serversDir>/<id>.json */
  serversDir: string;
  /** Layout preferences file; its backup sits beside it as <file>.backup */
  preferencesPath: string;
}

export const DEFAULT_PORT = 3000;

function parsePort(value: string | undefined): number {
  if (!value) return DEFAULT_PORT;
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    return DEFAULT_PORT;
  }
  return port;
}

export function getConfigFromEnv(env: NodeJS.ProcessEnv = process.env): VibeCoderConfig {
  const rootDir = path.resolve(env.VIBECODER_ROOT || process.cwd());

  return {
    port: parsePort(env.PORT),
    rootDir,
    agentsDir: path.resolve(rootDir, env.VIBECODER_AGENTS_DIR || path.join('config', 'agents')),
    serversDir: path.resolve(rootDir, env.VIBECODER_SERVERS_DIR || path.join('data', 'mcp_servers')),
    preferencesPath: path.resolve(
      rootDir,
      env.VIBECODER_PREFERENCES_PATH || path.join('data', 'layout_preferences.json')
    ),
  };
}
