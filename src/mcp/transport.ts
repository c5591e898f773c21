/**
 * MCP transport contract
 *
 * The registry never speaks the MCP wire protocol itself; it asks a
 * transport to connect to a server and list what the server offers.
 */

import type { MCPServerType, ServerCapabilities, ServerConnectionConfig } from '../schemas/models.js';

export interface MCPTransport {
  /** Whether this transport can reach servers of the given type */
  supports(type: MCPServerType): boolean;
  /** Open a session and list the server's tools, resources and prompts */
  connect(serverId: string, config: ServerConnectionConfig): Promise<ServerCapabilities>;
  disconnect(serverId: string): Promise<void>;
}
