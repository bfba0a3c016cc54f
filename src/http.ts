/**
 * Stateless Streamable HTTP transport
 *
 * Each POST gets its own SDK server and transport, torn down when the
 * response closes. No session ids are issued and nothing survives between
 * requests.
 */

import { createServer as createHttpServer, type IncomingMessage, type Server as HttpServer, type ServerResponse } from 'node:http';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { errorMessage } from './errors.js';
import type { ServerConfig } from './types.js';

export type HttpRoute = 'preflight' | 'health' | 'mcp' | 'method-not-allowed' | 'not-found';

export const CORS_HEADERS: Readonly<Record<string, string>> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': '*',
  'Access-Control-Allow-Headers': '*',
  'Access-Control-Expose-Headers': 'mcp-session-id',
};

const HEALTH_PATH = '/healthz';

export function resolveRoute(method: string | undefined, pathname: string, mcpPath: string): HttpRoute {
  if (method === 'OPTIONS') return 'preflight';
  if (pathname === HEALTH_PATH && method === 'GET') return 'health';
  if (pathname !== mcpPath) return 'not-found';
  return method === 'POST' ? 'mcp' : 'method-not-allowed';
}

function applyCors(res: ServerResponse): void {
  for (const [header, value] of Object.entries(CORS_HEADERS)) {
    res.setHeader(header, value);
  }
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function jsonRpcError(code: number, message: string) {
  return { jsonrpc: '2.0', error: { code, message }, id: null };
}

async function handleMcpPost(
  req: IncomingMessage,
  res: ServerResponse,
  createMcpServer: () => Server
): Promise<void> {
  const server = createMcpServer();
  const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

  res.on('close', () => {
    Promise.all([transport.close(), server.close()]).catch((error) => {
      console.error('[HuggiesServer] Failed to close request transport:', errorMessage(error));
    });
  });

  await server.connect(transport);
  await transport.handleRequest(req, res);
}

async function handleRequest(
  req: IncomingMessage,
  res: ServerResponse,
  createMcpServer: () => Server,
  mcpPath: string
): Promise<void> {
  applyCors(res);
  const { pathname } = new URL(req.url ?? '/', 'http://localhost');

  switch (resolveRoute(req.method, pathname, mcpPath)) {
    case 'preflight':
      res.writeHead(204);
      res.end();
      return;
    case 'health':
      sendJson(res, 200, { status: 'ok' });
      return;
    case 'not-found':
      sendJson(res, 404, { error: `Not found: ${pathname}` });
      return;
    case 'method-not-allowed':
      sendJson(res, 405, jsonRpcError(-32000, 'Method not allowed.'));
      return;
    case 'mcp':
      await handleMcpPost(req, res, createMcpServer);
      return;
  }
}

/**
 * Start listening. Resolves once the port is bound.
 */
export async function startHttpServer(
  createMcpServer: () => Server,
  options: Pick<ServerConfig['transport'], 'host' | 'port' | 'path'>
): Promise<HttpServer> {
  const httpServer = createHttpServer((req, res) => {
    handleRequest(req, res, createMcpServer, options.path).catch((error) => {
      console.error('[HuggiesServer] Error handling HTTP request:', errorMessage(error));
      if (!res.headersSent) {
        sendJson(res, 500, jsonRpcError(-32603, 'Internal server error'));
      } else {
        res.end();
      }
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(options.port, options.host, () => {
      httpServer.off('error', reject);
      resolve();
    });
  });

  return httpServer;
}
