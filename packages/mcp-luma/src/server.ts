#!/usr/bin/env -S npx tsx

/**
 * Luma MCP Server
 *
 * Exposes Luma Dream Machine image and video generation as MCP tools.
 * Runs over stdio by default; MCP_TRANSPORT=http serves streamable HTTP instead.
 */

import 'dotenv/config';
import { randomUUID } from 'node:crypto';
import { fileURLToPath } from 'url';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { SERVER_INSTRUCTIONS, SERVER_NAME, SERVER_VERSION, loadConfig, type AppConfig } from './config.ts';
import { CreateImageSchema, CreateVideoSchema, GetGenerationSchema, toolInputShape } from './schemas/luma.schema.ts';
import { LumaClient } from './services/luma-client.ts';
import {
  createImage,
  createToolContext,
  createVideo,
  getGeneration,
  listModels,
  type LumaToolContext,
} from './tools/luma.ts';
import { logger } from './utils/logger.ts';
import { ConfigError } from './utils/errors.ts';
import { withToolErrorHandler } from './utils/tool-handler.ts';
import { createHttpApp, setupGracefulShutdown } from './utils/http-server.ts';

const TOOL_NAMES = ['create_image', 'create_video', 'get_generation', 'list_models'] as const;

/** Handler context the SDK passes alongside the tool arguments. */
interface ToolExtra {
  signal: AbortSignal;
}

export function createServer(context: LumaToolContext, baseUrl?: string): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
        resources: {},
      },
      instructions: SERVER_INSTRUCTIONS,
    },
  );

  server.registerTool(
    'create_image',
    {
      description:
        'Generate an image with Luma Photon from a text prompt, optionally guided by weighted reference, style, character or modify images. Typically takes 5-15 seconds. Returns the image URL and a generation_id.',
      inputSchema: toolInputShape(CreateImageSchema.shape),
    },
    withToolErrorHandler('create_image', (args: unknown, extra: ToolExtra) => createImage(args, context, extra.signal)),
  );

  server.registerTool(
    'create_video',
    {
      description:
        'Generate a video with Luma Ray from a text prompt, optionally starting or ending on keyframe images or earlier generations. Typically takes 15-60 seconds. Returns the video URL, a thumbnail URL and a generation_id.',
      inputSchema: toolInputShape(CreateVideoSchema.shape),
    },
    withToolErrorHandler('create_video', (args: unknown, extra: ToolExtra) => createVideo(args, context, extra.signal)),
  );

  server.registerTool(
    'get_generation',
    {
      description:
        'Look up the current status and output URLs of an earlier generation by its generation_id. Use this after a create call timed out instead of submitting again.',
      inputSchema: toolInputShape(GetGenerationSchema.shape),
    },
    withToolErrorHandler('get_generation', (args: unknown, extra: ToolExtra) => getGeneration(args, context, extra.signal)),
  );

  server.registerTool(
    'list_models',
    {
      description: 'List the Luma image and video models with their options and typical generation times.',
      inputSchema: {},
    },
    withToolErrorHandler('list_models', () => Promise.resolve(listModels())),
  );

  server.registerResource(
    'info',
    'luma://info',
    {
      description: 'Information about the Luma MCP server',
      mimeType: 'application/json',
    },
    async () => ({
      contents: [
        {
          uri: 'luma://info',
          mimeType: 'application/json',
          text: JSON.stringify(
            {
              name: SERVER_NAME,
              version: SERVER_VERSION,
              description: 'MCP Server providing image and video generation via the Luma Dream Machine API',
              tools: TOOL_NAMES,
              lumaBaseUrl: baseUrl ?? null,
              imageTimeoutMs: context.poller.timeoutFor('image'),
              videoTimeoutMs: context.poller.timeoutFor('video'),
              embedImages: context.embedImages,
              uptime: process.uptime(),
              nodeVersion: process.version,
            },
            null,
            2,
          ),
        },
      ],
    }),
  );

  return server;
}

export function createContextFromConfig(config: AppConfig): LumaToolContext {
  const client = new LumaClient(config.apiKey, config.baseUrl, { timeoutMs: config.requestTimeoutMs });
  return createToolContext(client, {
    pollIntervalMs: config.pollIntervalMs,
    imageTimeoutMs: config.imageTimeoutMs,
    videoTimeoutMs: config.videoTimeoutMs,
    embedImages: config.embedImages,
  });
}

async function runStdio(config: AppConfig): Promise<void> {
  const server = createServer(createContextFromConfig(config), config.baseUrl);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ transport: 'stdio' }, 'Luma MCP server running');

  const shutdown = async () => {
    logger.info('Shutting down...');
    await server.close();
    process.exit(0);
  };
  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}

function runHttp(config: AppConfig): void {
  const context = createContextFromConfig(config);
  const transports = new Map<string, StreamableHTTPServerTransport>();

  const createSession = () => {
    const server = createServer(context, config.baseUrl);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      enableJsonResponse: true,
      onsessioninitialized: (sessionId: string) => {
        logger.info({ sessionId, totalSessions: transports.size + 1 }, 'Session initialized');
        transports.set(sessionId, transport);
      },
    });

    server.server.onclose = () => {
      const sid = transport.sessionId;
      if (sid && transports.delete(sid)) {
        logger.info({ sessionId: sid, totalSessions: transports.size }, 'Session closed');
      }
    };

    return { server, transport };
  };

  const app = createHttpApp({
    serverName: SERVER_NAME,
    version: SERVER_VERSION,
    transports,
    createSession,
    logger,
  });

  const httpServer = app.listen(config.port, '0.0.0.0', () => {
    logger.info({ port: config.port, transport: 'http' }, 'Luma MCP server running');
  });
  setupGracefulShutdown(httpServer, transports, logger);
}

async function main(): Promise<void> {
  const config = loadConfig();
  if (config.transport === 'http') {
    runHttp(config);
    return;
  }
  await runStdio(config);
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error) => {
    if (error instanceof ConfigError) {
      logger.fatal({ code: error.code }, error.message);
    } else {
      logger.fatal({ error: error instanceof Error ? error.message : String(error) }, 'Fatal error');
    }
    process.exit(1);
  });
}
