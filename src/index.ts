/**
 * Hypothesis Attestation MCP Server
 *
 * Entry point for the MCP server using stdio transport.
 * Exposes hypothesis generation, lookup and integrity verification tools via JSON-RPC.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module index
 */

import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';

// Load .env from multiple candidate locations (first found wins):
// 1. HYPOTHESIS_ENV_FILE env var (explicit override)
// 2. CWD/.env (project-local)
// 3. Package root/.env (development)
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const envCandidates = [
  process.env.HYPOTHESIS_ENV_FILE,
  path.resolve(process.cwd(), '.env'),
  path.resolve(__dirname, '..', '..', '.env'),
].filter((p): p is string => typeof p === 'string');

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath });
    break;
  }
}

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import type { ToolDefinition } from './tools/shared.js';
import { hypothesisTools } from './tools/hypothesis.js';
import { composeServices, initializeServices, resetState } from './server/state.js';
import { ExternalCapabilityError } from './server/errors.js';
import type { GenerationCapability } from './services/capabilities.js';
import { GeminiClient } from './services/gemini/client.js';
import { loadPipelineConfig, registryDatabasePath } from './services/pipeline/config.js';
import { openRegistryDatabase } from './services/storage/database.js';

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER INITIALIZATION
// ═══════════════════════════════════════════════════════════════════════════════

const server = new McpServer({
  name: 'hypothesis-attestation-mcp',
  version: '1.0.0',
});

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

const allToolModules: Record<string, ToolDefinition>[] = [hypothesisTools];

// Register tools with duplicate detection
const registeredToolNames = new Set<string>();
let toolCount = 0;

for (const toolModule of allToolModules) {
  for (const [name, tool] of Object.entries(toolModule)) {
    if (registeredToolNames.has(name)) {
      console.error(
        `[FATAL] Duplicate tool name detected: "${name}". Each tool must have a unique name.`
      );
      process.exit(1);
    }
    registeredToolNames.add(name);
    server.tool(name, tool.description, tool.inputSchema, tool.handler);
    toolCount++;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STARTUP
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Generation capability used when no API key is configured. Read-only tools
 * keep working; generation tools fail with a clear capability error.
 */
function unconfiguredGeneration(): GenerationCapability {
  return {
    name: 'gemini',
    generate: async () => {
      throw new ExternalCapabilityError('gemini', 'GEMINI_API_KEY is not set');
    },
  };
}

/**
 * Compose services from the environment. Fail-fast on invalid configuration.
 */
function startServices(): void {
  const config = loadPipelineConfig();
  const db = openRegistryDatabase(registryDatabasePath(config));

  let generation: GenerationCapability;
  if (process.env.GEMINI_API_KEY) {
    generation = new GeminiClient();
  } else {
    console.error('=== STARTUP WARNINGS ===');
    console.error(
      '  - GEMINI_API_KEY is not set. Hypothesis generation will fail. Get one at https://aistudio.google.com/'
    );
    console.error('========================');
    generation = unconfiguredGeneration();
  }

  initializeServices(composeServices({ config, db, generation }));
  console.error(`[Config] Registry at ${registryDatabasePath(config)}`);
}

async function main(): Promise<void> {
  startServices();

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('Hypothesis Attestation MCP Server running on stdio');
  console.error(`Tools registered: ${toolCount}`);
}

// Graceful shutdown handler
function handleShutdown(signal: string): void {
  console.error(`[Shutdown] Received ${signal}, shutting down gracefully...`);
  server
    .close()
    .then(() => {
      resetState();
      console.error('[Shutdown] Server closed successfully');
      process.exit(0);
    })
    .catch((err) => {
      console.error(`[Shutdown] Error closing server: ${err}`);
      process.exit(1);
    });
  // Force exit after 5s if graceful shutdown hangs
  setTimeout(() => {
    console.error('[Shutdown] Forced exit after timeout');
    process.exit(1);
  }, 5000).unref();
}

process.on('SIGTERM', () => handleShutdown('SIGTERM'));
process.on('SIGINT', () => handleShutdown('SIGINT'));

main().catch((error) => {
  console.error('Fatal error starting MCP server:', error);
  process.exit(1);
});
