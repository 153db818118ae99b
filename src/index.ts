#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { existsSync } from 'node:fs';
import { loadVaultConfigFile, resolveVaultConfig, type VaultConfigFile } from './config.js';
import { ReadwiseClient, defaultSleep } from './readwise/client.js';
import { createServer, SERVER_NAME } from './server.js';

// Parse CLI arguments
const args = process.argv.slice(2);
let vaultPath: string | undefined = process.env.VAULT_PATH;
let stateFile: string | undefined;
let configPath: string | undefined;

for (let i = 0; i < args.length; i++) {
  if (args[i] === '--vault-path' && args[i + 1]) {
    vaultPath = args[++i];
  } else if (args[i] === '--state-file' && args[i + 1]) {
    stateFile = args[++i];
  } else if (args[i] === '--config' && args[i + 1]) {
    configPath = args[++i];
  } else if (args[i] === '--help') {
    console.error(`
${SERVER_NAME} — Readwise to notes vault importer (MCP Server)

Usage:
  ${SERVER_NAME} [options]

Options:
  --vault-path <path>    Vault root directory (or set VAULT_PATH; default: ~/Notes)
  --state-file <path>    Import state file, relative to the vault
                         (default: .claude/state/readwise-import.json)
  --config <path>        JSON config file (directory layout, page limits, retry policy)
  --help                 Show this help message

Environment:
  READWISE_TOKEN         Readwise access token (required)
  VAULT_PATH             Vault root directory
`);
    process.exit(0);
  }
}

async function main(): Promise<void> {
  const token = process.env.READWISE_TOKEN;
  if (!token) {
    console.error('Error: READWISE_TOKEN environment variable is required');
    process.exit(1);
  }

  let file: VaultConfigFile = {};
  if (configPath) {
    try {
      file = loadVaultConfigFile(configPath);
    } catch (error) {
      console.error(`Error loading config: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    }
  }

  const config = resolveVaultConfig(file, { vaultPath, stateFile });
  if (!existsSync(config.vaultPath)) {
    console.error(`Warning: vault path ${config.vaultPath} does not exist yet; it will be created on first import`);
  }
  console.error(`Vault: ${config.vaultPath}`);
  console.error(`State file: ${config.stateFile}`);

  const api = new ReadwiseClient(token, { retry: config.request });
  const server = createServer({
    config,
    api,
    now: () => new Date(),
    sleep: defaultSleep,
  });

  // Clean shutdown
  const shutdown = async () => {
    await server.close();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  // Connect stdio transport
  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error(`${SERVER_NAME} server running on stdio`);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
