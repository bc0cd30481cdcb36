#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from './config';
import { startBot } from './bot';

async function main(): Promise<void> {
  const config = loadConfig();
  await startBot(config);
}

main().catch((err) => {
  console.error('Failed to start bot:', err);
  process.exit(1);
});
