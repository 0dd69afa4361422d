#!/usr/bin/env node
import readline from 'readline';
import { Orchestrator } from './agent/orchestrator.js';
import { PgSignupDatabase } from './tools/db.js';
import { GeminiCompletionService } from './tools/completion.js';
import { BANNER } from './commands.js';
import { Session } from './session.js';
import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';

let session: Session | undefined;

async function main() {
  const config = loadConfig();

  const database = new PgSignupDatabase({
    connectionString: config.databaseUrl,
    statementTimeoutMs: config.statementTimeoutMs,
  });

  try {
    console.log('🔧 Preparing signup database...');
    await database.setup();
    console.log('✓ Database ready\n');
  } catch (error) {
    console.error('✗ Failed to prepare the signup database:', errorMessage(error));
    console.error('Make sure DATABASE_URL is set correctly.\n');
    process.exit(1);
  }

  const orchestrator = new Orchestrator({
    completion: new GeminiCompletionService(config.geminiApiKey, config.geminiModel),
    database,
    allowedTables: config.allowedTables,
    memoryWindow: config.memoryWindow,
    sampleRowsForPrompt: config.sampleRowsForPrompt,
    maxResultRowsForLLM: config.maxResultRowsForLLM,
  });

  console.log(BANNER);

  // Input is read from here on, so piped lines all reach the session
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  rl.on('SIGINT', onInterrupt);

  session = new Session({
    orchestrator,
    database,
    prompt: () => rl.prompt(),
    endInput: () => rl.close(),
    exit: (code) => process.exit(code),
  });

  rl.setPrompt('\n🤔 You: ');
  await session.run(rl);

  rl.close();
  process.exit(0);
}

// Ctrl-C: between turns it ends input, during a turn it exits right away
async function interrupt(): Promise<void> {
  if (!session) {
    process.exit(0);
  }
  await session.interrupt();
}

function onInterrupt(): void {
  interrupt().catch((error: unknown) => {
    console.error('Fatal error:', errorMessage(error));
    process.exit(1);
  });
}

process.on('SIGINT', onInterrupt);

main().catch((error) => {
  console.error('Fatal error:', errorMessage(error));
  process.exit(1);
});
