#!/usr/bin/env node

import { Command } from 'commander';
import { pino, destination, type Logger } from 'pino';
import { loadConfig, resetConfig, type Config } from './config/index.js';
import { Runtime, setupGracefulShutdown, formatHistory, formatTaskTree } from './runtime/index.js';
import { StreamOutputChannel } from './agent/output.js';
import { createLogger, errorMessage } from './utils/logger.js';

const VERSION = '0.1.0';

const program = new Command();

program
  .name('conductor')
  .description('Run conversational agents and orchestrate work across them')
  .version(VERSION)
  .option('-v, --verbose', 'Enable debug logging');

function loadCliConfig(): { config: Config; logger: Logger } {
  resetConfig();
  const config = loadConfig();
  if (program.opts<{ verbose?: boolean }>().verbose) {
    config.logging.level = 'debug';
    // Logs go to stderr so they do not interleave with streamed replies
    return { config, logger: createLogger(config.logging, 'conductor', destination(2)) };
  }
  return { config, logger: pino({ level: 'silent' }) };
}

/** Read-only commands never call the model */
const offlineClient = {
  name: 'offline',
  streamMessage(): AsyncIterable<never> {
    throw new Error('Model access is disabled for this command');
  },
};

function fail(context: string, error: unknown): never {
  console.error(`${context}: ${errorMessage(error)}`);
  process.exit(1);
}

// Send a message to one agent and stream the reply
program
  .command('send <agent> <message...>')
  .description('Append a message for an agent and stream its reply')
  .action(async (agentId: string, words: string[]) => {
    try {
      const { config, logger } = loadCliConfig();
      const runtime = new Runtime({ config, logger, output: new StreamOutputChannel(process.stdout) });
      setupGracefulShutdown(runtime, logger);
      await runtime.initialize();

      const result = await runtime.sendMessage(agentId, words.join(' '));
      process.stdout.write('\n');
      await runtime.stop();

      if (result.status === 'failed') {
        fail(`Run failed (${result.error.kind})`, result.error.message);
      }
      if (result.status === 'cancelled') {
        fail('Run cancelled', 'interrupted');
      }
    } catch (error) {
      fail('Send failed', error);
    }
  });

// Orchestrate an objective across agents
program
  .command('orchestrate <objective...>')
  .description('Plan an objective with the coordinator and fan subtasks out to agents')
  .option('-c, --max-concurrent <n>', 'Maximum subtasks running at once')
  .action(async (words: string[], options: { maxConcurrent?: string }) => {
    try {
      const { config, logger } = loadCliConfig();
      if (options.maxConcurrent) {
        const maxConcurrent = parseInt(options.maxConcurrent, 10);
        if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
          fail('Invalid --max-concurrent', options.maxConcurrent);
        }
        config.orchestrator.maxConcurrent = maxConcurrent;
      }

      const runtime = new Runtime({
        config,
        logger,
        output: new StreamOutputChannel(process.stderr, { prefix: true }),
      });
      setupGracefulShutdown(runtime, logger);
      await runtime.initialize();

      const result = await runtime.orchestrate(words.join(' '));
      process.stderr.write('\n');

      console.log(`Task ${result.rootTaskId}: ${result.status}`);
      if (result.result) {
        console.log('');
        console.log(result.result);
      }
      if (result.error) {
        console.log(`Error (${result.error.kind}): ${result.error.message}`);
      }
      await runtime.stop();

      if (result.status !== 'succeeded') {
        process.exit(1);
      }
    } catch (error) {
      fail('Orchestration failed', error);
    }
  });

// Show a task tree
program
  .command('tasks [rootId]')
  .description('Show a task tree, or list recent root tasks')
  .action(async (rootId: string | undefined) => {
    try {
      const { config, logger } = loadCliConfig();
      const runtime = new Runtime({ config, logger, client: offlineClient });
      await runtime.initialize();
      const store = runtime.getStore();

      if (rootId) {
        const tree = await store.getTaskTree(rootId);
        if (!tree) {
          fail('Not found', `task ${rootId}`);
        }
        console.log(formatTaskTree(tree));
      } else {
        const roots = await store.listRootTasks();
        if (roots.length === 0) {
          console.log('No tasks yet.');
        }
        for (const root of roots) {
          console.log(`[${root.status}] ${root.id} ${root.objective}`);
        }
      }
      await runtime.stop();
    } catch (error) {
      fail('Failed to read tasks', error);
    }
  });

// Show an agent's conversation
program
  .command('history <agent>')
  .description("Show an agent's message log and committed cursor")
  .action(async (agentId: string) => {
    try {
      const { config, logger } = loadCliConfig();
      const runtime = new Runtime({ config, logger, client: offlineClient });
      await runtime.initialize();
      const store = runtime.getStore();

      const messages = await store.listMessages(agentId);
      console.log(formatHistory(messages, await store.getAgentState(agentId)));
      await runtime.stop();
    } catch (error) {
      fail('Failed to read history', error);
    }
  });

// Show effective configuration
program
  .command('config')
  .description('Show current configuration')
  .action(() => {
    try {
      const { config } = loadCliConfig();
      const safeConfig = {
        ...config,
        providers: {
          anthropic: { ...config.providers.anthropic, apiKey: config.providers.anthropic.apiKey ? '***' : '(not set)' },
        },
      };
      console.log(JSON.stringify(safeConfig, null, 2));
    } catch (error) {
      fail('Failed to load config', error);
    }
  });

program.parse();
