/**
 * CLI Entry Point
 */

import 'dotenv/config';
import readline from 'node:readline';
import { Command } from 'commander';
import { createCompletionService } from '../llm/client.js';
import { CatalogStore } from '../retrieval/catalog-store.js';
import { Orchestrator } from '../agent/orchestrator.js';
import { CourseAssistant } from '../agent/assistant.js';
import { SessionStore } from '../agent/session-store.js';
import { EventEmitter } from '../events/emitter.js';
import type { AgentEvent } from '../events/types.js';
import type { Source } from '../tools/types.js';
import type { LecternConfig } from '../utils/config.js';
import { loadConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import type { LoggerConfig } from '../utils/logger.js';
import { ConfigError } from '../errors/types.js';

const VERSION = '0.1.0';

interface CommonOptions {
  config?: string;
  catalog?: string;
  verbose?: boolean;
}

interface AskOptions extends CommonOptions {
  json?: boolean;
}

export async function main(argv: string[] = process.argv) {
  const program = new Command();

  // Common options helper
  const addCommonOptions = (cmd: Command) => {
    return cmd
      .option('-c, --config <path>', 'Path to config file')
      .option('--catalog <path>', 'Course catalog JSON (overrides retrieval.catalogPath)')
      .option('-v, --verbose', 'Verbose output');
  };

  program
    .name('lectern')
    .description('Answer questions about course material')
    .version(VERSION);

  addCommonOptions(
    program
      .command('ask')
      .description('Ask a question about the courses')
      .argument('<query>', 'Your question')
      .option('--json', 'Output as JSON')
  ).action(async (query: string, options: AskOptions) => {
    await runAsk(query, options);
  });

  addCommonOptions(
    program
      .command('chat')
      .description('Ask follow-up questions in one session; an empty line exits')
  ).action(async (options: CommonOptions) => {
    await runChat(options);
  });

  addCommonOptions(
    program
      .command('courses')
      .description('List the courses in the catalog')
  ).action(async (options: CommonOptions) => {
    const { store } = await setup(options);
    for (const title of store.getCourseTitles()) {
      process.stdout.write(`${title}\n`);
    }
  });

  await program.parseAsync(argv);
}

async function setup(options: CommonOptions): Promise<{ config: LecternConfig; store: CatalogStore }> {
  const config = await loadConfig(options.config);

  initLogger(loggerConfig(config, options.verbose));

  const catalogPath = options.catalog ?? config.retrieval.catalogPath;
  if (!catalogPath) {
    throw new ConfigError('No course catalog given. Use --catalog or set LECTERN_CATALOG.');
  }

  const store = await CatalogStore.fromFile(catalogPath, {
    maxResults: config.retrieval.maxResults,
  });
  return { config, store };
}

function createAssistant(config: LecternConfig, store: CatalogStore, verbose = false): CourseAssistant {
  const logger = getLogger();

  const eventEmitter = new EventEmitter();
  if (verbose) {
    eventEmitter.subscribe((event: AgentEvent) => logger.debug({ event }, 'Orchestrator event'));
  }

  const orchestrator = new Orchestrator(
    createCompletionService(config.llm),
    eventEmitter,
    config.orchestrator
  );
  return new CourseAssistant(
    orchestrator,
    store,
    config.tools,
    new SessionStore(config.session.maxHistory)
  );
}

async function runAsk(query: string, options: AskOptions) {
  const { config, store } = await setup(options);
  const assistant = createAssistant(config, store, options.verbose);

  const { answer, sources } = await assistant.ask(query);

  if (options.json) {
    process.stdout.write(`${JSON.stringify({ answer, sources }, null, 2)}\n`);
    return;
  }

  printAnswer(answer, sources);
}

async function runChat(options: CommonOptions) {
  const { config, store } = await setup(options);
  const assistant = createAssistant(config, store, options.verbose);
  const sessionId = assistant.createSession();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  const question = (prompt: string): Promise<string> => {
    return new Promise(resolve => rl.question(prompt, resolve));
  };

  try {
    for (;;) {
      const query = (await question('\n> ')).trim();
      if (!query) {
        break;
      }
      const { answer, sources } = await assistant.ask(query, { sessionId });
      printAnswer(answer, sources);
    }
  } finally {
    rl.close();
  }
}

function printAnswer(answer: string, sources: Source[]) {
  process.stdout.write(`${answer}\n`);
  if (sources.length > 0) {
    process.stdout.write(`\nSources:\n${formatSources(sources)}\n`);
  }
}

/**
 * Logger settings for a CLI run; --verbose wins over the configured level
 */
export function loggerConfig(config: LecternConfig, verbose = false): LoggerConfig {
  return {
    level: verbose ? 'debug' : config.log.level,
    pretty: config.log.pretty,
    destination: config.log.file,
  };
}

/**
 * Numbered source list for terminal output
 */
export function formatSources(sources: Source[]): string {
  return sources
    .map((source, index) => {
      const link = source.link ? ` <${source.link}>` : '';
      return `${index + 1}. ${source.text}${link}`;
    })
    .join('\n');
}
