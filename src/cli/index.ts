/**
 * CLI Entry Point for Topic Tutor
 *
 * Parses command-line arguments with commander, wires the services from
 * the environment configuration and routes to the command handlers.
 *
 * Available Commands:
 * - `chat --user <id> --topic <id> --course <id>` - Interactive tutoring session
 * - `sessions --user <id>` - List a learner's sessions
 * - `show <session-id>` - Print a session transcript
 * - `abandon <session-id>` - Abandon an active session
 * - `notify <session-id>` - Retry a failed completion notification
 * - `prompt <session-id>` - Print the stored system prompt
 * - `migrate` - Apply pending database migrations
 *
 * Usage:
 * ```bash
 * npm run cli -- chat --user 1 --topic 5 --course 2
 * npm run cli -- show sess_abc123
 * npm run cli -- notify sess_abc123
 * ```
 *
 * Services are created per command, so `migrate` and `show` run without
 * an Anthropic API key.
 */

import { Command, InvalidArgumentError } from 'commander';
import { config } from '../config';
import { TutoringError } from '../core/errors';
import { createServices, type Services } from '../services';
import { createDatabase } from '../storage/db';
import { migrateDatabase } from '../storage/migrate';
import { runChatCommand } from './commands/chat';
import {
  abandonSession,
  listSessions,
  redeliverCompletion,
  showPrompt,
  showSession,
} from './commands/inspect';
import { dim, red } from './utils/terminal';

/**
 * Parses a positive integer option value.
 */
function parseId(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Runs `fn` with freshly wired services and closes the database afterwards.
 */
async function withServices(fn: (services: Services) => Promise<void>): Promise<void> {
  const db = createDatabase(config.database.path);
  try {
    await fn(createServices(config, db));
  } finally {
    db.$client.close();
  }
}

export function createProgram(): Command {
  const program = new Command('topic-tutor')
    .description('One-topic AI tutoring sessions kept in step with the progress service')
    .version('0.1.0');

  program
    .command('chat')
    .description('Start or resume an interactive tutoring session')
    .requiredOption('-u, --user <id>', 'Learner id', parseId)
    .requiredOption('-t, --topic <id>', 'Topic id', parseId)
    .requiredOption('-c, --course <id>', 'Course id', parseId)
    .action(async (options: { user: number; topic: number; course: number }) => {
      await withServices((services) =>
        runChatCommand(services.orchestrator, {
          userId: options.user,
          topicId: options.topic,
          courseId: options.course,
        })
      );
    });

  program
    .command('sessions')
    .description("List a learner's sessions, most recent first")
    .requiredOption('-u, --user <id>', 'Learner id', parseId)
    .option('-n, --limit <count>', 'Number of sessions to show', parseId, 10)
    .action(async (options: { user: number; limit: number }) => {
      await withServices((services) => listSessions(services.sessions, options.user, options.limit));
    });

  program
    .command('show <session-id>')
    .description('Print a session transcript')
    .action(async (sessionId: string) => {
      await withServices((services) => showSession(services.orchestrator, sessionId));
    });

  program
    .command('abandon <session-id>')
    .description('Abandon an active session')
    .action(async (sessionId: string) => {
      await withServices((services) => abandonSession(services.orchestrator, sessionId));
    });

  program
    .command('notify <session-id>')
    .description('Retry the completion notification of a completed session')
    .action(async (sessionId: string) => {
      await withServices((services) => redeliverCompletion(services.orchestrator, sessionId));
    });

  program
    .command('prompt <session-id>')
    .description('Print the system prompt a session was started with')
    .action(async (sessionId: string) => {
      await withServices((services) =>
        showPrompt(services, sessionId, config.session.completionMarker)
      );
    });

  program
    .command('migrate')
    .description('Apply pending database migrations')
    .action(() => {
      migrateDatabase(config.database.path);
    });

  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    if (error instanceof TutoringError) {
      console.error(red(`\n${error.kind}: ${error.message}`));
    } else {
      console.error(red('\nFatal error:'));
      console.error(dim(error instanceof Error ? error.message : String(error)));
    }

    if (process.env.DEBUG && error instanceof Error && error.stack) {
      console.error(dim(error.stack));
    }

    process.exit(1);
  });
