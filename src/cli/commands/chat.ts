/**
 * Chat Command Handler
 *
 * Interactive tutoring session in the terminal:
 *
 * 1. Starting (or resuming) the session for a learner, topic and course
 * 2. Displaying the tutor's opening message
 * 3. Running the conversation loop until the topic completes or the
 *    learner leaves
 * 4. Handling slash commands (/quit, /exit, /help)
 *
 * Usage (via CLI):
 * ```bash
 * npm run cli -- chat --user 1 --topic 5 --course 2
 * ```
 */

import * as readline from 'node:readline';
import type { SessionOrchestrator, StartSessionInput } from '../../core/session';
import {
  bold,
  dim,
  red,
  yellow,
  formatTutorMessage,
  printBlankLine,
  printCommandsHelp,
  printSessionAbandoned,
  printSessionBanner,
  printSessionComplete,
} from '../utils/terminal';

type SlashOutcome = 'quit' | 'exit' | 'continue';

/**
 * Starts or resumes a session and runs the interactive loop.
 */
export async function runChatCommand(
  orchestrator: SessionOrchestrator,
  input: StartSessionInput
): Promise<void> {
  const started = await orchestrator.startSession(input);
  const view = await orchestrator.getSession(started.session.id);

  printSessionBanner({
    sessionId: started.session.id,
    courseTitle: view.context?.courseTitle ?? `Course ${input.courseId}`,
    topicTitle: view.context?.topicTitle ?? `Topic ${input.topicId}`,
    resumed: started.resumed,
  });

  console.log(formatTutorMessage(started.openingMessage.content));
  printBlankLine();

  await runInteractiveLoop(orchestrator, started.session.id);
}

async function runInteractiveLoop(
  orchestrator: SessionOrchestrator,
  sessionId: string
): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: bold('You: '),
  });

  // Lines typed while a reply is pending are rejected
  let isProcessing = false;
  let sessionEnded = false;

  const finish = () => {
    sessionEnded = true;
    rl.close();
  };

  const handleLine = async (line: string): Promise<void> => {
    const message = line.trim();

    if (!message) {
      rl.prompt();
      return;
    }

    if (isProcessing) {
      console.log(dim('Processing previous message... please wait.'));
      return;
    }

    isProcessing = true;

    try {
      if (message.startsWith('/')) {
        const outcome = await handleSlashCommand(message, orchestrator, sessionId);
        if (outcome === 'continue') {
          rl.prompt();
        } else {
          finish();
        }
        return;
      }

      const result = await orchestrator.postMessage(sessionId, message);

      printBlankLine();
      console.log(formatTutorMessage(result.reply.content));
      printBlankLine();

      if (result.warning) {
        console.log(yellow(result.warning.message));
        console.log(dim(`Retry later with: npm run cli -- notify ${sessionId}`));
      }

      if (result.completed) {
        printSessionComplete(result.session.notificationStatus);
        finish();
        return;
      }

      rl.prompt();
    } catch (error) {
      console.log(red('\nError processing your message:'));
      console.log(dim(error instanceof Error ? error.message : String(error)));
      printBlankLine();
      rl.prompt();
    } finally {
      isProcessing = false;
    }
  };

  rl.on('line', (line: string) => {
    handleLine(line).catch((error: unknown) => {
      console.error(red(error instanceof Error ? error.message : String(error)));
    });
  });

  rl.on('SIGINT', () => {
    console.log(dim('\n\nLeaving. The session stays active and can be resumed.'));
    finish();
  });

  rl.prompt();

  return new Promise<void>((resolve) => {
    rl.on('close', () => {
      if (!sessionEnded) {
        console.log(dim('\n\nInput closed.'));
      }
      resolve();
    });
  });
}

/**
 * Handles slash commands entered by the learner.
 */
async function handleSlashCommand(
  command: string,
  orchestrator: SessionOrchestrator,
  sessionId: string
): Promise<SlashOutcome> {
  const normalizedCommand = command.toLowerCase().split(' ')[0];

  switch (normalizedCommand) {
    case '/quit':
    case '/q':
      await orchestrator.abandon(sessionId);
      printSessionAbandoned();
      return 'quit';

    case '/exit':
      console.log(dim('\nSession left active. Run the same chat command to resume.'));
      return 'exit';

    case '/help':
    case '/h':
    case '/?':
      printCommandsHelp();
      return 'continue';

    default:
      console.log(yellow(`Unknown command: ${command}`));
      console.log(dim('Type /help to see available commands.'));
      return 'continue';
  }
}
