/**
 * Session Inspection Commands
 *
 * Non-interactive commands for looking at and managing stored sessions:
 *
 * - `sessions --user <id>` - List a learner's sessions, most recent first
 * - `show <session-id>`    - Print a session transcript
 * - `abandon <session-id>` - Abandon an active session
 * - `notify <session-id>`  - Retry a failed completion notification
 * - `prompt <session-id>`  - Print the stored system prompt
 */

import { NotFoundError } from '../../core/errors';
import type { Session } from '../../core/models';
import type { ConversationStore, SessionOrchestrator } from '../../core/session';
import { buildContextFromSnapshot, buildTutorPrompt } from '../../llm/prompts';
import type { SessionContextRepository, SessionRepository } from '../../storage/repositories';
import {
  bold,
  cyan,
  dim,
  green,
  yellow,
  formatNotificationStatus,
  formatSeparator,
  formatStatus,
  printBlankLine,
} from '../utils/terminal';

/**
 * Lists a learner's sessions in a table.
 */
export async function listSessions(
  sessions: SessionRepository,
  userId: number,
  limit: number
): Promise<void> {
  const results = (await sessions.findByUser(userId)).slice(0, limit);

  printBlankLine();
  console.log(bold(`Sessions for user ${userId}:`));
  console.log(formatSeparator(80));

  if (results.length === 0) {
    console.log(yellow('  No sessions found.'));
  }

  for (const session of results) {
    console.log(
      `  ${session.id}  ${dim(formatDateTime(session.startedAt))}  ` +
        `course ${session.courseId} / topic ${session.topicId}  ${formatStatus(session.status)}` +
        (session.status === 'completed'
          ? `  ${formatNotificationStatus(session.notificationStatus)}`
          : '')
    );
  }

  console.log(formatSeparator(80));
  printBlankLine();
}

/**
 * Prints session details and the transcript without the system prompt.
 */
export async function showSession(
  orchestrator: SessionOrchestrator,
  sessionId: string
): Promise<void> {
  const { session, context, turns } = await orchestrator.getSession(sessionId);

  printBlankLine();
  printSessionHeader(session);
  if (context) {
    console.log(`${bold('Course:')} ${context.courseTitle}`);
    console.log(`${bold('Topic:')} ${context.topicTitle}`);
    console.log(`${bold('Level:')} ${context.userLevel}`);
  }
  console.log(formatSeparator(60));

  for (const turn of turns) {
    const time = dim(`[${formatTime(turn.createdAt)}]`);
    if (turn.role === 'assistant') {
      console.log(`${time} ${cyan(`Tutor: ${turn.content}`)}`);
    } else {
      console.log(`${time} ${bold('You:')} ${turn.content}`);
    }
  }

  console.log(formatSeparator(60));
  printBlankLine();
}

export async function abandonSession(
  orchestrator: SessionOrchestrator,
  sessionId: string
): Promise<void> {
  const session = await orchestrator.abandon(sessionId);

  if (session.status === 'abandoned') {
    console.log(yellow(`Session ${session.id} is abandoned.`));
  } else {
    console.log(dim(`Session ${session.id} already ended as ${session.status}.`));
  }
}

export async function redeliverCompletion(
  orchestrator: SessionOrchestrator,
  sessionId: string
): Promise<void> {
  const result = await orchestrator.redeliverCompletion(sessionId);
  console.log(green(`Completion of session ${result.session.id} delivered.`));
}

/**
 * Prints the system prompt a session was started with, and whether the
 * stored context snapshot still renders to the same text.
 */
export async function showPrompt(
  deps: { sessions: SessionRepository; contexts: SessionContextRepository; store: ConversationStore },
  sessionId: string,
  completionMarker: string
): Promise<void> {
  const session = await deps.sessions.findById(sessionId);
  if (!session) {
    throw new NotFoundError('Session', sessionId);
  }

  const [context, turns] = await Promise.all([
    deps.contexts.findById(sessionId),
    deps.store.readAll(sessionId),
  ]);
  const system = turns.find((turn) => turn.role === 'system');

  printBlankLine();
  console.log(`${bold('Session:')} ${session.id}`);
  console.log(formatSeparator(60));
  console.log(system ? system.content : yellow('(no system turn)'));
  console.log(formatSeparator(60));

  if (system && context) {
    const { topic, user } = buildContextFromSnapshot(session, context);
    const rerendered = buildTutorPrompt(topic, user, completionMarker);
    console.log(
      rerendered === system.content
        ? green('Snapshot renders the same prompt.')
        : yellow('Snapshot renders a different prompt (template or marker changed since start).')
    );
  }
  printBlankLine();
}

function printSessionHeader(session: Session): void {
  console.log(`${bold('Session:')} ${session.id}`);
  console.log(`${bold('Status:')} ${formatStatus(session.status)}`);
  console.log(`${bold('Started:')} ${session.startedAt.toLocaleString()}`);
  if (session.endedAt) {
    console.log(`${bold('Ended:')} ${session.endedAt.toLocaleString()}`);
  }
  if (session.status === 'completed') {
    console.log(`${bold('Progress update:')} ${formatNotificationStatus(session.notificationStatus)}`);
  }
}

function formatDateTime(date: Date): string {
  return date.toLocaleString('en-US', {
    month: 'short',
    day: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
  });
}

function formatTime(date: Date): string {
  return date.toLocaleTimeString('en-US', {
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  });
}
