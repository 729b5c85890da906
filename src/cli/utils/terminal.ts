/**
 * Terminal Utilities for CLI Output Formatting
 *
 * ANSI escape code wrappers for colorizing terminal output, plus the
 * formatters the tutoring commands share.
 *
 * Usage:
 * ```typescript
 * import { bold, green, formatTutorMessage } from './terminal';
 *
 * console.log(bold('Topic Tutor'));
 * console.log(formatTutorMessage('O que é uma variável?'));
 * ```
 *
 * In non-TTY environments the codes pass through harmlessly.
 */

import type { NotificationStatus, SessionStatus } from '../../core/models';

// =============================================================================
// Text Style Modifiers
// =============================================================================

/**
 * Makes text bold/bright in the terminal.
 */
export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

/**
 * Makes text dim/faded in the terminal.
 * Use for secondary information like hints, timestamps, or IDs.
 */
export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;

// =============================================================================
// Color Functions
// =============================================================================

export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;

export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;

export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;

/**
 * Colors text cyan. Used for the tutor's replies.
 */
export const cyan = (s: string): string => `\x1b[36m${s}\x1b[0m`;

// =============================================================================
// Semantic Formatters
// =============================================================================

/**
 * Formats the tutor's reply with a "Tutor:" label.
 */
export function formatTutorMessage(message: string): string {
  return cyan(`Tutor: ${message}`);
}

/**
 * Formats a horizontal separator line for visual section breaks.
 *
 * @example
 * console.log(formatSeparator());
 * // Output: "──────────────────────────────────────────────────"
 */
export function formatSeparator(width: number = 50): string {
  return dim('─'.repeat(width));
}

/**
 * Formats command help text for display.
 *
 * @example
 * console.log(formatCommandHelp('/quit', 'Exit the session'));
 */
export function formatCommandHelp(command: string, description: string): string {
  return `  ${yellow(command.padEnd(10))} - ${dim(description)}`;
}

/**
 * Colors a session status: green for completed, yellow for active,
 * dim for abandoned.
 */
export function formatStatus(status: SessionStatus): string {
  switch (status) {
    case 'completed':
      return green(status);
    case 'active':
      return yellow(status);
    case 'abandoned':
      return dim(status);
  }
}

/**
 * Colors a notification status; 'failed' stands out in red.
 */
export function formatNotificationStatus(status: NotificationStatus): string {
  switch (status) {
    case 'delivered':
      return green(status);
    case 'failed':
      return red(status);
    case 'pending':
      return yellow(status);
    case 'not_required':
      return dim(status);
  }
}

/**
 * Prints a blank line for visual spacing.
 */
export function printBlankLine(): void {
  console.log();
}

/**
 * Prints the banner shown when a chat starts.
 */
export function printSessionBanner(info: {
  sessionId: string;
  courseTitle: string;
  topicTitle: string;
  resumed: boolean;
}): void {
  printBlankLine();
  console.log(formatSeparator(60));
  console.log(bold(`  Topic Tutor - ${info.resumed ? 'Resumed Session' : 'New Session'}`));
  console.log(formatSeparator(60));
  console.log(`  Course: ${green(info.courseTitle)}`);
  console.log(`  Topic:  ${green(info.topicTitle)}`);
  console.log(`  ${dim(info.sessionId)}`);
  console.log(formatSeparator(60));
  printBlankLine();
  console.log(dim('  Commands: /quit (abandon and exit) | /exit (leave, resume later) | /help'));
  printBlankLine();
}

/**
 * Prints the chat commands.
 */
export function printCommandsHelp(): void {
  printBlankLine();
  console.log(bold('Available Commands:'));
  console.log(formatCommandHelp('/quit', 'Abandon the session and exit'));
  console.log(formatCommandHelp('/exit', 'Leave; the session stays active and can be resumed'));
  console.log(formatCommandHelp('/help', 'Show this help message'));
  printBlankLine();
}

/**
 * Prints the completion summary.
 */
export function printSessionComplete(notificationStatus: NotificationStatus): void {
  printBlankLine();
  console.log(formatSeparator(60));
  console.log(green(bold('  Topic Complete!')));
  console.log(`  Progress update: ${formatNotificationStatus(notificationStatus)}`);
  console.log(formatSeparator(60));
  printBlankLine();
}

/**
 * Printed after /quit.
 */
export function printSessionAbandoned(): void {
  printBlankLine();
  console.log(yellow('Session abandoned.'));
  console.log(dim('Starting the same topic again opens a new session.'));
  printBlankLine();
}
