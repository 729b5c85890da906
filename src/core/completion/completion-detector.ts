/**
 * Completion Detector
 *
 * The tutor prompt instructs the model to emit a fixed marker token (by
 * default `{TOPIC_COMPLETED}`) once the learner has shown mastery of the
 * topic. This module turns a raw model reply into:
 *
 * - `completed`: whether the marker occurs anywhere in the reply
 * - `cleanedText`: the reply as the learner should see it
 *
 * Cleaning only happens when the marker is present: every occurrence, along
 * with the whitespace around it, becomes a single space and the result is
 * trimmed. Replies without the marker are returned untouched.
 *
 * @example
 * ```typescript
 * detectCompletion('Great job! {TOPIC_COMPLETED}', '{TOPIC_COMPLETED}');
 * // { cleanedText: 'Great job!', completed: true }
 * ```
 */

export interface CompletionDetection {
  cleanedText: string;
  completed: boolean;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Scans a model reply for the completion marker. Pure and total.
 */
export function detectCompletion(text: string, marker: string): CompletionDetection {
  if (marker.length === 0 || !text.includes(marker)) {
    return { cleanedText: text, completed: false };
  }

  // A run of markers and the whitespace between/around them collapses to one space.
  const pattern = new RegExp(`\\s*(?:${escapeRegExp(marker)}\\s*)+`, 'g');

  let cleaned = text;
  let previousLength: number;
  do {
    previousLength = cleaned.length;
    cleaned = cleaned.replace(pattern, ' ').trim();
    // joining the text around a removal can form a new occurrence
  } while (cleaned.includes(marker) && cleaned.length < previousLength);

  return { cleanedText: cleaned, completed: true };
}

/**
 * Strips the marker for display without reporting completion.
 */
export function stripCompletionMarker(text: string, marker: string): string {
  return detectCompletion(text, marker).cleanedText;
}
