/**
 * Tutor Prompt Builder
 *
 * Renders the system instruction for a tutoring session from the topic
 * definition and the learner context fetched upstream. The result is stored
 * as the session's single system turn, so it must be deterministic: the same
 * inputs always produce the same text.
 *
 * Key design decisions:
 *
 * 1. **Topic-owned templates**: each topic may carry its own template with
 *    `{placeholder}` slots. Topics without one get DEFAULT_TUTOR_TEMPLATE.
 *
 * 2. **Fixed renderings**: the learner level is mapped through a closed set
 *    of labels instead of being passed through, and empty lists render as
 *    explicit "none yet" phrases so the model never sees a dangling label.
 *
 * 3. **Reachable marker**: whatever the template says, the rendered prompt
 *    always contains the completion marker. Templates that forget the
 *    `{completion_marker}` slot get an instruction sentence appended.
 */

import type { Session, SessionContext, TopicSpec, UserContext } from '../../core/models';

// ============================================================================
// Renderings
// ============================================================================

/**
 * Level labels shown to the model. Upstream level strings are matched
 * case-insensitively against the keys; unknown values fall back to
 * intermediate.
 */
const LEVEL_LABELS: Record<string, string> = {
  beginner: 'iniciante',
  novice: 'iniciante',
  intermediate: 'intermediário',
  advanced: 'avançado',
  expert: 'avançado',
};

const UNKNOWN_LEVEL_LABEL = 'intermediário';
const MISSING_LEVEL_LABEL = 'iniciante a intermediário';
const NO_COMPLETED_TOPICS = 'nenhum tópico concluído ainda';
const NO_STRUGGLES = 'nenhuma dificuldade registrada ainda';
const NO_OBJECTIVES = 'não informados';

/** Only the most recent difficulties are worth the model's attention */
const MAX_STRUGGLES = 3;

export function renderUserLevel(level: string | null | undefined): string {
  const normalized = level?.trim().toLowerCase();
  if (!normalized) {
    return MISSING_LEVEL_LABEL;
  }
  return LEVEL_LABELS[normalized] ?? UNKNOWN_LEVEL_LABEL;
}

export function renderCompletedTopics(topicIds: readonly number[]): string {
  return topicIds.length === 0 ? NO_COMPLETED_TOPICS : topicIds.join(', ');
}

export function renderStruggles(struggles: readonly string[]): string {
  const labels = struggles
    .map((label) => label.trim())
    .filter((label) => label.length > 0)
    .slice(0, MAX_STRUGGLES);
  return labels.length === 0 ? NO_STRUGGLES : labels.join(', ');
}

// ============================================================================
// Template
// ============================================================================

/**
 * Template used when the topic does not define its own.
 */
export const DEFAULT_TUTOR_TEMPLATE = [
  'Você é um tutor paciente e encorajador do curso "{course_title}".',
  '',
  'TÓPICO ATUAL: {topic_title}',
  '',
  'DESCRIÇÃO DO TÓPICO:',
  '{topic_description}',
  '',
  'OBJETIVOS DE APRENDIZAGEM:',
  '{learning_objectives}',
  '',
  'CONTEXTO DO ALUNO:',
  '- Nível: {user_level}',
  '- Tópicos concluídos: {completed_topics}',
  '- Dificuldades anteriores: {struggles}',
  '',
  'COMO ENSINAR:',
  '1. Explique o conceito de forma clara e concisa, adaptada ao nível do aluno.',
  '2. Use exemplos práticos e analogias quando ajudarem.',
  '3. Faça três perguntas progressivas: compreensão, aplicação e análise.',
  '4. Dê feedback após cada resposta antes de seguir para a próxima pergunta.',
  '5. Se o aluno tiver dificuldade, ofereça dicas em vez da resposta pronta.',
  '',
  'Mantenha o foco em "{topic_title}". Quando o aluno responder corretamente a pelo menos',
  'duas das três perguntas, inclua o marcador {completion_marker} na sua resposta.',
  '',
  'Comece apresentando o tópico e a sua explicação.',
].join('\n');

/**
 * Values substituted into a template, keyed by placeholder name.
 */
export type TutorPromptVariables = Record<
  | 'course_title'
  | 'topic_title'
  | 'topic_description'
  | 'learning_objectives'
  | 'user_level'
  | 'completed_topics'
  | 'struggles'
  | 'completion_marker',
  string
>;

const PLACEHOLDER_PATTERN = /\{([a-z_]+)\}/g;

function isVariableName(
  name: string,
  variables: TutorPromptVariables
): name is keyof TutorPromptVariables {
  return Object.prototype.hasOwnProperty.call(variables, name);
}

/**
 * Substitutes known placeholders in a single pass. Unknown `{...}` sequences
 * are left as written and substituted values are not scanned again.
 */
export function applyTemplate(template: string, variables: TutorPromptVariables): string {
  return template.replace(PLACEHOLDER_PATTERN, (match, name: string) =>
    isVariableName(name, variables) ? variables[name] : match
  );
}

export function buildMarkerInstruction(marker: string): string {
  return (
    'Quando o aluno demonstrar domínio do tópico, inclua exatamente o marcador ' +
    `${marker} na sua resposta.`
  );
}

// ============================================================================
// Builders
// ============================================================================

/**
 * Builds the tutor system prompt.
 *
 * @param topic - Topic definition from upstream
 * @param user - Learner context from upstream
 * @param completionMarker - Token the model must emit on completion
 * @returns The rendered system instruction
 *
 * @example
 * ```typescript
 * const prompt = buildTutorPrompt(
 *   { ...topic, title: 'Variables', promptTemplate: 'Topic: {topic_title}. Level: {user_level}.' },
 *   { ...user, userLevel: 'beginner' },
 *   '{TOPIC_COMPLETED}'
 * );
 * // 'Topic: Variables. Level: iniciante.\n\nQuando o aluno demonstrar ...'
 * ```
 */
export function buildTutorPrompt(
  topic: TopicSpec,
  user: UserContext,
  completionMarker: string
): string {
  const template =
    topic.promptTemplate && topic.promptTemplate.trim().length > 0
      ? topic.promptTemplate
      : DEFAULT_TUTOR_TEMPLATE;

  const rendered = applyTemplate(template, {
    course_title: topic.courseTitle,
    topic_title: topic.title,
    topic_description: topic.description,
    learning_objectives: topic.learningObjectives?.trim() || NO_OBJECTIVES,
    user_level: renderUserLevel(user.userLevel),
    completed_topics: renderCompletedTopics(user.completedTopicIds),
    struggles: renderStruggles(user.struggleTopics),
    completion_marker: completionMarker,
  });

  if (rendered.includes(completionMarker)) {
    return rendered;
  }

  return `${rendered.trimEnd()}\n\n${buildMarkerInstruction(completionMarker)}`;
}

/**
 * Rebuilds the prompt inputs from a stored context snapshot, so a session's
 * system prompt can be rendered again without asking the upstream.
 */
export function buildContextFromSnapshot(
  session: Pick<Session, 'userId' | 'topicId' | 'courseId'>,
  context: SessionContext
): { topic: TopicSpec; user: UserContext } {
  return {
    topic: {
      id: session.topicId,
      title: context.topicTitle,
      description: context.topicDescription,
      promptTemplate: context.promptTemplate,
      courseId: session.courseId,
      courseTitle: context.courseTitle,
      learningObjectives: context.learningObjectives,
    },
    user: {
      userId: session.userId,
      userLevel: context.userLevel,
      completedTopicIds: context.completedTopicIds,
      struggleTopics: context.struggleTopics,
    },
  };
}
