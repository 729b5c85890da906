/**
 * LLM Prompts - Barrel Export
 */

export {
  buildTutorPrompt,
  buildContextFromSnapshot,
  buildMarkerInstruction,
  applyTemplate,
  renderUserLevel,
  renderCompletedTopics,
  renderStruggles,
  DEFAULT_TUTOR_TEMPLATE,
  type TutorPromptVariables,
} from './tutor-prompt';
