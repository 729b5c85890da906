/**
 * Externally-Sourced Context Types
 *
 * The upstream progress service owns everything the tutor needs to know about
 * the learner and the topic. These types describe that data after it has been
 * fetched and normalised, and the snapshot a session keeps of it.
 */

/**
 * What the upstream knows about the learner.
 */
export interface UserContext {
  userId: number;
  /** Free-form level label ('beginner', 'Expert', …); null when unknown */
  userLevel: string | null;
  completedTopicIds: number[];
  /** Labels of areas the learner previously struggled with */
  struggleTopics: string[];
}

/**
 * A topic of a course, as defined upstream.
 */
export interface TopicSpec {
  id: number;
  title: string;
  description: string;
  /**
   * Optional prompt template with `{placeholder}` slots.
   * When null the built-in tutor template is used.
   */
  promptTemplate: string | null;
  courseId: number;
  courseTitle: string;
  learningObjectives: string | null;
}

/**
 * Point-in-time snapshot of the upstream context, captured when the session
 * starts and never updated afterwards.
 */
export interface SessionContext {
  sessionId: string;
  userLevel: string | null;
  completedTopicIds: number[];
  struggleTopics: string[];
  courseTitle: string;
  topicTitle: string;
  topicDescription: string;
  learningObjectives: string | null;
  promptTemplate: string | null;
  capturedAt: Date;
}
