export {
  detectCompletion,
  stripCompletionMarker,
  type CompletionDetection,
} from './completion-detector';
