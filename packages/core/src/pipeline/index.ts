export {
  type IndexBuiltEvent,
  type QuestionStartEvent,
  type ClaimVerifiedEvent,
  type QuestionCompleteEvent,
  type PipelineCompleteEvent,
  type PipelineErrorEvent,
  type PipelineEvents,
  type PipelineContext,
  compareQids,
  orderQuestions,
  VerificationPipeline,
} from './engine.js';
