export {
  type StageName,
  type StageStartEvent,
  type StageCompleteEvent,
  type EntityResolvedEvent,
  type ProviderFailedEvent,
  type IndexIngestedEvent,
  type VerificationCompleteEvent,
  type VerificationDegradedEvent,
  type PipelineCompleteEvent,
  type PipelineErrorEvent,
  type PipelineEvents,
  type PipelineAgents,
  type PipelineDependencies,
  type RunOptions,
  type PipelineMetadata,
  type PipelineOutcome,
  type PipelineResult,
  STAGES,
  IRRELEVANT_ANSWER,
  irrelevantVerdict,
  VerdictPipeline,
} from './engine.js';

export { PipelineRunner, type PipelineRunnerOptions } from './runner.js';

export { fanOut, type FanOutTask, type FanOutOutcome, type FanOutOptions } from './fanout.js';

export { Semaphore } from './semaphore.js';
