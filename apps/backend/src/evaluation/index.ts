export { EvaluationModule } from './evaluation.module';
export { EvaluationPipelineService } from './evaluation-pipeline.service';
export { GradingConfigService } from './grading-config.service';
export { RubricWeights, type RubricWeightsInput } from './rubric-weights';
export { EvaluationCancelledError, EvaluationFailedError, InvalidInputError } from './evaluation.errors';
export type {
  DimensionScore,
  DimensionStatus,
  EssayPrompt,
  EvaluateOptions,
  GradingResult,
  TaggedNote,
} from './evaluation.types';
