export { DIMENSIONS, DIMENSION_CEILINGS, type Dimension } from './dimensions';
export {
  JUDGMENT_CLIENT,
  type JudgeOptions,
  type Judgment,
  type JudgmentClient,
  type JudgmentPromptContext,
  type JudgmentRequest,
} from './judgment-client.interface';
export { JudgmentUnavailableError, type JudgmentErrorCode } from './judgment.errors';
export { LlmConfigService, type LlmRuntimeConfig } from './llm-config.service';
export { LlmJudgmentClient } from './llm-judgment.client';
export { JudgmentModule } from './judgment.module';
