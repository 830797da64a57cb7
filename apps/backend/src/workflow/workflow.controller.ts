import { Body, Controller, HttpCode, Post, Res } from '@nestjs/common';
import type { Response } from 'express';
import { RecommendPromptsDto } from '../prompts/dto/recommend-prompts.dto';
import { SelectPromptDto } from '../prompts/dto/select-prompt.dto';
import { toPromptView } from '../prompts/prompt.view';
import { GradeEssayDto } from './dto/grade-essay.dto';
import { WorkflowCoordinatorService } from './workflow-coordinator.service';

@Controller()
export class WorkflowController {
  constructor(private readonly coordinator: WorkflowCoordinatorService) {}

  @Post('prompts/select')
  @HttpCode(200)
  async selectPrompt(@Body() body: SelectPromptDto) {
    const found = this.coordinator.requireMatch(await this.coordinator.selectPrompt(body));
    return {
      prompt: toPromptView(found.prompt),
      relaxation: found.relaxation,
      similarity: found.similarity,
      alternatives: found.alternatives.map(toPromptView),
    };
  }

  @Post('prompts/recommend')
  @HttpCode(200)
  recommendPrompts(@Body() body: RecommendPromptsDto) {
    return this.coordinator.recommendPrompts(body).map(toPromptView);
  }

  @Post('essays/grade')
  @HttpCode(200)
  async gradeEssay(@Body() body: GradeEssayDto, @Res({ passthrough: true }) res: Response) {
    const prompt = this.coordinator.resolvePrompt(body);
    const weights = body.weights ? this.coordinator.buildWeights(body.weights, prompt) : undefined;

    // A client that disconnects early abandons the judge calls.
    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    };
    res.on('close', onClose);
    try {
      const { result } = await this.coordinator.gradeEssay(body.essay, prompt, weights, {
        signal: controller.signal,
      });
      return result;
    } finally {
      res.off('close', onClose);
    }
  }
}
