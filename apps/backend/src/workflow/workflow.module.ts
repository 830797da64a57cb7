import { Module } from '@nestjs/common';
import { EvaluationModule } from '../evaluation';
import { PromptsModule } from '../prompts/prompts.module';
import { WorkflowController } from './workflow.controller';
import { WorkflowCoordinatorService } from './workflow-coordinator.service';

@Module({
  imports: [PromptsModule, EvaluationModule],
  controllers: [WorkflowController],
  providers: [WorkflowCoordinatorService],
  exports: [WorkflowCoordinatorService],
})
export class WorkflowModule {}
