import { Inject, Injectable } from '@nestjs/common';
import { JUDGMENT_CLIENT, JudgmentClient } from '../judgment/judgment-client.interface';
import { PromptCorpusService } from '../prompts/prompt-corpus.service';

type HealthStatus = 'healthy' | 'degraded';

type ComponentHealth = {
  status: HealthStatus;
  message?: string;
};

type OverallHealth = {
  status: HealthStatus;
  timestamp: string;
  components: {
    corpus: ComponentHealth & { size: number };
    judgment: ComponentHealth & { configured: boolean };
  };
  uptime: number;
};

@Injectable()
export class HealthService {
  private readonly startTime: number;

  constructor(
    private readonly corpus: PromptCorpusService,
    @Inject(JUDGMENT_CLIENT) private readonly judgmentClient: JudgmentClient,
  ) {
    this.startTime = Date.now();
  }

  getHealth(): OverallHealth {
    const corpus = this.checkCorpus();
    const judgment = this.checkJudgment();
    const allHealthy = corpus.status === 'healthy' && judgment.status === 'healthy';

    return {
      status: allHealthy ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      components: { corpus, judgment },
      uptime: Date.now() - this.startTime,
    };
  }

  private checkCorpus(): ComponentHealth & { size: number } {
    const size = this.corpus.count();
    if (size === 0) {
      return { status: 'degraded', size, message: 'Prompt corpus is empty' };
    }
    return { status: 'healthy', size };
  }

  // Grading still works without a judge, on rule-based scores only.
  private checkJudgment(): ComponentHealth & { configured: boolean } {
    if (!this.judgmentClient.isConfigured()) {
      return {
        status: 'degraded',
        configured: false,
        message: 'No LLM endpoint configured; essays are scored without review',
      };
    }
    return { status: 'healthy', configured: true };
  }
}
