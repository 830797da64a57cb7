import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { findDataFile } from '../common/utils/asset-path';
import { compileSchemaValidator } from '../common/utils/schema-validate';
import { PromptCorpusService } from './prompt-corpus.service';
import type { PromptDraft } from './prompt.types';
import { DuplicateIdError } from './prompts.errors';

const validateDraft = compileSchemaValidator<PromptDraft>('prompts/schemas/prompt-draft.schema.json');

const DEFAULT_SEED_FILE = 'prompts.seed.json';

/**
 * Fills an empty corpus from a JSON file of prompt drafts at startup.
 * Drafts that fail validation are skipped with a warning; the rest load.
 */
@Injectable()
export class PromptSeedService implements OnModuleInit {
  private readonly logger = new Logger(PromptSeedService.name);
  private readonly seedFile: string | null;

  constructor(
    private readonly corpus: PromptCorpusService,
    configService: ConfigService,
  ) {
    const configured = configService.get<string>('PROMPT_SEED_FILE')?.trim();
    this.seedFile = configured ? resolve(process.cwd(), configured) : findDataFile(DEFAULT_SEED_FILE);
  }

  async onModuleInit() {
    if (this.corpus.count() > 0) {
      return;
    }
    if (!this.seedFile || !existsSync(this.seedFile)) {
      this.logger.warn('No prompt seed file found; starting with an empty corpus');
      return;
    }
    const loaded = await this.loadDrafts(JSON.parse(readFileSync(this.seedFile, 'utf-8')));
    this.logger.log(`Seeded ${loaded} prompt(s) from ${this.seedFile}`);
  }

  async loadDrafts(payload: unknown): Promise<number> {
    if (!Array.isArray(payload)) {
      this.logger.warn('Prompt seed must be a JSON array; nothing loaded');
      return 0;
    }

    let loaded = 0;
    for (const [index, item] of payload.entries()) {
      const result = validateDraft(item);
      if (!result.valid) {
        this.logger.warn(`Skipping seed prompt #${index}: ${result.errors}`);
        continue;
      }
      try {
        await this.corpus.insert(result.value);
        loaded += 1;
      } catch (error) {
        if (!(error instanceof DuplicateIdError)) {
          throw error;
        }
        this.logger.warn(`Skipping seed prompt #${index}: ${error.message}`);
      }
    }
    return loaded;
  }
}
