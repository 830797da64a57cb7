import { Body, Controller, Get, Header, HttpCode, Param, Post } from '@nestjs/common';
import { CreatePromptDto } from './dto/create-prompt.dto';
import { ImportPromptsDto } from './dto/import-prompts.dto';
import { PromptCorpusService } from './prompt-corpus.service';
import { toPromptView } from './prompt.view';
import { PromptNotFoundError } from './prompts.errors';

@Controller('prompts')
export class PromptsController {
  constructor(private readonly corpus: PromptCorpusService) {}

  @Get()
  list() {
    return this.corpus.getAll().map(toPromptView);
  }

  @Post()
  async create(@Body() body: CreatePromptDto) {
    const record = await this.corpus.insert(body);
    return toPromptView(record);
  }

  @Get('export')
  @Header('Content-Type', 'application/json; charset=utf-8')
  exportAll() {
    return this.corpus.exportJson();
  }

  @Post('import')
  @HttpCode(200)
  importAll(@Body() body: ImportPromptsDto) {
    const imported = this.corpus.importJson(body.records, { replace: body.replace });
    return { imported, total: this.corpus.count() };
  }

  @Get(':id')
  findOne(@Param('id') id: string) {
    const record = this.corpus.findById(id);
    if (!record) {
      throw new PromptNotFoundError(id);
    }
    return toPromptView(record);
  }
}
