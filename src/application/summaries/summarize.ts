import type { Summarizer } from '../../domain/summaries/summarizer.js';
import type { Logger } from '../../infra/logger.js';
import { ValidationError } from '../errors.js';

export const MIN_SUMMARY_TEXT_LENGTH = 5;

export interface SummarizeCommand {
  text: string;
}

export interface SummarizeResult {
  original_text: string;
  summary: string;
}

export class SummarizeUseCase {
  constructor(
    private summarizer: Summarizer,
    private logger: Logger
  ) {}

  async execute(command: SummarizeCommand): Promise<SummarizeResult> {
    this.logger.info({ textLength: command.text.length }, 'Received summarization request');

    const cleanedText = command.text.trim();
    if (cleanedText.length < MIN_SUMMARY_TEXT_LENGTH) {
      throw new ValidationError(
        `Text must be at least ${MIN_SUMMARY_TEXT_LENGTH} characters`
      );
    }

    const summary = await this.summarizer.summarize(cleanedText);
    this.logger.info('Summarization successful');

    return {
      original_text: cleanedText,
      summary,
    };
  }
}
