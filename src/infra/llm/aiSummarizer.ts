import { createOpenAI } from '@ai-sdk/openai';
import { generateText } from 'ai';
import type { Summarizer } from '../../domain/summaries/summarizer.js';
import { UpstreamError } from '../../application/errors.js';
import type { Logger } from '../logger.js';

export interface AiSummarizerOptions {
  apiKey: string | undefined;
  model: string;
}

export class SummarizationError extends UpstreamError {
  constructor(message = 'Summarization service unavailable') {
    super('SUMMARIZATION_FAILED', message);
  }
}

const SYSTEM_PROMPT =
  'You summarize text. Reply with a concise summary of the user text in the ' +
  'same language, without preamble.';

/**
 * Summarizer backed by an OpenAI chat model through the `ai` SDK.
 */
export class AiSummarizer implements Summarizer {
  constructor(
    private options: AiSummarizerOptions,
    private logger: Logger
  ) {}

  async summarize(text: string): Promise<string> {
    if (!this.options.apiKey) {
      throw new SummarizationError('Summarization is not configured');
    }

    const openai = createOpenAI({ apiKey: this.options.apiKey });

    try {
      const result = await generateText({
        model: openai(this.options.model),
        system: SYSTEM_PROMPT,
        prompt: text,
      });
      return result.text.trim();
    } catch (error) {
      this.logger.error({ err: error, model: this.options.model }, 'Summarization request failed');
      throw new SummarizationError();
    }
  }
}
