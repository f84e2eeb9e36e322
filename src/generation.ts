import OpenAI from 'openai';
import logger from './logger';
import { GenerationUnavailableError, describeError } from './errors';

export interface GroundingFact {
  rank: number;
  cardName: string;
  category: string;
  rate: number;
  activationRequired: boolean;
  validUntil: string | null;
  conditions: string;
}

export interface AnswerGenerator {
  /**
   * Phrases an answer from the facts. Throws GenerationUnavailableError when
   * the model cannot be reached or refuses for quota reasons.
   */
  generate(prompt: string, groundingFacts: GroundingFact[]): Promise<string>;
}

const SYSTEM_PROMPT = `You are a friendly credit card rewards assistant.
Answer ONLY from the facts you are given; never add cards, rates or dates that are not in them.
Keep the order of the ranked cards exactly as given.
Mention when a card needs its reward plan switched on in the issuer app, and mention expiry dates.
Reply in the language of the user's question, in at most six short lines.`;

export const renderFacts = (facts: GroundingFact[]): string =>
  facts
    .map((fact) => {
      const caveats = [
        fact.activationRequired ? 'activation required in the issuer app' : 'no activation needed',
        fact.validUntil ? `valid until ${fact.validUntil}` : 'no expiry',
        fact.conditions ? `conditions: ${fact.conditions}` : null
      ].filter(Boolean);
      return `${fact.rank}. ${fact.cardName}: ${fact.rate}% on ${fact.category} (${caveats.join('; ')})`;
    })
    .join('\n');

export interface OpenAIAnswerGeneratorOptions {
  client: OpenAI;
  model: string;
  timeoutMs: number;
}

export class OpenAIAnswerGenerator implements AnswerGenerator {
  constructor(private readonly options: OpenAIAnswerGeneratorOptions) {}

  async generate(prompt: string, groundingFacts: GroundingFact[]): Promise<string> {
    try {
      const completion = await this.options.client.chat.completions.create(
        {
          model: this.options.model,
          temperature: 0.3,
          max_tokens: 400,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: `${prompt}\n\nRanked cards:\n${renderFacts(groundingFacts)}` }
          ]
        },
        { timeout: this.options.timeoutMs, maxRetries: 0 }
      );
      const content = completion.choices[0]?.message?.content?.trim();
      if (!content) {
        throw new GenerationUnavailableError('empty-response', 'The language model returned an empty answer');
      }
      return content;
    } catch (error) {
      throw toGenerationError(error);
    }
  }
}

export const toGenerationError = (error: unknown): GenerationUnavailableError => {
  if (error instanceof GenerationUnavailableError) {
    return error;
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new GenerationUnavailableError('timeout', 'The language model timed out', { cause: error });
  }
  if (error instanceof OpenAI.RateLimitError) {
    return new GenerationUnavailableError('quota', 'The language model quota is exhausted', { cause: error });
  }
  logger.error(`[GENERATION] Unexpected generation failure: ${describeError(error)}`, { error });
  return new GenerationUnavailableError('unavailable', 'The language model is unavailable', { cause: error });
};
