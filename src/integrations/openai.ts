import OpenAI from 'openai';
import { buildDialoguePrompts } from '../engines/dialogue';
import { DialogueContext, DialogueGenerator, OpenAIConfig, SentimentScorer } from '../types';
import { clamp } from '../utils/math';

export const DEFAULT_OPENAI_CONFIG: OpenAIConfig = {
  dialogueModel: 'gpt-4o-mini',
  sentimentModel: 'gpt-4o-mini',
  temperature: 0.8,
  maxTokens: 120
};

const SENTIMENT_SYSTEM_PROMPT = `You rate the emotional polarity of a line of dialogue.
Answer with a single number between -1 (very negative) and 1 (very positive). 0 is neutral.
Answer with the number only.`;

export function parseSentimentScore(raw: string): number {
  const match = raw.trim().match(/^[-+]?(?:\d+(?:\.\d+)?|\.\d+)/);
  if (!match) {
    throw new Error(`Unparseable sentiment score: "${raw}"`);
  }
  return clamp(Number(match[0]), -1, 1);
}

export class OpenAIService implements DialogueGenerator, SentimentScorer {
  private client: OpenAI;
  private config: OpenAIConfig;

  constructor(apiKey: string, config: Partial<OpenAIConfig> = {}) {
    this.client = new OpenAI({ apiKey });
    this.config = { ...DEFAULT_OPENAI_CONFIG, ...config };
  }

  async generate(context: DialogueContext): Promise<string> {
    const { system, user } = buildDialoguePrompts(context);
    return this.complete(this.config.dialogueModel, system, user, this.config.temperature, this.config.maxTokens);
  }

  async score(text: string): Promise<number> {
    const raw = await this.complete(this.config.sentimentModel, SENTIMENT_SYSTEM_PROMPT, text, 0, 8);
    return parseSentimentScore(raw);
  }

  protected async complete(
    model: string,
    systemPrompt: string,
    userPrompt: string,
    temperature: number,
    maxTokens: number
  ): Promise<string> {
    try {
      const response = await this.client.chat.completions.create({
        model,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt }
        ],
        temperature,
        max_tokens: maxTokens
      });

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new Error('No content received from OpenAI');
      }

      return content.trim();
    } catch (error) {
      console.error(`Error calling OpenAI (${model}):`, error);
      throw error;
    }
  }
}
