import weaviate, { ApiKey, WeaviateClient } from 'weaviate-ts-client';
import { z } from 'zod';
import { ConversationHistory, ConversationTurn, INTERACTION_TYPES } from '../types';

const MEMORY_CLASS = 'InteractionMemory';

const storedTurnSchema = z.object({
  ecosystemId: z.string(),
  pairKey: z.string(),
  turnIndex: z.number().int(),
  speakerId: z.string(),
  speakerName: z.string(),
  text: z.string(),
  interactionType: z.enum(INTERACTION_TYPES),
  timestamp: z.string()
});

const recentTurnsSchema = z.object({
  data: z.object({
    Get: z.object({
      [MEMORY_CLASS]: z.array(storedTurnSchema).nullable()
    })
  })
});

export class WeaviateService implements ConversationHistory {
  private client: WeaviateClient;

  // The OpenAI key lets the text2vec-openai module vectorize stored lines
  constructor(url: string, apiKey: string, openaiApiKey: string = '') {
    const scheme = url.startsWith('http://') ? 'http' : 'https';
    this.client = weaviate.client({
      scheme,
      host: url.replace(/^https?:\/\//, ''),
      apiKey: new ApiKey(apiKey),
      headers: { 'X-OpenAI-Api-Key': openaiApiKey }
    });
  }

  async initializeSchema(): Promise<void> {
    try {
      const schema = await this.client.schema.getter().do();
      const exists = (schema.classes ?? []).some(cls => cls.class === MEMORY_CLASS);
      if (exists) return;

      await this.client.schema.classCreator().withClass({
        class: MEMORY_CLASS,
        description: 'Dialogue exchanged between two characters of an ecosystem',
        vectorizer: 'text2vec-openai',
        properties: [
          { name: 'ecosystemId', dataType: ['text'], description: 'Ecosystem the pair belongs to' },
          { name: 'pairKey', dataType: ['text'], description: 'Canonical key of the character pair' },
          { name: 'turnIndex', dataType: ['int'], description: 'Position of the line in the pair history' },
          { name: 'speakerId', dataType: ['text'], description: 'Character who spoke the line' },
          { name: 'speakerName', dataType: ['text'], description: 'Display name of the speaker' },
          { name: 'text', dataType: ['text'], description: 'The line itself' },
          { name: 'interactionType', dataType: ['text'], description: 'Interaction the line belongs to' },
          { name: 'timestamp', dataType: ['date'], description: 'When the line was spoken' }
        ]
      }).do();
      console.log(`${MEMORY_CLASS} class created successfully`);
    } catch (error) {
      console.error('Error initializing Weaviate schema:', error);
      throw error;
    }
  }

  async append(turn: ConversationTurn): Promise<void> {
    try {
      await this.client.data.creator()
        .withClassName(MEMORY_CLASS)
        .withProperties({
          ecosystemId: turn.ecosystem_id,
          pairKey: turn.pair_key,
          turnIndex: turn.turn_index,
          speakerId: turn.speaker_id,
          speakerName: turn.speaker_name,
          text: turn.text,
          interactionType: turn.interaction_type,
          timestamp: turn.timestamp.toISOString()
        })
        .do();
    } catch (error) {
      console.error('Error storing conversation turn:', error);
      throw error;
    }
  }

  async recent(ecosystem_id: string, pair_key: string, limit: number): Promise<ConversationTurn[]> {
    if (limit <= 0) return [];

    try {
      const result: unknown = await this.client.graphql.get()
        .withClassName(MEMORY_CLASS)
        .withFields('ecosystemId pairKey turnIndex speakerId speakerName text interactionType timestamp')
        .withWhere({
          operator: 'And',
          operands: [
            { path: ['ecosystemId'], operator: 'Equal', valueText: ecosystem_id },
            { path: ['pairKey'], operator: 'Equal', valueText: pair_key }
          ]
        })
        .withSort([{ path: ['turnIndex'], order: 'desc' }])
        .withLimit(limit)
        .do();

      const items = recentTurnsSchema.parse(result).data.Get[MEMORY_CLASS] ?? [];

      return items
        .map(item => ({
          ecosystem_id: item.ecosystemId,
          pair_key: item.pairKey,
          turn_index: item.turnIndex,
          speaker_id: item.speakerId,
          speaker_name: item.speakerName,
          text: item.text,
          interaction_type: item.interactionType,
          timestamp: new Date(item.timestamp)
        }))
        .reverse(); // chronological order
    } catch (error) {
      console.error('Error getting recent conversation turns:', error);
      throw error;
    }
  }
}
