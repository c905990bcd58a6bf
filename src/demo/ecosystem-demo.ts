import dotenv from 'dotenv';
import { loadConfigFromEnv } from '../config';
import { EcosystemEventBus } from '../core/event-notifier';
import { InteractionProcessor } from '../core/interaction-processor';
import { neutralEmotionalState, dominantEmotion } from '../engines/emotion';
import { compatibility, describePersonality } from '../engines/personality';
import { OpenAIService } from '../integrations/openai';
import { WeaviateService } from '../integrations/weaviate';
import { InMemoryCharacterStore, InMemoryConversationHistory } from '../storage/character-store';
import { Character, ConversationHistory, InteractionRequest, OpenAIConfig } from '../types';

function seedCharacter(
  id: string,
  name: string,
  personality: Character['personality']
): Character {
  return {
    id,
    name,
    ecosystem_id: 'harbor-town',
    personality,
    emotional_state: neutralEmotionalState(),
    social_energy: 1,
    interaction_count: 0,
    is_active: true
  };
}

export async function runEcosystemDemo(): Promise<void> {
  dotenv.config();

  console.log('🌱 Character Ecosystem Demo');
  console.log('===========================');

  const config = loadConfigFromEnv();
  const store = new InMemoryCharacterStore();
  const bus = new EcosystemEventBus();

  // Real services when credentials are present, local fallbacks otherwise
  const openai_config: Partial<OpenAIConfig> = {};
  if (process.env.OPENAI_DIALOGUE_MODEL) openai_config.dialogueModel = process.env.OPENAI_DIALOGUE_MODEL;
  if (process.env.OPENAI_SENTIMENT_MODEL) openai_config.sentimentModel = process.env.OPENAI_SENTIMENT_MODEL;
  const openai = process.env.OPENAI_API_KEY
    ? new OpenAIService(process.env.OPENAI_API_KEY, openai_config)
    : undefined;

  let history: ConversationHistory = new InMemoryConversationHistory();
  if (process.env.WEAVIATE_URL && process.env.WEAVIATE_API_KEY) {
    const weaviate = new WeaviateService(
      process.env.WEAVIATE_URL,
      process.env.WEAVIATE_API_KEY,
      process.env.OPENAI_API_KEY
    );
    console.log('Initializing Weaviate schema...');
    await weaviate.initializeSchema();
    history = weaviate;
  }

  const processor = new InteractionProcessor({
    store,
    sentiment: openai,
    generator: openai,
    notifier: bus,
    history,
    config
  });

  const alice = seedCharacter('alice', 'Alice', {
    openness: 0.7,
    conscientiousness: 0.6,
    extraversion: 0.6,
    agreeableness: 0.9,
    neuroticism: 0.2
  });
  const bob = seedCharacter('bob', 'Bob', {
    openness: 0.4,
    conscientiousness: 0.3,
    extraversion: 0.3,
    agreeableness: 0.3,
    neuroticism: 0.8
  });
  await store.saveCharacter(alice);
  await store.saveCharacter(bob);

  console.log(`Alice: ${describePersonality(alice.personality)}`);
  console.log(`Bob: ${describePersonality(bob.personality)}`);
  const score = compatibility(alice.personality, bob.personality, config.compatibility);
  console.log(
    `Compatibility: overall ${score.overall.toFixed(2)}, friendship ${score.friendship.toFixed(2)}, ` +
    `romance ${score.romance.toFixed(2)}, rivalry ${score.rivalry.toFixed(2)}`
  );
  console.log('---');

  bus.subscribe('harbor-town', event => {
    if (event.type === 'relationship_change') {
      console.log(`🔄 ${event.character_a_id} & ${event.character_b_id}: ${event.previous_type} → ${event.relationship_type}`);
      return;
    }
    console.log(`📣 [${event.interaction_type}] ${event.participants[1].name}: "${event.response}"`);
  });

  const script: InteractionRequest[] = [
    { initiator_id: 'alice', target_id: 'bob', interaction_type: 'greeting', content: 'Good morning, Bob! Lovely day, isn\'t it?' },
    { initiator_id: 'bob', target_id: 'alice', interaction_type: 'debate', content: 'I think your plan for the harbor festival is wrong.' },
    { initiator_id: 'alice', target_id: 'bob', interaction_type: 'collaboration', content: 'Let\'s fix it together. I appreciate your ideas.' },
    { initiator_id: 'bob', target_id: 'alice', interaction_type: 'conflict', content: 'You never listen. I hate how this turned out.' }
  ];

  for (const [index, request] of script.entries()) {
    try {
      const result = await processor.process(request);
      if (!result.success) {
        console.log(`❌ Exchange ${index + 1}: ${result.failure_reason}`);
        continue;
      }

      const delta = result.relationship_delta;
      if (delta) {
        console.log(
          `💞 Exchange ${index + 1}: strength ${delta.new_strength.toFixed(3)} (${delta.strength_delta >= 0 ? '+' : ''}${delta.strength_delta.toFixed(3)}), ` +
          `trust ${delta.new_trust.toFixed(3)}, familiarity ${delta.new_familiarity.toFixed(2)} → ${result.relationship_type}`
        );
      }
      const target_state = result.emotional_states?.[request.target_id];
      if (target_state) {
        console.log(`   ${request.target_id} feels mostly ${dominantEmotion(target_state)}`);
      }
    } catch (error) {
      console.error(`❌ Error in exchange ${index + 1}:`, error);
    }
  }

  const final_alice = await store.getCharacter('alice');
  const final_bob = await store.getCharacter('bob');
  console.log('---');
  console.log(`Energy left: Alice ${final_alice?.social_energy.toFixed(2)}, Bob ${final_bob?.social_energy.toFixed(2)}`);
}

if (require.main === module) {
  runEcosystemDemo().catch(error => {
    console.error('❌ Demo failed:', error);
    process.exitCode = 1;
  });
}
