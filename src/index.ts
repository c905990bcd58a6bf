export * from './types';
export * from './config';
export * from './utils/errors';
export { withTimeout } from './utils/timeout';
export { personalityProfileSchema, interactionRequestSchema, validateInteractionRequest } from './utils/validation';

export {
  compatibility,
  validateProfile,
  describePersonality,
  dominantTrait,
  predictInteractionOutcome
} from './engines/personality';
export {
  EmotionEngine,
  neutralEmotionalState,
  dominantEmotion,
  emotionalDistance,
  diffEmotionalStates,
  moodOf
} from './engines/emotion';
export {
  RelationshipLedger,
  canonicalPair,
  pairKey,
  createRelationship,
  determineRelationshipType
} from './engines/relationship';
export { LexiconSentimentScorer } from './engines/sentiment';
export { TemplateDialogueGenerator, buildDialoguePrompts, relationshipTone } from './engines/dialogue';

export { InteractionProcessor } from './core/interaction-processor';
export type { InteractionProcessorDeps } from './core/interaction-processor';
export { CharacterLockManager } from './core/locks';
export { EcosystemEventBus, NoopNotifier, ecosystemChannel, GLOBAL_CHANNEL } from './core/event-notifier';

export { InMemoryCharacterStore, InMemoryConversationHistory } from './storage/character-store';
export { OpenAIService, parseSentimentScore } from './integrations/openai';
export { WeaviateService } from './integrations/weaviate';

import { runEcosystemDemo } from './demo/ecosystem-demo';

export { runEcosystemDemo };

// Main execution
if (require.main === module) {
  runEcosystemDemo().catch(error => {
    console.error('❌ Demo failed:', error);
    process.exitCode = 1;
  });
}
