import {
  Character,
  EmotionalState,
  InteractionType,
  Mood,
  PersonalityProfile,
  Relationship,
  RelationshipDelta,
  RelationshipType
} from './character';

export * from './character';

export interface InteractionRequest {
  initiator_id: string;
  target_id: string;
  interaction_type: InteractionType;
  content: string;
  context?: Record<string, unknown>;
}

export type FeasibilityFailure = 'insufficient_energy' | 'different_ecosystems' | 'inactive_character';

export interface InteractionResult {
  success: boolean;
  response_text?: string;
  relationship_delta?: RelationshipDelta;
  relationship_type?: RelationshipType;
  emotional_states?: Record<string, EmotionalState>;
  sentiment?: number;
  failure_reason?: string;
  failure_code?: FeasibilityFailure;
}

export interface EventParticipant {
  id: string;
  name: string;
  role: 'initiator' | 'responder';
}

export interface InteractionEvent {
  id: string;
  type: 'character_interaction';
  timestamp: string;
  ecosystem_id: string;
  interaction_type: InteractionType;
  participants: [EventParticipant, EventParticipant];
  content: string;
  response: string;
  relationship_change: RelationshipDelta;
  relationship_type: RelationshipType;
  emotional_states: Record<string, EmotionalState>;
  emotional_deltas: Record<string, EmotionalState>;
  sentiment: number;
}

export interface RelationshipChangeEvent {
  id: string;
  type: 'relationship_change';
  timestamp: string;
  ecosystem_id: string;
  character_a_id: string;
  character_b_id: string;
  previous_type: RelationshipType;
  relationship_type: RelationshipType;
  strength: number;
  trust: number;
}

export type EcosystemEvent = InteractionEvent | RelationshipChangeEvent;

export interface ConversationTurn {
  ecosystem_id: string;
  pair_key: string;
  // Position within the pair's history; both turns of one exchange share a timestamp
  turn_index: number;
  speaker_id: string;
  speaker_name: string;
  text: string;
  interaction_type: InteractionType;
  timestamp: Date;
}

export interface DialogueContext {
  speaker: Pick<Character, 'id' | 'name'>;
  listener: Pick<Character, 'id' | 'name'>;
  speaker_profile: PersonalityProfile;
  speaker_emotion: EmotionalState;
  mood: Mood;
  relationship: Relationship;
  interaction_type: InteractionType;
  content: string;
  recent_history: ConversationTurn[];
  context: Record<string, unknown>;
}

// Collaborator boundaries

export interface CharacterStore {
  getCharacter(id: string): Promise<Character | null>;
  saveCharacter(character: Character): Promise<void>;
  getRelationship(character_a_id: string, character_b_id: string): Promise<Relationship | null>;
  saveRelationship(relationship: Relationship): Promise<void>;
  listRelationships(character_id: string): Promise<Relationship[]>;
}

export interface SentimentScorer {
  score(text: string): Promise<number>;
}

export interface DialogueGenerator {
  generate(context: DialogueContext): Promise<string>;
}

export interface EventNotifier {
  notify(ecosystem_id: string, event: EcosystemEvent): Promise<void> | void;
}

export interface ConversationHistory {
  recent(ecosystem_id: string, pair_key: string, limit: number): Promise<ConversationTurn[]>;
  append(turn: ConversationTurn): Promise<void>;
}

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export interface OpenAIConfig {
  dialogueModel: string;
  sentimentModel: string;
  temperature: number;
  maxTokens: number;
}
