export const PERSONALITY_TRAITS = [
  'openness',
  'conscientiousness',
  'extraversion',
  'agreeableness',
  'neuroticism'
] as const;

export type PersonalityTrait = typeof PERSONALITY_TRAITS[number];

export interface PersonalityProfile {
  openness: number; // 0-1
  conscientiousness: number; // 0-1
  extraversion: number; // 0-1
  agreeableness: number; // 0-1
  neuroticism: number; // 0-1
}

export const EMOTIONS = [
  'joy',
  'sadness',
  'anger',
  'fear',
  'surprise',
  'disgust',
  'anticipation',
  'trust'
] as const;

export type Emotion = typeof EMOTIONS[number];

// Independent intensities, not a distribution
export type EmotionalState = Record<Emotion, number>;

export const NEGATIVE_EMOTIONS: readonly Emotion[] = ['sadness', 'anger', 'fear', 'disgust'];

export type Mood = 'positive' | 'neutral' | 'negative';

export interface Character {
  id: string;
  name: string;
  ecosystem_id: string;
  personality: PersonalityProfile;
  emotional_state: EmotionalState;
  social_energy: number; // 0-1
  interaction_count: number;
  is_active: boolean;
  last_interaction?: Date;
}

export type RelationshipType =
  | 'close_friend'
  | 'friend'
  | 'acquaintance'
  | 'neutral'
  | 'rival'
  | 'enemy';

export interface Relationship {
  ecosystem_id: string;
  character_a_id: string; // canonical order: a < b
  character_b_id: string;
  strength: number; // -1..+1
  trust: number; // 0-1
  familiarity: number; // 0-1
  interaction_count: number;
  relationship_type: RelationshipType;
  last_interaction?: Date;
  last_interaction_type?: InteractionType;
  last_sentiment?: number;
}

export const INTERACTION_TYPES = [
  'greeting',
  'chat',
  'discussion',
  'debate',
  'collaboration',
  'emotional_support',
  'conflict'
] as const;

export type InteractionType = typeof INTERACTION_TYPES[number];

export function isInteractionType(value: string): value is InteractionType {
  return INTERACTION_TYPES.some(type => type === value);
}

export interface CompatibilityScore {
  overall: number; // 0-1
  friendship: number; // 0-1
  romance: number; // 0-1
  rivalry: number; // 0-1
}

export interface InteractionPrediction {
  likely_sentiment: number; // -1..+1
  conflict_probability: number; // 0-1
  bonding_probability: number; // 0-1
  energy_drain: number; // 0-1
}

export interface RelationshipDelta {
  strength_delta: number;
  trust_delta: number;
  familiarity_delta: number;
  new_strength: number;
  new_trust: number;
  new_familiarity: number;
}

export interface RelationshipUpdate {
  relationship: Relationship;
  delta: RelationshipDelta;
}
