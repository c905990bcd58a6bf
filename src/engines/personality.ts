import { CompatibilityConfig, DEFAULT_ENGINE_CONFIG } from '../config';
import {
  CompatibilityScore,
  InteractionPrediction,
  InteractionType,
  PERSONALITY_TRAITS,
  PersonalityProfile,
  PersonalityTrait
} from '../types';
import { clampUnit } from '../utils/math';
import { validateProfile } from '../utils/validation';

export { validateProfile };

function isIdentical(a: PersonalityProfile, b: PersonalityProfile): boolean {
  return PERSONALITY_TRAITS.every(trait => a[trait] === b[trait]);
}

/**
 * Pairwise compatibility of two trait vectors.
 *
 * Friendship rewards similar agreeableness and openness. Romance is a bell
 * curve over the extraversion gap, peaking at a moderate difference rather
 * than at sameness. Rivalry grows with diverging conscientiousness and with
 * the more neurotic of the two.
 */
export function compatibility(
  a: PersonalityProfile,
  b: PersonalityProfile,
  config: CompatibilityConfig = DEFAULT_ENGINE_CONFIG.compatibility
): CompatibilityScore {
  validateProfile(a);
  validateProfile(b);

  const identical = isIdentical(a, b);

  const friendship = identical
    ? 1
    : clampUnit(1 - (Math.abs(a.agreeableness - b.agreeableness) + Math.abs(a.openness - b.openness)) / 2);

  const extraversion_gap = Math.abs(a.extraversion - b.extraversion);
  const offset = extraversion_gap - config.idealExtraversionDifference;
  const romance = clampUnit(Math.exp(-(offset * offset) / (2 * config.extraversionSpread * config.extraversionSpread)));

  const rivalry = identical
    ? 0
    : clampUnit(
        config.conscientiousnessRivalryWeight * Math.abs(a.conscientiousness - b.conscientiousness) +
          config.neuroticismRivalryWeight * Math.max(a.neuroticism, b.neuroticism)
      );

  const weight_total = config.friendshipWeight + config.romanceWeight + config.harmonyWeight;
  const overall = weight_total > 0
    ? clampUnit(
        (config.friendshipWeight * friendship + config.romanceWeight * romance + config.harmonyWeight * (1 - rivalry)) /
          weight_total
      )
    : 0;

  return { overall, friendship, romance, rivalry };
}

export function dominantTrait(profile: PersonalityProfile): { trait: PersonalityTrait; level: 'high' | 'low' } | null {
  let best: { trait: PersonalityTrait; level: 'high' | 'low' } | null = null;
  let max_deviation = 0.2;

  for (const trait of PERSONALITY_TRAITS) {
    const deviation = Math.abs(profile[trait] - 0.5);
    if (deviation > max_deviation) {
      max_deviation = deviation;
      best = { trait, level: profile[trait] > 0.5 ? 'high' : 'low' };
    }
  }

  return best;
}

const TRAIT_DESCRIPTIONS: Record<PersonalityTrait, { high: string; low: string }> = {
  openness: { high: 'highly creative and imaginative', low: 'practical and traditional' },
  conscientiousness: { high: 'organized and dependable', low: 'spontaneous and flexible' },
  extraversion: { high: 'outgoing and energetic', low: 'reserved and introspective' },
  agreeableness: { high: 'compassionate and cooperative', low: 'competitive and skeptical' },
  neuroticism: { high: 'sensitive and emotionally reactive', low: 'calm and emotionally stable' }
};

export function describePersonality(profile: PersonalityProfile): string {
  const descriptions: string[] = [];

  for (const trait of PERSONALITY_TRAITS) {
    if (profile[trait] > 0.7) descriptions.push(TRAIT_DESCRIPTIONS[trait].high);
    else if (profile[trait] < 0.3) descriptions.push(TRAIT_DESCRIPTIONS[trait].low);
  }

  if (descriptions.length === 0) {
    return 'This character has a balanced personality.';
  }
  return `This character is ${descriptions.join(', ')}.`;
}

const HEATED_TYPES: readonly InteractionType[] = ['debate', 'conflict'];
const BONDING_TYPES: readonly InteractionType[] = ['collaboration', 'emotional_support'];

// Rough expectations before an interaction happens; used for planning, never fed back into the ledger
export function predictInteractionOutcome(
  a: PersonalityProfile,
  b: PersonalityProfile,
  interaction_type: InteractionType
): InteractionPrediction {
  validateProfile(a);
  validateProfile(b);

  const openness_gap = Math.abs(a.openness - b.openness);
  const agreeableness_avg = (a.agreeableness + b.agreeableness) / 2;
  const neuroticism_avg = (a.neuroticism + b.neuroticism) / 2;

  let likely_sentiment = 0;
  if (agreeableness_avg > 0.6) likely_sentiment = 0.5;
  else if (agreeableness_avg < 0.4) likely_sentiment = -0.3;

  let conflict_probability = HEATED_TYPES.includes(interaction_type) ? 0.6 : 0.1;
  if (agreeableness_avg < 0.4 && neuroticism_avg > 0.6) conflict_probability += 0.3;

  let bonding_probability = openness_gap < 0.3 && agreeableness_avg > 0.5 ? 0.6 : 0.3;
  if (BONDING_TYPES.includes(interaction_type)) bonding_probability += 0.2;

  let energy_drain = HEATED_TYPES.includes(interaction_type) ? 0.3 : 0.1;
  if (neuroticism_avg > 0.7) energy_drain += 0.1;

  return {
    likely_sentiment,
    conflict_probability: clampUnit(conflict_probability),
    bonding_probability: clampUnit(bonding_probability),
    energy_drain: clampUnit(energy_drain)
  };
}
