import { DEFAULT_ENGINE_CONFIG, EmotionConfig } from '../config';
import {
  EMOTIONS,
  Emotion,
  EmotionalState,
  InteractionType,
  Mood,
  NEGATIVE_EMOTIONS,
  PersonalityProfile,
  isInteractionType
} from '../types';
import { InvalidInteractionTypeError } from '../utils/errors';
import { clampUnit, normalizeSentiment } from '../utils/math';
import { validateProfile } from '../utils/validation';

export function neutralEmotionalState(): EmotionalState {
  return {
    joy: 0,
    sadness: 0,
    anger: 0,
    fear: 0,
    surprise: 0,
    disgust: 0,
    anticipation: 0,
    trust: 0
  };
}

function mapEmotions(fn: (emotion: Emotion) => number): EmotionalState {
  const state = neutralEmotionalState();
  for (const emotion of EMOTIONS) {
    state[emotion] = fn(emotion);
  }
  return state;
}

export class EmotionEngine {
  private config: EmotionConfig;

  constructor(config: EmotionConfig = DEFAULT_ENGINE_CONFIG.emotion) {
    this.config = config;
  }

  /**
   * New emotional state of one participant after an interaction.
   *
   * The interaction type picks a base vector, sentiment scales it (and flips
   * joy/trust into sadness/anger when negative), personality modulates it, and
   * the result is blended into the current state by exponential decay.
   */
  computeResponse(
    profile: PersonalityProfile,
    current_state: EmotionalState,
    interaction_type: InteractionType,
    sentiment: number
  ): EmotionalState {
    if (!isInteractionType(interaction_type)) {
      throw new InvalidInteractionTypeError(interaction_type);
    }
    validateProfile(profile);

    const s = normalizeSentiment(sentiment);
    const delta = this.computeDelta(profile, interaction_type, s);
    const decay = this.config.decayFactor;

    return mapEmotions(emotion => clampUnit(current_state[emotion] * decay + delta[emotion] * (1 - decay)));
  }

  decay(state: EmotionalState, steps: number = 1): EmotionalState {
    const factor = Math.pow(this.config.decayFactor, Math.max(0, steps));
    return mapEmotions(emotion => clampUnit(state[emotion] * factor));
  }

  private computeDelta(profile: PersonalityProfile, interaction_type: InteractionType, s: number): EmotionalState {
    const magnitude = Math.abs(s);
    if (magnitude === 0) return neutralEmotionalState();

    const base = this.config.baseResponses[interaction_type];
    const delta = mapEmotions(emotion => (base[emotion] ?? 0) * magnitude);

    if (s < 0) {
      delta.sadness += delta.joy;
      delta.joy = 0;
      delta.anger += delta.trust;
      delta.trust = 0;
    }

    const negative_amplifier = 1 + profile.neuroticism * this.config.neuroticismAmplification;
    for (const emotion of NEGATIVE_EMOTIONS) {
      delta[emotion] *= negative_amplifier;
    }

    const expressiveness = 1 + profile.extraversion * this.config.extraversionAmplification;
    for (const emotion of EMOTIONS) {
      delta[emotion] *= expressiveness;
    }

    delta.anger *= Math.max(0, 1 - profile.agreeableness * this.config.agreeablenessAngerDamping);

    return delta;
  }
}

export function dominantEmotion(state: EmotionalState): Emotion | 'neutral' {
  let best: Emotion | 'neutral' = 'neutral';
  let best_value = 0;

  for (const emotion of EMOTIONS) {
    if (state[emotion] > best_value) {
      best_value = state[emotion];
      best = emotion;
    }
  }

  return best;
}

export function emotionalDistance(a: EmotionalState, b: EmotionalState): number {
  const total = EMOTIONS.reduce((sum, emotion) => sum + Math.abs(a[emotion] - b[emotion]), 0);
  return total / EMOTIONS.length;
}

export function diffEmotionalStates(before: EmotionalState, after: EmotionalState): EmotionalState {
  return mapEmotions(emotion => after[emotion] - before[emotion]);
}

export function moodOf(state: EmotionalState): Mood {
  const positive = state.joy + state.trust;
  const negative = NEGATIVE_EMOTIONS.reduce((sum, emotion) => sum + state[emotion], 0);
  const balance = positive - negative;

  if (balance > 0.05) return 'positive';
  if (balance < -0.05) return 'negative';
  return 'neutral';
}
