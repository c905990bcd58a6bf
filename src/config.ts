import { z } from 'zod';
import { Emotion, InteractionType } from './types';
import { ConfigurationError } from './utils/errors';

export type EmotionVector = Partial<Record<Emotion, number>>;

export interface EmotionConfig {
  decayFactor: number;
  neuroticismAmplification: number;
  extraversionAmplification: number;
  agreeablenessAngerDamping: number;
  baseResponses: Record<InteractionType, EmotionVector>;
}

export interface RelationshipConfig {
  typeWeights: Record<InteractionType, number>;
  positiveTrustRate: number;
  negativeTrustRate: number;
  lowTrustThreshold: number;
  minRebuildFactor: number;
  familiarityIncrement: number;
}

export interface CompatibilityConfig {
  idealExtraversionDifference: number;
  extraversionSpread: number;
  conscientiousnessRivalryWeight: number;
  neuroticismRivalryWeight: number;
  friendshipWeight: number;
  romanceWeight: number;
  harmonyWeight: number;
}

export interface InteractionConfig {
  minSocialEnergy: number;
  energyCosts: Record<InteractionType, number>;
  responderEnergyFactor: number;
  historyWindow: number;
  dialogueTimeoutMs: number;
  sentimentTimeoutMs: number;
  lockTimeoutMs: number;
}

export interface EngineConfig {
  emotion: EmotionConfig;
  relationship: RelationshipConfig;
  compatibility: CompatibilityConfig;
  interaction: InteractionConfig;
}

export type EngineConfigOverrides = {
  [K in keyof EngineConfig]?: Partial<EngineConfig[K]>;
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  emotion: {
    decayFactor: 0.6,
    neuroticismAmplification: 1.0,
    extraversionAmplification: 0.5,
    agreeablenessAngerDamping: 0.5,
    baseResponses: {
      greeting: { joy: 0.3, surprise: 0.1, anticipation: 0.2, trust: 0.1 },
      chat: { joy: 0.25, trust: 0.15, anticipation: 0.1 },
      discussion: { anticipation: 0.3, surprise: 0.15, trust: 0.15, joy: 0.1 },
      debate: { anticipation: 0.25, anger: 0.15, surprise: 0.15 },
      collaboration: { joy: 0.4, trust: 0.4, anticipation: 0.2 },
      emotional_support: { trust: 0.4, joy: 0.2, sadness: 0.3 },
      conflict: { anger: 0.4, fear: 0.2, disgust: 0.15 }
    }
  },
  relationship: {
    typeWeights: {
      greeting: 0.02,
      chat: 0.05,
      discussion: 0.08,
      debate: 0.06,
      collaboration: 0.1,
      emotional_support: 0.12,
      conflict: 0.15
    },
    positiveTrustRate: 0.05,
    negativeTrustRate: 0.12,
    lowTrustThreshold: 0.3,
    minRebuildFactor: 0.25,
    familiarityIncrement: 0.05
  },
  compatibility: {
    idealExtraversionDifference: 0.3,
    extraversionSpread: 0.2,
    conscientiousnessRivalryWeight: 0.6,
    neuroticismRivalryWeight: 0.4,
    friendshipWeight: 0.45,
    romanceWeight: 0.25,
    harmonyWeight: 0.3
  },
  interaction: {
    minSocialEnergy: 0.1,
    energyCosts: {
      greeting: 0.05,
      chat: 0.1,
      discussion: 0.15,
      debate: 0.2,
      collaboration: 0.15,
      emotional_support: 0.2,
      conflict: 0.25
    },
    responderEnergyFactor: 0.8,
    historyWindow: 6,
    dialogueTimeoutMs: 5000,
    sentimentTimeoutMs: 1500,
    lockTimeoutMs: 3000
  }
};

const unit = z.number().min(0).max(1);
const nonNegative = z.number().min(0);
const positiveMs = z.number().int().positive();

function perInteractionType<T extends z.ZodTypeAny>(schema: T) {
  return z.object({
    greeting: schema,
    chat: schema,
    discussion: schema,
    debate: schema,
    collaboration: schema,
    emotional_support: schema,
    conflict: schema
  });
}

const emotionVectorSchema = z
  .object({
    joy: unit.optional(),
    sadness: unit.optional(),
    anger: unit.optional(),
    fear: unit.optional(),
    surprise: unit.optional(),
    disgust: unit.optional(),
    anticipation: unit.optional(),
    trust: unit.optional()
  })
  .strict();

const engineConfigSchema = z.object({
  emotion: z.object({
    decayFactor: unit,
    neuroticismAmplification: nonNegative,
    extraversionAmplification: nonNegative,
    agreeablenessAngerDamping: unit,
    baseResponses: perInteractionType(emotionVectorSchema)
  }),
  relationship: z
    .object({
      typeWeights: perInteractionType(nonNegative),
      positiveTrustRate: unit,
      negativeTrustRate: unit,
      lowTrustThreshold: unit,
      minRebuildFactor: unit,
      familiarityIncrement: unit
    })
    .refine(r => r.negativeTrustRate > r.positiveTrustRate, {
      message: 'negativeTrustRate must exceed positiveTrustRate'
    })
    .refine(r => r.minRebuildFactor < 1, { message: 'minRebuildFactor must be below 1' }),
  compatibility: z.object({
    idealExtraversionDifference: unit,
    extraversionSpread: z.number().positive(),
    conscientiousnessRivalryWeight: nonNegative,
    neuroticismRivalryWeight: nonNegative,
    friendshipWeight: nonNegative,
    romanceWeight: nonNegative,
    harmonyWeight: nonNegative
  }),
  interaction: z.object({
    minSocialEnergy: unit,
    energyCosts: perInteractionType(unit),
    responderEnergyFactor: nonNegative,
    historyWindow: z.number().int().min(0),
    dialogueTimeoutMs: positiveMs,
    sentimentTimeoutMs: positiveMs,
    lockTimeoutMs: positiveMs
  })
});

export function resolveConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  const merged: EngineConfig = {
    emotion: { ...DEFAULT_ENGINE_CONFIG.emotion, ...overrides.emotion },
    relationship: { ...DEFAULT_ENGINE_CONFIG.relationship, ...overrides.relationship },
    compatibility: { ...DEFAULT_ENGINE_CONFIG.compatibility, ...overrides.compatibility },
    interaction: { ...DEFAULT_ENGINE_CONFIG.interaction, ...overrides.interaction }
  };

  const parsed = engineConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid engine configuration: ${issues.join('; ')}`);
  }

  return merged;
}

const envNumber = z.coerce.number().finite();

function readEnvNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;

  const parsed = envNumber.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`${name} must be a number, got "${raw}"`);
  }
  return parsed.data;
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const interaction: Partial<InteractionConfig> = {};

  const lockTimeoutMs = readEnvNumber(env, 'INTERACTION_LOCK_TIMEOUT_MS');
  if (lockTimeoutMs !== undefined) interaction.lockTimeoutMs = lockTimeoutMs;

  const dialogueTimeoutMs = readEnvNumber(env, 'DIALOGUE_TIMEOUT_MS');
  if (dialogueTimeoutMs !== undefined) interaction.dialogueTimeoutMs = dialogueTimeoutMs;

  const sentimentTimeoutMs = readEnvNumber(env, 'SENTIMENT_TIMEOUT_MS');
  if (sentimentTimeoutMs !== undefined) interaction.sentimentTimeoutMs = sentimentTimeoutMs;

  const minSocialEnergy = readEnvNumber(env, 'MIN_SOCIAL_ENERGY');
  if (minSocialEnergy !== undefined) interaction.minSocialEnergy = minSocialEnergy;

  const historyWindow = readEnvNumber(env, 'HISTORY_WINDOW');
  if (historyWindow !== undefined) interaction.historyWindow = historyWindow;

  return resolveConfig({ interaction });
}
