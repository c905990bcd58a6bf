import { DEFAULT_ENGINE_CONFIG, RelationshipConfig } from '../config';
import {
  CharacterStore,
  InteractionType,
  Relationship,
  RelationshipType,
  RelationshipUpdate,
  isInteractionType
} from '../types';
import { InvalidInteractionTypeError, UnknownRelationshipError } from '../utils/errors';
import { clamp, clampUnit, normalizeSentiment } from '../utils/math';

export function canonicalPair(a: string, b: string): [string, string] {
  return a < b ? [a, b] : [b, a];
}

export function pairKey(a: string, b: string): string {
  const [first, second] = canonicalPair(a, b);
  return `${first}::${second}`;
}

export function determineRelationshipType(strength: number, trust: number): RelationshipType {
  if (strength > 0.7 && trust > 0.7) return 'close_friend';
  if (strength > 0.5 && trust > 0.5) return 'friend';
  if (strength > 0.3) return 'acquaintance';
  if (strength < -0.7) return 'enemy';
  if (strength < -0.3) return 'rival';
  return 'neutral';
}

export function createRelationship(ecosystem_id: string, a: string, b: string): Relationship {
  const [character_a_id, character_b_id] = canonicalPair(a, b);
  return {
    ecosystem_id,
    character_a_id,
    character_b_id,
    strength: 0,
    trust: 0.5,
    familiarity: 0,
    interaction_count: 0,
    relationship_type: 'neutral'
  };
}

export interface ResolveOptions {
  createIfMissing: boolean;
}

export class RelationshipLedger {
  private config: RelationshipConfig;
  private store?: CharacterStore;

  constructor(config: RelationshipConfig = DEFAULT_ENGINE_CONFIG.relationship, store?: CharacterStore) {
    this.config = config;
    this.store = store;
  }

  /**
   * Looks the pair up in the store. A missing pair is only created (in memory,
   * not yet saved) when the caller asks for lazy creation.
   */
  async resolve(ecosystem_id: string, a: string, b: string, options: ResolveOptions): Promise<Relationship> {
    const existing = await this.find(a, b);
    if (existing) return existing;

    if (!options.createIfMissing) {
      throw new UnknownRelationshipError(a, b);
    }
    return createRelationship(ecosystem_id, a, b);
  }

  async find(a: string, b: string): Promise<Relationship | null> {
    return this.store ? this.store.getRelationship(a, b) : null;
  }

  update(
    relationship: Relationship,
    interaction_type: InteractionType,
    sentiment: number,
    now: Date = new Date()
  ): RelationshipUpdate {
    if (!isInteractionType(interaction_type)) {
      throw new InvalidInteractionTypeError(interaction_type);
    }

    const s = normalizeSentiment(sentiment);

    const new_strength = clamp(
      relationship.strength + this.strengthChange(interaction_type, s, relationship.strength),
      -1,
      1
    );
    const new_trust = clampUnit(relationship.trust + this.trustChange(s, relationship.trust));
    const new_familiarity = clampUnit(relationship.familiarity + this.config.familiarityIncrement);

    const updated: Relationship = {
      ...relationship,
      strength: new_strength,
      trust: new_trust,
      familiarity: Math.max(relationship.familiarity, new_familiarity),
      interaction_count: relationship.interaction_count + 1,
      relationship_type: determineRelationshipType(new_strength, new_trust),
      last_interaction: now,
      last_interaction_type: interaction_type,
      last_sentiment: s
    };

    return {
      relationship: updated,
      delta: {
        strength_delta: updated.strength - relationship.strength,
        trust_delta: updated.trust - relationship.trust,
        familiarity_delta: updated.familiarity - relationship.familiarity,
        new_strength: updated.strength,
        new_trust: updated.trust,
        new_familiarity: updated.familiarity
      }
    };
  }

  // Scaled by remaining headroom so relationships near either extreme move slowly
  private strengthChange(interaction_type: InteractionType, s: number, current_strength: number): number {
    const base = s * this.config.typeWeights[interaction_type];
    return base * (1 - Math.abs(current_strength));
  }

  private trustChange(s: number, current_trust: number): number {
    if (s < 0) {
      return this.config.negativeTrustRate * s;
    }

    const change = this.config.positiveTrustRate * s;
    if (change > 0 && current_trust < this.config.lowTrustThreshold) {
      return change * this.rebuildDamping(current_trust);
    }
    return change;
  }

  // Broken trust heals slower the lower it has fallen
  private rebuildDamping(current_trust: number): number {
    const depth = clampUnit(current_trust / this.config.lowTrustThreshold);
    return this.config.minRebuildFactor + (1 - this.config.minRebuildFactor) * depth;
  }
}
