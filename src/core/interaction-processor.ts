import { v4 as uuidv4 } from 'uuid';
import { EngineConfig, EngineConfigOverrides, resolveConfig } from '../config';
import { TemplateDialogueGenerator } from '../engines/dialogue';
import { EmotionEngine, diffEmotionalStates, moodOf } from '../engines/emotion';
import { compatibility } from '../engines/personality';
import { RelationshipLedger, createRelationship, pairKey } from '../engines/relationship';
import { LexiconSentimentScorer } from '../engines/sentiment';
import {
  Character,
  CharacterStore,
  CompatibilityScore,
  ConversationHistory,
  ConversationTurn,
  DialogueContext,
  DialogueGenerator,
  EcosystemEvent,
  EventNotifier,
  InteractionEvent,
  InteractionRequest,
  InteractionResult,
  Logger,
  Relationship,
  RelationshipChangeEvent,
  SentimentScorer
} from '../types';
import { InvalidParticipantsError } from '../utils/errors';
import { clampUnit, normalizeSentiment } from '../utils/math';
import { withTimeout } from '../utils/timeout';
import { validateInteractionRequest, validateProfile } from '../utils/validation';
import { NoopNotifier } from './event-notifier';
import { CharacterLockManager } from './locks';

export interface InteractionProcessorDeps {
  store: CharacterStore;
  sentiment?: SentimentScorer;
  generator?: DialogueGenerator;
  notifier?: EventNotifier;
  history?: ConversationHistory;
  config?: EngineConfigOverrides;
  logger?: Logger;
  now?: () => Date;
  locks?: CharacterLockManager;
}

interface LockedOutcome {
  result: InteractionResult;
  events: EcosystemEvent[];
}

export class InteractionProcessor {
  private store: CharacterStore;
  private sentiment: SentimentScorer;
  private generator: DialogueGenerator;
  private fallbackGenerator: TemplateDialogueGenerator;
  private notifier: EventNotifier;
  private history?: ConversationHistory;
  private config: EngineConfig;
  private logger: Logger;
  private now: () => Date;
  private locks: CharacterLockManager;
  private emotionEngine: EmotionEngine;
  private ledger: RelationshipLedger;

  constructor(deps: InteractionProcessorDeps) {
    this.config = resolveConfig(deps.config);
    this.store = deps.store;
    this.fallbackGenerator = new TemplateDialogueGenerator();
    this.sentiment = deps.sentiment ?? new LexiconSentimentScorer();
    this.generator = deps.generator ?? this.fallbackGenerator;
    this.notifier = deps.notifier ?? new NoopNotifier();
    this.history = deps.history;
    this.logger = deps.logger ?? console;
    this.now = deps.now ?? (() => new Date());
    this.locks = deps.locks ?? new CharacterLockManager();
    this.emotionEngine = new EmotionEngine(this.config.emotion);
    this.ledger = new RelationshipLedger(this.config.relationship, this.store);
  }

  /**
   * Runs one interaction end to end.
   *
   * Validation problems throw before anything is touched. Feasibility problems
   * come back as `success: false`. Collaborator outages degrade (neutral
   * sentiment, templated dialogue, dropped notification) and only show up in
   * the log.
   */
  async process(request: InteractionRequest): Promise<InteractionResult> {
    const valid = validateInteractionRequest(request);

    const release = await this.locks.acquire(
      [valid.initiator_id, valid.target_id],
      this.config.interaction.lockTimeoutMs
    );

    let outcome: LockedOutcome;
    try {
      outcome = await this.processLocked(valid);
    } finally {
      release();
    }

    outcome.events.forEach(event => this.emitEvent(event));
    return outcome.result;
  }

  async compatibilityBetween(character_a_id: string, character_b_id: string): Promise<CompatibilityScore> {
    const [a, b] = await this.loadParticipants(character_a_id, character_b_id);
    return compatibility(a.personality, b.personality, this.config.compatibility);
  }

  private async processLocked(request: InteractionRequest): Promise<LockedOutcome> {
    const { interaction_type, content } = request;
    const [initiator, target] = await this.loadParticipants(request.initiator_id, request.target_id);

    const infeasible = this.checkFeasibility(initiator, target);
    if (infeasible) {
      this.logger.log(`Interaction ${initiator.name} → ${target.name} not feasible: ${infeasible.failure_reason}`);
      return { result: infeasible, events: [] };
    }

    const sentiment = await this.scoreSentiment(content);

    // Both participants react to the same pre-interaction snapshot
    const initiator_emotion = this.emotionEngine.computeResponse(
      initiator.personality,
      initiator.emotional_state,
      interaction_type,
      sentiment
    );
    const target_emotion = this.emotionEngine.computeResponse(
      target.personality,
      target.emotional_state,
      interaction_type,
      sentiment
    );

    const now = this.now();
    const stored_relationship = await this.ledger.find(initiator.id, target.id);
    const relationship = stored_relationship ?? createRelationship(initiator.ecosystem_id, initiator.id, target.id);
    const { relationship: updated_relationship, delta } = this.ledger.update(
      relationship,
      interaction_type,
      sentiment,
      now
    );

    const pair_key = pairKey(initiator.id, target.id);
    const recent_history = await this.loadHistory(initiator.ecosystem_id, pair_key);

    const dialogue_context: DialogueContext = {
      speaker: { id: target.id, name: target.name },
      listener: { id: initiator.id, name: initiator.name },
      speaker_profile: target.personality,
      speaker_emotion: target_emotion,
      mood: moodOf(target_emotion),
      relationship: updated_relationship,
      interaction_type,
      content,
      recent_history,
      context: request.context ?? {}
    };
    const response_text = await this.generateDialogue(dialogue_context);

    const energy_cost = this.config.interaction.energyCosts[interaction_type];
    const updated_initiator: Character = {
      ...initiator,
      emotional_state: initiator_emotion,
      social_energy: clampUnit(initiator.social_energy - energy_cost),
      interaction_count: initiator.interaction_count + 1,
      last_interaction: now
    };
    const updated_target: Character = {
      ...target,
      emotional_state: target_emotion,
      social_energy: clampUnit(target.social_energy - energy_cost * this.config.interaction.responderEnergyFactor),
      interaction_count: target.interaction_count + 1,
      last_interaction: now
    };

    try {
      await this.store.saveCharacter(updated_initiator);
      await this.store.saveCharacter(updated_target);
      await this.store.saveRelationship(updated_relationship);
    } catch (error) {
      this.logger.error('Failed to persist interaction, restoring previous state:', error);
      await this.restore(initiator, target, stored_relationship);
      throw error;
    }

    const first_turn = relationship.interaction_count * 2;
    await this.recordHistory([
      this.turn(initiator, pair_key, first_turn, content, request, now),
      this.turn(target, pair_key, first_turn + 1, response_text, request, now)
    ]);

    const emotional_states = {
      [initiator.id]: initiator_emotion,
      [target.id]: target_emotion
    };

    this.logger.log(
      `💬 ${initiator.name} → ${target.name} (${interaction_type}, sentiment ${sentiment.toFixed(2)}): ` +
      `strength ${delta.new_strength.toFixed(3)}, trust ${delta.new_trust.toFixed(3)}`
    );

    const event: InteractionEvent = {
      id: uuidv4(),
      type: 'character_interaction',
      timestamp: now.toISOString(),
      ecosystem_id: initiator.ecosystem_id,
      interaction_type,
      participants: [
        { id: initiator.id, name: initiator.name, role: 'initiator' },
        { id: target.id, name: target.name, role: 'responder' }
      ],
      content,
      response: response_text,
      relationship_change: delta,
      relationship_type: updated_relationship.relationship_type,
      emotional_states,
      emotional_deltas: {
        [initiator.id]: diffEmotionalStates(initiator.emotional_state, initiator_emotion),
        [target.id]: diffEmotionalStates(target.emotional_state, target_emotion)
      },
      sentiment
    };

    const events: EcosystemEvent[] = [event];
    if (updated_relationship.relationship_type !== relationship.relationship_type) {
      events.push(this.relationshipChange(relationship, updated_relationship, now));
    }

    return {
      result: {
        success: true,
        response_text,
        relationship_delta: delta,
        relationship_type: updated_relationship.relationship_type,
        emotional_states,
        sentiment
      },
      events
    };
  }

  private async loadParticipants(initiator_id: string, target_id: string): Promise<[Character, Character]> {
    const [initiator, target] = await Promise.all([
      this.store.getCharacter(initiator_id),
      this.store.getCharacter(target_id)
    ]);

    const missing = [
      initiator ? null : initiator_id,
      target ? null : target_id
    ].filter((id): id is string => id !== null);

    if (!initiator || !target) {
      throw new InvalidParticipantsError(`Unknown character(s): ${missing.join(', ')}`);
    }

    validateProfile(initiator.personality);
    validateProfile(target.personality);
    return [initiator, target];
  }

  private checkFeasibility(initiator: Character, target: Character): InteractionResult | null {
    if (initiator.ecosystem_id !== target.ecosystem_id) {
      return {
        success: false,
        failure_code: 'different_ecosystems',
        failure_reason: 'Characters are not in the same ecosystem'
      };
    }

    for (const character of [initiator, target]) {
      if (!character.is_active) {
        return {
          success: false,
          failure_code: 'inactive_character',
          failure_reason: `${character.name} is inactive`
        };
      }
    }

    for (const character of [initiator, target]) {
      if (character.social_energy <= this.config.interaction.minSocialEnergy) {
        return {
          success: false,
          failure_code: 'insufficient_energy',
          failure_reason: `${character.name} is too exhausted to interact`
        };
      }
    }

    return null;
  }

  private async scoreSentiment(content: string): Promise<number> {
    if (content.trim().length === 0) return 0;

    try {
      const raw = await withTimeout(
        this.sentiment.score(content),
        this.config.interaction.sentimentTimeoutMs,
        'Sentiment scoring'
      );
      if (!Number.isFinite(raw)) {
        this.logger.warn(`Sentiment scorer returned ${raw}, using neutral sentiment`);
        return 0;
      }
      return normalizeSentiment(raw);
    } catch (error) {
      this.logger.warn('Sentiment scoring unavailable, using neutral sentiment:', error);
      return 0;
    }
  }

  private async generateDialogue(context: DialogueContext): Promise<string> {
    if (this.generator === this.fallbackGenerator) {
      return this.fallbackGenerator.render(context);
    }

    try {
      const text = await withTimeout(
        this.generator.generate(context),
        this.config.interaction.dialogueTimeoutMs,
        'Dialogue generation'
      );
      if (text.trim().length > 0) return text.trim();
      this.logger.warn('Dialogue generator returned empty text, using template');
    } catch (error) {
      this.logger.warn('Dialogue generation unavailable, using template:', error);
    }

    return this.fallbackGenerator.render(context);
  }

  private async loadHistory(ecosystem_id: string, pair_key: string): Promise<ConversationTurn[]> {
    if (!this.history) return [];

    try {
      return await this.history.recent(ecosystem_id, pair_key, this.config.interaction.historyWindow);
    } catch (error) {
      this.logger.warn('Conversation history unavailable, generating without it:', error);
      return [];
    }
  }

  private async recordHistory(turns: ConversationTurn[]): Promise<void> {
    if (!this.history) return;

    try {
      for (const turn of turns) {
        await this.history.append(turn);
      }
    } catch (error) {
      this.logger.error('Failed to record conversation history:', error);
    }
  }

  // Writes the loaded records back; a relationship that never existed has nothing to restore
  private async restore(initiator: Character, target: Character, relationship: Relationship | null): Promise<void> {
    const writes = [this.store.saveCharacter(initiator), this.store.saveCharacter(target)];
    if (relationship) writes.push(this.store.saveRelationship(relationship));

    const outcomes = await Promise.allSettled(writes);
    for (const outcome of outcomes) {
      if (outcome.status === 'rejected') {
        this.logger.error('Failed to restore state after an aborted interaction:', outcome.reason);
      }
    }
  }

  private relationshipChange(before: Relationship, after: Relationship, now: Date): RelationshipChangeEvent {
    return {
      id: uuidv4(),
      type: 'relationship_change',
      timestamp: now.toISOString(),
      ecosystem_id: after.ecosystem_id,
      character_a_id: after.character_a_id,
      character_b_id: after.character_b_id,
      previous_type: before.relationship_type,
      relationship_type: after.relationship_type,
      strength: after.strength,
      trust: after.trust
    };
  }

  private turn(
    speaker: Character,
    pair_key: string,
    turn_index: number,
    text: string,
    request: InteractionRequest,
    timestamp: Date
  ): ConversationTurn {
    return {
      ecosystem_id: speaker.ecosystem_id,
      pair_key,
      turn_index,
      speaker_id: speaker.id,
      speaker_name: speaker.name,
      text,
      interaction_type: request.interaction_type,
      timestamp
    };
  }

  // Fire-and-forget: a lost notification never fails the interaction
  private emitEvent(event: EcosystemEvent): void {
    let delivery: Promise<void>;
    try {
      delivery = Promise.resolve(this.notifier.notify(event.ecosystem_id, event));
    } catch (error) {
      delivery = Promise.reject(error);
    }

    void delivery.catch(error => {
      this.logger.error(`Failed to deliver ${event.type} event ${event.id}:`, error);
    });
  }
}
