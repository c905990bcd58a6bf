import { EcosystemEventBus } from '../core/event-notifier';
import { InteractionProcessor } from '../core/interaction-processor';
import { CharacterLockManager } from '../core/locks';
import { DEFAULT_TEMPLATES } from '../engines/dialogue';
import { neutralEmotionalState } from '../engines/emotion';
import { createRelationship } from '../engines/relationship';
import { InMemoryCharacterStore, InMemoryConversationHistory } from '../storage/character-store';
import {
  Character,
  DialogueContext,
  DialogueGenerator,
  EcosystemEvent,
  InteractionEvent,
  InteractionRequest,
  InteractionType,
  Logger,
  Relationship,
  SentimentScorer
} from '../types';
import {
  CollaboratorTimeoutError,
  InteractionBusyError,
  InvalidInteractionTypeError,
  InvalidParticipantsError,
  InvalidRequestError
} from '../utils/errors';

// Mock implementations for testing
class FixedSentiment implements SentimentScorer {
  private value: number;

  constructor(value: number) {
    this.value = value;
  }

  async score(): Promise<number> {
    return this.value;
  }
}

class FailingSentiment implements SentimentScorer {
  async score(): Promise<number> {
    throw new Error('sentiment service down');
  }
}

class HangingSentiment implements SentimentScorer {
  score(): Promise<number> {
    return new Promise<number>(() => undefined);
  }
}

class EchoGenerator implements DialogueGenerator {
  contexts: DialogueContext[] = [];

  async generate(context: DialogueContext): Promise<string> {
    this.contexts.push(context);
    return `${context.speaker.name} answers ${context.listener.name}`;
  }
}

class HangingGenerator implements DialogueGenerator {
  generate(): Promise<string> {
    return new Promise<string>(() => undefined);
  }
}

// Fails the next character or relationship write once armed, then behaves again
class FlakyStore extends InMemoryCharacterStore {
  private character_saves_left = Infinity;
  private fail_relationship_save = false;

  failCharacterSaveAfter(successful_saves: number): void {
    this.character_saves_left = successful_saves;
  }

  failNextRelationshipSave(): void {
    this.fail_relationship_save = true;
  }

  async saveCharacter(character: Character): Promise<void> {
    if (this.character_saves_left <= 0) {
      this.character_saves_left = Infinity;
      throw new Error('db write failed');
    }
    this.character_saves_left--;
    return super.saveCharacter(character);
  }

  async saveRelationship(relationship: Relationship): Promise<void> {
    if (this.fail_relationship_save) {
      this.fail_relationship_save = false;
      throw new Error('db write failed');
    }
    return super.saveRelationship(relationship);
  }
}

class FailingGenerator implements DialogueGenerator {
  async generate(): Promise<string> {
    throw new Error('model unavailable');
  }
}

// Holds back replies from one speaker until the gate opens
class GatedGenerator implements DialogueGenerator {
  private gated_speaker: string;
  private open_gate: () => void = () => undefined;
  private gate: Promise<void>;
  started: string[] = [];

  constructor(gated_speaker: string) {
    this.gated_speaker = gated_speaker;
    this.gate = new Promise<void>(resolve => {
      this.open_gate = resolve;
    });
  }

  async generate(context: DialogueContext): Promise<string> {
    this.started.push(context.speaker.id);
    if (context.speaker.id === this.gated_speaker) {
      await this.gate;
    }
    return `${context.speaker.name} replies`;
  }

  open(): void {
    this.open_gate();
  }
}

const tick = () => new Promise<void>(resolve => setImmediate(resolve));
const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

function silentLogger(): Logger & { log: jest.Mock; warn: jest.Mock; error: jest.Mock } {
  return { log: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

function makeCharacter(id: string, name: string, overrides: Partial<Character> = {}): Character {
  return {
    id,
    name,
    ecosystem_id: 'harbor',
    personality: { openness: 0.5, conscientiousness: 0.5, extraversion: 0.5, agreeableness: 0.5, neuroticism: 0.5 },
    emotional_state: neutralEmotionalState(),
    social_energy: 1,
    interaction_count: 0,
    is_active: true,
    ...overrides
  };
}

function request(
  initiator_id: string,
  target_id: string,
  interaction_type: InteractionType,
  content: string = 'Shall we work on the nets together?'
): InteractionRequest {
  return { initiator_id, target_id, interaction_type, content };
}

describe('Interaction Processor', () => {
  let store: InMemoryCharacterStore;
  let logger: ReturnType<typeof silentLogger>;
  const now = new Date('2026-03-01T08:00:00Z');

  beforeEach(async () => {
    store = new InMemoryCharacterStore();
    logger = silentLogger();

    await store.saveCharacter(makeCharacter('alice', 'Alice'));
    await store.saveCharacter(makeCharacter('bob', 'Bob'));
    await store.saveCharacter(makeCharacter('carol', 'Carol'));
    await store.saveCharacter(makeCharacter('dave', 'Dave'));
  });

  describe('Successful interactions', () => {
    test('a warm collaboration updates both characters and their relationship', async () => {
      const bus = new EcosystemEventBus();
      const events: InteractionEvent[] = [];
      bus.subscribe('harbor', event => {
        if (event.type === 'character_interaction') events.push(event);
      });

      const processor = new InteractionProcessor({
        store,
        sentiment: new FixedSentiment(0.8),
        generator: new EchoGenerator(),
        notifier: bus,
        logger,
        now: () => now
      });

      const result = await processor.process(request('alice', 'bob', 'collaboration'));

      expect(result.success).toBe(true);
      expect(result.response_text).toBe('Bob answers Alice');
      expect(result.sentiment).toBe(0.8);
      expect(result.relationship_delta?.strength_delta).toBeCloseTo(0.08, 10);
      expect(result.relationship_delta?.new_trust).toBeCloseTo(0.54, 10);
      expect(result.relationship_type).toBe('neutral');
      expect(Object.keys(result.emotional_states ?? {}).sort()).toEqual(['alice', 'bob']);

      const alice = await store.getCharacter('alice');
      const bob = await store.getCharacter('bob');
      expect(alice?.social_energy).toBeCloseTo(0.85, 10);
      expect(bob?.social_energy).toBeCloseTo(0.88, 10);
      expect(alice?.interaction_count).toBe(1);
      expect(bob?.interaction_count).toBe(1);
      expect(alice?.last_interaction).toEqual(now);
      expect(alice?.emotional_state.joy).toBeGreaterThan(0);

      const relationship = await store.getRelationship('bob', 'alice');
      expect(relationship?.strength).toBeCloseTo(0.08, 10);
      expect(relationship?.interaction_count).toBe(1);

      expect(events).toHaveLength(1);
      expect(events[0].participants.map(p => p.id)).toEqual(['alice', 'bob']);
      expect(events[0].response).toBe('Bob answers Alice');
      expect(events[0].timestamp).toBe('2026-03-01T08:00:00.000Z');
      expect(events[0].emotional_deltas.bob.joy).toBeCloseTo(events[0].emotional_states.bob.joy, 10);
    });

    test('the responder speaks and hears what the initiator said', async () => {
      const generator = new EchoGenerator();
      const processor = new InteractionProcessor({ store, sentiment: new FixedSentiment(0.2), generator, logger });

      await processor.process(request('carol', 'dave', 'discussion', 'Did you see the storm?'));

      expect(generator.contexts).toHaveLength(1);
      expect(generator.contexts[0].speaker.id).toBe('dave');
      expect(generator.contexts[0].listener.id).toBe('carol');
      expect(generator.contexts[0].content).toBe('Did you see the storm?');
      expect(generator.contexts[0].relationship.interaction_count).toBe(1);
    });

    test('both role orders share one relationship record', async () => {
      const processor = new InteractionProcessor({ store, sentiment: new FixedSentiment(0.5), logger });

      await processor.process(request('alice', 'bob', 'chat'));
      await processor.process(request('bob', 'alice', 'chat'));

      const relationship = await store.getRelationship('alice', 'bob');
      expect(relationship?.interaction_count).toBe(2);
      expect(await store.listRelationships('alice')).toHaveLength(1);
    });

    test('without an external generator the templated voice answers', async () => {
      const processor = new InteractionProcessor({ store, logger });
      const result = await processor.process(request('alice', 'bob', 'greeting', 'Hello there, friend!'));

      expect(result.success).toBe(true);
      expect(result.sentiment).toBe(1);
      expect(result.response_text).toMatch(/[.!?]$/);
    });

    test('conversation turns are recorded and fed into later replies', async () => {
      const history = new InMemoryConversationHistory();
      const generator = new EchoGenerator();
      const processor = new InteractionProcessor({ store, history, generator, sentiment: new FixedSentiment(0), logger, now: () => now });

      await processor.process(request('alice', 'bob', 'greeting', 'Morning!'));
      await processor.process(request('alice', 'bob', 'chat', 'Nice weather.'));

      const turns = await history.recent('harbor', 'alice::bob', 10);
      expect(turns.map(t => `${t.speaker_id}: ${t.text}`)).toEqual([
        'alice: Morning!',
        'bob: Bob answers Alice',
        'alice: Nice weather.',
        'bob: Bob answers Alice'
      ]);
      expect(turns.map(t => t.turn_index)).toEqual([0, 1, 2, 3]);
      expect(generator.contexts[0].recent_history).toEqual([]);
      expect(generator.contexts[1].recent_history.map(t => t.text)).toEqual(['Morning!', 'Bob answers Alice']);
    });

    test('compatibility is computed from stored profiles', async () => {
      const processor = new InteractionProcessor({ store, logger });
      const score = await processor.compatibilityBetween('alice', 'bob');

      expect(score.friendship).toBe(1);
      expect(score.rivalry).toBe(0);
    });
  });

  describe('Invalid requests', () => {
    test('a character cannot interact with itself, and nothing changes', async () => {
      const processor = new InteractionProcessor({ store, logger });

      for (let attempt = 0; attempt < 3; attempt++) {
        await expect(processor.process(request('alice', 'alice', 'chat'))).rejects.toThrow(InvalidParticipantsError);
      }

      const alice = await store.getCharacter('alice');
      expect(alice?.social_energy).toBe(1);
      expect(alice?.interaction_count).toBe(0);
      expect(await store.listRelationships('alice')).toEqual([]);
    });

    test('unknown characters are named in the error', async () => {
      const processor = new InteractionProcessor({ store, logger });

      await expect(processor.process(request('alice', 'ghost', 'chat'))).rejects.toThrow(
        'Unknown character(s): ghost'
      );
    });

    test('an unrecognized interaction type is rejected before anything is read', async () => {
      const processor = new InteractionProcessor({ store, logger });
      const bogus: InteractionRequest = { ...request('alice', 'bob', 'chat'), interaction_type: JSON.parse('"duel"') };

      await expect(processor.process(bogus)).rejects.toThrow(InvalidInteractionTypeError);
    });

    test('a malformed request body is rejected as a bad request, not bad participants', async () => {
      const processor = new InteractionProcessor({ store, logger });
      const wrong_content: InteractionRequest = { ...request('alice', 'bob', 'chat'), content: JSON.parse('42') };
      const blank_initiator = request('', 'bob', 'chat');

      await expect(processor.process(wrong_content)).rejects.toThrow(InvalidRequestError);
      await expect(processor.process(blank_initiator)).rejects.toThrow(InvalidParticipantsError);
    });
  });

  describe('Feasibility', () => {
    test('characters in different ecosystems cannot interact', async () => {
      await store.saveCharacter(makeCharacter('zed', 'Zed', { ecosystem_id: 'forest' }));
      const processor = new InteractionProcessor({ store, logger });

      const result = await processor.process(request('alice', 'zed', 'chat'));

      expect(result).toEqual({
        success: false,
        failure_code: 'different_ecosystems',
        failure_reason: 'Characters are not in the same ecosystem'
      });
    });

    test('an exhausted character cannot interact and no state changes', async () => {
      await store.saveCharacter(makeCharacter('bob', 'Bob', { social_energy: 0.1 }));
      const processor = new InteractionProcessor({ store, logger });

      const result = await processor.process(request('alice', 'bob', 'chat'));

      expect(result.success).toBe(false);
      expect(result.failure_code).toBe('insufficient_energy');
      expect(result.failure_reason).toBe('Bob is too exhausted to interact');
      expect((await store.getCharacter('alice'))?.social_energy).toBe(1);
      expect(await store.getRelationship('alice', 'bob')).toBeNull();
    });

    test('an inactive character cannot interact', async () => {
      await store.saveCharacter(makeCharacter('carol', 'Carol', { is_active: false }));
      const processor = new InteractionProcessor({ store, logger });

      const result = await processor.process(request('carol', 'dave', 'chat'));

      expect(result.failure_code).toBe('inactive_character');
      expect(result.failure_reason).toBe('Carol is inactive');
    });

    test('repeated interactions drain energy until the character is too tired', async () => {
      const processor = new InteractionProcessor({ store, sentiment: new FixedSentiment(0), logger });

      // conflict costs the initiator 0.25: 1 -> 0.75 -> 0.5 -> 0.25 -> 0
      const outcomes: boolean[] = [];
      for (let round = 0; round < 5; round++) {
        outcomes.push((await processor.process(request('alice', 'bob', 'conflict'))).success);
      }

      expect(outcomes).toEqual([true, true, true, true, false]);
      expect((await store.getCharacter('alice'))?.social_energy).toBeCloseTo(0, 10);
      expect((await store.getCharacter('bob'))?.social_energy).toBeCloseTo(0.2, 10);
    });
  });

  describe('Degraded collaborators', () => {
    test('a failing sentiment scorer falls back to neutral', async () => {
      const processor = new InteractionProcessor({ store, sentiment: new FailingSentiment(), logger });

      const result = await processor.process(request('alice', 'bob', 'chat', 'I love this!'));

      expect(result.success).toBe(true);
      expect(result.sentiment).toBe(0);
      expect(result.relationship_delta?.strength_delta).toBe(0);
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    test('a hanging sentiment scorer times out to neutral', async () => {
      const processor = new InteractionProcessor({
        store,
        sentiment: new HangingSentiment(),
        config: { interaction: { sentimentTimeoutMs: 10 } },
        logger
      });

      const result = await processor.process(request('alice', 'bob', 'chat'));

      expect(result.success).toBe(true);
      expect(result.sentiment).toBe(0);
    });

    test('out-of-range sentiment is clamped', async () => {
      const processor = new InteractionProcessor({ store, sentiment: new FixedSentiment(7), logger });

      const result = await processor.process(request('alice', 'bob', 'chat'));
      expect(result.sentiment).toBe(1);
    });

    test('a hanging generator times out to the templated voice', async () => {
      const processor = new InteractionProcessor({
        store,
        generator: new HangingGenerator(),
        sentiment: new FixedSentiment(0.5),
        config: { interaction: { dialogueTimeoutMs: 20 } },
        logger
      });

      const result = await processor.process(request('alice', 'bob', 'greeting', 'Hello!'));
      const candidates = DEFAULT_TEMPLATES.responses.greeting.neutral.map(line => line.replace('{name}', 'Alice'));

      expect(result.success).toBe(true);
      expect(candidates).toContain(result.response_text);
      expect(logger.warn).toHaveBeenCalledWith(
        'Dialogue generation unavailable, using template:',
        expect.any(CollaboratorTimeoutError)
      );
    });

    test('a failing generator falls back to the templated voice', async () => {
      const processor = new InteractionProcessor({ store, generator: new FailingGenerator(), logger });

      const result = await processor.process(request('alice', 'bob', 'greeting', 'Hello!'));

      expect(result.success).toBe(true);
      expect(result.response_text?.length).toBeGreaterThan(0);
      expect(logger.warn).toHaveBeenCalledWith('Dialogue generation unavailable, using template:', expect.any(Error));
    });

    test('a notifier that throws does not fail the interaction', async () => {
      const processor = new InteractionProcessor({
        store,
        notifier: {
          notify: () => {
            throw new Error('broker unreachable');
          }
        },
        logger
      });

      const result = await processor.process(request('alice', 'bob', 'chat'));
      await tick();

      expect(result.success).toBe(true);
      expect(logger.error).toHaveBeenCalledTimes(1);
      expect((await store.getCharacter('bob'))?.interaction_count).toBe(1);
    });

    test('a notifier that rejects does not fail the interaction', async () => {
      const processor = new InteractionProcessor({
        store,
        notifier: { notify: () => Promise.reject(new Error('broker unreachable')) },
        logger
      });

      const result = await processor.process(request('alice', 'bob', 'chat'));
      await tick();

      expect(result.success).toBe(true);
      expect(logger.error).toHaveBeenCalledTimes(1);
    });

    test('a failing history store does not fail the interaction', async () => {
      const processor = new InteractionProcessor({
        store,
        history: {
          recent: () => Promise.reject(new Error('vector store down')),
          append: () => Promise.reject(new Error('vector store down'))
        },
        logger
      });

      const result = await processor.process(request('alice', 'bob', 'chat'));

      expect(result.success).toBe(true);
      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(logger.error).toHaveBeenCalledTimes(1);
    });
  });

  describe('Scenarios', () => {
    test('a first greeting between an agreeable and an anxious character', async () => {
      await store.saveCharacter(makeCharacter('alice', 'Alice', {
        personality: { openness: 0.5, conscientiousness: 0.5, extraversion: 0.5, agreeableness: 0.9, neuroticism: 0.2 }
      }));
      await store.saveCharacter(makeCharacter('bob', 'Bob', {
        personality: { openness: 0.5, conscientiousness: 0.5, extraversion: 0.5, agreeableness: 0.3, neuroticism: 0.8 }
      }));
      const processor = new InteractionProcessor({ store, sentiment: new FixedSentiment(0.5), logger });

      const result = await processor.process(request('alice', 'bob', 'greeting', 'Good morning, Bob!'));

      expect(result.success).toBe(true);
      expect(result.relationship_delta?.strength_delta).toBeCloseTo(0.01, 10);
      expect(result.relationship_delta?.new_trust).toBeCloseTo(0.525, 10);
      expect(result.relationship_delta?.new_familiarity).toBeCloseTo(0.05, 10);
      expect(result.relationship_type).toBe('neutral');
      expect(result.emotional_states?.alice.joy).toBeCloseTo(0.075, 10);
      expect(result.emotional_states?.bob.joy).toBeCloseTo(0.075, 10);
      expect(result.emotional_states?.bob.anger).toBe(0);

      expect((await store.getCharacter('alice'))?.social_energy).toBeCloseTo(0.95, 10);
      expect((await store.getCharacter('bob'))?.social_energy).toBeCloseTo(0.96, 10);
      expect((await store.getRelationship('alice', 'bob'))?.interaction_count).toBe(1);
    });

    test('a near-maximal relationship barely moves and never passes 1', async () => {
      await store.saveRelationship({
        ...createRelationship('harbor', 'alice', 'bob'),
        strength: 0.95,
        trust: 0.9,
        relationship_type: 'close_friend'
      });
      const processor = new InteractionProcessor({ store, sentiment: new FixedSentiment(1), logger });

      const result = await processor.process(request('alice', 'bob', 'collaboration'));
      const delta = result.relationship_delta;

      expect(delta?.new_strength).toBeLessThanOrEqual(1);
      expect(delta?.strength_delta).toBeCloseTo(0.005, 10);
      expect(delta?.strength_delta).toBeLessThan(0.01);
    });

    test('broken trust gains less from the same collaboration than healthy trust', async () => {
      await store.saveRelationship({ ...createRelationship('harbor', 'alice', 'bob'), trust: 0.05 });
      await store.saveRelationship({ ...createRelationship('harbor', 'carol', 'dave'), trust: 0.5 });
      const processor = new InteractionProcessor({ store, sentiment: new FixedSentiment(0.9), logger });

      const broken = await processor.process(request('alice', 'bob', 'collaboration'));
      const healthy = await processor.process(request('carol', 'dave', 'collaboration'));

      expect(broken.relationship_delta?.trust_delta).toBeCloseTo(0.016875, 10);
      expect(healthy.relationship_delta?.trust_delta).toBeCloseTo(0.045, 10);
      expect(broken.relationship_delta?.strength_delta).toBeCloseTo(0.09, 10);
      expect(healthy.relationship_delta?.strength_delta).toBeCloseTo(0.09, 10);
    });
  });

  describe('Relationship events', () => {
    test('crossing a type threshold publishes a relationship change', async () => {
      await store.saveRelationship({
        ...createRelationship('harbor', 'alice', 'bob'),
        strength: 0.69,
        trust: 0.8,
        relationship_type: 'friend'
      });
      const bus = new EcosystemEventBus();
      const events: EcosystemEvent[] = [];
      bus.subscribe('harbor', event => events.push(event));
      const processor = new InteractionProcessor({ store, sentiment: new FixedSentiment(1), notifier: bus, logger });

      const result = await processor.process(request('bob', 'alice', 'collaboration'));

      expect(result.relationship_type).toBe('close_friend');
      expect(events.map(event => event.type)).toEqual(['character_interaction', 'relationship_change']);
      const change = events[1];
      if (change.type !== 'relationship_change') throw new Error('expected a relationship change');
      expect(change.character_a_id).toBe('alice');
      expect(change.character_b_id).toBe('bob');
      expect(change.previous_type).toBe('friend');
      expect(change.relationship_type).toBe('close_friend');
      expect(change.strength).toBeCloseTo(0.721, 10);
    });

    test('an interaction that keeps the type publishes only the interaction', async () => {
      const bus = new EcosystemEventBus();
      const types: string[] = [];
      bus.subscribeAll(event => types.push(event.type));
      const processor = new InteractionProcessor({ store, sentiment: new FixedSentiment(0.5), notifier: bus, logger });

      await processor.process(request('alice', 'bob', 'chat'));

      expect(types).toEqual(['character_interaction']);
    });
  });

  describe('Persistence failures', () => {
    let flaky: FlakyStore;

    beforeEach(async () => {
      flaky = new FlakyStore();
      await flaky.saveCharacter(makeCharacter('alice', 'Alice'));
      await flaky.saveCharacter(makeCharacter('bob', 'Bob'));
    });

    test('a failed character write restores both characters and publishes nothing', async () => {
      const bus = new EcosystemEventBus();
      const types: string[] = [];
      bus.subscribeAll(event => types.push(event.type));
      const processor = new InteractionProcessor({ store: flaky, notifier: bus, sentiment: new FixedSentiment(0.5), logger });
      flaky.failCharacterSaveAfter(1);

      await expect(processor.process(request('alice', 'bob', 'chat'))).rejects.toThrow('db write failed');

      const alice = await flaky.getCharacter('alice');
      const bob = await flaky.getCharacter('bob');
      expect(alice?.interaction_count).toBe(0);
      expect(alice?.social_energy).toBe(1);
      expect(alice?.emotional_state).toEqual(neutralEmotionalState());
      expect(bob?.interaction_count).toBe(0);
      expect(await flaky.getRelationship('alice', 'bob')).toBeNull();
      expect(types).toEqual([]);
      expect(logger.error).toHaveBeenCalledWith(
        'Failed to persist interaction, restoring previous state:',
        expect.any(Error)
      );
    });

    test('a failed relationship write restores the characters and the previous relationship', async () => {
      await flaky.saveRelationship({
        ...createRelationship('harbor', 'alice', 'bob'),
        strength: 0.4,
        trust: 0.6,
        interaction_count: 3,
        relationship_type: 'acquaintance'
      });
      const processor = new InteractionProcessor({ store: flaky, sentiment: new FixedSentiment(0.5), logger });
      flaky.failNextRelationshipSave();

      await expect(processor.process(request('alice', 'bob', 'chat'))).rejects.toThrow('db write failed');

      const relationship = await flaky.getRelationship('alice', 'bob');
      expect(relationship?.strength).toBe(0.4);
      expect(relationship?.interaction_count).toBe(3);
      expect((await flaky.getCharacter('alice'))?.social_energy).toBe(1);
      expect((await flaky.getCharacter('bob'))?.social_energy).toBe(1);

      const retry = await processor.process(request('alice', 'bob', 'chat'));
      expect(retry.success).toBe(true);
      expect((await flaky.getRelationship('alice', 'bob'))?.interaction_count).toBe(4);
    });
  });

  describe('Concurrency', () => {
    test('interactions over disjoint pairs run side by side', async () => {
      const generator = new GatedGenerator('bob');
      const processor = new InteractionProcessor({ store, generator, sentiment: new FixedSentiment(0.3), logger });

      const first = processor.process(request('alice', 'bob', 'chat'));
      const second = await processor.process(request('carol', 'dave', 'chat'));

      expect(second.success).toBe(true);
      expect([...generator.started].sort()).toEqual(['bob', 'dave']);

      generator.open();
      expect((await first).success).toBe(true);
    });

    test('interactions sharing a character are serialized', async () => {
      const generator = new GatedGenerator('bob');
      const processor = new InteractionProcessor({ store, generator, sentiment: new FixedSentiment(0.3), logger });

      let second_done = false;
      const first = processor.process(request('alice', 'bob', 'chat'));
      const second = processor.process(request('bob', 'carol', 'chat')).then(result => {
        second_done = true;
        return result;
      });

      await sleep(20);
      expect(second_done).toBe(false);
      expect(generator.started).toEqual(['bob']);

      generator.open();
      const [first_result, second_result] = await Promise.all([first, second]);
      expect(first_result.success).toBe(true);
      expect(second_result.success).toBe(true);

      // chat costs 0.1; bob responds first (x0.8) then initiates
      const bob = await store.getCharacter('bob');
      expect(bob?.social_energy).toBeCloseTo(0.82, 10);
      expect(bob?.interaction_count).toBe(2);
    });

    test('a character busy past the lock timeout rejects the waiting interaction', async () => {
      const generator = new GatedGenerator('bob');
      const locks = new CharacterLockManager();
      const processor = new InteractionProcessor({
        store,
        generator,
        locks,
        sentiment: new FixedSentiment(0.3),
        config: { interaction: { lockTimeoutMs: 20 } },
        logger
      });

      const first = processor.process(request('alice', 'bob', 'chat'));

      await expect(processor.process(request('bob', 'alice', 'chat'))).rejects.toThrow(InteractionBusyError);

      generator.open();
      expect((await first).success).toBe(true);
      expect(locks.isLocked('alice')).toBe(false);
      expect(locks.isLocked('bob')).toBe(false);
      expect((await store.getCharacter('alice'))?.interaction_count).toBe(1);
    });
  });
});
