// In-process store for characters, relationships and conversation history.
// A relational/graph backend plugs in behind the same CharacterStore interface.

import {
  Character,
  CharacterStore,
  ConversationHistory,
  ConversationTurn,
  Relationship
} from '../types';
import { pairKey } from '../engines/relationship';

export class InMemoryCharacterStore implements CharacterStore {
  private characters: Map<string, Character> = new Map();
  private relationships: Map<string, Relationship> = new Map();

  // Records are copied on the way in and out so callers never alias stored state
  async getCharacter(id: string): Promise<Character | null> {
    const character = this.characters.get(id);
    return character ? structuredClone(character) : null;
  }

  async saveCharacter(character: Character): Promise<void> {
    this.characters.set(character.id, structuredClone(character));
  }

  async getRelationship(character_a_id: string, character_b_id: string): Promise<Relationship | null> {
    const relationship = this.relationships.get(pairKey(character_a_id, character_b_id));
    return relationship ? structuredClone(relationship) : null;
  }

  async saveRelationship(relationship: Relationship): Promise<void> {
    const key = pairKey(relationship.character_a_id, relationship.character_b_id);
    this.relationships.set(key, structuredClone(relationship));
  }

  async listRelationships(character_id: string): Promise<Relationship[]> {
    return Array.from(this.relationships.values())
      .filter(r => r.character_a_id === character_id || r.character_b_id === character_id)
      .map(r => structuredClone(r));
  }

  async listCharacters(ecosystem_id?: string): Promise<Character[]> {
    return Array.from(this.characters.values())
      .filter(c => ecosystem_id === undefined || c.ecosystem_id === ecosystem_id)
      .map(c => structuredClone(c));
  }
}

export class InMemoryConversationHistory implements ConversationHistory {
  private turns: Map<string, ConversationTurn[]> = new Map();
  private maxTurnsPerPair: number;

  constructor(maxTurnsPerPair: number = 200) {
    this.maxTurnsPerPair = maxTurnsPerPair;
  }

  async recent(ecosystem_id: string, pair_key: string, limit: number): Promise<ConversationTurn[]> {
    if (limit <= 0) return [];
    const turns = this.turns.get(`${ecosystem_id}/${pair_key}`) ?? [];
    return turns.slice(-limit).map(turn => ({ ...turn }));
  }

  async append(turn: ConversationTurn): Promise<void> {
    const key = `${turn.ecosystem_id}/${turn.pair_key}`;
    const turns = this.turns.get(key) ?? [];
    turns.push({ ...turn });
    turns.sort((a, b) => a.turn_index - b.turn_index);

    if (turns.length > this.maxTurnsPerPair) {
      turns.splice(0, turns.length - this.maxTurnsPerPair);
    }
    this.turns.set(key, turns);
  }
}
