import { z } from 'zod';
import templateData from '../data/dialogue-templates.json';
import { DialogueContext, DialogueGenerator, EMOTIONS, Mood, Relationship } from '../types';
import { describePersonality, dominantTrait } from './personality';
import { dominantEmotion } from './emotion';
import { pairKey } from './relationship';

export type Tone = 'friendly' | 'neutral' | 'unfriendly';

const lines = z.array(z.string().min(1)).min(1);
const toneLines = z.object({ friendly: lines, neutral: lines, unfriendly: lines });
const traitLines = z.object({ high: lines, low: lines });

const templateSchema = z.object({
  responses: z.object({
    greeting: toneLines,
    chat: toneLines,
    discussion: toneLines,
    debate: toneLines,
    collaboration: toneLines,
    emotional_support: toneLines,
    conflict: toneLines
  }),
  trait_flourishes: z.object({
    openness: traitLines,
    conscientiousness: traitLines,
    extraversion: traitLines,
    agreeableness: traitLines,
    neuroticism: traitLines
  }),
  history_references: toneLines
});

export type DialogueTemplates = z.infer<typeof templateSchema>;

export const DEFAULT_TEMPLATES: DialogueTemplates = templateSchema.parse(templateData);

const HISTORY_REFERENCE_AFTER = 10;

export function relationshipTone(relationship: Relationship, mood: Mood): Tone {
  let tone: Tone = 'neutral';
  if (relationship.strength > 0.3 && relationship.trust > 0.5) tone = 'friendly';
  else if (relationship.strength < -0.3 || relationship.trust < 0.3) tone = 'unfriendly';

  // A bad mood cools a warm reply, a good one softens a cold reply
  if (tone === 'friendly' && mood === 'negative') return 'neutral';
  if (tone === 'unfriendly' && mood === 'positive') return 'neutral';
  if (tone === 'neutral' && mood === 'negative' && relationship.strength < 0) return 'unfriendly';
  return tone;
}

// FNV-1a, 32 bit
export function stableHash(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash >>> 0;
}

function pick<T>(options: readonly T[], seed: number): T {
  return options[seed % options.length];
}

function finishSentence(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length === 0) return trimmed;
  const capitalized = trimmed.charAt(0).toUpperCase() + trimmed.slice(1);
  return /[.!?]$/.test(capitalized) ? capitalized : `${capitalized}.`;
}

/**
 * Deterministic fallback voice. The same pair at the same point in its
 * history always gets the same line, so reruns are reproducible.
 */
export class TemplateDialogueGenerator implements DialogueGenerator {
  private templates: DialogueTemplates;

  constructor(templates: DialogueTemplates = DEFAULT_TEMPLATES) {
    this.templates = templates;
  }

  async generate(context: DialogueContext): Promise<string> {
    return this.render(context);
  }

  render(context: DialogueContext): string {
    const tone = relationshipTone(context.relationship, context.mood);
    const seed = stableHash(
      `${pairKey(context.speaker.id, context.listener.id)}:${context.relationship.interaction_count}:${context.interaction_type}`
    );

    const parts: string[] = [];

    const trait = dominantTrait(context.speaker_profile);
    if (trait && seed % 3 === 0) {
      parts.push(pick(this.templates.trait_flourishes[trait.trait][trait.level], seed >>> 3));
    }

    const base = pick(this.templates.responses[context.interaction_type][tone], seed);
    parts.push(base.replace(/\{name\}/g, context.listener.name));

    if (context.relationship.interaction_count > HISTORY_REFERENCE_AFTER) {
      parts.push(pick(this.templates.history_references[tone], seed >>> 5));
    }

    return parts.map(finishSentence).join(' ');
  }
}

function describeEmotion(context: DialogueContext): string {
  const felt = EMOTIONS
    .filter(emotion => context.speaker_emotion[emotion] >= 0.05)
    .map(emotion => `${emotion} ${(context.speaker_emotion[emotion] * 100).toFixed(0)}%`);

  if (felt.length === 0) return 'calm, no strong feelings';
  return `${felt.join(', ')} (dominant: ${dominantEmotion(context.speaker_emotion)})`;
}

export function buildDialoguePrompts(context: DialogueContext): { system: string; user: string } {
  const { relationship } = context;
  const history_lines = context.recent_history
    .map(turn => `${turn.speaker_name}: ${turn.text}`)
    .join('\n');

  const system = `You voice ${context.speaker.name}, a character living in a shared ecosystem with other characters.
Stay in character. Reply with one or two short sentences of dialogue only, no stage directions, no quotes.

PERSONALITY:
${describePersonality(context.speaker_profile)}
Openness ${(context.speaker_profile.openness * 100).toFixed(0)}%, conscientiousness ${(context.speaker_profile.conscientiousness * 100).toFixed(0)}%, extraversion ${(context.speaker_profile.extraversion * 100).toFixed(0)}%, agreeableness ${(context.speaker_profile.agreeableness * 100).toFixed(0)}%, neuroticism ${(context.speaker_profile.neuroticism * 100).toFixed(0)}%

CURRENT FEELINGS: ${describeEmotion(context)}
MOOD: ${context.mood}`;

  const user = `RELATIONSHIP WITH ${context.listener.name.toUpperCase()}:
- Type: ${relationship.relationship_type}
- Strength: ${relationship.strength.toFixed(2)} (-1 hostile .. +1 devoted)
- Trust: ${relationship.trust.toFixed(2)}
- Familiarity: ${relationship.familiarity.toFixed(2)}
- Interactions so far: ${relationship.interaction_count}

INTERACTION: ${context.interaction_type}

RECENT CONVERSATION:
${history_lines || '(none yet)'}

${context.listener.name} says: "${context.content}"

Respond as ${context.speaker.name}:`;

  return { system, user };
}
