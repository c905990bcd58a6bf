import { z } from 'zod';
import { INTERACTION_TYPES, InteractionRequest, PersonalityProfile } from '../types';
import { InvalidInteractionTypeError, InvalidParticipantsError, InvalidProfileError, InvalidRequestError } from './errors';

const trait = z.number().finite().min(0).max(1);

export const personalityProfileSchema = z.object({
  openness: trait,
  conscientiousness: trait,
  extraversion: trait,
  agreeableness: trait,
  neuroticism: trait
});

export const interactionRequestSchema = z.object({
  initiator_id: z.string().min(1),
  target_id: z.string().min(1),
  interaction_type: z.enum(INTERACTION_TYPES),
  content: z.string(),
  context: z.record(z.unknown()).optional()
});

export function validateProfile(profile: PersonalityProfile): PersonalityProfile {
  const parsed = personalityProfileSchema.safeParse(profile);
  if (!parsed.success) {
    throw new InvalidProfileError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'profile'} ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * Checks an incoming request before any lock is taken or any record is read.
 * An unknown interaction type wins over every other problem so callers get the
 * most specific error.
 */
export function validateInteractionRequest(request: InteractionRequest): InteractionRequest {
  const parsed = interactionRequestSchema.safeParse(request);

  if (!parsed.success) {
    const typeIssue = parsed.error.issues.find(issue => issue.path[0] === 'interaction_type');
    if (typeIssue) {
      throw new InvalidInteractionTypeError(String(request.interaction_type));
    }
    const describe = (issues: z.ZodIssue[]) =>
      issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');

    const participantIssues = parsed.error.issues.filter(
      issue => issue.path[0] === 'initiator_id' || issue.path[0] === 'target_id'
    );
    if (participantIssues.length > 0) {
      throw new InvalidParticipantsError(describe(participantIssues));
    }
    throw new InvalidRequestError(describe(parsed.error.issues));
  }

  if (parsed.data.initiator_id === parsed.data.target_id) {
    throw new InvalidParticipantsError(`A character cannot interact with itself (${parsed.data.initiator_id})`);
  }

  return parsed.data;
}
