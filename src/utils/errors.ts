export type EcosystemErrorCode =
  | 'invalid_participants'
  | 'invalid_request'
  | 'invalid_profile'
  | 'invalid_interaction_type'
  | 'unknown_relationship'
  | 'interaction_busy'
  | 'invalid_configuration'
  | 'collaborator_timeout';

export class EcosystemError extends Error {
  readonly code: EcosystemErrorCode;

  constructor(code: EcosystemErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidParticipantsError extends EcosystemError {
  constructor(message: string) {
    super('invalid_participants', message);
  }
}

export class InvalidRequestError extends EcosystemError {
  constructor(message: string) {
    super('invalid_request', message);
  }
}

export class InvalidProfileError extends EcosystemError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('invalid_profile', `Invalid personality profile: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class InvalidInteractionTypeError extends EcosystemError {
  readonly interactionType: string;

  constructor(interactionType: string) {
    super('invalid_interaction_type', `Unrecognized interaction type: ${interactionType}`);
    this.interactionType = interactionType;
  }
}

export class UnknownRelationshipError extends EcosystemError {
  constructor(character_a_id: string, character_b_id: string) {
    super('unknown_relationship', `No relationship between ${character_a_id} and ${character_b_id}`);
  }
}

export class InteractionBusyError extends EcosystemError {
  readonly characterId: string;

  constructor(characterId: string, timeoutMs: number) {
    super('interaction_busy', `Character ${characterId} is busy (waited ${timeoutMs}ms)`);
    this.characterId = characterId;
  }
}

export class ConfigurationError extends EcosystemError {
  constructor(message: string) {
    super('invalid_configuration', message);
  }
}

export class CollaboratorTimeoutError extends EcosystemError {
  constructor(label: string, timeoutMs: number) {
    super('collaborator_timeout', `${label} timed out after ${timeoutMs}ms`);
  }
}
