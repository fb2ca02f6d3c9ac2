/** Base class for every failure the requirement engine reports as an error. */
export class RequirementError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RequirementError";
  }
}

/**
 * A requirement tree or document is malformed: missing bounds, wrong types,
 * unknown variant. Raised while building or deserializing, never mid-walk.
 */
export class InvalidRequirement extends RequirementError {
  readonly issues: string[];

  constructor(issues: string | string[]) {
    const list = Array.isArray(issues) ? issues : [issues];
    super(`Invalid requirement: ${list.join("; ")}`);
    this.name = "InvalidRequirement";
    this.issues = list;
  }
}

/** The data source behind a fact provider failed while answering a query. */
export class FactProviderError extends RequirementError {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "FactProviderError";
  }
}

export class CharacterNotFound extends FactProviderError {
  readonly characterId: number;

  constructor(characterId: number) {
    super(`Character ${characterId} not found`);
    this.name = "CharacterNotFound";
    this.characterId = characterId;
  }
}

export function isRequirementError(err: unknown): err is RequirementError {
  return err instanceof RequirementError;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
